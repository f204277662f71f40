/**
 * Metrics Calculator
 * Hit / commission rates and mean reaction times over a finished Go/No-Go log.
 *
 * Pure function of the log's relative timeline. A value is `null` when its
 * denominator is zero. Trials left `pending` by an abort are not scored.
 */

import * as d3 from 'd3';
import type { GoNoGoLog, GoNoGoMetrics, RelativeTime, TrialRecord } from '@/types';

export class MetricsCalculator {

  static computeMetrics(log: Pick<GoNoGoLog, 'timingRelative'>): GoNoGoMetrics {
    const trials = MetricsCalculator.scoredTrials(log);
    const goTrials = trials.filter(t => t.isGoTrial);
    const nogoTrials = trials.filter(t => !t.isGoTrial);

    const goHits = goTrials.filter(t => t.outcome === 'hit');
    const nogoCommissions = nogoTrials.filter(t => t.outcome === 'commission_error');

    return {
      goHitPercent: MetricsCalculator.percent(goHits.length, goTrials.length),
      nogoCommissionPercent: MetricsCalculator.percent(nogoCommissions.length, nogoTrials.length),
      meanRtGoHit: MetricsCalculator.meanReactionTime(goHits),
      meanRtNogoCommission: MetricsCalculator.meanReactionTime(nogoCommissions),
    };
  }

  /** Trials of every block in block order, excluding pending ones */
  static scoredTrials(log: Pick<GoNoGoLog, 'timingRelative'>): TrialRecord<RelativeTime>[] {
    const blocks = Object.values(log.timingRelative.blocks).sort((a, b) => a.blockIndex - b.blockIndex);
    return blocks.flatMap(block => block.trials).filter(t => t.outcome !== 'pending');
  }

  /** Response minus onset on the relative clock, in seconds */
  static reactionTime(trial: TrialRecord<RelativeTime>): number | null {
    if (trial.response === null) return null;
    return trial.response - trial.onset;
  }

  private static meanReactionTime(trials: TrialRecord<RelativeTime>[]): number | null {
    return d3.mean(trials, t => MetricsCalculator.reactionTime(t)) ?? null;
  }

  private static percent(numerator: number, denominator: number): number | null {
    if (denominator <= 0) return null;
    return (numerator / denominator) * 100;
  }
}
