/**
 * Trial Scheduler
 * Go/No-Go ratio algebra and per-block randomized trial sequences.
 *
 * Digits are drawn with replacement from each class by weight and the
 * combined list is shuffled, so the configured ratio holds in expectation
 * without reconciling a fixed deck against arbitrary float ratios.
 */

import * as d3 from 'd3';
import { InvalidConfigError } from './errors';
import { DIGITS } from '@/types';
import type { Digit, DigitProbabilities, DigitWeights, GoNoGoConfig, TrialPlan, TrialSpec } from '@/types';

export type RandomSource = () => number;

export type ScheduleConfig = Pick<GoNoGoConfig, 'goDigits' | 'nogoDigits' | 'digitWeights' | 'nTrialsPerBlock'>;

export class TrialScheduler {

  // =========================================================================
  // RATIO
  // =========================================================================

  /**
   * Share of Go trials: total positive Go weight over total positive weight.
   * Throws InvalidConfig for empty or overlapping sets and for zero totals.
   */
  static computeGoRatio(goDigits: readonly Digit[], nogoDigits: readonly Digit[], weights: DigitWeights): number {
    TrialScheduler.assertDigitSets(goDigits, nogoDigits);
    const totalGo = TrialScheduler.positiveWeightTotal(goDigits, weights);
    const totalNogo = TrialScheduler.positiveWeightTotal(nogoDigits, weights);
    if (totalGo <= 0 || totalNogo <= 0) {
      throw new InvalidConfigError(['Non-zero weights required for both Go and No-Go digits']);
    }
    return totalGo / (totalGo + totalNogo);
  }

  static splitCounts(nTrials: number, goRatio: number): { nGo: number; nNogo: number } {
    const nGo = Math.max(0, Math.min(Math.round(nTrials * goRatio), nTrials));
    return { nGo, nNogo: nTrials - nGo };
  }

  // =========================================================================
  // SEQUENCES
  // =========================================================================

  static generateTrialSchedule(
    config: ScheduleConfig,
    goRatio: number,
    random: RandomSource = Math.random
  ): TrialSpec[] {
    TrialScheduler.assertDigitSets(config.goDigits, config.nogoDigits);
    if (!Number.isInteger(config.nTrialsPerBlock) || config.nTrialsPerBlock <= 0) {
      throw new InvalidConfigError([`Trials per block must be a positive integer, got ${config.nTrialsPerBlock}`]);
    }

    const { nGo, nNogo } = TrialScheduler.splitCounts(config.nTrialsPerBlock, goRatio);
    const drawGo = TrialScheduler.weightedSampler(config.goDigits, config.digitWeights, 'Go', random);
    const drawNogo = TrialScheduler.weightedSampler(config.nogoDigits, config.digitWeights, 'No-Go', random);

    const trials: TrialSpec[] = [];
    for (let i = 0; i < nGo; i++) trials.push({ digit: drawGo(), isGo: true });
    for (let i = 0; i < nNogo; i++) trials.push({ digit: drawNogo(), isGo: false });

    return d3.shuffler(random)(trials);
  }

  /** One independently drawn sequence per block; ratio and weights shared */
  static buildTrialPlan(
    config: ScheduleConfig & Pick<GoNoGoConfig, 'nBlocks'>,
    random: RandomSource = Math.random
  ): TrialPlan {
    const goRatio = TrialScheduler.computeGoRatio(config.goDigits, config.nogoDigits, config.digitWeights);
    const blocks: TrialSpec[][] = [];
    for (let b = 0; b < config.nBlocks; b++) {
      blocks.push(TrialScheduler.generateTrialSchedule(config, goRatio, random));
    }
    return { goRatio, blocks };
  }

  // =========================================================================
  // PREVIEW
  // =========================================================================

  /**
   * Per-digit probability of appearing on any given trial. All zeros when
   * the configuration has no valid ratio.
   */
  static digitProbabilities(config: Pick<GoNoGoConfig, 'goDigits' | 'nogoDigits' | 'digitWeights'>): DigitProbabilities {
    const go = TrialScheduler.zeroWeights();
    const nogo = TrialScheduler.zeroWeights();
    let ratio: number;
    try {
      ratio = TrialScheduler.computeGoRatio(config.goDigits, config.nogoDigits, config.digitWeights);
    } catch (error) {
      if (error instanceof InvalidConfigError) {
        return { go, nogo, goTotal: 0, nogoTotal: 0 };
      }
      throw error;
    }

    const goWeight = TrialScheduler.positiveWeightTotal(config.goDigits, config.digitWeights);
    const nogoWeight = TrialScheduler.positiveWeightTotal(config.nogoDigits, config.digitWeights);
    for (const d of config.goDigits) {
      go[d] = (Math.max(config.digitWeights[d], 0) / goWeight) * ratio;
    }
    for (const d of config.nogoDigits) {
      nogo[d] = (Math.max(config.digitWeights[d], 0) / nogoWeight) * (1 - ratio);
    }
    return {
      go,
      nogo,
      goTotal: d3.sum(DIGITS, d => go[d]),
      nogoTotal: d3.sum(DIGITS, d => nogo[d]),
    };
  }

  // =========================================================================
  // HELPERS
  // =========================================================================

  private static assertDigitSets(goDigits: readonly Digit[], nogoDigits: readonly Digit[]): void {
    const issues: string[] = [];
    if (goDigits.length === 0) issues.push('At least one Go digit is required');
    if (nogoDigits.length === 0) issues.push('At least one No-Go digit is required');
    const nogo = new Set(nogoDigits);
    const overlap = [...new Set(goDigits)].filter(d => nogo.has(d)).sort((a, b) => a - b);
    if (overlap.length > 0) {
      issues.push(`Digits cannot be both Go and No-Go: ${overlap.join(', ')}`);
    }
    if (issues.length > 0) throw new InvalidConfigError(issues);
  }

  private static positiveWeightTotal(digits: readonly Digit[], weights: DigitWeights): number {
    return d3.sum(digits, d => (weights[d] > 0 ? weights[d] : 0));
  }

  /**
   * Weighted draw with replacement over the digits whose weight is positive
   */
  private static weightedSampler(
    digits: readonly Digit[],
    weights: DigitWeights,
    label: string,
    random: RandomSource
  ): () => Digit {
    const candidates = digits.filter(d => weights[d] > 0);
    if (candidates.length === 0) {
      throw new InvalidConfigError([`Non-zero weights are required for ${label} digits`]);
    }
    const total = d3.sum(candidates, d => weights[d]);
    const cumulative = d3.cumsum(candidates, d => weights[d] / total);
    const last = candidates.length - 1;
    return () => candidates[Math.min(d3.bisectRight(cumulative, random()), last)];
  }

  private static zeroWeights(): DigitWeights {
    return { 0: 0, 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0, 8: 0, 9: 0 };
  }
}
