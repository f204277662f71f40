/**
 * Post-Session Results View
 * Text rendering of the Go/No-Go summary metrics shown after a run
 */

import { DIGITS } from '@/types';
import type { DigitProbabilities, GoNoGoMetrics } from '@/types';

const UNAVAILABLE = 'N/A';

export function formatPercent(value: number | null): string {
  return value === null || !Number.isFinite(value) ? UNAVAILABLE : `${value.toFixed(1)}%`;
}

export function formatSeconds(value: number | null): string {
  return value === null || !Number.isFinite(value) ? UNAVAILABLE : `${value.toFixed(3)} s`;
}

/** Pre-run listing of every digit that can appear and how often */
export function formatDigitPreview(probabilities: DigitProbabilities): string {
  const lines = ['Digit probabilities:'];
  for (const digit of DIGITS) {
    if (probabilities.go[digit] > 0) {
      lines.push(`  ${digit}  Go     ${formatPercent(probabilities.go[digit] * 100)}`);
    } else if (probabilities.nogo[digit] > 0) {
      lines.push(`  ${digit}  No-Go  ${formatPercent(probabilities.nogo[digit] * 100)}`);
    }
  }
  lines.push(`  Go ${formatPercent(probabilities.goTotal * 100)}, No-Go ${formatPercent(probabilities.nogoTotal * 100)}`);
  return lines.join('\n');
}

export interface ResultsViewOptions {
  metrics: GoNoGoMetrics;
  completed: boolean;
  /** Shown under the summary; omitted when empty */
  footer?: string;
}

export class ResultsView {
  private static readonly LABEL_WIDTH = 24;

  private options: ResultsViewOptions;

  constructor(options: ResultsViewOptions) {
    this.options = options;
  }

  /** Lines of the results screen, without trailing newline */
  render(): string {
    const { metrics, completed, footer } = this.options;
    const lines = [
      completed ? 'Results' : 'Results (run aborted)',
      '',
      this.row('Go hit rate:', formatPercent(metrics.goHitPercent)),
      this.row('No-Go commission rate:', formatPercent(metrics.nogoCommissionPercent)),
      this.row('Mean RT (Go hits):', formatSeconds(metrics.meanRtGoHit)),
      this.row('Mean RT (commissions):', formatSeconds(metrics.meanRtNogoCommission)),
    ];
    if (footer) lines.push('', footer);
    return lines.join('\n');
  }

  private row(label: string, value: string): string {
    return `${label.padEnd(ResultsView.LABEL_WIDTH)}${value}`;
  }
}
