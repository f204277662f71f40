/**
 * Fire-and-forget wrapper around a presentation target.
 *
 * Every call is queued and runs after the engine's current step; a failing
 * side effect is reported and never reaches the timing code.
 */

import type { NotificationKind, StimulusOutput } from '@/types';

export class DeferredOutput implements StimulusOutput {
  private readonly target: StimulusOutput;

  constructor(target: StimulusOutput) {
    this.target = target;
  }

  setInstructionText(text: string): void {
    this.defer('setInstructionText', () => this.target.setInstructionText(text));
  }

  clearScreen(): void {
    this.defer('clearScreen', () => this.target.clearScreen());
  }

  showVisualCue(colorHex: string, radiusPx: number, durationMs: number): void {
    this.defer('showVisualCue', () => this.target.showVisualCue(colorHex, radiusPx, durationMs));
  }

  hideVisualCue(): void {
    this.defer('hideVisualCue', () => this.target.hideVisualCue());
  }

  playTone(frequencyHz: number, durationMs: number): void {
    this.defer('playTone', () => this.target.playTone(frequencyHz, durationMs));
  }

  playNotification(kind: NotificationKind): void {
    this.defer('playNotification', () => this.target.playNotification(kind));
  }

  private defer(label: string, effect: () => void): void {
    queueMicrotask(() => {
      try {
        effect();
      } catch (error) {
        console.error(`Stimulus output ${label} failed:`, error);
      }
    });
  }
}
