/**
 * Terminal presentation target: instruction text and the visual cue, held as
 * a snapshot the ink view subscribes to. Audio goes through the AudioManager.
 */

import { getAudioManager, type AudioManager } from '@/lib/audioManager';
import type { NotificationKind, StimulusOutput } from '@/types';

export interface VisualCue {
  colorHex: string;
  radiusPx: number;
}

export interface ScreenSnapshot {
  instruction: string;
  cue: VisualCue | null;
}

const BLANK: ScreenSnapshot = { instruction: '', cue: null };

export class TerminalScreen implements StimulusOutput {
  private audio: AudioManager;
  private snapshot: ScreenSnapshot = BLANK;
  private listeners: Set<() => void> = new Set();
  private cueTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(audio: AudioManager = getAudioManager()) {
    this.audio = audio;
  }

  // === STORE (useSyncExternalStore) ===
  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): ScreenSnapshot => this.snapshot;

  // === StimulusOutput ===
  setInstructionText(text: string): void {
    this.update({ ...this.snapshot, instruction: text });
  }

  clearScreen(): void {
    this.cancelCueTimer();
    this.update(BLANK);
  }

  showVisualCue(colorHex: string, radiusPx: number, durationMs: number): void {
    this.cancelCueTimer();
    this.update({ ...this.snapshot, cue: { colorHex, radiusPx } });
    this.cueTimer = setTimeout(() => {
      this.cueTimer = null;
      this.hideVisualCue();
    }, durationMs);
  }

  hideVisualCue(): void {
    this.cancelCueTimer();
    if (!this.snapshot.cue) return;
    this.update({ ...this.snapshot, cue: null });
  }

  playTone(frequencyHz: number, durationMs: number): void {
    this.audio.playTone(frequencyHz, durationMs);
  }

  playNotification(kind: NotificationKind): void {
    this.audio.playNotification(kind).catch(error => {
      console.error(`Notification "${kind}" failed:`, error);
    });
  }

  /** Drops the pending cue timer and detaches the view */
  destroy(): void {
    this.cancelCueTimer();
    this.snapshot = BLANK;
    this.listeners.clear();
  }

  private update(next: ScreenSnapshot): void {
    this.snapshot = next;
    for (const listener of [...this.listeners]) listener();
  }

  private cancelCueTimer(): void {
    if (this.cueTimer !== null) {
      clearTimeout(this.cueTimer);
      this.cueTimer = null;
    }
  }
}
