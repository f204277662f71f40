import type { KeyHandler, KeySource } from '@/components/KeyboardInput';
import type { Clock, NotificationKind, StimulusOutput } from '@/types';

export const SESSION_START = new Date(2024, 0, 15, 9, 0, 0);

/** Follows the (faked) Date, so vi.advanceTimersByTime moves both clocks */
export function createTestClock(): Clock {
  return {
    wallNow: () => new Date(),
    monotonicMs: () => Date.now(),
  };
}

export interface ManualClock {
  clock: Clock;
  advance(ms: number): void;
}

export function createManualClock(start: Date = SESSION_START): ManualClock {
  let offsetMs = 0;
  return {
    clock: {
      wallNow: () => new Date(start.getTime() + offsetMs),
      monotonicMs: () => offsetMs,
    },
    advance(ms: number) {
      offsetMs += ms;
    },
  };
}

export interface OutputCall {
  method: keyof StimulusOutput;
  args: unknown[];
}

export class RecordingOutput implements StimulusOutput {
  readonly calls: OutputCall[] = [];
  readonly texts: string[] = [];

  setInstructionText(text: string): void {
    this.texts.push(text);
    this.record('setInstructionText', text);
  }

  clearScreen(): void {
    this.record('clearScreen');
  }

  showVisualCue(colorHex: string, radiusPx: number, durationMs: number): void {
    this.record('showVisualCue', colorHex, radiusPx, durationMs);
  }

  hideVisualCue(): void {
    this.record('hideVisualCue');
  }

  playTone(frequencyHz: number, durationMs: number): void {
    this.record('playTone', frequencyHz, durationMs);
  }

  playNotification(kind: NotificationKind): void {
    this.record('playNotification', kind);
  }

  callsTo(method: keyof StimulusOutput): unknown[][] {
    return this.calls.filter(call => call.method === method).map(call => call.args);
  }

  get lastText(): string | undefined {
    return this.texts[this.texts.length - 1];
  }

  private record(method: keyof StimulusOutput, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }
}

export class FakeKeySource implements KeySource {
  private handlers: Set<KeyHandler> = new Set();

  subscribe(handler: KeyHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  press(key: string): void {
    for (const handler of [...this.handlers]) handler(key);
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }
}
