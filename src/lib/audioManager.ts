/**
 * Audio Manager
 * Synthesizes cue and notification tones and hands them to an output sink
 */

import { sleep } from './timing';
import type { NotificationKind } from '@/types';

export interface ToneBuffer {
  frequencyHz: number;
  durationMs: number;
  sampleRate: number;
  samples: Float32Array;
}

/** Anything able to render a mono PCM buffer */
export interface AudioSink {
  play(buffer: ToneBuffer): void;
}

/** Rings the terminal bell; the samples themselves are not rendered */
export class TerminalBellSink implements AudioSink {
  private readonly stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
  }

  play(_buffer: ToneBuffer): void {
    this.stream.write('\x07');
  }
}

export interface AudioConfig {
  volume?: number;
  sampleRate?: number;
  sink?: AudioSink;
}

interface ToneStep {
  frequencyHz: number;
  durationMs: number;
}

export const NOTIFICATION_SEQUENCES: Record<NotificationKind, { tones: ToneStep[]; gapsMs: number[] }> = {
  start_sequence: {
    tones: [
      { frequencyHz: 800, durationMs: 180 },
      { frequencyHz: 1000, durationMs: 180 },
      { frequencyHz: 1200, durationMs: 180 },
    ],
    gapsMs: [80, 80],
  },
  end_sequence: {
    tones: [
      { frequencyHz: 900, durationMs: 200 },
      { frequencyHz: 700, durationMs: 200 },
      { frequencyHz: 500, durationMs: 400 },
    ],
    gapsMs: [150, 250],
  },
  high_beep: { tones: [{ frequencyHz: 1000, durationMs: 300 }], gapsMs: [] },
  low_beep: { tones: [{ frequencyHz: 500, durationMs: 300 }], gapsMs: [] },
};

export class AudioManager {
  private static readonly FADE_IN_S = 0.005;
  private static readonly FADE_OUT_S = 0.015;

  private buffers: Map<string, ToneBuffer> = new Map();
  private sink: AudioSink | null = null;
  private volume = 0.8;
  private sampleRate = 44100;

  init(config: AudioConfig = {}): void {
    if (this.sink) {
      console.warn('AudioManager already initialized');
      return;
    }
    this.sampleRate = config.sampleRate ?? this.sampleRate;
    this.setVolume(config.volume ?? this.volume);
    this.sink = config.sink ?? new TerminalBellSink();
    console.log(`AudioManager initialized (${this.sampleRate} Hz)`);
  }

  get isInitialized(): boolean {
    return this.sink !== null;
  }

  /**
   * Sine tone with a short linear fade at both ends to prevent clicks.
   * Buffers are cached per frequency/duration/volume.
   */
  synthesize(frequencyHz: number, durationMs: number): ToneBuffer {
    const key = `${frequencyHz}:${durationMs}:${this.volume}`;
    const cached = this.buffers.get(key);
    if (cached) return cached;

    const durationS = durationMs / 1000;
    const numSamples = Math.floor(durationS * this.sampleRate);
    const samples = new Float32Array(numSamples);
    for (let i = 0; i < numSamples; i++) {
      const t = i / this.sampleRate;
      let envelope = 1.0;
      if (t < AudioManager.FADE_IN_S) {
        envelope = t / AudioManager.FADE_IN_S;
      } else if (t > durationS - AudioManager.FADE_OUT_S) {
        envelope = Math.max(0, (durationS - t) / AudioManager.FADE_OUT_S);
      }
      samples[i] = Math.sin(2 * Math.PI * frequencyHz * t) * envelope * this.volume;
    }

    const buffer: ToneBuffer = { frequencyHz, durationMs, sampleRate: this.sampleRate, samples };
    this.buffers.set(key, buffer);
    return buffer;
  }

  playTone(frequencyHz: number, durationMs: number): void {
    if (!this.sink) {
      throw new Error('AudioManager not initialized. Call init() first.');
    }
    this.sink.play(this.synthesize(frequencyHz, durationMs));
  }

  /** Plays each tone of the sequence, waiting the gap after each onset */
  async playNotification(kind: NotificationKind): Promise<void> {
    const { tones, gapsMs } = NOTIFICATION_SEQUENCES[kind];
    for (let i = 0; i < tones.length; i++) {
      this.playTone(tones[i].frequencyHz, tones[i].durationMs);
      if (i < gapsMs.length) {
        await sleep(gapsMs[i]);
      }
    }
  }

  setVolume(volume: number): void {
    this.volume = Math.max(0, Math.min(1, volume));
  }

  getVolume(): number {
    return this.volume;
  }

  destroy(): void {
    this.buffers.clear();
    this.sink = null;
  }
}

let audioManagerInstance: AudioManager | null = null;

export function getAudioManager(): AudioManager {
  if (!audioManagerInstance) {
    audioManagerInstance = new AudioManager();
  }
  return audioManagerInstance;
}
