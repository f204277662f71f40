import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AudioManager, NOTIFICATION_SEQUENCES, getAudioManager, type AudioSink, type ToneBuffer } from '@/lib/audioManager';

class RecordingSink implements AudioSink {
  readonly played: ToneBuffer[] = [];

  play(buffer: ToneBuffer): void {
    this.played.push(buffer);
  }
}

describe('AudioManager', () => {
  let audio: AudioManager;
  let sink: RecordingSink;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    audio = new AudioManager();
    sink = new RecordingSink();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('refuses to play before init', () => {
    expect(() => audio.playTone(880, 300)).toThrow('AudioManager not initialized. Call init() first.');
  });

  it('synthesizes a faded sine buffer', () => {
    audio.init({ sink, sampleRate: 8000, volume: 0.5 });
    const buffer = audio.synthesize(1000, 10);

    expect(buffer.samples).toHaveLength(80);
    expect(buffer.samples[0]).toBe(0);
    expect(Math.max(...buffer.samples)).toBeLessThanOrEqual(0.5);
    expect(audio.synthesize(1000, 10)).toBe(buffer);
  });

  it('sends tones to the sink', () => {
    audio.init({ sink });
    audio.playTone(880, 300);
    expect(sink.played.map(b => [b.frequencyHz, b.durationMs])).toEqual([[880, 300]]);
  });

  it('warns on a second init and keeps the first sink', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    audio.init({ sink });
    audio.init({ sink: new RecordingSink() });
    audio.playTone(500, 300);

    expect(warn).toHaveBeenCalledWith('AudioManager already initialized');
    expect(sink.played).toHaveLength(1);
  });

  it('clamps the volume', () => {
    audio.setVolume(2);
    expect(audio.getVolume()).toBe(1);
    audio.setVolume(-1);
    expect(audio.getVolume()).toBe(0);
  });

  it('plays notification sequences with their gaps', async () => {
    vi.useFakeTimers();
    audio.init({ sink });
    const done = audio.playNotification('start_sequence');

    expect(sink.played.map(b => b.frequencyHz)).toEqual([800]);
    await vi.advanceTimersByTimeAsync(80);
    expect(sink.played.map(b => b.frequencyHz)).toEqual([800, 1000]);
    await vi.advanceTimersByTimeAsync(80);
    await done;
    expect(sink.played.map(b => [b.frequencyHz, b.durationMs])).toEqual([[800, 180], [1000, 180], [1200, 180]]);
  });

  it('defines single-tone beeps', () => {
    expect(NOTIFICATION_SEQUENCES.high_beep.tones).toEqual([{ frequencyHz: 1000, durationMs: 300 }]);
    expect(NOTIFICATION_SEQUENCES.low_beep.tones).toEqual([{ frequencyHz: 500, durationMs: 300 }]);
    expect(NOTIFICATION_SEQUENCES.end_sequence.gapsMs).toEqual([150, 250]);
  });

  it('forgets its sink on destroy', () => {
    audio.init({ sink });
    audio.destroy();
    expect(audio.isInitialized).toBe(false);
  });

  it('shares one instance', () => {
    expect(getAudioManager()).toBe(getAudioManager());
  });
});
