import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RhythmEngine } from '@/lib/rhythmEngine';
import { RunGuard } from '@/lib/runGuard';
import { parseRhythmConfig } from '@/lib/configuration';
import type { RhythmConfig } from '@/types';
import { createTestClock, RecordingOutput, SESSION_START } from '../helpers';

function shortConfig(overrides: Record<string, unknown> = {}): RhythmConfig {
  return parseRhythmConfig({
    numBlocks: 2,
    interBlockIntervalS: 1,
    cueFrequencyHz: 2,
    phaseDurationsS: { rest_pre: 0, cued_movement: 3, rest_instruction: 0, internal_movement: 0, rest_post: 0 },
    outputFolder: 'out',
    ...overrides,
  });
}

describe('RhythmEngine', () => {
  let output: RecordingOutput;
  let guard: RunGuard;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(SESSION_START);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    output = new RecordingOutput();
    guard = new RunGuard();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function createEngine(config: RhythmConfig): RhythmEngine {
    return new RhythmEngine(config, output, { clock: createTestClock(), guard, cuePollMs: 50, waitPollMs: 100 });
  }

  it('emits cues on the accumulated schedule and completes every block', async () => {
    const engine = createEngine(shortConfig());
    const run = engine.run();
    expect(guard.activeRun).toBe('Rhythm');

    await vi.advanceTimersByTimeAsync(9000);
    const log = await run;

    expect(log.status.state).toBe('completed');
    expect(engine.getState()).toEqual({ kind: 'terminal' });
    expect(guard.activeRun).toBeNull();

    for (const block of log.timingRelative.blocks) {
      const cued = block.phases.cued_movement;
      const start = cued.start ?? Number.NaN;
      const offsets = cued.cueEvents.map(t => t - start);
      expect(offsets).toHaveLength(6);
      [0, 0.5, 1, 1.5, 2, 2.5].forEach((expected, i) => expect(offsets[i]).toBeCloseTo(expected, 6));
      expect(block.phases.internal_movement.cueEvents).toEqual([]);
    }

    const [first, second] = log.timingRelative.blocks;
    expect(first.blockStart).toBeCloseTo(0.8, 6);
    expect(first.intervalAfterBlock?.plannedDurationS).toBe(1);
    expect(first.intervalAfterBlock?.intervalStart).toBeCloseTo(3.8, 6);
    expect(second.blockStart).toBeCloseTo(4.8, 6);
    expect(second.intervalAfterBlock).toBeNull();
    expect(log.timingRelative.experimentEnd).toBeCloseTo(7.8, 6);
    expect(log.timingAbsolute.blocks[1].phases.cued_movement.cueEvents).toHaveLength(6);
  });

  it('keeps cues within one poll of their slot when polls do not line up', async () => {
    const config = shortConfig({
      numBlocks: 1,
      cueFrequencyHz: 3,
      phaseDurationsS: { rest_pre: 0, cued_movement: 10, rest_instruction: 0, internal_movement: 0, rest_post: 0 },
    });
    const engine = new RhythmEngine(config, output, { clock: createTestClock(), guard, cuePollMs: 7, waitPollMs: 100 });
    const run = engine.run();

    await vi.advanceTimersByTimeAsync(12_000);
    const log = await run;

    const cued = log.timingRelative.blocks[0].phases.cued_movement;
    const start = cued.start ?? Number.NaN;
    const lateness = cued.cueEvents.map((t, i) => t - start - i / 3);
    expect(lateness).toHaveLength(30);
    for (const late of lateness) {
      expect(late).toBeGreaterThanOrEqual(-1e-9);
      expect(late).toBeLessThanOrEqual(0.007 + 1e-9);
    }
  });

  it('plays a tone per cue and the configured notifications', async () => {
    const engine = createEngine(shortConfig());
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(9000);
    await run;

    expect(output.callsTo('playTone')).toHaveLength(12);
    expect(output.callsTo('playTone')[0]).toEqual([880, 300]);
    expect(output.callsTo('playNotification')).toEqual([['start_sequence'], ['end_sequence']]);
    expect(output.texts[0]).toBe('Start');
    expect(output.texts).toContain('Block 1 finished.\nPlease rest.\n01.000s');
    expect(output.texts).toContain('End');
    expect(output.calls.at(-1)).toEqual({ method: 'clearScreen', args: [] });
  });

  it('flashes the visual cue when configured', async () => {
    const engine = createEngine(shortConfig({ cueType: 'visual', numBlocks: 1, visualColorHex: '#00FF00' }));
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(5000);
    await run;

    expect(output.callsTo('playTone')).toEqual([]);
    expect(output.callsTo('showVisualCue')).toHaveLength(6);
    expect(output.callsTo('showVisualCue')[0]).toEqual(['#00FF00', 160, 300]);
  });

  it('reports each cue to the callback', async () => {
    const engine = createEngine(shortConfig({ numBlocks: 1 }));
    const onCue = vi.fn();
    engine.setCallbacks({ onCue });
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(5000);
    await run;

    expect(onCue).toHaveBeenCalledTimes(6);
    expect(onCue.mock.calls[0][0]).toBe(0);
    expect(onCue.mock.calls[0][1]).toBe('cued_movement');
    expect(onCue.mock.calls[0][2]).toBeCloseTo(0.8, 6);
  });

  it('waits without cues when the frequency is not positive', async () => {
    const engine = createEngine({ ...shortConfig({ numBlocks: 1 }), cueFrequencyHz: 0 });
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(5000);
    const log = await run;

    expect(log.status.state).toBe('completed');
    expect(log.timingRelative.blocks[0].phases.cued_movement.cueEvents).toEqual([]);
    expect(log.timingRelative.experimentEnd).toBeCloseTo(3.8, 6);
  });

  it('stops at the next poll after an abort and freezes the log', async () => {
    const engine = createEngine(shortConfig({ numBlocks: 1, phaseDurationsS: { cued_movement: 10, rest_pre: 0 } }));
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(2000);

    expect(engine.requestAbort()).toBe(true);
    expect(engine.requestAbort()).toBe(false);
    expect(engine.getState()).toEqual({ kind: 'aborted', reason: 'esc_pressed' });

    const log = await run;
    expect(log.status).toMatchObject({ state: 'aborted', completed: false, abortReason: 'esc_pressed', abortTimeRelative: 2 });
    expect(log.timingRelative.experimentEnd).toBe(2);
    expect(log.timingRelative.blocks[0].phases.cued_movement.cueEvents).toHaveLength(3);
    expect(log.timingRelative.blocks[0].phases.rest_instruction.start).toBeNull();
    expect(engine.getState()).toEqual({ kind: 'terminal' });
    expect(guard.activeRun).toBeNull();
    expect(output.callsTo('hideVisualCue').length).toBeGreaterThan(0);
    expect(output.callsTo('playNotification')).toEqual([['start_sequence']]);
  });

  it('aborts during the start screen before any block begins', async () => {
    const engine = createEngine(shortConfig());
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(300);
    engine.requestAbort('operator_stop');

    const log = await run;
    expect(log.status.abortReason).toBe('operator_stop');
    expect(log.timingRelative.blocks[0].blockStart).toBeNull();
  });

  it('ignores an abort once the run has completed', async () => {
    const engine = createEngine(shortConfig({ numBlocks: 1 }));
    const run = engine.run();
    await vi.advanceTimersByTimeAsync(4000);
    expect(engine.getState()).toEqual({ kind: 'end-screen' });

    expect(engine.requestAbort()).toBe(false);
    expect(engine.getState()).toEqual({ kind: 'end-screen' });

    await vi.advanceTimersByTimeAsync(1000);
    const log = await run;
    expect(log.status).toMatchObject({ state: 'completed', completed: true, abortReason: null });
    expect(output.callsTo('playNotification')).toEqual([['start_sequence'], ['end_sequence']]);
  });

  it('cannot be aborted before it runs', () => {
    expect(createEngine(shortConfig()).requestAbort()).toBe(false);
  });

  it('cannot be run twice', async () => {
    const engine = createEngine(shortConfig({ numBlocks: 1 }));
    const run = engine.run();
    await expect(engine.run()).rejects.toThrow('Rhythm engine cannot run from state "start-screen"');
    engine.requestAbort();
    await run;
  });
});

describe('RhythmEngine.timelinePreview', () => {
  it('lists every planned segment with offsets', () => {
    const preview = RhythmEngine.timelinePreview(parseRhythmConfig({ outputFolder: 'out' }));

    expect(preview.segments).toHaveLength(13);
    expect(preview.segments[0]).toEqual({ kind: 'start-screen', block: null, phase: null, offsetS: 0, durationS: 0.8 });
    expect(preview.segments[2]).toMatchObject({ kind: 'phase', block: 0, phase: 'cued_movement', durationS: 15 });
    expect(preview.segments[2].offsetS).toBeCloseTo(5.8, 9);
    expect(preview.segments[6]).toMatchObject({ kind: 'interval', block: 0, phase: null, durationS: 5 });
    expect(preview.segments[12].kind).toBe('end-screen');
    expect(preview.totalS).toBeCloseTo(96.6, 9);
    expect(preview.cuesPerBlock).toBe(15);
  });
});
