import { describe, expect, it } from 'vitest';
import { GoNoGoRecorder, RhythmRecorder, classifyOutcome } from '@/lib/eventLog';
import { buildSessionMeta, parseGoNoGoConfig, parseRhythmConfig } from '@/lib/configuration';
import { Stopwatch, formatWallTime } from '@/lib/timing';
import type { TrialPlan } from '@/types';
import { createManualClock, SESSION_START } from '../helpers';

const plan: TrialPlan = {
  goRatio: 0.5,
  blocks: [[{ digit: 3, isGo: true }, { digit: 9, isGo: false }]],
};

function wallAt(ms: number): string {
  return formatWallTime(new Date(SESSION_START.getTime() + ms));
}

function setupGoNoGo() {
  const manual = createManualClock();
  const stopwatch = new Stopwatch(manual.clock);
  const meta = buildSessionMeta('', 'en', manual.clock);
  const config = parseGoNoGoConfig({ nBlocks: 1, nTrialsPerBlock: 2, outputFolder: 'out' });
  const recorder = new GoNoGoRecorder(stopwatch, meta, config, plan);
  return { manual, stopwatch, recorder };
}

describe('classifyOutcome', () => {
  it('maps trial class and response to an outcome', () => {
    expect(classifyOutcome(true, true)).toBe('hit');
    expect(classifyOutcome(true, false)).toBe('miss');
    expect(classifyOutcome(false, true)).toBe('commission_error');
    expect(classifyOutcome(false, false)).toBe('correct_withholding');
  });
});

describe('GoNoGoRecorder', () => {
  it('anchors the experiment start at the stopwatch start', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    const log = recorder.snapshot();

    expect(log.status.state).toBe('running');
    expect(log.timingRelative.experimentStart).toBe(0);
    expect(log.timingAbsolute.experimentStart).toBe(wallAt(0));
    expect(log.config.goRatio).toBe(0.5);
    expect(log.config.trialSchedule).toEqual(plan.blocks);
  });

  it('writes every event into both timelines under the same keys', () => {
    const { manual, stopwatch, recorder } = setupGoNoGo();
    recorder.start();
    manual.advance(1000);
    recorder.beginBlock(1);
    recorder.markRestStart(1);
    manual.advance(1000);
    recorder.markTaskStart(1);
    recorder.openTrialAt(1, 1, plan.blocks[0][0]);
    manual.advance(350);
    expect(recorder.closeTrial({ key: 'space', pair: stopwatch.timestampPair() })).toBe('hit');

    const log = recorder.snapshot();
    const relative = log.timingRelative.blocks[1];
    const absolute = log.timingAbsolute.blocks[1];
    expect(Object.keys(log.timingAbsolute.blocks)).toEqual(Object.keys(log.timingRelative.blocks));
    expect(relative.blockStart).toBe(1);
    expect(relative.restStart).toBe(1);
    expect(relative.taskStart).toBe(2);
    expect(absolute.taskStart).toBe(wallAt(2000));

    expect(relative.trials[0]).toMatchObject({
      trialIndex: 1,
      digit: 3,
      isGoTrial: true,
      onset: 2,
      response: 2.35,
      responseKey: 'space',
      outcome: 'hit',
    });
    expect(relative.trials[0].reactionTimeS).toBeCloseTo(0.35, 9);
    expect(absolute.trials[0].onset).toBe(wallAt(2000));
    expect(absolute.trials[0].response).toBe(wallAt(2350));
    expect(absolute.trials[0].reactionTimeS).toBe(relative.trials[0].reactionTimeS);
  });

  it('closes a trial only once', () => {
    const { stopwatch, recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    recorder.openTrialAt(1, 1, plan.blocks[0][1]);

    expect(recorder.closeTrial(null)).toBe('correct_withholding');
    expect(recorder.closeTrial({ key: 'space', pair: stopwatch.timestampPair() })).toBeNull();

    const trial = recorder.snapshot().timingRelative.blocks[1].trials[0];
    expect(trial.outcome).toBe('correct_withholding');
    expect(trial.response).toBeNull();
    expect(trial.responseKey).toBeNull();
    expect(Number.isNaN(trial.reactionTimeS)).toBe(true);
  });

  it('refuses to open a second trial while one is open', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    recorder.openTrialAt(1, 1, plan.blocks[0][0]);
    expect(() => recorder.openTrialAt(1, 2, plan.blocks[0][1])).toThrow('Trial 1 of block 1 is still open');
  });

  it('requires a block to begin before it is marked', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    expect(() => recorder.markTaskStart(2)).toThrow('Block 2 has not begun');
  });

  it('records inter-block intervals by block', () => {
    const { manual, recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    manual.advance(4000);
    recorder.markPostRestStart(1);
    recorder.markInterBlockInterval(1, 40);

    const log = recorder.snapshot();
    expect(log.timingRelative.blocks[1].postRestStart).toBe(4);
    expect(log.timingRelative.interBlockIntervals[1]).toEqual({ intervalStart: 4, plannedDurationS: 40 });
    expect(log.timingAbsolute.interBlockIntervals[1]).toEqual({ intervalStart: wallAt(4000), plannedDurationS: 40 });
  });

  it('freezes the end on abort and leaves an open trial pending', () => {
    const { manual, recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    recorder.openTrialAt(1, 1, plan.blocks[0][0]);
    manual.advance(2100);
    recorder.abandonOpenTrial();
    expect(recorder.abort('user_pressed_esc')).not.toBeNull();

    manual.advance(5000);
    expect(recorder.abort('again')).toBeNull();
    expect(recorder.complete()).toBeNull();

    const log = recorder.snapshot();
    expect(log.status).toEqual({
      state: 'aborted',
      completed: false,
      abortReason: 'user_pressed_esc',
      abortTimeAbsolute: wallAt(2100),
      abortTimeRelative: 2.1,
    });
    expect(log.timingRelative.experimentEnd).toBe(2.1);
    expect(log.timingAbsolute.experimentEnd).toBe(wallAt(2100));
    expect(log.timingRelative.blocks[1].trials[0].outcome).toBe('pending');
  });

  it('rejects timing writes once sealed', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    recorder.complete();
    expect(recorder.isSealed).toBe(true);
    expect(() => recorder.markRestStart(1)).toThrow(/sealed/);
  });

  it('still accepts metrics after completion', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    recorder.complete();
    const metrics = { goHitPercent: 100, nogoCommissionPercent: 0, meanRtGoHit: 0.3, meanRtNogoCommission: null };
    recorder.setMetrics(metrics);
    expect(recorder.snapshot().metrics).toEqual(metrics);
  });

  it('hands out independent snapshots', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    recorder.beginBlock(1);
    const snapshot = recorder.snapshot();
    snapshot.timingRelative.blocks[1].blockStart = 99;
    expect(recorder.snapshot().timingRelative.blocks[1].blockStart).toBe(0);
  });

  it('cannot be started twice', () => {
    const { recorder } = setupGoNoGo();
    recorder.start();
    expect(() => recorder.start()).toThrow('Log already running');
  });
});

describe('RhythmRecorder', () => {
  function setupRhythm() {
    const manual = createManualClock();
    const stopwatch = new Stopwatch(manual.clock);
    const config = parseRhythmConfig({ numBlocks: 2, outputFolder: 'out' });
    const recorder = new RhythmRecorder(stopwatch, buildSessionMeta('', 'en', manual.clock), config);
    return { manual, recorder };
  }

  it('pre-builds every block with its planned phase durations', () => {
    const { recorder } = setupRhythm();
    const log = recorder.snapshot();

    expect(log.timingRelative.blocks).toHaveLength(2);
    expect(log.timingRelative.blocks[1].blockIndex).toBe(1);
    expect(log.timingRelative.blocks[0].phases.cued_movement).toEqual({ start: null, plannedDurationS: 15, cueEvents: [] });
    expect(log.timingAbsolute.blocks[0].intervalAfterBlock).toBeNull();
  });

  it('records phases, cues and intervals on both clocks', () => {
    const { manual, recorder } = setupRhythm();
    recorder.start();
    manual.advance(800);
    recorder.markBlockStart(0);
    recorder.markPhaseStart(0, 'cued_movement', 3);
    recorder.logCue(0, 'cued_movement');
    manual.advance(500);
    recorder.logCue(0, 'cued_movement');
    manual.advance(2500);
    recorder.markIntervalStart(0, 5);

    const log = recorder.snapshot();
    const relative = log.timingRelative.blocks[0];
    expect(relative.blockStart).toBe(0.8);
    expect(relative.phases.cued_movement).toEqual({ start: 0.8, plannedDurationS: 3, cueEvents: [0.8, 1.3] });
    expect(log.timingAbsolute.blocks[0].phases.cued_movement.cueEvents).toEqual([wallAt(800), wallAt(1300)]);
    expect(relative.intervalAfterBlock).toEqual({ intervalStart: 3.8, plannedDurationS: 5 });
  });

  it('rejects blocks outside the configured range', () => {
    const { recorder } = setupRhythm();
    recorder.start();
    expect(() => recorder.markBlockStart(2)).toThrow('Block 2 is outside the configured range');
  });
});
