/**
 * Dual-clock experiment log
 *
 * Every event is written twice, once into the absolute (wall clock) timeline
 * and once into the relative (stopwatch) timeline, under identical keys and
 * from the same timestamp pair. A log is sealed by exactly one of
 * `complete()` or `abort()`; after that no timing field may change.
 */

import { formatWallTime, type Stopwatch } from './timing';
import type {
  AbsoluteTime, ExperimentLog, GoNoGoBlockTiming, GoNoGoConfig, GoNoGoLog, GoNoGoTimeline, PhaseTiming, RelativeTime,
  RhythmBlockTiming, RhythmConfig, RhythmLog, RhythmPhaseKey, RhythmTimeline, RunStatus, SessionMeta,
  TimelineBounds, TimestampPair, TrialOutcome, TrialPlan, TrialRecord, TrialSpec, GoNoGoMetrics
} from '@/types';

type AnyLog = ExperimentLog<unknown, TimelineBounds<AbsoluteTime>, TimelineBounds<RelativeTime>>;

export function classifyOutcome(isGo: boolean, responded: boolean): Exclude<TrialOutcome, 'pending'> {
  if (isGo) return responded ? 'hit' : 'miss';
  return responded ? 'commission_error' : 'correct_withholding';
}

function initialStatus(): RunStatus {
  return {
    state: 'not_started',
    completed: false,
    abortReason: null,
    abortTimeAbsolute: null,
    abortTimeRelative: null,
  };
}

abstract class DualClockRecorder<L extends AnyLog> {
  protected readonly stopwatch: Stopwatch;
  protected readonly log: L;

  protected constructor(stopwatch: Stopwatch, log: L) {
    this.stopwatch = stopwatch;
    this.log = log;
  }

  get status(): Readonly<RunStatus> {
    return this.log.status;
  }

  get isSealed(): boolean {
    return this.log.status.state === 'completed' || this.log.status.state === 'aborted';
  }

  /** Marks the run as started; experiment start is the stopwatch anchor */
  start(): void {
    if (this.log.status.state !== 'not_started') {
      throw new Error(`Log already ${this.log.status.state}`);
    }
    this.log.timingAbsolute.experimentStart = formatWallTime(this.stopwatch.startWallTime);
    this.log.timingRelative.experimentStart = 0;
    this.log.status.state = 'running';
  }

  complete(): TimestampPair | null {
    if (this.isSealed) return null;
    const pair = this.writeEnd();
    this.log.status.state = 'completed';
    this.log.status.completed = true;
    return pair;
  }

  abort(reason: string): TimestampPair | null {
    if (this.isSealed) return null;
    const pair = this.writeEnd();
    const status = this.log.status;
    status.state = 'aborted';
    status.completed = false;
    status.abortReason = reason;
    status.abortTimeAbsolute = formatWallTime(pair.wall);
    status.abortTimeRelative = pair.elapsedS;
    return pair;
  }

  /** Deep copy handed to consumers once the run is over */
  snapshot(): L {
    return structuredClone(this.log);
  }

  protected write(
    applyAbsolute: (timeline: L['timingAbsolute'], value: AbsoluteTime) => void,
    applyRelative: (timeline: L['timingRelative'], value: RelativeTime) => void,
    pair: TimestampPair = this.stopwatch.timestampPair()
  ): TimestampPair {
    if (this.isSealed) {
      throw new Error(`Experiment log is sealed (${this.log.status.state}); timing writes are not allowed`);
    }
    applyAbsolute(this.log.timingAbsolute, formatWallTime(pair.wall));
    applyRelative(this.log.timingRelative, pair.elapsedS);
    return pair;
  }

  private writeEnd(): TimestampPair {
    const pair = this.stopwatch.timestampPair();
    this.log.timingAbsolute.experimentEnd = formatWallTime(pair.wall);
    this.log.timingRelative.experimentEnd = pair.elapsedS;
    return pair;
  }
}

// =========================================================================
// GO / NO-GO
// =========================================================================

type GoNoGoApply = <T extends AbsoluteTime | RelativeTime>(timeline: GoNoGoTimeline<T>, value: T) => void;

function emptyGoNoGoTimeline<T>(): GoNoGoTimeline<T> {
  return { experimentStart: null, experimentEnd: null, blocks: {}, interBlockIntervals: {} };
}

export class GoNoGoRecorder extends DualClockRecorder<GoNoGoLog> {
  private openTrial: { block: number; position: number; onsetS: number; isGo: boolean } | null = null;

  constructor(stopwatch: Stopwatch, meta: SessionMeta, config: GoNoGoConfig, plan: TrialPlan) {
    super(stopwatch, {
      meta,
      config: { ...config, goRatio: plan.goRatio, trialSchedule: plan.blocks },
      timingAbsolute: emptyGoNoGoTimeline<AbsoluteTime>(),
      timingRelative: emptyGoNoGoTimeline<RelativeTime>(),
      status: initialStatus(),
      metrics: null,
    });
  }

  get hasOpenTrial(): boolean {
    return this.openTrial !== null;
  }

  beginBlock(block: number): TimestampPair {
    return this.both((timeline, value) => {
      timeline.blocks[block] = {
        blockIndex: block,
        blockStart: value,
        restStart: null,
        taskStart: null,
        postRestStart: null,
        trials: [],
      };
    });
  }

  markRestStart(block: number): TimestampPair {
    return this.both((timeline, value) => { this.blockOf(timeline, block).restStart = value; });
  }

  markTaskStart(block: number): TimestampPair {
    return this.both((timeline, value) => { this.blockOf(timeline, block).taskStart = value; });
  }

  markPostRestStart(block: number): TimestampPair {
    return this.both((timeline, value) => { this.blockOf(timeline, block).postRestStart = value; });
  }

  markInterBlockInterval(block: number, plannedDurationS: number): TimestampPair {
    return this.both((timeline, value) => {
      timeline.interBlockIntervals[block] = { intervalStart: value, plannedDurationS };
    });
  }

  /** Records stimulus onset; the entry stays `pending` until closed */
  openTrialAt(block: number, trialIndex: number, trial: TrialSpec): TimestampPair {
    if (this.openTrial) {
      throw new Error(`Trial ${this.openTrial.position + 1} of block ${this.openTrial.block} is still open`);
    }
    let position = -1;
    const pair = this.both((timeline, value) => {
      const trials = this.blockOf(timeline, block).trials;
      position = trials.length;
      trials.push({
        trialIndex,
        digit: trial.digit,
        isGoTrial: trial.isGo,
        onset: value,
        response: null,
        responseKey: null,
        outcome: 'pending',
        reactionTimeS: Number.NaN,
      });
    });
    this.openTrial = { block, position, onsetS: pair.elapsedS, isGo: trial.isGo };
    return pair;
  }

  /**
   * Fills outcome and response fields of the open trial exactly once.
   * Returns null when no trial is open (the other path already closed it).
   */
  closeTrial(response: { key: string; pair: TimestampPair } | null): TrialOutcome | null {
    const open = this.openTrial;
    if (!open) return null;
    if (this.isSealed) {
      throw new Error('Experiment log is sealed; cannot close trial');
    }
    this.openTrial = null;

    const outcome = classifyOutcome(open.isGo, response !== null);
    const reactionTimeS = response ? response.pair.elapsedS - open.onsetS : Number.NaN;
    const fill = <T extends AbsoluteTime | RelativeTime>(trial: TrialRecord<T>, responseValue: T | null): void => {
      trial.response = responseValue;
      trial.responseKey = response ? response.key : null;
      trial.outcome = outcome;
      trial.reactionTimeS = reactionTimeS;
    };

    fill(
      this.blockOf(this.log.timingAbsolute, open.block).trials[open.position],
      response ? formatWallTime(response.pair.wall) : null
    );
    fill(
      this.blockOf(this.log.timingRelative, open.block).trials[open.position],
      response ? response.pair.elapsedS : null
    );
    return outcome;
  }

  /** Drops the open-trial handle without writing; used when a run aborts mid-trial */
  abandonOpenTrial(): void {
    this.openTrial = null;
  }

  setMetrics(metrics: GoNoGoMetrics): void {
    this.log.metrics = metrics;
  }

  /** Live read access for metric computation */
  get current(): Readonly<GoNoGoLog> {
    return this.log;
  }

  private both(apply: GoNoGoApply, pair?: TimestampPair): TimestampPair {
    return this.write(apply, apply, pair);
  }

  private blockOf<T>(timeline: GoNoGoTimeline<T>, block: number): GoNoGoBlockTiming<T> {
    const entry = timeline.blocks[block];
    if (!entry) throw new Error(`Block ${block} has not begun`);
    return entry;
  }
}

// =========================================================================
// RHYTHM
// =========================================================================

type RhythmApply = <T extends AbsoluteTime | RelativeTime>(timeline: RhythmTimeline<T>, value: T) => void;

function emptyRhythmBlock<T>(blockIndex: number, config: RhythmConfig): RhythmBlockTiming<T> {
  const phase = (key: RhythmPhaseKey): PhaseTiming<T> => ({
    start: null,
    plannedDurationS: config.phaseDurationsS[key],
    cueEvents: [],
  });
  const phases: Record<RhythmPhaseKey, PhaseTiming<T>> = {
    rest_pre: phase('rest_pre'),
    cued_movement: phase('cued_movement'),
    rest_instruction: phase('rest_instruction'),
    internal_movement: phase('internal_movement'),
    rest_post: phase('rest_post'),
  };
  return { blockIndex, blockStart: null, phases, intervalAfterBlock: null };
}

function emptyRhythmTimeline<T>(config: RhythmConfig): RhythmTimeline<T> {
  const blocks: RhythmBlockTiming<T>[] = [];
  for (let i = 0; i < config.numBlocks; i++) blocks.push(emptyRhythmBlock<T>(i, config));
  return { experimentStart: null, experimentEnd: null, blocks };
}

export class RhythmRecorder extends DualClockRecorder<RhythmLog> {
  constructor(stopwatch: Stopwatch, meta: SessionMeta, config: RhythmConfig) {
    super(stopwatch, {
      meta,
      config: { ...config, phaseDurationsS: { ...config.phaseDurationsS } },
      timingAbsolute: emptyRhythmTimeline<AbsoluteTime>(config),
      timingRelative: emptyRhythmTimeline<RelativeTime>(config),
      status: initialStatus(),
    });
  }

  markBlockStart(block: number): TimestampPair {
    return this.both((timeline, value) => { this.blockOf(timeline, block).blockStart = value; });
  }

  markPhaseStart(block: number, phase: RhythmPhaseKey, plannedDurationS: number): TimestampPair {
    return this.both((timeline, value) => {
      const timing = this.blockOf(timeline, block).phases[phase];
      timing.start = value;
      timing.plannedDurationS = plannedDurationS;
    });
  }

  logCue(block: number, phase: RhythmPhaseKey): TimestampPair {
    return this.both((timeline, value) => { this.blockOf(timeline, block).phases[phase].cueEvents.push(value); });
  }

  markIntervalStart(block: number, plannedDurationS: number): TimestampPair {
    return this.both((timeline, value) => {
      this.blockOf(timeline, block).intervalAfterBlock = { intervalStart: value, plannedDurationS };
    });
  }

  private both(apply: RhythmApply): TimestampPair {
    return this.write(apply, apply);
  }

  private blockOf<T>(timeline: RhythmTimeline<T>, block: number): RhythmBlockTiming<T> {
    const entry = timeline.blocks[block];
    if (!entry) throw new Error(`Block ${block} is outside the configured range`);
    return entry;
  }
}
