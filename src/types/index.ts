/**
 * Paradigm Runner Type Definitions
 * Configuration, trial plans, engine states and the dual-clock experiment log
 */

// =============================================================================
// CLOCKS & TIMESTAMPS
// =============================================================================

/**
 * Source of both clocks. `monotonicMs` must never go backwards.
 */
export interface Clock {
  wallNow(): Date;
  monotonicMs(): number;
}

/** A single instant read from both clocks together */
export interface TimestampPair {
  wall: Date;
  elapsedS: number;
}

/** Absolute timestamps are local ISO-8601 strings with milliseconds and offset */
export type AbsoluteTime = string;
/** Relative timestamps are seconds since the run's stopwatch started */
export type RelativeTime = number;

// =============================================================================
// CONFIGURATION
// =============================================================================

export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DIGITS: readonly Digit[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

export type DigitWeights = Record<Digit, number>;

export type Language = 'en' | 'zh';

export interface GoNoGoConfig {
  paradigmName: string;
  goDigits: Digit[];
  nogoDigits: Digit[];
  digitWeights: DigitWeights;
  nBlocks: number;
  nTrialsPerBlock: number;
  restDurationS: number;
  postBlockRestDurationS: number;
  interBlockIntervalS: number;
  stimulusDurationS: number;
  interTrialIntervalS: number;
  maxResponseWindowS: number;
  outputFolder: string;
  testMode: boolean;
}

export const RHYTHM_PHASES = [
  'rest_pre',
  'cued_movement',
  'rest_instruction',
  'internal_movement',
  'rest_post',
] as const;

export type RhythmPhaseKey = typeof RHYTHM_PHASES[number];

export type CueType = 'audio' | 'visual';

export type NotificationKind = 'start_sequence' | 'end_sequence' | 'high_beep' | 'low_beep';

export interface RhythmConfig {
  paradigmName: string;
  cueType: CueType;
  cueFrequencyHz: number;
  cueToneHz: number;
  cueOnTimeMs: number;
  startSoundType: NotificationKind;
  endSoundType: NotificationKind;
  visualColorHex: string;
  visualRadiusPx: number;
  numBlocks: number;
  interBlockIntervalS: number;
  phaseDurationsS: Record<RhythmPhaseKey, number>;
  outputFolder: string;
  filePrefix: string;
  testMode: boolean;
}

export interface SessionMeta {
  patientInfo: string;
  electrodeInfo: string;
  notesRaw: string;
  language: Language;
  operator: string;
  softwareVersion: string;
  createdAt: AbsoluteTime;
}

// =============================================================================
// TRIAL PLAN
// =============================================================================

export interface TrialSpec {
  readonly digit: Digit;
  readonly isGo: boolean;
}

export interface TrialPlan {
  goRatio: number;
  /** Index 0 holds block 1 */
  blocks: ReadonlyArray<readonly TrialSpec[]>;
}

export interface DigitProbabilities {
  go: DigitWeights;
  nogo: DigitWeights;
  goTotal: number;
  nogoTotal: number;
}

// =============================================================================
// EXPERIMENT LOG
// =============================================================================

export type TrialOutcome = 'hit' | 'miss' | 'commission_error' | 'correct_withholding' | 'pending';

export type RunState = 'not_started' | 'running' | 'completed' | 'aborted';

export interface RunStatus {
  state: RunState;
  completed: boolean;
  abortReason: string | null;
  abortTimeAbsolute: AbsoluteTime | null;
  abortTimeRelative: RelativeTime | null;
}

/** Fields every timeline carries, whatever the paradigm */
export interface TimelineBounds<T> {
  experimentStart: T | null;
  experimentEnd: T | null;
}

export interface TrialRecord<T> {
  trialIndex: number;
  digit: Digit;
  isGoTrial: boolean;
  onset: T;
  response: T | null;
  responseKey: string | null;
  outcome: TrialOutcome;
  /** Seconds; NaN when no response occurred */
  reactionTimeS: number;
}

export interface GoNoGoBlockTiming<T> {
  blockIndex: number;
  blockStart: T;
  restStart: T | null;
  taskStart: T | null;
  postRestStart: T | null;
  trials: TrialRecord<T>[];
}

export interface IntervalTiming<T> {
  intervalStart: T;
  plannedDurationS: number;
}

export interface GoNoGoTimeline<T> extends TimelineBounds<T> {
  blocks: Record<number, GoNoGoBlockTiming<T>>;
  interBlockIntervals: Record<number, IntervalTiming<T>>;
}

export interface PhaseTiming<T> {
  start: T | null;
  plannedDurationS: number;
  cueEvents: T[];
}

export interface RhythmBlockTiming<T> {
  blockIndex: number;
  blockStart: T | null;
  phases: Record<RhythmPhaseKey, PhaseTiming<T>>;
  intervalAfterBlock: IntervalTiming<T> | null;
}

export interface RhythmTimeline<T> extends TimelineBounds<T> {
  blocks: RhythmBlockTiming<T>[];
}

export interface GoNoGoMetrics {
  goHitPercent: number | null;
  nogoCommissionPercent: number | null;
  meanRtGoHit: number | null;
  meanRtNogoCommission: number | null;
}

export interface ExperimentLog<C, A extends TimelineBounds<AbsoluteTime>, R extends TimelineBounds<RelativeTime>> {
  meta: SessionMeta;
  config: C;
  timingAbsolute: A;
  timingRelative: R;
  status: RunStatus;
}

export interface GoNoGoLog extends ExperimentLog<
  GoNoGoConfig & { goRatio: number; trialSchedule: TrialPlan['blocks'] },
  GoNoGoTimeline<AbsoluteTime>,
  GoNoGoTimeline<RelativeTime>
> {
  metrics: GoNoGoMetrics | null;
}

export type RhythmLog = ExperimentLog<
  RhythmConfig,
  RhythmTimeline<AbsoluteTime>,
  RhythmTimeline<RelativeTime>
>;

// =============================================================================
// RUNTIME STATE TYPES
// =============================================================================

export type TrialStep = 'inter-trial' | 'stimulus' | 'response-window';

export type GoNoGoState =
  | { kind: 'idle' }
  | { kind: 'start-screen' }
  | { kind: 'block-rest'; block: number }
  | { kind: 'trial'; block: number; trial: number; step: TrialStep }
  | { kind: 'block-finished'; block: number }
  | { kind: 'inter-block-rest'; block: number; remainingMs: number }
  | { kind: 'aborted'; reason: string }
  | { kind: 'results'; completed: boolean; metrics: GoNoGoMetrics }
  | { kind: 'terminal' };

export type RhythmState =
  | { kind: 'idle' }
  | { kind: 'start-screen' }
  | { kind: 'phase'; block: number; phase: RhythmPhaseKey }
  | { kind: 'inter-block-rest'; block: number; remainingMs: number }
  | { kind: 'end-screen' }
  | { kind: 'aborted'; reason: string }
  | { kind: 'terminal' };

// =============================================================================
// STIMULUS OUTPUT
// =============================================================================

/**
 * Presentation side effects. All calls are fire-and-forget; engines never
 * wait on them.
 */
export interface StimulusOutput {
  setInstructionText(text: string): void;
  clearScreen(): void;
  showVisualCue(colorHex: string, radiusPx: number, durationMs: number): void;
  hideVisualCue(): void;
  playTone(frequencyHz: number, durationMs: number): void;
  playNotification(kind: NotificationKind): void;
}
