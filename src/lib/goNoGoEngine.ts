/**
 * Go/No-Go Engine
 * Discrete-trial state machine: start screen, then per block a pre-task rest,
 * the trial loop (inter-trial interval, stimulus, response window) and a
 * countdown rest before the next block; results at the end.
 *
 * Timing is event-loop driven (single-shot timers and a cooperative
 * countdown). Abort is absorbing: it cancels every timer, freezes the log's
 * end timestamps and goes straight to results.
 */

import { GoNoGoRecorder } from './eventLog';
import { MetricsCalculator } from './metricsCalculator';
import { RunGuard } from './runGuard';
import { DeferredOutput } from './stimulusOutput';
import { buildSessionMeta } from './configuration';
import { TrialScheduler, type RandomSource } from './trialScheduler';
import {
  Stopwatch, formatCountdownText, startCountdownTimer, systemClock, type CountdownHandle
} from './timing';
import type {
  Clock, GoNoGoConfig, GoNoGoLog, GoNoGoMetrics, GoNoGoState, SessionMeta, StimulusOutput,
  TrialOutcome, TrialPlan, TrialSpec
} from '@/types';

type StateChangeCallback = (state: GoNoGoState) => void;
type TrialCompleteCallback = (block: number, trialIndex: number, outcome: TrialOutcome) => void;
type ResultsCallback = (metrics: GoNoGoMetrics, completed: boolean) => void;
type FinishedCallback = (log: GoNoGoLog) => void;

type Timer = ReturnType<typeof setTimeout>;

export interface GoNoGoEngineOptions {
  clock?: Clock;
  guard?: RunGuard;
  meta?: SessionMeta;
  random?: RandomSource;
  /** Pre-built plan; generated from the config when omitted */
  plan?: TrialPlan;
}

export class GoNoGoEngine {
  private static readonly START_SCREEN_MS = 1000;
  private static readonly RESPONSE_KEYS: ReadonlySet<string> = new Set(['space']);
  static readonly ABORT_BY_USER = 'user_pressed_esc';

  // Configuration
  private readonly config: GoNoGoConfig;
  private readonly plan: TrialPlan;
  private readonly output: StimulusOutput;
  private readonly clock: Clock;
  private readonly guard: RunGuard;
  private readonly meta: SessionMeta;

  // Run state
  private state: GoNoGoState = { kind: 'idle' };
  private readonly abortController = new AbortController();
  private stopwatch: Stopwatch | null = null;
  private recorder: GoNoGoRecorder | null = null;
  private releaseRun: (() => void) | null = null;
  private blockIndex = 0;
  private trialIndex = -1;
  private blockTrials: readonly TrialSpec[] = [];

  // Timers
  private timers: Set<Timer> = new Set();
  private stimulusTimer: Timer | null = null;
  private responseTimer: Timer | null = null;
  private restCountdown: CountdownHandle | null = null;

  // Callbacks
  private onStateChange: StateChangeCallback | null = null;
  private onTrialComplete: TrialCompleteCallback | null = null;
  private onResults: ResultsCallback | null = null;
  private onFinished: FinishedCallback | null = null;

  /** Builds the trial plan up front; throws InvalidConfig before anything runs */
  constructor(config: GoNoGoConfig, output: StimulusOutput, options: GoNoGoEngineOptions = {}) {
    this.config = config;
    this.plan = options.plan ?? TrialScheduler.buildTrialPlan(config, options.random);
    this.output = new DeferredOutput(output);
    this.clock = options.clock ?? systemClock;
    this.guard = options.guard ?? RunGuard.getInstance();
    this.meta = options.meta ?? buildSessionMeta('', 'en', this.clock);
  }

  // =========================================================================
  // PUBLIC API
  // =========================================================================

  setCallbacks(callbacks: {
    onStateChange?: StateChangeCallback;
    onTrialComplete?: TrialCompleteCallback;
    onResults?: ResultsCallback;
    onFinished?: FinishedCallback;
  }): void {
    this.onStateChange = callbacks.onStateChange || null;
    this.onTrialComplete = callbacks.onTrialComplete || null;
    this.onResults = callbacks.onResults || null;
    this.onFinished = callbacks.onFinished || null;
  }

  start(): void {
    if (this.state.kind !== 'idle') {
      throw new Error(`Go/No-Go engine cannot start from state "${this.state.kind}"`);
    }
    this.releaseRun = this.guard.acquire(this.config.paradigmName);
    this.stopwatch = new Stopwatch(this.clock);
    this.recorder = new GoNoGoRecorder(this.stopwatch, this.meta, this.config, this.plan);
    this.recorder.start();
    console.log(`Go/No-Go run started: ${this.config.nBlocks} blocks x ${this.config.nTrialsPerBlock} trials`);

    this.transition({ kind: 'start-screen' });
    this.output.playNotification('start_sequence');
    this.output.setInstructionText('Start');
    this.makeTimer(GoNoGoEngine.START_SCREEN_MS, () => this.startBlock());
  }

  /**
   * Subject input. Only the first qualifying key inside a response window
   * counts; returns whether the input was scored.
   */
  respond(key = 'space'): boolean {
    if (this.halted || !GoNoGoEngine.RESPONSE_KEYS.has(key)) return false;
    if (this.state.kind !== 'trial' || this.state.step === 'inter-trial') return false;
    const recorder = this.recorder;
    const stopwatch = this.stopwatch;
    if (!recorder || !stopwatch || !recorder.hasOpenTrial) return false;

    const pair = stopwatch.timestampPair();
    this.cancelTrialTimers();
    this.output.clearScreen();
    const outcome = recorder.closeTrial({ key, pair });
    if (outcome) this.onTrialComplete?.(this.blockIndex + 1, this.trialIndex + 1, outcome);
    this.startNextTrial();
    return true;
  }

  abort(reason: string = GoNoGoEngine.ABORT_BY_USER): boolean {
    const kind = this.state.kind;
    if (this.halted || kind === 'idle' || kind === 'results' || kind === 'terminal') return false;
    // A completed run is only waiting for its results screen
    if (this.recorder?.isSealed) return false;
    this.abortController.abort();
    this.clearTimers();

    const recorder = this.recorder;
    if (recorder) {
      recorder.abandonOpenTrial();
      recorder.abort(reason);
    }
    console.log(`Go/No-Go run aborted: ${reason}`);
    this.output.clearScreen();
    this.output.playNotification('end_sequence');
    this.transition({ kind: 'aborted', reason });
    this.makeTimer(0, () => this.showResults());
    return true;
  }

  /** Leaves the results screen and hands the finished log off */
  dismiss(): void {
    if (this.state.kind !== 'results') return;
    this.clearTimers();
    this.transition({ kind: 'terminal' });
    this.releaseRun?.();
    this.releaseRun = null;
    if (this.recorder) this.onFinished?.(this.recorder.snapshot());
  }

  getState(): GoNoGoState {
    return this.state;
  }

  getPlan(): TrialPlan {
    return this.plan;
  }

  getLog(): GoNoGoLog | null {
    return this.recorder ? this.recorder.snapshot() : null;
  }

  getStartTime(): Date | null {
    return this.stopwatch ? this.stopwatch.startWallTime : null;
  }

  // =========================================================================
  // BLOCK LIFECYCLE
  // =========================================================================

  private startBlock(): void {
    if (this.halted || !this.recorder) return;
    if (this.blockIndex >= this.config.nBlocks) {
      this.finishExperiment();
      return;
    }
    const block = this.blockIndex + 1;
    this.recorder.beginBlock(block);
    this.output.clearScreen();
    this.recorder.markRestStart(block);
    this.transition({ kind: 'block-rest', block });
    this.makeTimer(this.toMs(this.config.restDurationS), () => this.startTrials());
  }

  private startTrials(): void {
    if (this.halted || !this.recorder) return;
    const block = this.blockIndex + 1;
    this.recorder.markTaskStart(block);
    this.trialIndex = -1;
    this.blockTrials = this.plan.blocks[this.blockIndex] ?? [];
    this.startNextTrial();
  }

  private startNextTrial(): void {
    if (this.halted) return;
    this.trialIndex++;
    if (this.trialIndex >= this.blockTrials.length) {
      this.finishBlock();
      return;
    }
    this.output.clearScreen();
    if (this.trialIndex === 0) {
      this.showStimulus();
      return;
    }
    this.transition({ kind: 'trial', block: this.blockIndex + 1, trial: this.trialIndex + 1, step: 'inter-trial' });
    this.makeTimer(this.toMs(this.config.interTrialIntervalS), () => this.showStimulus());
  }

  private finishBlock(): void {
    if (this.halted || !this.recorder) return;
    const block = this.blockIndex + 1;
    this.transition({ kind: 'block-finished', block });
    this.blockIndex++;

    if (block >= this.config.nBlocks) {
      this.finishExperiment();
      return;
    }

    const totalRestS = this.config.postBlockRestDurationS + this.config.interBlockIntervalS;
    this.recorder.markPostRestStart(block);
    this.recorder.markInterBlockInterval(block, totalRestS);
    const message = `Block ${block} finished.\nPlease rest.`;
    this.restCountdown = startCountdownTimer({
      durationS: totalRestS,
      clock: this.clock,
      shouldAbort: () => this.halted,
      onTick: remainingMs => {
        this.transition({ kind: 'inter-block-rest', block, remainingMs });
        this.output.setInstructionText(formatCountdownText(message, remainingMs));
      },
      onFinished: () => {
        this.restCountdown = null;
        this.startBlock();
      },
    });
  }

  private finishExperiment(): void {
    if (this.halted || !this.recorder) return;
    this.recorder.complete();
    console.log('Go/No-Go run completed');
    this.output.playNotification('end_sequence');
    this.makeTimer(0, () => this.showResults());
  }

  /**
   * Reached on completion and on abort; metrics are computed over whatever
   * trials were recorded.
   */
  private showResults(): void {
    if (!this.recorder || this.state.kind === 'results' || this.state.kind === 'terminal') return;
    this.clearTimers();
    const metrics = MetricsCalculator.computeMetrics(this.recorder.current);
    this.recorder.setMetrics(metrics);
    const completed = this.recorder.status.completed;
    this.transition({ kind: 'results', completed, metrics });
    this.onResults?.(metrics, completed);
  }

  // =========================================================================
  // TRIALS
  // =========================================================================

  private showStimulus(): void {
    if (this.halted || !this.recorder) return;
    const trial = this.blockTrials[this.trialIndex];
    const block = this.blockIndex + 1;

    this.output.setInstructionText(String(trial.digit));
    this.output.playNotification('high_beep');
    this.recorder.openTrialAt(block, this.trialIndex + 1, trial);
    this.transition({ kind: 'trial', block, trial: this.trialIndex + 1, step: 'stimulus' });

    this.stimulusTimer = this.makeTimer(this.toMs(this.config.stimulusDurationS), () => this.hideStimulus());
    this.responseTimer = this.makeTimer(this.toMs(this.config.maxResponseWindowS), () => this.expireResponseWindow());
  }

  private hideStimulus(): void {
    this.stimulusTimer = null;
    if (this.halted) return;
    this.output.clearScreen();
    const state = this.state;
    if (state.kind === 'trial' && state.step === 'stimulus') {
      this.transition({ ...state, step: 'response-window' });
    }
  }

  private expireResponseWindow(): void {
    this.responseTimer = null;
    if (this.halted || !this.recorder || !this.recorder.hasOpenTrial) return;
    this.cancelTrialTimers();
    const outcome = this.recorder.closeTrial(null);
    if (outcome) this.onTrialComplete?.(this.blockIndex + 1, this.trialIndex + 1, outcome);
    this.startNextTrial();
  }

  private cancelTrialTimers(): void {
    for (const timer of [this.stimulusTimer, this.responseTimer]) {
      if (timer !== null) {
        clearTimeout(timer);
        this.timers.delete(timer);
      }
    }
    this.stimulusTimer = null;
    this.responseTimer = null;
  }

  // =========================================================================
  // HELPERS
  // =========================================================================

  private get halted(): boolean {
    return this.abortController.signal.aborted;
  }

  private transition(state: GoNoGoState): void {
    this.state = state;
    this.onStateChange?.(state);
  }

  private makeTimer(ms: number, callback: () => void): Timer {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      callback();
    }, ms);
    this.timers.add(timer);
    return timer;
  }

  private clearTimers(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.stimulusTimer = null;
    this.responseTimer = null;
    this.restCountdown?.cancel();
    this.restCountdown = null;
  }

  private toMs(seconds: number): number {
    return Math.max(0, Math.round(seconds * 1000));
  }
}
