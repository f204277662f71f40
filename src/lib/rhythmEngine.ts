/**
 * Rhythm Engine
 * Block / phase state machine for the rhythmic-movement paradigm. One phase
 * per block runs a periodic cue train (audio tone or visual flash); the rest
 * are plain waits. Runs as a single async loop that yields between polls.
 */

import { RhythmRecorder } from './eventLog';
import { RunGuard } from './runGuard';
import { DeferredOutput } from './stimulusOutput';
import { buildSessionMeta } from './configuration';
import {
  PeriodicSchedule, Stopwatch, formatCountdownText, runPollingCountdown, sleep, systemClock, waitWithAbort,
  POLL_INTERVAL_MS
} from './timing';
import { RHYTHM_PHASES } from '@/types';
import type { Clock, RhythmConfig, RhythmLog, RhythmPhaseKey, RhythmState, SessionMeta, StimulusOutput } from '@/types';

type StateChangeCallback = (state: RhythmState) => void;
type CueCallback = (block: number, phase: RhythmPhaseKey, relativeS: number) => void;

export interface RhythmEngineOptions {
  clock?: Clock;
  guard?: RunGuard;
  meta?: SessionMeta;
  /** Cue-train poll interval */
  cuePollMs?: number;
  /** Poll interval for plain waits and countdowns */
  waitPollMs?: number;
}

export interface TimelineSegment {
  kind: 'start-screen' | 'phase' | 'interval' | 'end-screen';
  /** Zero-based block index; null outside blocks */
  block: number | null;
  phase: RhythmPhaseKey | null;
  offsetS: number;
  durationS: number;
}

export interface TimelinePreview {
  segments: TimelineSegment[];
  totalS: number;
  /** Expected cue count per cued phase */
  cuesPerBlock: number;
}

export class RhythmEngine {
  static readonly SCREEN_HOLD_S = 0.8;
  static readonly CUED_PHASE: RhythmPhaseKey = 'cued_movement';
  static readonly ABORT_BY_USER = 'esc_pressed';

  static readonly PHASE_INSTRUCTIONS: Readonly<Record<RhythmPhaseKey, string>> = {
    rest_pre: 'Rest',
    cued_movement: 'Move with the cue',
    rest_instruction: 'Rest\nKeep the rhythm in mind',
    internal_movement: 'Move at the same rhythm\nwithout the cue',
    rest_post: 'Rest',
  };

  private readonly config: RhythmConfig;
  private readonly output: StimulusOutput;
  private readonly clock: Clock;
  private readonly guard: RunGuard;
  private readonly meta: SessionMeta;
  private readonly cuePollMs: number;
  private readonly waitPollMs: number;

  private state: RhythmState = { kind: 'idle' };
  private readonly abortController = new AbortController();
  private recorder: RhythmRecorder | null = null;
  private stopwatch: Stopwatch | null = null;

  private onStateChange: StateChangeCallback | null = null;
  private onCue: CueCallback | null = null;

  constructor(config: RhythmConfig, output: StimulusOutput, options: RhythmEngineOptions = {}) {
    this.config = config;
    this.output = new DeferredOutput(output);
    this.clock = options.clock ?? systemClock;
    this.guard = options.guard ?? RunGuard.getInstance();
    this.meta = options.meta ?? buildSessionMeta('', 'en', this.clock);
    this.cuePollMs = options.cuePollMs ?? 1;
    this.waitPollMs = options.waitPollMs ?? POLL_INTERVAL_MS;
  }

  // =========================================================================
  // PUBLIC API
  // =========================================================================

  setCallbacks(callbacks: { onStateChange?: StateChangeCallback; onCue?: CueCallback }): void {
    this.onStateChange = callbacks.onStateChange || null;
    this.onCue = callbacks.onCue || null;
  }

  /**
   * Runs every block to completion or until aborted, then tears down and
   * returns a snapshot of the log.
   */
  async run(): Promise<RhythmLog> {
    if (this.state.kind !== 'idle') {
      throw new Error(`Rhythm engine cannot run from state "${this.state.kind}"`);
    }
    const release = this.guard.acquire(this.config.paradigmName || 'Rhythm');
    const stopwatch = new Stopwatch(this.clock);
    const recorder = new RhythmRecorder(stopwatch, this.meta, this.config);
    this.stopwatch = stopwatch;
    this.recorder = recorder;
    recorder.start();
    console.log(`Rhythm run started: ${this.config.numBlocks} blocks, cue ${this.config.cueType} @ ${this.config.cueFrequencyHz} Hz`);

    try {
      this.transition({ kind: 'start-screen' });
      this.output.playNotification(this.config.startSoundType);
      this.output.setInstructionText('Start');
      await this.wait(RhythmEngine.SCREEN_HOLD_S);

      for (let block = 0; block < this.config.numBlocks && !this.halted; block++) {
        recorder.markBlockStart(block);
        await this.runBlock(recorder, block);
        if (this.halted || block === this.config.numBlocks - 1) continue;
        recorder.markIntervalStart(block, this.config.interBlockIntervalS);
        await this.restBetweenBlocks(block);
      }

      if (!this.halted) {
        recorder.complete();
        console.log('Rhythm run completed');
        this.transition({ kind: 'end-screen' });
        this.output.playNotification(this.config.endSoundType);
        this.output.setInstructionText('End');
        await this.wait(RhythmEngine.SCREEN_HOLD_S);
      }
    } finally {
      this.output.hideVisualCue();
      this.output.clearScreen();
      this.transition({ kind: 'terminal' });
      release();
    }
    return recorder.snapshot();
  }

  /**
   * Sets the abort flag; the running loop observes it at its next poll.
   * The log's end timestamps are frozen here, not at teardown.
   */
  requestAbort(reason: string = RhythmEngine.ABORT_BY_USER): boolean {
    const kind = this.state.kind;
    if (this.halted || kind === 'idle' || kind === 'terminal') return false;
    if (this.recorder?.isSealed) return false;
    this.abortController.abort();
    this.recorder?.abort(reason);
    console.log(`Rhythm run aborted: ${reason}`);
    this.output.hideVisualCue();
    this.transition({ kind: 'aborted', reason });
    return true;
  }

  getState(): RhythmState {
    return this.state;
  }

  getLog(): RhythmLog | null {
    return this.recorder ? this.recorder.snapshot() : null;
  }

  getStartTime(): Date | null {
    return this.stopwatch ? this.stopwatch.startWallTime : null;
  }

  /** Planned schedule of a run, without running it */
  static timelinePreview(config: RhythmConfig): TimelinePreview {
    const segments: TimelineSegment[] = [];
    let offsetS = 0;
    const push = (segment: Omit<TimelineSegment, 'offsetS'>): void => {
      segments.push({ ...segment, offsetS });
      offsetS += segment.durationS;
    };

    push({ kind: 'start-screen', block: null, phase: null, durationS: RhythmEngine.SCREEN_HOLD_S });
    for (let block = 0; block < config.numBlocks; block++) {
      for (const phase of RHYTHM_PHASES) {
        push({ kind: 'phase', block, phase, durationS: config.phaseDurationsS[phase] });
      }
      if (block < config.numBlocks - 1) {
        push({ kind: 'interval', block, phase: null, durationS: config.interBlockIntervalS });
      }
    }
    push({ kind: 'end-screen', block: null, phase: null, durationS: RhythmEngine.SCREEN_HOLD_S });

    const cuedS = config.phaseDurationsS[RhythmEngine.CUED_PHASE];
    const cuesPerBlock = config.cueFrequencyHz > 0 ? Math.ceil(cuedS * config.cueFrequencyHz) : 0;
    return { segments, totalS: offsetS, cuesPerBlock };
  }

  // =========================================================================
  // PHASES
  // =========================================================================

  private async runBlock(recorder: RhythmRecorder, block: number): Promise<void> {
    for (const phase of RHYTHM_PHASES) {
      if (this.halted) return;
      const durationS = this.config.phaseDurationsS[phase];
      recorder.markPhaseStart(block, phase, durationS);
      this.transition({ kind: 'phase', block, phase });
      this.output.setInstructionText(RhythmEngine.PHASE_INSTRUCTIONS[phase]);

      if (phase === RhythmEngine.CUED_PHASE) {
        await this.runCueTrain(recorder, block, phase, durationS);
      } else {
        await this.wait(durationS);
      }
    }
  }

  /**
   * Cue times accumulate from phase entry by one period each; a late poll
   * emits at most one cue and the next one follows on the following poll.
   */
  private async runCueTrain(
    recorder: RhythmRecorder,
    block: number,
    phase: RhythmPhaseKey,
    durationS: number
  ): Promise<void> {
    const frequencyHz = this.config.cueFrequencyHz;
    if (!(frequencyHz > 0)) {
      await this.wait(durationS);
      return;
    }

    const startMs = this.clock.monotonicMs();
    const durationMs = durationS * 1000;
    const cues = new PeriodicSchedule(1000 / frequencyHz, startMs);
    const signal = this.abortController.signal;

    while (!this.halted) {
      const now = this.clock.monotonicMs();
      if (now - startMs >= durationMs) break;
      if (cues.isDue(now)) {
        const pair = recorder.logCue(block, phase);
        this.emitCue();
        cues.advance();
        this.onCue?.(block, phase, pair.elapsedS);
      }
      await sleep(this.cuePollMs, signal);
    }
    this.output.hideVisualCue();
  }

  private emitCue(): void {
    const { cueType, cueToneHz, cueOnTimeMs, visualColorHex, visualRadiusPx } = this.config;
    if (cueType === 'audio') {
      this.output.playTone(cueToneHz, cueOnTimeMs);
    } else {
      this.output.showVisualCue(visualColorHex, visualRadiusPx, cueOnTimeMs);
    }
  }

  private async restBetweenBlocks(block: number): Promise<void> {
    const message = `Block ${block + 1} finished.\nPlease rest.`;
    await runPollingCountdown({
      durationS: this.config.interBlockIntervalS,
      clock: this.clock,
      signal: this.abortController.signal,
      stepMs: this.waitPollMs,
      onTick: remainingMs => {
        this.transition({ kind: 'inter-block-rest', block, remainingMs });
        this.output.setInstructionText(formatCountdownText(message, remainingMs));
      },
    });
  }

  // =========================================================================
  // HELPERS
  // =========================================================================

  private get halted(): boolean {
    return this.abortController.signal.aborted;
  }

  private async wait(durationS: number): Promise<void> {
    await waitWithAbort(durationS, {
      signal: this.abortController.signal,
      clock: this.clock,
      stepMs: this.waitPollMs,
    });
  }

  private transition(state: RhythmState): void {
    // an aborted run stays aborted until teardown
    if (this.state.kind === 'aborted' && state.kind !== 'terminal') return;
    this.state = state;
    this.onStateChange?.(state);
  }
}
