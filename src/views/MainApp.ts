/**
 * Main Application View
 * Runs one paradigm end to end: config, engine, keyboard, results, saving
 */

import { GoNoGoEngine } from '@/lib/goNoGoEngine';
import { RhythmEngine } from '@/lib/rhythmEngine';
import { LogStorage, type SavedLog } from '@/lib/logStorage';
import { buildSessionMeta, parseGoNoGoConfig, parseRhythmConfig } from '@/lib/configuration';
import { TrialScheduler } from '@/lib/trialScheduler';
import { systemClock } from '@/lib/timing';
import { ResultsView, formatDigitPreview } from '@/components/ResultsView';
import { mountTerminalDisplay, type Display } from '@/components/ParadigmScreen';
import type { Clock, GoNoGoConfig, GoNoGoLog, Language, RhythmConfig, RhythmLog, SessionMeta } from '@/types';

export type ParadigmKind = 'gonogo' | 'rhythm';

export interface MainAppOptions {
  paradigm: ParadigmKind;
  /** Raw config object; defaults fill in whatever is missing */
  config?: unknown;
  notes?: string;
  language?: Language;
  /** Mounted on the process terminal when omitted */
  display?: Display;
  storage?: LogStorage;
  clock?: Clock;
}

export class MainApp {
  private options: MainAppOptions;
  private storage: LogStorage;
  private clock: Clock;

  constructor(options: MainAppOptions) {
    this.options = options;
    this.storage = options.storage ?? new LogStorage();
    this.clock = options.clock ?? systemClock;
  }

  /** Resolves with the saved file, or null for test-mode runs */
  async run(): Promise<SavedLog | null> {
    const meta = buildSessionMeta(this.options.notes ?? '', this.options.language ?? 'en', this.clock);
    switch (this.options.paradigm) {
      case 'gonogo': {
        const config = parseGoNoGoConfig(this.options.config);
        console.log(formatDigitPreview(TrialScheduler.digitProbabilities(config)));
        const { log, startedAt } = await this.withDisplay(display => this.runGoNoGo(config, meta, display));
        return this.persist(log, config.outputFolder, config.paradigmName, startedAt, config.testMode);
      }
      case 'rhythm': {
        const config = parseRhythmConfig(this.options.config);
        const preview = RhythmEngine.timelinePreview(config);
        console.log(`Planned duration: ${preview.totalS.toFixed(1)} s, ${preview.cuesPerBlock} cues per block`);
        const { log, startedAt } = await this.withDisplay(display => this.runRhythm(config, meta, display));
        return this.persist(log, config.outputFolder, config.filePrefix, startedAt, config.testMode);
      }
    }
  }

  // === GO / NO-GO ===
  private runGoNoGo(
    config: GoNoGoConfig,
    meta: SessionMeta,
    { screen, keys }: Display
  ): Promise<{ log: GoNoGoLog; startedAt: Date }> {
    const engine = new GoNoGoEngine(config, screen, { meta, clock: this.clock });
    console.log(`Go ratio: ${engine.getPlan().goRatio.toFixed(3)}`);

    return new Promise((resolve, reject) => {
      let unsubscribe: () => void = () => {};
      engine.setCallbacks({
        onResults: (metrics, completed) => {
          const view = new ResultsView({ metrics, completed, footer: 'Press any key to close' });
          screen.setInstructionText(view.render());
        },
        onFinished: log => {
          unsubscribe();
          resolve({ log, startedAt: engine.getStartTime() ?? this.clock.wallNow() });
        },
      });

      unsubscribe = keys.subscribe(key => {
        const state = engine.getState();
        if (state.kind === 'results') {
          engine.dismiss();
        } else if (key === 'escape') {
          engine.abort();
        } else {
          engine.respond(key);
        }
      });

      try {
        engine.start();
      } catch (error) {
        unsubscribe();
        reject(error);
      }
    });
  }

  // === RHYTHM ===
  private async runRhythm(
    config: RhythmConfig,
    meta: SessionMeta,
    { screen, keys }: Display
  ): Promise<{ log: RhythmLog; startedAt: Date }> {
    const engine = new RhythmEngine(config, screen, { meta, clock: this.clock });
    const unsubscribe = keys.subscribe(key => {
      if (key === 'escape') engine.requestAbort();
    });
    try {
      const log = await engine.run();
      return { log, startedAt: engine.getStartTime() ?? this.clock.wallNow() };
    } finally {
      unsubscribe();
    }
  }

  /** The terminal is handed back before the log is written */
  private async withDisplay<T>(body: (display: Display) => Promise<T>): Promise<T> {
    const display = this.options.display ?? mountTerminalDisplay();
    try {
      return await body(display);
    } finally {
      display.destroy();
    }
  }

  // === PERSISTENCE ===
  private async persist(
    log: object,
    folder: string,
    prefix: string,
    startedAt: Date,
    testMode: boolean
  ): Promise<SavedLog | null> {
    if (testMode) {
      console.log('Test mode: log not saved');
      return null;
    }
    return this.storage.save(log, folder, prefix, startedAt);
  }
}
