/**
 * Paradigm configuration: defaults, validation and session metadata
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidConfigError } from './errors';
import { TrialScheduler } from './trialScheduler';
import { formatWallTime, systemClock } from './timing';
import type { Clock, Digit, GoNoGoConfig, Language, RhythmConfig, SessionMeta } from '@/types';

export const SOFTWARE_VERSION = 'v0.3.0';

function isDigit(value: unknown): value is Digit {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 9;
}

const digitZ = z.custom<Digit>(isDigit, { message: 'Digits must be integers from 0 to 9' });
const weightZ = z.number().finite().min(0, 'Weights must be >= 0').default(1);
const secondsZ = z.number().finite().min(0, 'Durations must be >= 0');
const countZ = z.number().int().positive('Must be a positive integer');

const digitWeightsZ = z.object({
  0: weightZ, 1: weightZ, 2: weightZ, 3: weightZ, 4: weightZ,
  5: weightZ, 6: weightZ, 7: weightZ, 8: weightZ, 9: weightZ,
}).default({});

export const goNoGoConfigSchema = z.object({
  paradigmName: z.string().trim().default('GoNoGo').transform(name => name || 'GoNoGo'),
  goDigits: z.array(digitZ).default([0, 1, 2, 3, 4, 5, 6, 7, 8]),
  nogoDigits: z.array(digitZ).default([9]),
  digitWeights: digitWeightsZ,
  nBlocks: countZ.default(4),
  nTrialsPerBlock: countZ.default(75),
  restDurationS: secondsZ.default(10),
  postBlockRestDurationS: secondsZ.default(10),
  interBlockIntervalS: secondsZ.default(30),
  stimulusDurationS: z.number().finite().positive('Stimulus duration must be > 0').default(0.3),
  interTrialIntervalS: secondsZ.default(1),
  maxResponseWindowS: z.number().finite().positive('Response window must be > 0').default(0.8),
  outputFolder: z.string().trim().min(1, 'Output folder is required').default(() => process.cwd()),
  testMode: z.boolean().default(false),
}).superRefine((config, ctx) => {
  try {
    TrialScheduler.computeGoRatio(config.goDigits, config.nogoDigits, config.digitWeights);
  } catch (error) {
    if (!(error instanceof InvalidConfigError)) throw error;
    for (const issue of error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue, path: ['goDigits'] });
    }
  }
});

const notificationZ = z.enum(['start_sequence', 'end_sequence', 'high_beep', 'low_beep']);

export const rhythmConfigSchema = z.object({
  paradigmName: z.string().trim().default('Rhythm'),
  cueType: z.enum(['audio', 'visual']).default('audio'),
  cueFrequencyHz: z.number().finite().positive('Cue frequency must be > 0').default(1),
  cueToneHz: z.number().finite().positive().default(880),
  cueOnTimeMs: z.number().int().positive().default(300),
  startSoundType: notificationZ.default('start_sequence'),
  endSoundType: notificationZ.default('end_sequence'),
  visualColorHex: z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'Visual color must be in #RRGGBB format').default('#FF0000'),
  visualRadiusPx: z.number().int().positive().default(160),
  numBlocks: countZ.default(2),
  interBlockIntervalS: secondsZ.default(5),
  phaseDurationsS: z.object({
    rest_pre: secondsZ.default(5),
    cued_movement: secondsZ.default(15),
    rest_instruction: secondsZ.default(5),
    internal_movement: secondsZ.default(15),
    rest_post: secondsZ.default(5),
  }).default({}),
  outputFolder: z.string().trim().min(1, 'Output folder is required').default(() => process.cwd()),
  filePrefix: z.string().trim().default(''),
  testMode: z.boolean().default(false),
}).transform(config => ({
  ...config,
  filePrefix: config.filePrefix || config.paradigmName || 'Rhythm',
}));

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Fills defaults and validates; throws InvalidConfig listing every problem */
export function parseGoNoGoConfig(input: unknown): GoNoGoConfig {
  const result = goNoGoConfigSchema.safeParse(input ?? {});
  if (!result.success) throw new InvalidConfigError(formatIssues(result.error));
  return result.data;
}

export function parseRhythmConfig(input: unknown): RhythmConfig {
  const result = rhythmConfigSchema.safeParse(input ?? {});
  if (!result.success) throw new InvalidConfigError(formatIssues(result.error));
  return result.data;
}

/** Reads a JSON config file; the result still has to go through a parser */
export async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError([`${filePath}: ${reason}`]);
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError([`${filePath}: expected a JSON object`]);
  }
  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First non-empty note line is the patient info, the second the electrode info
 */
export function buildSessionMeta(
  notes: string,
  language: Language,
  clock: Clock = systemClock,
  operator = ''
): SessionMeta {
  const lines = notes.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
  return {
    patientInfo: lines[0] ?? '',
    electrodeInfo: lines[1] ?? '',
    notesRaw: notes,
    language,
    operator,
    softwareVersion: SOFTWARE_VERSION,
    createdAt: formatWallTime(clock.wallNow()),
  };
}
