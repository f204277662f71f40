/**
 * Log Storage
 * Writes finished experiment logs as JSON under timestamp-qualified names
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { format } from 'date-fns';
import { PersistenceError } from './errors';

export function timestampString(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

/** `<folder>/<prefix>_yyyyMMdd_HHmmss.<suffix>` */
export function buildTimestampedPath(folder: string, prefix: string, date: Date, suffix = 'json'): string {
  const ext = suffix.replace(/^\.+/, '');
  return path.join(folder || '.', `${prefix}_${timestampString(date)}.${ext}`);
}

export interface SavedLog {
  path: string;
  bytes: number;
}

export class LogStorage {
  private readonly indent: number;

  constructor(options: { indent?: number } = {}) {
    this.indent = options.indent ?? 2;
  }

  /**
   * Serializes and writes the log, creating the folder when missing.
   * NaN reaction times become `null` in JSON.
   */
  async save(log: object, folder: string, prefix: string, startedAt: Date): Promise<SavedLog> {
    const target = buildTimestampedPath(folder, prefix, startedAt);
    const body = JSON.stringify(log, null, this.indent);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, body, 'utf8');
    } catch (error) {
      throw new PersistenceError(target, error);
    }
    console.log('Log saved:', target);
    return { path: target, bytes: Buffer.byteLength(body, 'utf8') };
  }
}
