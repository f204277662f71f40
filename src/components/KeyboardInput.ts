/**
 * Keyboard input for the terminal runner. The ink view feeds key presses
 * into a KeyRelay; engines and MainApp only see KeySource.
 */

import type { Key } from 'ink';

export type KeyHandler = (key: string) => void;

export interface KeySource {
  /** Starts delivering key names; the returned function stops it */
  subscribe(handler: KeyHandler): () => void;
}

/** Ctrl+C reaches useInput when exitOnCtrlC is off and counts as Escape */
export function normalizeKey(input: string, key: Pick<Key, 'escape' | 'ctrl' | 'return'>): string {
  if (key.escape || (key.ctrl && input === 'c')) return 'escape';
  if (key.return) return 'return';
  if (input === ' ') return 'space';
  return input;
}

export class KeyRelay implements KeySource {
  private handlers: Set<KeyHandler> = new Set();

  subscribe(handler: KeyHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  dispatch(key: string): void {
    if (!key) return;
    for (const handler of [...this.handlers]) handler(key);
  }
}
