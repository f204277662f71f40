/**
 * Ink view of the stimulus screen. Renders the TerminalScreen snapshot and
 * relays key presses; the engines never see React.
 */

import { Box, Text, render, useInput } from 'ink';
import { type default as React, useSyncExternalStore } from 'react';
import { TerminalScreen, type VisualCue } from './TerminalScreen';
import { KeyRelay, normalizeKey, type KeySource } from './KeyboardInput';
import type { StimulusOutput } from '@/types';

/** Terminal cells are roughly twice as tall as wide */
const PX_PER_ROW = 32;

export interface DiscRow {
  indent: number;
  width: number;
}

export function discRows(radiusPx: number): DiscRow[] {
  const radius = Math.max(1, Math.round(radiusPx / PX_PER_ROW));
  const rows: DiscRow[] = [];
  for (let y = -radius; y <= radius; y++) {
    const halfWidth = Math.round(Math.sqrt(radius * radius - y * y) * 2);
    rows.push({ indent: radius * 2 - halfWidth, width: halfWidth * 2 });
  }
  return rows;
}

const CueDisc: React.FC<VisualCue> = ({ colorHex, radiusPx }) => (
  <Box flexDirection="column" marginTop={1}>
    {discRows(radiusPx).map((row, i) => (
      <Text key={i}>
        {' '.repeat(row.indent)}
        <Text backgroundColor={colorHex}>{' '.repeat(row.width)}</Text>
      </Text>
    ))}
  </Box>
);

interface ParadigmScreenProps {
  screen: TerminalScreen;
  keys: KeyRelay;
}

export const ParadigmScreen: React.FC<ParadigmScreenProps> = ({ screen, keys }) => {
  const { instruction, cue } = useSyncExternalStore(screen.subscribe, screen.getSnapshot);

  useInput((input, key) => {
    keys.dispatch(normalizeKey(input, key));
  });

  return (
    <Box flexDirection="column">
      <Text>{instruction}</Text>
      {cue && <CueDisc colorHex={cue.colorHex} radiusPx={cue.radiusPx} />}
    </Box>
  );
};

// =========================================================================
// DISPLAY
// =========================================================================

/** What a run draws on and listens to; destroyed once the run is over */
export interface Display {
  readonly screen: StimulusOutput;
  readonly keys: KeySource;
  destroy(): void;
}

export function mountTerminalDisplay(): Display {
  const screen = new TerminalScreen();
  const keys = new KeyRelay();
  const instance = render(<ParadigmScreen screen={screen} keys={keys} />, { exitOnCtrlC: false });
  return {
    screen,
    keys,
    destroy: () => {
      instance.unmount();
      screen.destroy();
    },
  };
}
