#!/usr/bin/env -S npx tsx
/**
 * Paradigm Runner Entry Point
 * Parses the command line, initializes audio and runs one paradigm
 */

import meow from 'meow';
import { z } from 'zod';
import { MainApp } from '@/views/MainApp';
import { getAudioManager } from '@/lib/audioManager';
import { loadConfigFile } from '@/lib/configuration';
import { InvalidConfigError } from '@/lib/errors';

const cli = meow(
  `
	Usage
	  $ paradigm-runner <gonogo|rhythm>

	Options
	  --config, -c     JSON config file; missing keys take their defaults
	  --notes, -n      Session notes: patient info, then electrode info
	  --language, -l   Interface language (en or zh)
	  --test-mode      Run without saving the log

	Examples
	  $ paradigm-runner gonogo --config gonogo.json
	  $ paradigm-runner rhythm --test-mode
`,
  {
    importMeta: import.meta,
    flags: {
      config: { type: 'string', shortFlag: 'c' },
      notes: { type: 'string', shortFlag: 'n', default: '' },
      language: { type: 'string', shortFlag: 'l', default: 'en' },
      testMode: { type: 'boolean', default: false },
    },
  },
);

const paradigmZ = z.enum(['gonogo', 'rhythm']);
const languageZ = z.enum(['en', 'zh']);

async function bootstrap(): Promise<void> {
  const paradigm = paradigmZ.safeParse(cli.input[0]);
  const language = languageZ.safeParse(cli.flags.language);
  if (!paradigm.success || !language.success) {
    cli.showHelp(2);
    return;
  }

  const fileConfig = cli.flags.config ? await loadConfigFile(cli.flags.config) : {};
  const config = cli.flags.testMode ? { ...fileConfig, testMode: true } : fileConfig;

  getAudioManager().init();

  const app = new MainApp({
    paradigm: paradigm.data,
    config,
    notes: cli.flags.notes,
    language: language.data,
  });
  const saved = await app.run();
  if (saved) console.log(`Saved ${saved.bytes} bytes to ${saved.path}`);
}

process.on('unhandledRejection', reason => {
  console.error('Unhandled rejection:', reason);
});

bootstrap().catch(error => {
  if (error instanceof InvalidConfigError) {
    console.error(error.message);
    for (const issue of error.issues) console.error(`  - ${issue}`);
  } else {
    console.error('Run failed:', error);
  }
  process.exitCode = 1;
});
