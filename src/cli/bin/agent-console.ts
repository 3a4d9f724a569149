// src/cli/bin/agent-console.ts
// CLI bootstrap (executes the parser). Kept separate from src/cli/index.ts
// so importing the CLI factory has no side effects.
import { CommanderError } from 'commander';

import { error } from '@/runner/util/color';

import { makeCli } from '..';
import { isBenignExit } from '../cli-utils';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    if (isBenignExit(e)) return;
    // Commander already printed usage errors.
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    const msg = e instanceof Error ? e.message : String(e);
    console.error(error(`agent-console: ${msg}`));
    process.exitCode = 1;
  });
