#!/usr/bin/env -S node --import tsx

import { CommanderError } from 'commander';
import { exitCodeForError } from './context';
import { createProgram } from './program';

export { createProgram };

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(message);
    }
    process.exitCode = exitCodeForError(err);
  }
}

if (require.main === module) {
  void main();
}
