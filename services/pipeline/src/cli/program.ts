import { Command } from 'commander';
import { registerAggregateCommand } from './commands/aggregate';
import { registerIngestCommand } from './commands/ingest';
import { registerIngestYieldCommand } from './commands/ingestYield';
import { registerMigrateCommand } from './commands/migrate';
import { registerStatusCommand } from './commands/status';
import { resolveContext, type CliDependencies } from './context';

export function createProgram(deps: CliDependencies = {}): Command {
  const ctx = resolveContext(deps);
  const program = new Command();

  program
    .name('wxdata')
    .description('Weather observation ingestion, yearly aggregation and crop yield loading')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout(text),
      writeErr: (text) => ctx.stderr(text)
    });

  registerIngestCommand(program, ctx);
  registerAggregateCommand(program, ctx);
  registerIngestYieldCommand(program, ctx);
  registerMigrateCommand(program, ctx);
  registerStatusCommand(program, ctx);

  return program;
}
