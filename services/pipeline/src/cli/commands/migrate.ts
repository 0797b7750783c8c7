import type { Command } from 'commander';
import { parseCommonOptions } from '../../config/jobConfig';
import { EXIT_OK, printResult, runJob, withLoggingOptions, type CliContext } from '../context';

export function registerMigrateCommand(program: Command, ctx: CliContext): void {
  const command = program
    .command('migrate')
    .description('Create the schema and apply pending database migrations')
    .option('--json', 'print the result as JSON');

  withLoggingOptions(command).action(async (rawOptions: unknown) => {
    await runJob(ctx, 'migrate', () => parseCommonOptions(rawOptions, 'migrate'), async ({ config, logger }, options) => {
      const store = await ctx.openStore(config.database, logger, { migrate: true });
      await store.close();
      printResult(
        ctx,
        { schema: config.database.schema, status: 'up-to-date' },
        `Database schema '${config.database.schema}' is up to date`,
        options.json
      );
      return EXIT_OK;
    });
  });
}
