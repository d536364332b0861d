import { Command } from 'commander';
import chalk from 'chalk';
import { createPgPool, loadConfig, migrate } from '@commonroom/core';

export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Apply the database schema to the configured PostgreSQL database')
    .action(async () => {
      try {
        const configResult = await loadConfig(process.cwd());
        if (configResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom]'), configResult.error.message);
          process.exit(1);
        }

        const database = configResult.value.database;
        if (!database) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom] database.url is not configured; nothing to migrate.'));
          process.exit(1);
        }

        const pool = createPgPool(database);
        const result = await migrate(pool);
        await pool.end();

        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom] Migration failed:'), result.error.message);
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('[commonroom]'), 'Schema applied.');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('[commonroom] Migration failed:'), message);
        process.exit(1);
      }
    });
}
