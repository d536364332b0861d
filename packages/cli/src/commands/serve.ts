import { Command } from 'commander';
import chalk from 'chalk';
import { createRuntime, loadConfigOrDefaults } from '@commonroom/core';
import { CommunityServer } from '@commonroom/server';

/** Port from `--port`, then COMMONROOM_PORT, then config. Null when invalid. */
export function resolvePort(option: string | undefined, env: string | undefined, fallback: number): number | null {
  const raw = option ?? env;
  if (raw === undefined || raw === '') return fallback;
  const port = Number(raw);
  return Number.isInteger(port) && port >= 1 && port <= 65535 ? port : null;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the Commonroom web server')
    .option('--port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      try {
        const configResult = await loadConfigOrDefaults(process.cwd());
        if (configResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom] Config invalid:'), configResult.error.message);
          process.exit(1);
        }
        const config = configResult.value;

        const port = resolvePort(options.port, process.env['COMMONROOM_PORT'], config.server.port);
        if (port === null) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom] Invalid port number'));
          process.exit(1);
        }

        const runtime = createRuntime(config);
        if (runtime.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom]'), runtime.error.message);
          process.exit(1);
        }

        if (runtime.value.store.kind === 'memory') {
          // eslint-disable-next-line no-console
          console.error(chalk.yellow('[commonroom] No database configured; using the in-memory store.'));
        }

        const server = new CommunityServer(runtime.value, { port });

        // Graceful shutdown: stop listening, flush queued mail, release the store
        const shutdown = (): void => {
          // eslint-disable-next-line no-console
          console.error(chalk.blue('[commonroom]'), 'Shutting down...');
          server.close().then(
            () => process.exit(0),
            (error: unknown) => {
              const message = error instanceof Error ? error.message : String(error);
              // eslint-disable-next-line no-console
              console.error(chalk.red('[commonroom] Shutdown failed:'), message);
              process.exit(1);
            },
          );
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        await server.start();
        // eslint-disable-next-line no-console
        console.error(chalk.green('[commonroom]'), `${config.site.name} running on http://localhost:${port}`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('[commonroom] Server failed:'), message);
        process.exit(1);
      }
    });
}
