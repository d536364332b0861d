import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigOrDefaults, type DocsConfig } from '@commonroom/core';

export type DocsState = 'up_to_date' | 'behind' | 'unknown';

export interface DocsStatus {
  state: DocsState;
  translatedVersion: string | null;
  upstreamVersion: string | null;
}

/**
 * Parse a dotted numeric version ("10.2", "v9.0.1"). Returns null for
 * anything else.
 */
export function parseVersion(version: string): number[] | null {
  const match = /^v?(\d+(?:\.\d+)*)$/.exec(version.trim());
  if (!match?.[1]) return null;
  return match[1].split('.').map((part) => parseInt(part, 10));
}

/** Negative when `a` is older than `b`; missing trailing parts count as 0. */
export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function checkDocs(docs: DocsConfig): DocsStatus {
  const translatedVersion = docs.translatedVersion ?? null;
  const upstreamVersion = docs.upstreamVersion ?? null;
  const translated = translatedVersion ? parseVersion(translatedVersion) : null;
  const upstream = upstreamVersion ? parseVersion(upstreamVersion) : null;

  let state: DocsState = 'unknown';
  if (translated && upstream) {
    state = compareVersions(translated, upstream) < 0 ? 'behind' : 'up_to_date';
  }
  return { state, translatedVersion, upstreamVersion };
}

/**
 * Format docs status for human-readable terminal output.
 */
export function formatDocsStatus(status: DocsStatus): string {
  const stateColor =
    status.state === 'up_to_date' ? chalk.green : status.state === 'behind' ? chalk.yellow : chalk.red;

  return [
    chalk.bold('Documentation'),
    '',
    `  State:      ${stateColor(status.state)}`,
    `  Translated: ${chalk.cyan(status.translatedVersion ?? 'not set')}`,
    `  Upstream:   ${chalk.cyan(status.upstreamVersion ?? 'not set')}`,
  ].join('\n');
}

export function registerCheckDocsCommand(program: Command): void {
  program
    .command('check-docs')
    .description('Compare the translated documentation version with upstream')
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      try {
        const configResult = await loadConfigOrDefaults(process.cwd());
        if (configResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[commonroom] Config invalid:'), configResult.error.message);
          process.exit(1);
        }

        const status = checkDocs(configResult.value.docs);
        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(status, null, 2) : formatDocsStatus(status));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('[commonroom] check-docs failed:'), message);
        process.exit(1);
      }
    });
}
