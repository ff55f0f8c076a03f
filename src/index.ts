#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from './errors';
import { runIndex } from './run';
import { ExitCode } from './types';

const program = new Command();

program
  .name('gist-index')
  .description('Render an index of a GitHub user\'s public gists and publish it to an index gist')
  .version('1.0.0')
  .option('--html', 'embed a filter box and sortable columns (style + script) in the document')
  .option('--dry-run', 'print the document without updating the index gist')
  .addHelpText('after', `
Environment:
  GITHUB_USERNAME     (required) user whose public gists are listed
  INDEX_GIST_ID       gist to overwrite with the index
  GITHUB_TOKEN        token with gist scope, required for the update
  TARGET_MD_FILENAME  file inside the index gist (default: Public-Gists-by-Rich-Lewis.md)
  GITHUB_API_URL      API base URL (default: https://api.github.com)
  INDEX_TIMEZONE      IANA zone for displayed times (default: America/New_York)`)
  .showHelpAfterError()
  .action(async (options: { html?: boolean; dryRun?: boolean }) => {
    process.exitCode = await runIndex(process.env, options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Unhandled error: ${describeError(error)}`));
  process.exitCode = ExitCode.Unhandled;
});
