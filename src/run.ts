import type { AxiosInstance } from 'axios';
import chalk from 'chalk';
import { canUpdate, loadSettings } from './config';
import { describeError, GistIndexError, HttpError, NotFoundError, UpdateFailure } from './errors';
import { createGitHubClient, listPublicGists, sleep, updateIndexGist } from './github';
import { buildMarkdown } from './render';
import { ExitCode, type GitHubContext, type Settings, type Sleep } from './types';

export const SCHEDULE_DESCRIPTION = 'daily';

export interface RunOptions {
  html?: boolean;
  dryRun?: boolean;
}

export interface RunDeps {
  createClient?: (settings: Settings) => AxiosInstance;
  sleep?: Sleep;
  now?: () => Date;
  writeOutput?: (document: string) => void;
}

function reportFailure(error: unknown): ExitCode {
  if (error instanceof GistIndexError) {
    console.error(chalk.red(error instanceof HttpError ? describeError(error) : error.message));
    return error.exitCode;
  }
  console.error(chalk.red(`Unhandled error: ${describeError(error)}`));
  return ExitCode.Unhandled;
}

async function publish(ctx: GitHubContext, gistId: string, document: string): Promise<ExitCode> {
  try {
    const url = await updateIndexGist(ctx, gistId, ctx.settings.targetFilename, document);
    console.error(chalk.green(`✓ Updated gist: ${url}`));
    return ExitCode.Ok;
  } catch (error) {
    if (error instanceof NotFoundError) {
      console.error(chalk.red(error.message));
      return error.exitCode;
    }
    if (!(error instanceof HttpError)) {
      throw error;
    }
    const failure = new UpdateFailure(error.status, error);
    console.error(chalk.red(failure.message));
    return failure.exitCode;
  }
}

/**
 * One batch run: settings, list, render, print, then the optional write to
 * the index gist. Resolves to the process exit code.
 */
export async function runIndex(
  env: NodeJS.ProcessEnv,
  options: RunOptions = {},
  deps: RunDeps = {}
): Promise<ExitCode> {
  const now = deps.now ?? (() => new Date());
  const writeOutput = deps.writeOutput ?? ((document: string) => process.stdout.write(document));

  try {
    const settings = loadSettings(env);
    const ctx: GitHubContext = {
      client: (deps.createClient ?? createGitHubClient)(settings),
      settings,
      sleep: deps.sleep ?? sleep,
      now
    };

    const gists = await listPublicGists(ctx, settings.username);
    console.error(chalk.gray(`Fetched ${gists.length} public gists for ${settings.username}.`));

    const document = buildMarkdown(gists, {
      generatedAt: now(),
      timeZone: settings.displayTimeZone,
      schedule: SCHEDULE_DESCRIPTION,
      html: options.html ?? false
    });
    writeOutput(document);

    if (options.dryRun) {
      console.error(chalk.gray('Dry run: index gist not updated.'));
      return ExitCode.Ok;
    }
    if (!canUpdate(settings)) {
      console.error(chalk.gray('INDEX_GIST_ID or GITHUB_TOKEN not set; skipping index gist update.'));
      return ExitCode.Ok;
    }
    return await publish(ctx, settings.indexGistId, document);
  } catch (error) {
    return reportFailure(error);
  }
}
