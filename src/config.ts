import { ConfigError } from './errors';
import type { HttpSettings, Settings } from './types';

export const DEFAULT_TARGET_FILENAME = 'Public-Gists-by-Rich-Lewis.md';
export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_TIME_ZONE = 'America/New_York';

export const DEFAULT_HTTP_SETTINGS: Readonly<HttpSettings> = Object.freeze({
  timeoutMs: 30_000,
  retries: 3,
  backoffBase: 2.0,
  perPage: 100,
  userAgent: 'gist-index/1.0 (+https://github.com/)',
  apiVersion: '2022-11-28'
});

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new ConfigError(`Missing required env: ${name}`);
  }
  return value;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads the run's settings from the environment. Called once at startup;
 * the returned object is frozen and handed to every component.
 */
export function loadSettings(env: NodeJS.ProcessEnv): Readonly<Settings> {
  const username = requireEnv(env, 'GITHUB_USERNAME');

  const displayTimeZone = readEnv(env, 'INDEX_TIMEZONE') ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(displayTimeZone)) {
    throw new ConfigError(`Invalid INDEX_TIMEZONE: ${displayTimeZone}`);
  }

  return Object.freeze({
    username,
    indexGistId: readEnv(env, 'INDEX_GIST_ID'),
    token: readEnv(env, 'GITHUB_TOKEN'),
    targetFilename: readEnv(env, 'TARGET_MD_FILENAME') ?? DEFAULT_TARGET_FILENAME,
    apiBaseUrl: (readEnv(env, 'GITHUB_API_URL') ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
    displayTimeZone,
    http: DEFAULT_HTTP_SETTINGS
  });
}

export function canUpdate(settings: Settings): settings is Settings & { indexGistId: string; token: string } {
  return Boolean(settings.indexGistId && settings.token);
}
