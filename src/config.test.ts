import { describe, it, expect } from 'vitest';
import { canUpdate, DEFAULT_HTTP_SETTINGS, DEFAULT_TARGET_FILENAME, loadSettings } from './config';
import { ConfigError } from './errors';

describe('loadSettings', () => {
  it('requires GITHUB_USERNAME', () => {
    expect(() => loadSettings({})).toThrow(ConfigError);
    expect(() => loadSettings({ GITHUB_USERNAME: '   ' })).toThrow('Missing required env: GITHUB_USERNAME');
  });

  it('applies defaults for optional settings', () => {
    const settings = loadSettings({ GITHUB_USERNAME: 'octo' });

    expect(settings).toEqual({
      username: 'octo',
      indexGistId: undefined,
      token: undefined,
      targetFilename: DEFAULT_TARGET_FILENAME,
      apiBaseUrl: 'https://api.github.com',
      displayTimeZone: 'America/New_York',
      http: DEFAULT_HTTP_SETTINGS
    });
    expect(settings.targetFilename).toBe('Public-Gists-by-Rich-Lewis.md');
    expect(settings.http).toMatchObject({ retries: 3, backoffBase: 2, perPage: 100, timeoutMs: 30000 });
  });

  it('reads every variable and treats empty values as absent', () => {
    const settings = loadSettings({
      GITHUB_USERNAME: ' octo ',
      INDEX_GIST_ID: 'abc123',
      GITHUB_TOKEN: '',
      TARGET_MD_FILENAME: 'Index.md',
      GITHUB_API_URL: 'https://ghe.example.com/api/v3/',
      INDEX_TIMEZONE: 'Europe/Berlin'
    });

    expect(settings.username).toBe('octo');
    expect(settings.indexGistId).toBe('abc123');
    expect(settings.token).toBeUndefined();
    expect(settings.targetFilename).toBe('Index.md');
    expect(settings.apiBaseUrl).toBe('https://ghe.example.com/api/v3');
    expect(settings.displayTimeZone).toBe('Europe/Berlin');
  });

  it('rejects an unknown time zone', () => {
    expect(() => loadSettings({ GITHUB_USERNAME: 'octo', INDEX_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'Invalid INDEX_TIMEZONE: Mars/Olympus'
    );
  });

  it('returns frozen settings', () => {
    const settings = loadSettings({ GITHUB_USERNAME: 'octo' });
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.http)).toBe(true);
  });
});

describe('canUpdate', () => {
  it('needs both the gist id and the token', () => {
    expect(canUpdate(loadSettings({ GITHUB_USERNAME: 'octo', INDEX_GIST_ID: 'abc123', GITHUB_TOKEN: 'test-token' }))).toBe(true);
    expect(canUpdate(loadSettings({ GITHUB_USERNAME: 'octo', INDEX_GIST_ID: 'abc123' }))).toBe(false);
    expect(canUpdate(loadSettings({ GITHUB_USERNAME: 'octo', GITHUB_TOKEN: 'test-token' }))).toBe(false);
  });
});
