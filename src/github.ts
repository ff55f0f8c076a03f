import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import chalk from 'chalk';
import { ConfigError, HttpError, NotFoundError, TransientFailure } from './errors';
import type { ApiRequest, Gist, GitHubContext, Settings, UpdateGistRequest } from './types';

export const INDEX_GIST_DESCRIPTION = 'Auto-generated index of my PUBLIC gists';

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK'
]);

type AttemptResult =
  | { ok: true; response: AxiosResponse }
  | { ok: false; error: TransientFailure };

export function createGitHubClient(settings: Settings): AxiosInstance {
  const headers: Record<string, string> = {
    'Accept': 'application/vnd.github+json',
    'X-GitHub-Api-Version': settings.http.apiVersion,
    'User-Agent': settings.http.userAgent
  };

  if (settings.token) {
    headers['Authorization'] = `Bearer ${settings.token}`;
  }

  return axios.create({
    baseURL: settings.apiBaseUrl,
    timeout: settings.http.timeoutMs,
    headers,
    // requestWithRetry inspects every status itself
    validateStatus: () => true
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  return JSON.stringify(data);
}

function isRateLimited(response: AxiosResponse): boolean {
  return response.status === 403 && bodyText(response.data).toLowerCase().includes('rate limit');
}

function rateLimitReset(response: AxiosResponse): number | null {
  const header = response.headers['x-ratelimit-reset'];
  if (header === undefined || header === null) {
    return null;
  }
  const value = String(header).trim();
  return /^\d+$/.test(value) ? Number(value) : null;
}

async function attempt(ctx: GitHubContext, request: ApiRequest): Promise<AttemptResult> {
  try {
    const response = await ctx.client.request({
      method: request.method,
      url: request.url,
      params: request.params,
      data: request.data
    });
    if (response.status >= 500 && response.status < 600) {
      return {
        ok: false,
        error: new TransientFailure(`${response.status} ${response.statusText}`.trim(), response.status)
      };
    }
    return { ok: true, response };
  } catch (error) {
    // connection errors and timeouts only; cancellations and bad config propagate
    if (axios.isAxiosError(error) && !error.response && error.code && TRANSIENT_ERROR_CODES.has(error.code)) {
      return { ok: false, error: new TransientFailure(error.message, undefined, { cause: error }) };
    }
    throw error;
  }
}

/**
 * Issue one request with bounded retries.
 *
 * Connection errors, timeouts and 5xx responses are retried with
 * exponential backoff (`backoffBase ** (attempt - 1)` seconds). A 403 whose
 * body mentions a rate limit and which carries a numeric `X-RateLimit-Reset`
 * sleeps until the reset plus one second; that wait uses up an attempt.
 * Once the attempts run out the last failure is thrown.
 */
export async function requestWithRetry(ctx: GitHubContext, request: ApiRequest): Promise<AxiosResponse> {
  const { retries, backoffBase } = ctx.settings.http;
  let lastError: HttpError | undefined;

  for (let attemptIndex = 1; attemptIndex <= retries; attemptIndex++) {
    const result = await attempt(ctx, request);

    if (result.ok) {
      const reset = isRateLimited(result.response) ? rateLimitReset(result.response) : null;
      if (reset === null) {
        return result.response;
      }
      lastError = new HttpError('API rate limit exceeded', 403);
      if (attemptIndex === retries) {
        break;
      }
      const nowSeconds = Math.floor(ctx.now().getTime() / 1000);
      const wait = Math.max(0, reset - nowSeconds) + 1;
      console.error(chalk.yellow(`Rate limited. Sleeping ${wait}s…`));
      await ctx.sleep(wait * 1000);
      continue;
    }

    lastError = result.error;
    if (attemptIndex === retries) {
      break;
    }
    const delay = backoffBase ** (attemptIndex - 1);
    console.error(
      chalk.yellow(`Transient error (${result.error.message}); retry ${attemptIndex}/${retries - 1} in ${delay.toFixed(1)}s…`)
    );
    await ctx.sleep(delay * 1000);
  }

  throw lastError ?? new HttpError(`No attempt made for ${request.method} ${request.url}`);
}

function assertOk(response: AxiosResponse, what: string): void {
  if (response.status < 200 || response.status >= 300) {
    const detail = bodyText(response.data).slice(0, 200);
    throw new HttpError(`${what} failed: ${response.statusText || 'request rejected'}${detail ? ` ${detail}` : ''}`, response.status);
  }
}

/**
 * List ALL public gists for a username, page by page, in API order.
 */
export async function listPublicGists(ctx: GitHubContext, username: string): Promise<Gist[]> {
  const gists: Gist[] = [];
  const url = `/users/${encodeURIComponent(username)}/gists`;

  for (let page = 1; ; page++) {
    const response = await requestWithRetry(ctx, {
      method: 'GET',
      url,
      params: { per_page: ctx.settings.http.perPage, page }
    });

    if (response.status === 404) {
      throw new NotFoundError('user', username);
    }
    assertOk(response, `Listing gists for ${username}`);

    const chunk: unknown = response.data;
    if (!Array.isArray(chunk)) {
      throw new HttpError(`Unexpected response listing gists for ${username} (page ${page})`, response.status);
    }
    if (chunk.length === 0) {
      break;
    }
    gists.push(...chunk);
  }

  return gists;
}

/**
 * Overwrite one file of the index gist and return the gist's browser URL.
 */
export async function updateIndexGist(
  ctx: GitHubContext,
  gistId: string,
  filename: string,
  content: string
): Promise<string> {
  if (!ctx.settings.token) {
    throw new ConfigError('GITHUB_TOKEN is required to update the gist.');
  }

  const payload: UpdateGistRequest = {
    description: INDEX_GIST_DESCRIPTION,
    files: { [filename]: { content } }
  };

  const response = await requestWithRetry(ctx, {
    method: 'PATCH',
    url: `/gists/${encodeURIComponent(gistId)}`,
    data: payload
  });

  if (response.status === 404) {
    throw new NotFoundError('gist', gistId);
  }
  assertOk(response, `Updating gist ${gistId}`);

  const data: unknown = response.data;
  if (data && typeof data === 'object' && 'html_url' in data && typeof data.html_url === 'string') {
    return data.html_url;
  }
  return '(unknown)';
}
