import type { AxiosInstance } from 'axios';

// Configuration types
export interface HttpSettings {
  timeoutMs: number;
  retries: number;
  backoffBase: number;
  perPage: number;
  userAgent: string;
  apiVersion: string;
}

export interface Settings {
  username: string;
  indexGistId?: string;
  token?: string;
  targetFilename: string;
  apiBaseUrl: string;
  displayTimeZone: string;
  http: HttpSettings;
}

// GitHub API types
export interface GistFile {
  filename: string;
  size?: number | null;
  language?: string | null;
}

export interface Gist {
  id: string;
  description?: string | null;
  files?: Record<string, GistFile> | null;
  updated_at?: string | null;
  html_url?: string | null;
  public?: boolean;
}

export interface UpdateGistRequest {
  description: string;
  files: Record<string, { content: string }>;
}

// HTTP plumbing shared by the lister and the updater
export type Sleep = (ms: number) => Promise<void>;

export interface GitHubContext {
  client: AxiosInstance;
  settings: Settings;
  sleep: Sleep;
  now: () => Date;
}

export interface ApiRequest {
  method: 'GET' | 'PATCH';
  url: string;
  params?: Record<string, string | number>;
  data?: unknown;
}

// Rendering types
export interface RenderOptions {
  generatedAt: Date;
  timeZone: string;
  schedule: string;
  html: boolean;
}

export const ExitCode = {
  Ok: 0,
  MissingConfig: 1,
  UserNotFound: 2,
  GistNotFound: 4,
  UpdateFailed: 5,
  Unhandled: 6
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
