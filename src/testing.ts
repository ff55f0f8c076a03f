import type { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { createGitHubClient } from './github';
import type { Settings } from './types';

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (request: InternalAxiosRequestConfig, index: number) => FakeReply | Error;

/**
 * In-process stand-in for the GitHub API: a real client from
 * createGitHubClient whose transport is swapped for `handler`.
 */
export function fakeGitHub(handler: FakeHandler) {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const reply = handler(config, requests.length - 1);
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      data: reply.data,
      status: reply.status,
      statusText: '',
      headers: reply.headers ?? {},
      config
    };
  };

  const createClient = (settings: Settings): AxiosInstance => {
    const client = createGitHubClient(settings);
    client.defaults.adapter = adapter;
    return client;
  };

  return { requests, createClient };
}

export function bodyOf(request: InternalAxiosRequestConfig): unknown {
  return typeof request.data === 'string' ? JSON.parse(request.data) : request.data;
}
