/**
 * HTTP client for the *arr family of APIs (Radarr, Sonarr, Prowlarr)
 *
 * All three authenticate with an X-Api-Key header. Retries with exponential
 * backoff on timeouts, network errors and 5xx responses; the caller sees a
 * single ArrRequestError once retries are exhausted.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { createLogger, withRetry, type Logger } from '@torrent-forge/plugin-utils';
import type { ServiceEndpoint } from '../types.js';

export interface ArrClientOptions {
  service: string;
  endpoint: ServiceEndpoint;
  timeoutMs: number;
  maxRetries: number;
  /** Base backoff delay in milliseconds */
  retryDelayMs?: number;
  /** Transport override, used by tests to stay in-process */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export class ArrRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArrRequestError';
    this.status = status;
  }
}

function isTransient(error: Error): boolean {
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  return status === undefined || status >= 500 || status === 429;
}

function describeError(error: unknown): ArrRequestError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = status !== undefined ? `HTTP ${status}` : (error.code ?? error.message);
    return new ArrRequestError(detail, status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ArrRequestError(message, undefined, { cause: error });
}

export class ArrClient {
  readonly service: string;
  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: ArrClientOptions) {
    this.service = options.service;
    this.maxRetries = options.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.logger = options.logger ?? createLogger(`torrent-forge:${options.service.toLowerCase()}`);
    this.http = axios.create({
      baseURL: options.endpoint.url.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      headers: {
        'X-Api-Key': options.endpoint.apiKey,
        Accept: 'application/json',
      },
      adapter: options.adapter,
    });
  }

  /**
   * GET a JSON document
   * @throws ArrRequestError when the service cannot be reached or answers with an error status
   */
  async get(path: string, params: Record<string, string | number>): Promise<unknown> {
    const start = Date.now();
    try {
      const response = await withRetry(
        () => this.http.get<unknown>(path, { params }),
        {
          maxRetries: this.maxRetries,
          baseDelay: this.retryDelayMs,
          maxDelay: this.retryDelayMs * 8,
          shouldRetry: isTransient,
          logger: this.logger,
        }
      );
      this.logger.debug(`${this.service} ${path}`, { duration: Date.now() - start, status: response.status });
      return response.data;
    } catch (error) {
      const failure = describeError(error);
      this.logger.error(`${this.service} request failed`, { path, error: failure.message });
      throw failure;
    }
  }
}
