import debug from 'debug';

import { toCloudApiError } from './errors';
import type { RetryOptions } from './retry';
import { isThrottled, isTransientError, parseRetryAfter, withRetry } from './retry';

const debugTransport = debug('skyform:transport');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, QueryValue>;
  /** Status codes accepted as success; defaults to any 2xx */
  okCodes?: number[];
  headers?: Record<string, string>;
}

/** Transport contract the resources depend on */
export interface IServiceClient {
  readonly endpoint: string;
  readonly projectId: string;

  /** Expands `{project_id}` and the given placeholders in a path template */
  buildPath(template: string, params?: Record<string, string>): string;

  /** Resolves to the parsed JSON body, or undefined for an empty response */
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
}

export interface ServiceClientOptions {
  endpoint: string;
  projectId: string;
  authToken: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  retry?: RetryOptions;
}

export class ServiceClient implements IServiceClient {
  readonly endpoint: string;
  readonly projectId: string;
  private readonly authToken: string;
  private readonly timeout: number;
  private readonly retry: RetryOptions;

  constructor(options: ServiceClientOptions) {
    this.endpoint = options.endpoint.endsWith('/') ? options.endpoint : `${options.endpoint}/`;
    this.projectId = options.projectId;
    this.authToken = options.authToken;
    this.timeout = options.timeout ?? 30_000;
    this.retry = options.retry ?? {};
  }

  buildPath(template: string, params: Record<string, string> = {}): string {
    const values: Record<string, string> = { project_id: this.projectId, ...params };

    return template.replace(/{([a-z_]+)}/g, (_match: string, name: string) => {
      const value = values[name];
      if (value === undefined) throw new Error(`Missing value for path parameter "${name}" in ${template}`);
      return encodeURIComponent(value);
    });
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(path, options.query);
    // POST is not idempotent: only repeat it when the server refused to process it
    const shouldRetry = method === 'POST' ? isThrottled : isTransientError;

    return withRetry(() => this.send(method, url, options), { ...this.retry, shouldRetry: this.retry.shouldRetry ?? shouldRetry });
  }

  private buildUrl(path: string, query: Record<string, QueryValue> = {}): string {
    const url = new URL(path.replace(/^\//, ''), this.endpoint);
    for (const [key, value] of Object.entries(query)) if (value !== undefined) url.searchParams.set(key, String(value));

    return url.toString();
  }

  private async send(method: HttpMethod, url: string, options: RequestOptions): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      const res = await fetch(url, {
        method,
        headers: {
          'X-Auth-Token': this.authToken,
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...options.headers,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      debugTransport('%s %s -> %d', method, url, res.status);

      const accepted = options.okCodes ? options.okCodes.includes(res.status) : res.ok;
      if (!accepted) {
        const errorBody: unknown = await res.json().catch(() => undefined);
        throw toCloudApiError(res.status, errorBody, {
          requestId: res.headers.get('x-request-id') ?? undefined,
          retryAfterMs: parseRetryAfter(res.headers.get('retry-after')) ?? undefined,
        });
      }

      if (res.status === 204) return undefined;
      const text = await res.text();
      if (text === '') return undefined;

      const body: unknown = JSON.parse(text);
      return body;
    } finally {
      clearTimeout(timer);
    }
  }
}
