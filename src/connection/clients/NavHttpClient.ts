/**
 * NAV HTTP Client
 *
 * Default IHttpClient on node-fetch. Adds the endpoint's auth headers to every
 * request and bounds each exchange (headers and body) by a timeout. No retry.
 *
 * Usage:
 * ```ts
 * const client = createNavHttpClient(config.nav.soap, config.timeout);
 * const response = await client.send({ method: 'GET', url: client.baseAddress + 'Customer' });
 * ```
 */

import fetch from 'node-fetch';
import { NetworkError, TimeoutError, errorMessage } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { buildAuthHeaders } from '../auth/auth-headers.js';
import { buildBaseUri, type NavServiceConfig } from '../endpoint.js';
import type { HttpRequest, HttpResponse, IHttpClient } from '../interfaces.js';

export interface NavHttpClientOptions {
  baseAddress: string;
  /** Headers sent with every request (auth, user agent) */
  headers?: Record<string, string>;
  /** Milliseconds before an exchange is aborted */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 100000;

export class NavHttpClient implements IHttpClient {
  public readonly baseAddress: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: NavHttpClientOptions) {
    this.baseAddress = options.baseAddress.endsWith('/') ? options.baseAddress : `${options.baseAddress}/`;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Send a request and read its body.
   *
   * @throws {TimeoutError} If the exchange outlives the timeout
   * @throws {NetworkError} If no response was received
   */
  public async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: { ...this.headers, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        text: async () => body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        logger.warn({ url: request.url, timeoutMs: this.timeoutMs }, 'HTTP request timed out');
        throw new TimeoutError(`HTTP request timed out after ${this.timeoutMs}ms`, this.timeoutMs, {
          cause: error,
          context: { url: request.url, method: request.method },
        });
      }
      throw new NetworkError(`HTTP request failed: ${errorMessage(error)}`, {
        cause: error,
        context: { url: request.url, method: request.method },
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Client for one configured endpoint: its base address and auth headers.
 */
export function createNavHttpClient(config: NavServiceConfig, timeoutMs?: number): NavHttpClient {
  return new NavHttpClient({
    baseAddress: buildBaseUri(config),
    headers: buildAuthHeaders(config.credentials),
    timeoutMs,
  });
}
