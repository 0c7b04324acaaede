/**
 * HTTP collaborator contract.
 *
 * Services speak to NAV only through IHttpClient, so the transport (and its
 * auth, timeout and connection reuse) can be swapped without touching them.
 * Tests use an in-process implementation.
 */

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  readonly method: HttpMethod;
  /** Absolute URL */
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  /** True for 2xx statuses */
  readonly ok: boolean;
  text(): Promise<string>;
}

export interface IHttpClient {
  /** Base address every request path is appended to, ending in "/" */
  readonly baseAddress: string;

  /**
   * Sends one request. Rejects only when no response was received.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}
