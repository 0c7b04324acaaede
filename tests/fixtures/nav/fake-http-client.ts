/**
 * In-process IHttpClient: records requests and answers from a queue.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from '../../../src/connection/interfaces.js';

export interface FakeReply {
  status?: number;
  statusText?: string;
  body?: string;
}

export class FakeHttpClient implements IHttpClient {
  public readonly requests: HttpRequest[] = [];
  private readonly replies: (FakeReply | Error)[] = [];

  constructor(public readonly baseAddress: string) {}

  public reply(reply: FakeReply): this {
    this.replies.push(reply);
    return this;
  }

  public fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  public get lastRequest(): HttpRequest {
    const request = this.requests[this.requests.length - 1];
    if (!request) {
      throw new Error('No request was sent');
    }
    return request;
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (!next) {
      throw new Error(`No reply queued for ${request.method} ${request.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    const status = next.status ?? 200;
    const body = next.body ?? '';
    return {
      status,
      statusText: next.statusText ?? '',
      ok: status >= 200 && status < 300,
      text: async () => body,
    };
  }
}
