/**
 * NAV OData V4 Service
 *
 * Generic CRUD over one entity set. Collections arrive as
 * `{ "@odata.context": …, "value": [ … ] }`; single-entity calls exchange the
 * entity body itself.
 *
 * JSON conventions:
 * - property names bind case-insensitively to the entity's declared fields
 * - `@odata.etag` binds to `ETag` and is never written back into a body
 * - `Key` and null/undefined fields are never written
 * - Date values are written as yyyy-MM-dd
 */

import {
  EntityNotFoundError,
  InvalidResponseError,
  NetworkError,
  ODataHttpError,
  ParseError,
  errorMessage,
  isNavError,
} from '../core/errors.js';
import { requestIdFor } from '../core/id.js';
import type { INavODataService } from '../core/interfaces.js';
import { createServiceLogger, type Logger } from '../core/logger.js';
import type { HttpRequest, HttpResponse, IHttpClient } from '../connection/interfaces.js';
import { formatNavDate } from '../models/date-only.js';
import { hasConcurrencyToken, type EntityDefinition, type NavRecord } from '../models/nav-record.js';
import {
  ODataCollectionSchema,
  ODataEntitySchema,
  formatZodIssues,
} from '../validation/schemas.js';

const ODATA_ETAG = '@odata.etag';

const JSON_HEADERS = {
  Accept: 'application/json',
  'Content-Type': 'application/json; charset=utf-8',
} as const;

/**
 * RFC 3986 data-string escaping: everything but unreserved characters is
 * percent-encoded, including `'`, `(`, `)`, `!` and `*`.
 */
export function escapeDataString(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Combine filter fragments with " and ", skipping empty ones.
 * Returns undefined when nothing remains.
 */
export function combineFilters(filter?: string, filters: readonly string[] = []): string | undefined {
  const parts = [filter, ...filters].filter((part): part is string => !!part);
  return parts.length > 0 ? parts.join(' and ') : undefined;
}

function toJsonValue(value: unknown): unknown {
  if (value instanceof Date) {
    return formatNavDate(value);
  }
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.map(toJsonValue);
  }
  if (typeof value === 'object' && value !== null) {
    const entries: [string, unknown][] = Object.entries(value);
    return Object.fromEntries(
      entries.filter(([, nested]) => nested !== null && nested !== undefined).map(([k, nested]) => [k, toJsonValue(nested)])
    );
  }
  return value;
}

export class ODataService<T extends NavRecord> implements INavODataService<T> {
  public readonly serviceName: string;
  private readonly log: Logger;
  private readonly fieldsByLowerName: ReadonlyMap<string, string>;

  constructor(
    private readonly http: IHttpClient,
    private readonly entity: EntityDefinition<T>,
    serviceName?: string
  ) {
    this.serviceName = serviceName ?? entity.name;
    this.log = createServiceLogger('odata', this.serviceName);
    this.fieldsByLowerName = new Map(entity.fields.map((field) => [field.toLowerCase(), field]));
  }

  public async getEntities(filter?: string, filters?: readonly string[]): Promise<T[]> {
    const url = this.collectionUrl(combineFilters(filter, filters));
    this.log.debug({ url }, 'Fetching entities');

    const records = await this.getCollection(url);
    this.log.info({ count: records.length }, 'Retrieved entities');
    return records;
  }

  public async getEntityById(filter: string): Promise<T> {
    const url = this.collectionUrl(filter);
    this.log.debug({ url }, 'Fetching entity by filter');

    const [entity] = await this.getCollection(url);
    if (!entity) {
      this.log.warn({ filter }, 'No entity found');
      throw new EntityNotFoundError(this.serviceName, filter);
    }

    this.log.info('Entity retrieved');
    return entity;
  }

  public async createEntity(entity: T): Promise<T> {
    this.log.debug('Creating entity');

    const response = await this.send({
      method: 'POST',
      url: this.entitySetUrl(),
      headers: JSON_HEADERS,
      body: this.toBody(entity),
    });
    const text = await this.readSuccessBody(response);

    const created = this.parseEntityBody(text);
    if (!created) {
      throw new InvalidResponseError('Response body was empty or malformed.', { service: this.serviceName });
    }

    this.log.info('Entity created');
    return created;
  }

  public async updateEntity(key: string, entity: T): Promise<T> {
    const headers: Record<string, string> = { ...JSON_HEADERS };
    if (hasConcurrencyToken(entity)) {
      headers['If-Match'] = entity.ETag;
      this.log.debug({ etag: entity.ETag }, 'Including ETag header for concurrency control');
    }

    this.log.debug({ key }, 'Updating entity');

    const response = await this.send({
      method: 'PATCH',
      url: this.entityUrl(key),
      headers,
      body: this.toBody(entity),
    });
    const text = await this.readSuccessBody(response);

    const updated = this.parseEntityBody(text);
    if (!updated) {
      throw new InvalidResponseError('Update succeeded but response body was empty or invalid.', {
        service: this.serviceName,
        key,
      });
    }

    this.log.info({ key }, 'Entity updated');
    return updated;
  }

  public async deleteEntity(key: string): Promise<void> {
    this.log.debug({ key }, 'Deleting entity');

    const response = await this.send({ method: 'DELETE', url: this.entityUrl(key) });
    await this.readSuccessBody(response);

    this.log.info({ key }, 'Entity deleted');
  }

  // ==========================================================================
  // Addressing
  // ==========================================================================

  private entitySetUrl(): string {
    return `${this.http.baseAddress}${this.serviceName}`;
  }

  private collectionUrl(filter: string | undefined): string {
    const url = this.entitySetUrl();
    return filter ? `${url}?$filter=${escapeDataString(filter)}` : url;
  }

  private entityUrl(key: string): string {
    return `${this.entitySetUrl()}('${key}')`;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async send(request: HttpRequest): Promise<HttpResponse> {
    const log = this.log.child({ requestId: requestIdFor('odata'), method: request.method });
    try {
      return await this.http.send(request);
    } catch (error) {
      log.error({ err: error, url: request.url }, 'HTTP request failed');
      if (isNavError(error)) {
        throw error;
      }
      throw new NetworkError(`HTTP request failed: ${errorMessage(error)}`, {
        cause: error,
        context: { url: request.url, method: request.method },
      });
    }
  }

  /**
   * @throws {ODataHttpError} On a non-2xx status
   */
  private async readSuccessBody(response: HttpResponse): Promise<string> {
    const text = await response.text();
    if (!response.ok) {
      this.log.error({ statusCode: response.status, body: text }, 'OData request failed');
      throw new ODataHttpError(response.status, response.statusText, text, { service: this.serviceName });
    }
    return text;
  }

  private async getCollection(url: string): Promise<T[]> {
    const response = await this.send({ method: 'GET', url, headers: { Accept: 'application/json' } });
    const text = await this.readSuccessBody(response);

    const json = this.parseJson(text);
    if (json === null) {
      return [];
    }

    const envelope = ODataCollectionSchema.safeParse(json);
    if (!envelope.success) {
      throw new InvalidResponseError('Response is not an OData collection', {
        service: this.serviceName,
        issues: formatZodIssues(envelope.error),
      });
    }
    return (envelope.data.value ?? []).map((raw) => this.toRecord(raw));
  }

  // ==========================================================================
  // JSON Binding
  // ==========================================================================

  /**
   * @throws {ParseError} On text that is not JSON
   */
  private parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Invalid JSON from ${this.serviceName}: ${errorMessage(error)}`, {
        cause: error,
        context: { service: this.serviceName },
      });
    }
  }

  /**
   * Entity echoed in a write response, or undefined for an empty body.
   */
  private parseEntityBody(text: string): T | undefined {
    if (text.trim() === '') {
      return undefined;
    }
    const json = this.parseJson(text);
    if (json === null) {
      return undefined;
    }
    const raw = ODataEntitySchema.safeParse(json);
    if (!raw.success) {
      throw new InvalidResponseError('Response body is not an entity', { service: this.serviceName });
    }
    return this.toRecord(raw.data);
  }

  private toRecord(raw: Record<string, unknown>): T {
    const bound: Record<string, unknown> = {};
    for (const [property, value] of Object.entries(raw)) {
      if (property === ODATA_ETAG) {
        bound.ETag = value;
        continue;
      }
      if (property.startsWith('@odata.')) continue;
      bound[this.fieldsByLowerName.get(property.toLowerCase()) ?? property] = value;
    }

    const parsed = this.entity.schema.safeParse(bound);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new ParseError(`Could not bind ${this.entity.name} entity: ${issues.join('; ')}`, {
        context: { service: this.serviceName, issues },
      });
    }
    return parsed.data;
  }

  private toBody(entity: T): string {
    const entries: [string, unknown][] = Object.entries(entity);
    const payload = entries.filter(([key]) => key !== 'ETag' && key !== 'Key');
    return JSON.stringify(toJsonValue(Object.fromEntries(payload)));
  }
}
