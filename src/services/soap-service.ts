/**
 * NAV SOAP Service
 *
 * Generic page service plus codeunit invocation over SOAP 1.1.
 *
 * Addressing:
 * - Page calls POST to `{base}{service}` with SOAPAction `…/page/{Verb}`
 * - Codeunit calls POST to the same path with `/Page/` swapped for
 *   `/Codeunit/`, SOAPAction `…/codeunit/{service}`
 *
 * A response is returned for parsing only when its status is 2xx and its text
 * carries no fault markers.
 */

import {
  NetworkError,
  SoapFaultError,
  SoapHttpError,
  errorMessage,
  isNavError,
} from '../core/errors.js';
import { requestIdFor } from '../core/id.js';
import type { INavSoapService, ReadMultipleOptions } from '../core/interfaces.js';
import { createServiceLogger, type Logger } from '../core/logger.js';
import type { HttpResponse, IHttpClient } from '../connection/interfaces.js';
import type { EntityDefinition, NavRecord } from '../models/nav-record.js';
import type { SoapResult } from '../models/soap-result.js';
import { codeunitUrl, pageNamespace, pageUrl, soapAction } from '../soap/addressing.js';
import { buildEnvelope } from '../soap/envelope-builder.js';
import { containsFaultMarkers, extractSoapFault } from '../soap/fault-extractor.js';
import {
  parseCodeunitResult,
  parseCreateOrUpdate,
  parseDelete,
  parseRead,
  parseReadMultiple,
} from '../soap/response-parser.js';
import { pageOperation, serializeEntity } from '../soap/serialization.js';
import { element, serializeXml, type XmlElement } from '../xml/xml-document.js';

const DEFAULT_SET_SIZE = 1000;

interface SoapTarget {
  readonly url: string;
  readonly action: string;
  /** Service the call addresses, for logs and errors */
  readonly service: string;
}

export class SoapService<T extends NavRecord> implements INavSoapService<T> {
  public readonly serviceName: string;
  private readonly log: Logger;

  constructor(
    private readonly http: IHttpClient,
    private readonly entity: EntityDefinition<T>,
    serviceName?: string
  ) {
    this.serviceName = serviceName ?? entity.name;
    this.log = createServiceLogger('soap', this.serviceName);
  }

  /**
   * Namespace of this service's request elements.
   */
  public get namespace(): string {
    return pageNamespace(this.serviceName);
  }

  public async readMultiple(options: ReadMultipleOptions = {}): Promise<T[]> {
    this.log.info('Reading all records');

    const ns = this.namespace;
    const body = pageOperation(ns, 'ReadMultiple', [
      ...(options.filters ?? []),
      options.bookmarkKey ? element('bookmarkKey', ns, [options.bookmarkKey]) : undefined,
      element('setSize', ns, [String(options.setSize ?? DEFAULT_SET_SIZE)]),
    ]);

    const response = await this.dispatch(this.pageTarget('ReadMultiple'), body);
    const records = parseReadMultiple(response, this.entity);
    this.log.info({ count: records.length }, 'Read records');
    return records;
  }

  public async read(keyFieldsXml: XmlElement): Promise<T | undefined> {
    this.log.info('Reading single record');
    const response = await this.dispatch(this.pageTarget('Read'), keyFieldsXml);
    const record = parseRead(response, this.entity);
    if (!record) {
      this.log.warn('Read returned no record');
    }
    return record;
  }

  public async create(createPayloadXml: XmlElement): Promise<T | undefined> {
    this.log.info('Creating record');
    const response = await this.dispatch(this.pageTarget('Create'), createPayloadXml);
    return parseCreateOrUpdate(response, this.entity);
  }

  public async update(updatePayloadXml: XmlElement): Promise<T | undefined> {
    this.log.info('Updating record');
    const response = await this.dispatch(this.pageTarget('Update'), updatePayloadXml);
    return parseCreateOrUpdate(response, this.entity);
  }

  public async delete(keyFieldsXml: XmlElement): Promise<boolean> {
    this.log.warn('Deleting record');
    const response = await this.dispatch(this.pageTarget('Delete'), keyFieldsXml);
    return parseDelete(response);
  }

  public async createRecord(record: T): Promise<T | undefined> {
    return this.create(this.recordOperation('Create', record));
  }

  public async updateRecord(record: T): Promise<T | undefined> {
    return this.update(this.recordOperation('Update', record));
  }

  public async invokeCodeunit(serviceName: string, methodName: string, parametersXml: XmlElement): Promise<SoapResult> {
    this.log.debug({ codeunit: serviceName, method: methodName }, 'Invoking codeunit');

    const target: SoapTarget = {
      url: codeunitUrl(this.http.baseAddress, serviceName),
      action: soapAction('codeunit', serviceName),
      service: serviceName,
    };
    const response = await this.dispatch(target, parametersXml);
    return parseCodeunitResult(response, methodName, serviceName);
  }

  private recordOperation(verb: 'Create' | 'Update', record: T): XmlElement {
    return pageOperation(this.namespace, verb, [serializeEntity(this.entity, record, this.serviceName)]);
  }

  private pageTarget(verb: string): SoapTarget {
    return {
      url: pageUrl(this.http.baseAddress, this.serviceName),
      action: soapAction('page', verb),
      service: this.serviceName,
    };
  }

  /**
   * POST one envelope and return the raw response text.
   *
   * @throws {NetworkError} If the transport failed without a response
   * @throws {SoapHttpError} On a non-2xx status
   * @throws {SoapFaultError} On fault markers in a 2xx response
   */
  private async dispatch(target: SoapTarget, body: XmlElement): Promise<string> {
    const log = this.log.child({ requestId: requestIdFor('soap'), action: target.action });
    const envelope = serializeXml(buildEnvelope(body));

    log.debug({ envelope }, 'Envelope content');
    log.debug({ url: target.url }, 'Sending SOAP request');

    let response: HttpResponse;
    let content: string;
    try {
      response = await this.http.send({
        method: 'POST',
        url: target.url,
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          SOAPAction: target.action,
        },
        body: envelope,
      });
      content = await response.text();
    } catch (error) {
      log.error({ err: error }, 'HTTP request failed');
      if (isNavError(error)) {
        throw error;
      }
      throw new NetworkError(`HTTP Request failed: ${errorMessage(error)}`, {
        cause: error,
        context: { url: target.url, action: target.action },
      });
    }

    if (!response.ok) {
      const fault = extractSoapFault(content);
      log.error({ statusCode: response.status, fault: fault ?? content }, 'SOAP error');
      throw new SoapHttpError(response.status, fault, content);
    }

    if (containsFaultMarkers(content)) {
      const fault = extractSoapFault(content);
      log.error({ fault }, 'SOAP fault');
      throw new SoapFaultError(fault, { service: target.service, action: target.action });
    }

    log.debug('SOAP response received');
    return content;
  }
}
