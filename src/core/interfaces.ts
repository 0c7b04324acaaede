/**
 * Service Abstractions
 *
 * Callers depend on these contracts; the OData and SOAP implementations and
 * their factories are interchangeable behind them.
 */

import type { EntityDefinition, NavRecord } from '../models/nav-record.js';
import type { SoapResult } from '../models/soap-result.js';
import type { XmlElement } from '../xml/xml-document.js';

// ============================================================================
// OData
// ============================================================================

/**
 * CRUD operations against one OData entity set.
 */
export interface INavODataService<T extends NavRecord> {
  /**
   * Entities matching `filter` AND every non-empty entry of `filters`.
   * No match is an empty list.
   */
  getEntities(filter?: string, filters?: readonly string[]): Promise<T[]>;

  /**
   * First entity matching `filter`.
   * @throws {EntityNotFoundError} When nothing matches
   */
  getEntityById(filter: string): Promise<T>;

  /**
   * Creates an entity and returns the server's copy (keys, ETag, defaults).
   */
  createEntity(entity: T): Promise<T>;

  /**
   * Patches the entity at `key`. Sends `If-Match` when the record has an ETag.
   */
  updateEntity(key: string, entity: T): Promise<T>;

  deleteEntity(key: string): Promise<void>;
}

export interface INavODataServiceFactory {
  /**
   * @param serviceName - Entity set name; defaults to the entity name
   */
  create<T extends NavRecord>(entity: EntityDefinition<T>, serviceName?: string): INavODataService<T>;
}

// ============================================================================
// SOAP
// ============================================================================

export interface ReadMultipleOptions {
  /** `<filter>` elements, see soapFilter() */
  readonly filters?: readonly XmlElement[];
  /** Key of the last record of the previous page */
  readonly bookmarkKey?: string;
  /** Page size; 0 lets the server decide. Default 1000. */
  readonly setSize?: number;
}

/**
 * CRUD and codeunit operations against one NAV SOAP page service.
 */
export interface INavSoapService<T extends NavRecord> {
  readMultiple(options?: ReadMultipleOptions): Promise<T[]>;

  /**
   * @param keyFieldsXml - Complete `<Read>` body
   * @returns The record, or undefined when the server returned none
   */
  read(keyFieldsXml: XmlElement): Promise<T | undefined>;

  /**
   * @param createPayloadXml - Complete `<Create>` body
   */
  create(createPayloadXml: XmlElement): Promise<T | undefined>;

  /**
   * @param updatePayloadXml - Complete `<Update>` body, Key included
   */
  update(updatePayloadXml: XmlElement): Promise<T | undefined>;

  /**
   * @param keyFieldsXml - Complete `<Delete>` body
   * @returns Whether the server acknowledged the delete
   */
  delete(keyFieldsXml: XmlElement): Promise<boolean>;

  /** Serializes `record` into a `<Create>` body and creates it */
  createRecord(record: T): Promise<T | undefined>;

  /** Serializes `record` into an `<Update>` body and updates it */
  updateRecord(record: T): Promise<T | undefined>;

  /**
   * Calls a codeunit method. Returns a failed result, rather than throwing,
   * when the response has no return value.
   */
  invokeCodeunit(serviceName: string, methodName: string, parametersXml: XmlElement): Promise<SoapResult>;
}

export interface INavSoapServiceFactory {
  /**
   * @param serviceName - Page service name; defaults to the entity name
   */
  create<T extends NavRecord>(entity: EntityDefinition<T>, serviceName?: string): INavSoapService<T>;
}
