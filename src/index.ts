/**
 * NAV Service Client
 *
 * Generic CRUD and codeunit access to Microsoft Dynamics NAV / Business
 * Central over OData V4 and SOAP.
 *
 * ```ts
 * const Customer = defineEntity('Customer', { No: z.string(), Name: z.string().optional() });
 * const { odata, soap } = createNavClients();
 *
 * const customers = await odata.create(Customer).getEntities("Country_Region_Code eq 'US'");
 * const customer = await soap.create(Customer).read(
 *   pageOperation(pageNamespace('Customer'), 'Read', [element('No', pageNamespace('Customer'), ['10000'])])
 * );
 * ```
 */

// Services
export { ODataService, escapeDataString, combineFilters } from './services/odata-service.js';
export { SoapService } from './services/soap-service.js';
export {
  NavODataServiceFactory,
  NavSoapServiceFactory,
  createNavClients,
  type NavClients,
} from './services/service-factory.js';
export type {
  INavODataService,
  INavODataServiceFactory,
  INavSoapService,
  INavSoapServiceFactory,
  ReadMultipleOptions,
} from './core/interfaces.js';

// Models
export {
  defineEntity,
  hasConcurrencyToken,
  NavRecordSchema,
  type EntityDefinition,
  type EntityRecord,
  type HasConcurrencyToken,
  type NavRecord,
} from './models/nav-record.js';
export { successResult, failureResult, type SoapResult } from './models/soap-result.js';
export { formatNavDate, parseNavDate } from './models/date-only.js';
export { navBoolean, navDate, navNumber } from './validation/schemas.js';

// SOAP building blocks
export {
  SOAP_ENVELOPE_NS,
  codeunitNamespace,
  codeunitUrl,
  pageNamespace,
  pageUrl,
  soapAction,
} from './soap/addressing.js';
export { buildEnvelope } from './soap/envelope-builder.js';
export { containsFaultMarkers, extractSoapFault } from './soap/fault-extractor.js';
export {
  parseCodeunitResult,
  parseCreateOrUpdate,
  parseDelete,
  parseRead,
  parseReadMultiple,
} from './soap/response-parser.js';
export {
  codeunitOperation,
  deserializeEntity,
  pageOperation,
  serializeEntity,
  soapFilter,
} from './soap/serialization.js';
export {
  element,
  parseXml,
  serializeXml,
  textContent,
  type XmlElement,
  type XmlNode,
} from './xml/xml-document.js';

// Connection
export {
  buildBaseUri,
  defineServiceConfig,
  type NavCredentials,
  type NavEndpointsConfig,
  type NavServiceConfig,
  type NavServiceConfigInput,
} from './connection/endpoint.js';
export { buildAuthHeaders } from './connection/auth/auth-headers.js';
export { NavHttpClient, createNavHttpClient, type NavHttpClientOptions } from './connection/clients/NavHttpClient.js';
export type { HttpMethod, HttpRequest, HttpResponse, IHttpClient } from './connection/interfaces.js';

// Core
export { config, loadNavEndpoints } from './core/config.js';
export { logger, createChildLogger, createServiceLogger, type Logger } from './core/logger.js';
export * from './core/errors.js';
