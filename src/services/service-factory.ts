/**
 * Service factories
 *
 * Each factory is bound to one HTTP client (one endpoint) and hands out a
 * service per entity definition.
 */

import { config } from '../core/config.js';
import type {
  INavODataServiceFactory,
  INavSoapServiceFactory,
} from '../core/interfaces.js';
import { createChildLogger } from '../core/logger.js';
import { createNavHttpClient } from '../connection/clients/NavHttpClient.js';
import type { NavEndpointsConfig } from '../connection/endpoint.js';
import type { IHttpClient } from '../connection/interfaces.js';
import type { EntityDefinition, NavRecord } from '../models/nav-record.js';
import { ODataService } from './odata-service.js';
import { SoapService } from './soap-service.js';

const log = createChildLogger({ component: 'service-factory' });

export class NavODataServiceFactory implements INavODataServiceFactory {
  constructor(private readonly http: IHttpClient) {}

  public create<T extends NavRecord>(entity: EntityDefinition<T>, serviceName?: string): ODataService<T> {
    return new ODataService(this.http, entity, serviceName);
  }
}

export class NavSoapServiceFactory implements INavSoapServiceFactory {
  constructor(private readonly http: IHttpClient) {}

  public create<T extends NavRecord>(entity: EntityDefinition<T>, serviceName?: string): SoapService<T> {
    return new SoapService(this.http, entity, serviceName);
  }
}

export interface NavClients {
  readonly odata: NavODataServiceFactory;
  readonly soap: NavSoapServiceFactory;
}

/**
 * Both factories for a pair of endpoints, on the default node-fetch transport.
 * Without arguments the endpoints and timeout come from the environment.
 */
export function createNavClients(
  endpoints: NavEndpointsConfig = config.nav,
  timeoutMs: number = config.timeout
): NavClients {
  const odata = createNavHttpClient(endpoints.odata, timeoutMs);
  const soap = createNavHttpClient(endpoints.soap, timeoutMs);
  log.info({ odata: odata.baseAddress, soap: soap.baseAddress }, 'NAV clients created');

  return {
    odata: new NavODataServiceFactory(odata),
    soap: new NavSoapServiceFactory(soap),
  };
}
