import { describe, it, expect, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { defineServiceConfig } from '../../../src/connection/endpoint.js';
import { ODataService } from '../../../src/services/odata-service.js';
import {
  NavODataServiceFactory,
  NavSoapServiceFactory,
  createNavClients,
} from '../../../src/services/service-factory.js';
import { SoapService } from '../../../src/services/soap-service.js';
import { Customer, ODATA_BASE, SOAP_BASE } from '../../fixtures/nav/entities.js';
import { FakeHttpClient } from '../../fixtures/nav/fake-http-client.js';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

describe('service factories', () => {
  it('name services after the entity by default', () => {
    const odata = new NavODataServiceFactory(new FakeHttpClient(ODATA_BASE)).create(Customer);
    const soap = new NavSoapServiceFactory(new FakeHttpClient(SOAP_BASE)).create(Customer);

    expect(odata).toBeInstanceOf(ODataService);
    expect(odata.serviceName).toBe('Customer');
    expect(soap).toBeInstanceOf(SoapService);
    expect(soap.serviceName).toBe('Customer');
  });

  it('accept an explicit service name', () => {
    const soap = new NavSoapServiceFactory(new FakeHttpClient(SOAP_BASE)).create(Customer, 'CustomerCard');

    expect(soap.serviceName).toBe('CustomerCard');
  });
});

describe('createNavClients', () => {
  it('binds each factory to its endpoint', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"value":[]}', { status: 200 }));
    const shared = { host: 'http://nav.test', serverInstance: 'BC', company: 'CRONUS' };
    const clients = createNavClients(
      {
        odata: defineServiceConfig({ ...shared, port: 7048, serviceType: 'ODataV4' }),
        soap: defineServiceConfig({ ...shared, port: 7047, serviceType: 'SOAP' }),
      },
      1000
    );

    await clients.odata.create(Customer).getEntities();

    expect(fetchMock).toHaveBeenCalledWith(`${ODATA_BASE}Customer`, expect.objectContaining({ method: 'GET' }));
  });
});
