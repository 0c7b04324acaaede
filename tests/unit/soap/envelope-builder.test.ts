import { describe, it, expect } from 'vitest';
import { SOAP_ENVELOPE_NS, pageNamespace } from '../../../src/soap/addressing.js';
import { buildEnvelope } from '../../../src/soap/envelope-builder.js';
import { childElements, element, serializeXml } from '../../../src/xml/xml-document.js';

describe('buildEnvelope', () => {
  const ns = pageNamespace('Customer');
  const body = element('Read', ns, [element('No', ns, ['10000'])]);

  it('wraps the body in Envelope, an empty Header, and Body', () => {
    const envelope = buildEnvelope(body);

    expect(envelope.name).toBe('Envelope');
    expect(envelope.namespace).toBe(SOAP_ENVELOPE_NS);
    expect(childElements(envelope).map((child) => child.name)).toEqual(['Header', 'Body']);

    const [header, soapBody] = childElements(envelope);
    expect(header?.children).toEqual([]);
    expect(soapBody?.children).toEqual([body]);
  });

  it('serializes with the soap prefix and the body in its own namespace', () => {
    expect(serializeXml(buildEnvelope(body))).toBe(
      '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">' +
        '<soap:Header/>' +
        '<soap:Body><Read xmlns="urn:microsoft-dynamics-schemas/page/customer"><No>10000</No></Read></soap:Body>' +
        '</soap:Envelope>'
    );
  });
});
