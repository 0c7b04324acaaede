import { element, type XmlElement } from '../xml/xml-document.js';
import { SOAP_ENVELOPE_NS } from './addressing.js';

/**
 * Wrap a body element in a SOAP 1.1 envelope with an empty header.
 */
export function buildEnvelope(body: XmlElement): XmlElement {
  return element(
    'Envelope',
    SOAP_ENVELOPE_NS,
    [element('Header', SOAP_ENVELOPE_NS), element('Body', SOAP_ENVELOPE_NS, [body])],
    { 'xmlns:soap': SOAP_ENVELOPE_NS }
  );
}
