/**
 * SOAP fault detection and message extraction.
 */

import {
  documentElements,
  parseXml,
  textContent,
  type XmlElement,
} from '../xml/xml-document.js';

/**
 * Literal markers NAV puts in a fault body. Checked on the raw text because a
 * fault can arrive with a 200 status.
 */
const FAULT_MARKERS = ['<faultcode>', '<Fault>'] as const;

export function containsFaultMarkers(body: string): boolean {
  return FAULT_MARKERS.some((marker) => body.includes(marker));
}

function findText(root: XmlElement, name: string): string | undefined {
  const el = documentElements(root, root.namespace, name)[0] ?? documentElements(root, '', name)[0];
  return el ? textContent(el) : undefined;
}

/**
 * Best-effort fault message: `faultstring`, else `detail`, each looked up in
 * the root element's namespace first and then without a namespace. Returns
 * undefined for bodies that are not XML or hold neither element.
 */
export function extractSoapFault(xml: string): string | undefined {
  const parsed = parseXml(xml);
  if (!parsed.ok) {
    return undefined;
  }
  const root = parsed.value;
  return findText(root, 'faultstring') ?? findText(root, 'detail');
}
