/**
 * SOAP addressing conventions of NAV web services.
 *
 * Pure string functions: namespaces, SOAPAction values and target URLs.
 */

export const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';

export const NAV_SCHEMA_URN = 'urn:microsoft-dynamics-schemas/';

export type NavObjectKind = 'page' | 'codeunit';

/**
 * Namespace of a page service's elements; NAV lower-cases the page name.
 *
 * @example pageNamespace('Customer') // "urn:microsoft-dynamics-schemas/page/customer"
 */
export function pageNamespace(name: string): string {
  return `${NAV_SCHEMA_URN}page/${name.toLowerCase()}`;
}

/**
 * Namespace of a codeunit service's elements; the name keeps its casing.
 */
export function codeunitNamespace(codeunitName: string): string {
  return `${NAV_SCHEMA_URN}codeunit/${codeunitName}`;
}

/**
 * SOAPAction header value, e.g. `urn:microsoft-dynamics-schemas/page/Read`.
 */
export function soapAction(kind: NavObjectKind, action: string): string {
  return `${NAV_SCHEMA_URN}${kind}/${action}`;
}

export function pageUrl(baseAddress: string, serviceName: string): string {
  return `${baseAddress}${serviceName}`;
}

/**
 * Codeunits live beside pages under the same company. Every `/Page/` segment
 * of the address becomes `/Codeunit/`.
 */
export function codeunitUrl(baseAddress: string, serviceName: string): string {
  return `${baseAddress}${serviceName}`.replaceAll('/Page/', '/Codeunit/');
}
