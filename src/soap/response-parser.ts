/**
 * SOAP Response Parser
 *
 * NAV nests every result two levels under the SOAP body:
 *
 * ```xml
 * <Soap:Body>
 *   <ReadMultiple_Result xmlns="urn:microsoft-dynamics-schemas/page/customer">
 *     <ReadMultiple_Result>
 *       <Customer>…</Customer>
 *       <Customer>…</Customer>
 *     </ReadMultiple_Result>
 *   </ReadMultiple_Result>
 * </Soap:Body>
 * ```
 *
 * Single-record verbs put the entity directly under `<Verb>_Result`; codeunit
 * methods put a `return_value` under `<Method>_Result` in the codeunit
 * namespace.
 */

import { unwrap } from '../core/result.js';
import type { EntityDefinition, NavRecord } from '../models/nav-record.js';
import { failureResult, successResult, type SoapResult } from '../models/soap-result.js';
import {
  childElements,
  descendants,
  documentElements,
  firstChild,
  parseXml,
  textContent,
  type XmlElement,
} from '../xml/xml-document.js';
import { SOAP_ENVELOPE_NS, codeunitNamespace, pageNamespace } from './addressing.js';
import { deserializeEntity } from './serialization.js';

/**
 * First `<tag>` in `namespace` anywhere under a SOAP Body.
 */
function findResultElement(root: XmlElement, namespace: string, tag: string): XmlElement | undefined {
  for (const body of documentElements(root, SOAP_ENVELOPE_NS, 'Body')) {
    const found = descendants(body, namespace, tag)[0];
    if (found) return found;
  }
  return undefined;
}

function parseEntityUnder<T extends NavRecord>(
  root: XmlElement,
  entity: EntityDefinition<T>,
  tag: string
): T | undefined {
  const dataNs = pageNamespace(entity.name);
  const result = findResultElement(root, dataNs, tag);
  const entityElement = result && firstChild(result, dataNs, entity.name);
  return entityElement ? deserializeEntity(entityElement, entity, dataNs) : undefined;
}

/**
 * Records of a ReadMultiple response. A missing wrapper or an empty one yields
 * an empty list.
 *
 * @throws {ParseError} If the body is not XML or a record does not bind
 */
export function parseReadMultiple<T extends NavRecord>(soapResponse: string, entity: EntityDefinition<T>): T[] {
  const root = unwrap(parseXml(soapResponse));
  const dataNs = pageNamespace(entity.name);

  const outer = findResultElement(root, dataNs, 'ReadMultiple_Result');
  const inner = outer && firstChild(outer, dataNs, 'ReadMultiple_Result');
  if (!inner) {
    return [];
  }

  return childElements(inner, dataNs, entity.name).map((item) => deserializeEntity(item, entity, dataNs));
}

/**
 * Record of a Read response, or undefined when the server returned none.
 *
 * @throws {ParseError} If the body is not XML or the record does not bind
 */
export function parseRead<T extends NavRecord>(soapResponse: string, entity: EntityDefinition<T>): T | undefined {
  return parseEntityUnder(unwrap(parseXml(soapResponse)), entity, 'Read_Result');
}

/**
 * Record echoed by a Create or Update response. Both result tags are probed
 * and the first that holds the entity wins.
 *
 * @throws {ParseError} If the body is not XML or the record does not bind
 */
export function parseCreateOrUpdate<T extends NavRecord>(
  soapResponse: string,
  entity: EntityDefinition<T>
): T | undefined {
  const root = unwrap(parseXml(soapResponse));
  return parseEntityUnder(root, entity, 'Create_Result') ?? parseEntityUnder(root, entity, 'Update_Result');
}

/**
 * Delete acknowledgement: presence of `Delete_Result` anywhere in the text.
 */
export function parseDelete(soapResponse: string): boolean {
  return soapResponse.includes('Delete_Result');
}

/**
 * Return value of a codeunit method. Never throws: a missing element or an
 * unreadable body produces a failed result.
 */
export function parseCodeunitResult(soapResponse: string, methodName: string, codeunitName: string): SoapResult {
  const parsed = parseXml(soapResponse);
  if (!parsed.ok) {
    return failureResult(`Error parsing response: ${parsed.error.message}`);
  }

  const dataNs = codeunitNamespace(codeunitName);
  const result = findResultElement(parsed.value, dataNs, `${methodName}_Result`);
  const returnValue = result && firstChild(result, dataNs, 'return_value');
  if (!returnValue) {
    return failureResult('return_value element not found.');
  }

  return successResult(textContent(returnValue));
}
