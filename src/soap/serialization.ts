/**
 * Record ↔ XML binding for NAV page services, plus builders for the request
 * fragments callers commonly need (filters, operation wrappers).
 */

import { ParseError } from '../core/errors.js';
import { formatNavDate } from '../models/date-only.js';
import type { EntityDefinition, NavRecord } from '../models/nav-record.js';
import { formatZodIssues } from '../validation/schemas.js';
import {
  childElements,
  element,
  textContent,
  type XmlElement,
} from '../xml/xml-document.js';
import { codeunitNamespace, pageNamespace } from './addressing.js';

// ============================================================================
// Request Fragments
// ============================================================================

/**
 * `<Verb xmlns="ns">children</Verb>`, the body of every page call.
 */
export function pageOperation(
  namespace: string,
  verb: string,
  children: readonly (XmlElement | undefined)[] = []
): XmlElement {
  return element(verb, namespace, children);
}

/**
 * `<Method xmlns="urn:…/codeunit/Name">params</Method>` for codeunit calls.
 */
export function codeunitOperation(
  codeunitName: string,
  methodName: string,
  parameters: Readonly<Record<string, string>> = {}
): XmlElement {
  const ns = codeunitNamespace(codeunitName);
  return element(
    methodName,
    ns,
    Object.entries(parameters).map(([name, value]) => element(name, ns, [value]))
  );
}

/**
 * ReadMultiple filter: `<filter><Field>…</Field><Criteria>…</Criteria></filter>`.
 * Criteria use NAV filter syntax (`10000..20000`, `<>0`, `@*smith*`).
 */
export function soapFilter(namespace: string, field: string, criteria: string): XmlElement {
  return element('filter', namespace, [
    element('Field', namespace, [field]),
    element('Criteria', namespace, [criteria]),
  ]);
}

// ============================================================================
// Serialization
// ============================================================================

function fieldElements(name: string, value: unknown, namespace: string): XmlElement[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.flatMap((item) => fieldElements(name, item, namespace));
  }
  if (value instanceof Date) {
    return [element(name, namespace, [formatNavDate(value)])];
  }
  if (typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    return [
      element(
        name,
        namespace,
        entries.flatMap(([key, nested]) => fieldElements(key, nested, namespace))
      ),
    ];
  }
  return [element(name, namespace, [String(value)])];
}

/**
 * Element order of a record: `Key`, then the entity's declared fields, then
 * anything else the record carries. Page schemas are sequences, so NAV
 * rejects fields out of order.
 */
function fieldOrder(record: object, declared: readonly string[]): string[] {
  const present = Object.keys(record);
  const leading = ['Key', ...declared.filter((field) => field !== 'Key')];
  return [
    ...leading.filter((field) => present.includes(field)),
    ...present.filter((field) => !leading.includes(field)),
  ];
}

/**
 * Serialize a record as `<EntityName>` in the service's page namespace.
 * `ETag` is not an XML field; null and undefined fields are omitted.
 */
export function serializeEntity<T extends NavRecord>(
  entity: EntityDefinition<T>,
  record: T,
  serviceName: string = entity.name
): XmlElement {
  const namespace = pageNamespace(serviceName);
  const values = new Map<string, unknown>(Object.entries(record));
  return element(
    entity.name,
    namespace,
    fieldOrder(record, entity.fields)
      .filter((key) => key !== 'ETag')
      .flatMap((key) => fieldElements(key, values.get(key), namespace))
  );
}

// ============================================================================
// Deserialization
// ============================================================================

function elementValue(el: XmlElement, namespace: string): unknown {
  const children = childElements(el);
  if (children.length === 0) {
    return textContent(el);
  }
  return collectFields(children, namespace);
}

function collectFields(children: readonly XmlElement[], namespace: string): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const child of children) {
    if (child.namespace !== namespace) continue;
    const value = elementValue(child, namespace);
    const existing = fields[child.name];
    if (existing === undefined) {
      fields[child.name] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      fields[child.name] = [existing, value];
    }
  }
  return fields;
}

/**
 * Bind an entity element's children (those in `namespace`) to a record by
 * field name. Unknown fields are dropped by the schema; absent optional fields
 * keep their schema defaults.
 *
 * @throws {ParseError} When a field's value does not fit the schema
 */
export function deserializeEntity<T extends NavRecord>(
  el: XmlElement,
  entity: EntityDefinition<T>,
  namespace: string = el.namespace
): T {
  const raw = collectFields(childElements(el), namespace);
  const parsed = entity.schema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ParseError(`Could not bind <${entity.name}> element: ${issues.join('; ')}`, {
      context: { entity: entity.name, issues },
    });
  }
  return parsed.data;
}
