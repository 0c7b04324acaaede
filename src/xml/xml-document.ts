/**
 * Namespace-aware XML element model
 *
 * fast-xml-parser works on prefixed tag names. NAV responses are matched by
 * (namespace, local name), so the ordered parser output is converted into a
 * small element tree with every prefix resolved against its xmlns scope, and
 * element trees are written back through XMLBuilder with prefixes chosen from
 * the declarations in scope.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { ParseError, errorMessage } from '../core/errors.js';
import { andThen, err, fromThrowableWith, ok, type Result } from '../core/result.js';

// ============================================================================
// Element Model
// ============================================================================

export interface XmlElement {
  /** Local name, without prefix */
  readonly name: string;
  /** Namespace URI; empty string when the element has none */
  readonly namespace: string;
  /** Attributes by qualified name, including xmlns declarations */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | string;

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== 'string';
}

/**
 * Build an element. `undefined` children are dropped so optional parts can be
 * written inline.
 */
export function element(
  name: string,
  namespace = '',
  children: readonly (XmlNode | undefined)[] = [],
  attributes: Readonly<Record<string, string>> = {}
): XmlElement {
  return {
    name,
    namespace,
    attributes,
    children: children.filter((child): child is XmlNode => child !== undefined),
  };
}

// ============================================================================
// Queries
// ============================================================================

function matches(el: XmlElement, namespace?: string, name?: string): boolean {
  return (namespace === undefined || el.namespace === namespace) && (name === undefined || el.name === name);
}

/**
 * Direct child elements, optionally filtered by namespace and local name.
 */
export function childElements(parent: XmlElement, namespace?: string, name?: string): XmlElement[] {
  return parent.children.filter(isElement).filter((child) => matches(child, namespace, name));
}

export function firstChild(parent: XmlElement, namespace: string, name: string): XmlElement | undefined {
  return childElements(parent, namespace, name)[0];
}

/**
 * Descendant elements in document order, excluding `parent` itself.
 */
export function descendants(parent: XmlElement, namespace?: string, name?: string): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (el: XmlElement): void => {
    for (const child of el.children) {
      if (!isElement(child)) continue;
      if (matches(child, namespace, name)) found.push(child);
      visit(child);
    }
  };
  visit(parent);
  return found;
}

/**
 * Elements of the whole document rooted at `root`, root included.
 */
export function documentElements(root: XmlElement, namespace?: string, name?: string): XmlElement[] {
  const rest = descendants(root, namespace, name);
  return matches(root, namespace, name) ? [root, ...rest] : rest;
}

/**
 * Concatenated text of the element and all its descendants.
 */
export function textContent(el: XmlElement): string {
  return el.children.map((child) => (isElement(child) ? textContent(child) : child)).join('');
}

// ============================================================================
// Parsing
// ============================================================================

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  // character references such as &#xD; and &#233;
  htmlEntities: true,
  trimValues: false,
});

type Scope = ReadonlyMap<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitQName(qname: string): [prefix: string, local: string] {
  const idx = qname.indexOf(':');
  return idx < 0 ? ['', qname] : [qname.slice(0, idx), qname.slice(idx + 1)];
}

function withDeclarations(scope: Scope, attributes: Readonly<Record<string, string>>): Map<string, string> {
  const next = new Map(scope);
  for (const [attr, value] of Object.entries(attributes)) {
    if (attr === 'xmlns') next.set('', value);
    else if (attr.startsWith('xmlns:')) next.set(attr.slice('xmlns:'.length), value);
  }
  return next;
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTR_PREFIX)) {
      attributes[key.slice(ATTR_PREFIX.length)] = String(value);
    }
  }
  return attributes;
}

function toElement(node: Record<string, unknown>, scope: Scope): XmlElement | undefined {
  const tag = Object.keys(node).find((key) => key !== ATTRS_KEY);
  // declarations (?xml), text, comments
  if (!tag || tag === TEXT_KEY || tag.startsWith('?') || tag.startsWith('#')) {
    return undefined;
  }

  const attributes = readAttributes(node[ATTRS_KEY]);
  const local = withDeclarations(scope, attributes);
  const [prefix, name] = splitQName(tag);

  const children: XmlNode[] = [];
  const rawChildren = node[tag];
  if (Array.isArray(rawChildren)) {
    for (const item of rawChildren) {
      if (!isRecord(item)) continue;
      if (TEXT_KEY in item) {
        children.push(String(item[TEXT_KEY]));
        continue;
      }
      const child = toElement(item, local);
      if (child) children.push(child);
    }
  }

  // Text is kept verbatim; whitespace between child elements is layout
  const hasElements = children.some(isElement);
  return {
    name,
    namespace: local.get(prefix) ?? '',
    attributes,
    children: hasElements ? children.filter((child) => isElement(child) || child.trim() !== '') : children,
  };
}

/**
 * Parse a document and return its root element.
 */
export function parseXml(xml: string): Result<XmlElement, ParseError> {
  const parsed = fromThrowableWith<unknown, ParseError>(
    () => parser.parse(xml, true),
    (error) => new ParseError(`Invalid XML: ${errorMessage(error)}`, { cause: error })
  );

  return andThen(parsed, (nodes) => {
    const rootScope: Scope = new Map([['', '']]);
    if (Array.isArray(nodes)) {
      for (const node of nodes) {
        if (!isRecord(node)) continue;
        const root = toElement(node, rootScope);
        if (root) return ok(root);
      }
    }
    return err(new ParseError('XML document has no root element'));
  });
}

// ============================================================================
// Serialization
// ============================================================================

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  suppressEmptyNode: true,
  format: false,
});

function prefixFor(scope: Scope, namespace: string): string | undefined {
  for (const [prefix, uri] of scope) {
    if (prefix !== '' && uri === namespace) return prefix;
  }
  return undefined;
}

function toOrdered(el: XmlElement, scope: Scope): Record<string, unknown> {
  const attributes: Record<string, string> = { ...el.attributes };
  const local = withDeclarations(scope, attributes);

  let tag = el.name;
  if ((local.get('') ?? '') !== el.namespace) {
    const prefix = prefixFor(local, el.namespace);
    if (prefix !== undefined) {
      tag = `${prefix}:${el.name}`;
    } else {
      attributes.xmlns = el.namespace;
      local.set('', el.namespace);
    }
  }

  const children = el.children
    .filter((child) => child !== '')
    .map((child) => (isElement(child) ? toOrdered(child, local) : { [TEXT_KEY]: child }));

  const node: Record<string, unknown> = { [tag]: children };
  const attrEntries = Object.entries(attributes);
  if (attrEntries.length > 0) {
    node[ATTRS_KEY] = Object.fromEntries(attrEntries.map(([key, value]) => [`${ATTR_PREFIX}${key}`, value]));
  }
  return node;
}

/**
 * Serialize an element tree without an XML declaration. Empty elements are
 * written self-closing.
 */
export function serializeXml(root: XmlElement): string {
  const rootScope: Scope = new Map([['', '']]);
  return builder.build([toOrdered(root, rootScope)]);
}
