import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FeedParseError } from '../shared/errors.js';

/**
 * Element of a parsed document with its namespace resolved.
 * `name` is the local name; `namespace` is the bound URI or null.
 */
export interface XmlElement {
  name: string;
  namespace: string | null;
  attributes: ReadonlyMap<string, string>;
  children: XmlElement[];
  /** Trimmed concatenation of the element's direct text and CDATA children. */
  text: string;
}

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';
const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const CDATA_KEY = '#cdata';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  cdataPropName: CDATA_KEY,
  // References are decoded below, after CDATA has been set apart.
  processEntities: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: false,
});

type Scope = ReadonlyMap<string, string>;

const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
]);

const REFERENCE = /&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([a-zA-Z]+));/g;

/**
 * Replace character references and the five predefined entities. Anything
 * else, such as an undeclared HTML entity, is left as written.
 */
export function decodeReferences(text: string): string {
  return text.replace(REFERENCE, (ref: string, dec?: string, hex?: string, name?: string) => {
    if (name !== undefined) return PREDEFINED_ENTITIES.get(name) ?? ref;
    const code = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? '', 16);
    return Number.isInteger(code) && code <= 0x10ffff ? String.fromCodePoint(code) : ref;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function malformed(message: string, details?: Record<string, unknown>): FeedParseError {
  return new FeedParseError('MalformedDocument', message, details);
}

function splitQualifiedName(qname: string): { prefix: string; local: string } {
  const colon = qname.indexOf(':');
  if (colon === -1) return { prefix: '', local: qname };
  return { prefix: qname.slice(0, colon), local: qname.slice(colon + 1) };
}

function readAttributes(node: Record<string, unknown>): Map<string, string> {
  const attributes = new Map<string, string>();
  const raw = node[ATTRIBUTES_KEY];
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    attributes.set(key.slice(ATTRIBUTE_PREFIX.length), decodeReferences(String(value)));
  }
  return attributes;
}

function extendScope(parent: Scope, attributes: ReadonlyMap<string, string>): Scope {
  let scope: Map<string, string> | null = null;
  for (const [name, value] of attributes) {
    let prefix: string | null = null;
    if (name === 'xmlns') prefix = '';
    else if (name.startsWith('xmlns:')) prefix = name.slice('xmlns:'.length);
    if (prefix === null) continue;
    scope ??= new Map(parent);
    scope.set(prefix, value);
  }
  return scope ?? parent;
}

function tagOf(node: Record<string, unknown>): string | undefined {
  return Object.keys(node).find((k) => k !== ATTRIBUTES_KEY && k !== TEXT_KEY && k !== CDATA_KEY);
}

function cdataText(value: unknown): string {
  if (!Array.isArray(value)) return '';
  return value.map((part) => (isRecord(part) && part[TEXT_KEY] !== undefined ? String(part[TEXT_KEY]) : '')).join('');
}

function buildElement(node: Record<string, unknown>, parentScope: Scope): XmlElement | null {
  const tag = tagOf(node);
  if (tag === undefined) return null;

  const attributes = readAttributes(node);
  const scope = extendScope(parentScope, attributes);
  const { prefix, local } = splitQualifiedName(tag);

  let namespace: string | null;
  if (prefix === '') {
    namespace = scope.get('') || null;
  } else {
    const bound = scope.get(prefix);
    if (bound === undefined) {
      throw malformed(`Unbound namespace prefix "${prefix}" on <${tag}>`, { tag });
    }
    namespace = bound;
  }

  const children: XmlElement[] = [];
  const texts: string[] = [];
  const content = node[tag];
  if (Array.isArray(content)) {
    for (const child of content) {
      if (!isRecord(child)) continue;
      if (CDATA_KEY in child) {
        texts.push(cdataText(child[CDATA_KEY]));
        continue;
      }
      const text = child[TEXT_KEY];
      if (text !== undefined && Object.keys(child).length === 1) {
        texts.push(decodeReferences(String(text)));
        continue;
      }
      const element = buildElement(child, scope);
      if (element) children.push(element);
    }
  }

  return { name: local, namespace, attributes, children, text: texts.join('').trim() };
}

/**
 * Parse `xml` into a namespace-resolved element tree and return its root.
 * Fails with `MalformedDocument` when the markup is not well formed.
 */
export function parseXml(xml: string): XmlElement {
  const source = xml.replace(/^\uFEFF/, '').trimStart();
  if (source.length === 0) {
    throw malformed('Document is empty');
  }

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw malformed(`Malformed XML: ${msg} (line ${line}, column ${col})`, { line, col });
  }

  const nodes: unknown = parser.parse(source);
  const roots = Array.isArray(nodes) ? nodes.filter(isRecord).filter((node) => tagOf(node) !== undefined) : [];
  if (roots.length > 1) {
    throw malformed('Document has more than one root element', { roots: roots.length });
  }

  const rootScope: Scope = new Map([['xml', XML_NAMESPACE]]);
  const root = roots.length === 1 ? buildElement(roots[0], rootScope) : null;
  if (!root) {
    throw malformed('Document has no root element');
  }
  return root;
}

/**
 * Direct children of `parent` with local name `name` in namespace `namespace`.
 */
export function childrenNamed(parent: XmlElement, name: string, namespace: string | null): XmlElement[] {
  return parent.children.filter((c) => c.name === name && c.namespace === namespace);
}

export function childNamed(parent: XmlElement, name: string, namespace: string | null): XmlElement | undefined {
  return parent.children.find((c) => c.name === name && c.namespace === namespace);
}

/**
 * Text of the first matching child, or null when it is missing or empty.
 */
export function childText(parent: XmlElement, name: string, namespace: string | null): string | null {
  const text = childNamed(parent, name, namespace)?.text;
  return text ? text : null;
}
