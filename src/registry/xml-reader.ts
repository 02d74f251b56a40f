/**
 * Reader for the Khronos XML API registry (`gl.xml`, `glx.xml`, `wgl.xml`,
 * `egl.xml`).
 *
 * The document is parsed in order-preserving mode because `<proto>` and
 * `<param>` mix text with `<ptype>` and `<name>` elements, and the type
 * expression is the text around the name.
 *
 * @packageDocumentation
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedInputError } from '../errors.js';
import { parseTypeExpression } from '../type-map/type-map.js';
import { NAMESPACE_INFO, trimPrefix } from './namespaces.js';
import { RawRegistry } from './registry.js';
import { tryParseVersion } from './version.js';
import type {
  Binding,
  Command,
  Enum,
  Namespace,
  Profile,
  Provenance,
  RawCommand,
  RawEnum,
  Removal,
  Version,
} from './types.js';

/**
 * An element of the parsed document.
 */
export interface XmlElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

/** An element or a text run. */
export type XmlNode = XmlElement | string;

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [key, attribute] of Object.entries(value)) {
    if (typeof attribute === 'string') {
      attributes[key] = attribute;
    }
  }
  return attributes;
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: readonly unknown[] = value;
  const nodes: XmlNode[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    for (const [key, content] of Object.entries(item)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?')) {
        continue;
      }
      if (key === TEXT_KEY) {
        if (typeof content === 'string' && content !== '') {
          nodes.push(content);
        }
        continue;
      }
      nodes.push({
        name: key,
        attributes: readAttributes(item[ATTRIBUTES_KEY]),
        children: toNodes(content),
      });
    }
  }
  return nodes;
}

/**
 * Parses XML text into an element tree.
 *
 * @param xml - The document text.
 * @returns The top-level nodes.
 * @throws MalformedInputError if the text is not well-formed XML.
 */
export function parseXml(xml: string): XmlNode[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { line, msg } = validation.err;
    throw new MalformedInputError('document', 'xml', `line ${String(line)}: ${msg}`);
  }
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    trimValues: true,
  });
  const document: unknown = parser.parse(xml);
  return toNodes(document);
}

function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== 'string';
}

function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement => isElement(child) && (name === undefined || child.name === name)
  );
}

/**
 * Concatenated text of an element and its descendants, skipping elements
 * named in `skip`.
 */
function textContent(element: XmlElement, skip: ReadonlySet<string> = new Set()): string {
  const parts: string[] = [];
  for (const child of element.children) {
    if (typeof child === 'string') {
      parts.push(child);
    } else if (!skip.has(child.name)) {
      parts.push(textContent(child, skip));
    }
  }
  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

const NAME_ONLY = new Set(['name']);

function requireAttribute(element: XmlElement, attribute: string, recordId: string): string {
  const value = element.attributes[attribute];
  if (value === undefined || value === '') {
    throw new MalformedInputError(recordId, attribute, `<${element.name}> has no '${attribute}'`);
  }
  return value;
}

function requireChild(element: XmlElement, name: string, recordId: string): XmlElement {
  const child = childElements(element, name)[0];
  if (child === undefined) {
    throw new MalformedInputError(recordId, name, `<${element.name}> has no <${name}>`);
  }
  return child;
}

/** Whether an element's `api` restriction admits the namespace. */
function matchesApi(api: string | undefined, namespace: Namespace): boolean {
  return api === undefined || api === namespace;
}

function supportsNamespace(supported: string, namespace: Namespace): boolean {
  const apis = supported.split('|');
  return apis.includes(namespace) || (namespace === 'gl' && apis.includes('glcore'));
}

function readProfile(element: XmlElement): Profile | undefined {
  const profile = element.attributes.profile;
  if (profile === 'core' || profile === 'compatibility') {
    return profile;
  }
  return undefined;
}

function readEnum(element: XmlElement, namespace: Namespace): Enum {
  const documentName = requireAttribute(element, 'name', '<enum>');
  const value = requireAttribute(element, 'value', documentName);
  return {
    identifier: trimPrefix(documentName, NAMESPACE_INFO[namespace].enumPrefix),
    value,
    typeOverride: element.attributes.type,
  };
}

function readBinding(element: XmlElement, recordId: string, isReturn: boolean): Binding {
  const nameElement = requireChild(element, 'name', recordId);
  const typeName = textContent(element, NAME_ONLY);
  if (typeName === '') {
    throw new MalformedInputError(recordId, isReturn ? 'proto' : 'param', 'missing type');
  }
  return {
    identifier: isReturn ? '' : textContent(nameElement),
    typeName,
    group: element.attributes.group,
    len: element.attributes.len,
  };
}

function readCommand(
  element: XmlElement,
  namespace: Namespace,
  index: number
): { documentName: string; command: Command } {
  const proto = requireChild(element, 'proto', `<command #${String(index)}>`);
  const documentName = textContent(requireChild(proto, 'name', `<command #${String(index)}>`));
  if (documentName === '') {
    throw new MalformedInputError(`<command #${String(index)}>`, 'name', 'empty command name');
  }
  const prefix = NAMESPACE_INFO[namespace].symbolPrefix;
  const returns = readBinding(proto, documentName, true);
  const params = childElements(element, 'param')
    .filter((param) => matchesApi(param.attributes.api, namespace))
    .map((param) => readBinding(param, documentName, false));
  const aliasElement = childElements(element, 'alias')[0];
  const alias =
    aliasElement === undefined
      ? undefined
      : trimPrefix(requireAttribute(aliasElement, 'name', documentName), prefix);
  const isSafe = [returns, ...params].every(
    (binding) => parseTypeExpression(binding.typeName).pointerDepth === 0
  );
  return {
    documentName,
    command: { identifier: trimPrefix(documentName, prefix), params, returns, isSafe, alias },
  };
}

interface Definitions {
  readonly enums: Map<string, Enum>;
  readonly commands: Map<string, Command>;
}

/**
 * Collects enum and command definitions. A definition restricted to this
 * namespace replaces an unrestricted one of the same name.
 */
function collectDefinitions(registry: XmlElement, namespace: Namespace): Definitions {
  const enums = new Map<string, Enum>();
  const commands = new Map<string, Command>();
  const store = <T>(into: Map<string, T>, name: string, api: string | undefined, def: T): void => {
    if (api === namespace || !into.has(name)) {
      into.set(name, def);
    }
  };

  for (const block of childElements(registry, 'enums')) {
    for (const element of childElements(block, 'enum')) {
      const api = element.attributes.api;
      if (!matchesApi(api, namespace)) {
        continue;
      }
      store(enums, requireAttribute(element, 'name', '<enum>'), api, readEnum(element, namespace));
    }
  }

  let index = 0;
  for (const block of childElements(registry, 'commands')) {
    for (const element of childElements(block, 'command')) {
      index += 1;
      const api = element.attributes.api;
      if (!matchesApi(api, namespace)) {
        continue;
      }
      const { documentName, command } = readCommand(element, namespace, index);
      store(commands, documentName, api, command);
    }
  }
  return { enums, commands };
}

interface Introduction {
  readonly name: string;
  readonly introducedIn?: Version | undefined;
  readonly extension?: string | undefined;
  readonly profile?: Profile | undefined;
}

/**
 * Walks the `<require>` and `<remove>` blocks of a feature or extension.
 */
class ProvenanceCollector {
  readonly enums: Introduction[] = [];
  readonly commands: Introduction[] = [];
  readonly removals = new Map<string, Removal[]>();

  constructor(
    private readonly definitions: Definitions,
    private readonly namespace: Namespace
  ) {}

  require(block: XmlElement, owner: string, origin: Omit<Introduction, 'name'>): void {
    if (!matchesApi(block.attributes.api, this.namespace)) {
      return;
    }
    const profile = readProfile(block);
    for (const element of childElements(block)) {
      if (element.name !== 'enum' && element.name !== 'command') {
        continue;
      }
      const name = requireAttribute(element, 'name', owner);
      const known =
        element.name === 'enum' ? this.definitions.enums : this.definitions.commands;
      if (!known.has(name)) {
        throw new MalformedInputError(owner, element.name, `'${name}' is not defined`);
      }
      const target = element.name === 'enum' ? this.enums : this.commands;
      target.push({ ...origin, name, profile: profile ?? origin.profile });
    }
  }

  remove(block: XmlElement, owner: string, version: Version): void {
    if (!matchesApi(block.attributes.api, this.namespace)) {
      return;
    }
    const removal: Removal = { version, profile: readProfile(block) };
    for (const element of childElements(block)) {
      if (element.name !== 'enum' && element.name !== 'command') {
        continue;
      }
      const name = requireAttribute(element, 'name', owner);
      const existing = this.removals.get(name);
      if (existing === undefined) {
        this.removals.set(name, [removal]);
      } else {
        existing.push(removal);
      }
    }
  }
}

function findRegistry(nodes: readonly XmlNode[]): XmlElement {
  const registry = nodes.find(
    (node): node is XmlElement => isElement(node) && node.name === 'registry'
  );
  if (registry === undefined) {
    throw new MalformedInputError('document', 'registry', 'no <registry> root element');
  }
  return registry;
}

function buildRecords<T extends Enum | Command>(
  introductions: readonly Introduction[],
  definitions: ReadonlyMap<string, T>,
  removals: ReadonlyMap<string, readonly Removal[]>
): Array<T & Provenance> {
  const required = new Set(introductions.map((intro) => intro.name));
  const records: Array<T & Provenance> = [];
  for (const intro of introductions) {
    const definition = definitions.get(intro.name);
    if (definition !== undefined) {
      records.push({
        ...definition,
        introducedIn: intro.introducedIn,
        extension: intro.extension,
        profile: intro.profile,
        removedIn: removals.get(intro.name) ?? [],
      });
    }
  }
  for (const [name, definition] of definitions) {
    if (!required.has(name)) {
      records.push({ ...definition, removedIn: [] });
    }
  }
  return records;
}

/**
 * Reads a Khronos registry document into the raw records of one namespace.
 *
 * @param xml - Registry document text.
 * @param namespace - Namespace to read.
 * @returns The raw registry, records in document order.
 * @throws MalformedInputError on missing attributes or elements, or when a
 *   `<require>` names an undefined enum or command.
 */
export function readRegistryXml(xml: string, namespace: Namespace): RawRegistry {
  const registry = findRegistry(parseXml(xml));
  const definitions = collectDefinitions(registry, namespace);
  const collector = new ProvenanceCollector(definitions, namespace);
  const extensions: string[] = [];

  for (const element of childElements(registry)) {
    if (element.name === 'feature') {
      if (element.attributes.api !== namespace) {
        continue;
      }
      const owner = requireAttribute(element, 'name', '<feature>');
      const number = requireAttribute(element, 'number', owner);
      const version = tryParseVersion(number);
      if (version === undefined) {
        throw new MalformedInputError(owner, 'number', `'${number}' is not a version`);
      }
      for (const block of childElements(element)) {
        if (block.name === 'require') {
          collector.require(block, owner, { introducedIn: version });
        } else if (block.name === 'remove') {
          collector.remove(block, owner, version);
        }
      }
    } else if (element.name === 'extensions') {
      for (const extension of childElements(element, 'extension')) {
        const name = requireAttribute(extension, 'name', '<extension>');
        const supported = requireAttribute(extension, 'supported', name);
        if (!supportsNamespace(supported, namespace)) {
          continue;
        }
        extensions.push(name);
        for (const block of childElements(extension, 'require')) {
          collector.require(block, name, { extension: name });
        }
      }
    }
  }

  const enums: RawEnum[] = buildRecords(collector.enums, definitions.enums, collector.removals);
  const commands: RawCommand[] = buildRecords(
    collector.commands,
    definitions.commands,
    collector.removals
  );
  return new RawRegistry(namespace, enums, commands, extensions);
}
