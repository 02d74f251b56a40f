/**
 * Registry model and readers.
 *
 * @packageDocumentation
 */

export type {
  Binding,
  Command,
  Enum,
  Namespace,
  Profile,
  Provenance,
  RawCommand,
  RawEnum,
  Removal,
  TypeAlias,
  Version,
} from './types.js';
export {
  NAMESPACE_INFO,
  NAMESPACES,
  PROFILES,
  parseNamespace,
  parseProfile,
  trimPrefix,
  type NamespaceInfo,
} from './namespaces.js';
export { compareVersions, formatVersion, tryParseVersion } from './version.js';
export { RawRegistry, Registry } from './registry.js';
export { parseXml, readRegistryXml, type XmlElement, type XmlNode } from './xml-reader.js';
export { parseRegistryRecords } from './records.js';
