/**
 * Filter resolution: raw registry plus filter to resolved registry.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_SELECTION,
  VERSION_FORMATS,
  selectionToFilter,
  validateVersion,
  type Filter,
  type Selection,
} from './filter.js';
export {
  UNKNOWN_EXTENSION_POLICIES,
  isIncluded,
  parseUnknownExtensionPolicy,
  resolveRegistry,
  type Criteria,
  type ResolveOptions,
  type UnknownExtensionPolicy,
} from './resolver.js';
