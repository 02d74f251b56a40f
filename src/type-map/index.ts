/**
 * Registry type names mapped to emitted TypeScript types.
 *
 * @packageDocumentation
 */

export {
  POINTER_TYPE,
  TYPES_NAMESPACE,
  TypeAliasTable,
  buildTypeAliasTable,
  loadTypeAliases,
  parseAliasData,
  parseTypeExpression,
  type AliasData,
  type AliasTableData,
  type ParsedTypeExpression,
  type TableKey,
} from './type-map.js';
