/**
 * Runtime support imported by generated bindings.
 *
 * @packageDocumentation
 */

export {
  BindingTable,
  UnloadedCommandError,
  type Callable,
  type SlotState,
  type SymbolLoader,
  type SymbolNames,
} from './binding-table.js';
