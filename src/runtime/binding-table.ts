/**
 * Run-time storage for dynamically loaded command bindings.
 *
 * Generated `global` and `struct` modules create one table each and dispatch
 * every call through it. A slot starts unloaded and becomes loaded when the
 * loader returns a function for its primary symbol or one of its fallbacks;
 * a loaded slot is never rewritten.
 *
 * @packageDocumentation
 */

/** Any function value a loader may return. */
export type Callable = (...args: never[]) => unknown;

/**
 * Resolves a symbol name to a function, or `null`/`undefined` when the host
 * does not provide it.
 */
export type SymbolLoader<S> = <K extends keyof S>(symbol: string, command: K) => S[K] | null | undefined;

/**
 * Symbols to try for every command: the primary symbol first, then the
 * symbols of equivalent commands.
 */
export type SymbolNames<S> = { readonly [K in keyof S]: readonly string[] };

/** State of one slot. */
export type SlotState = 'unloaded' | 'loaded';

/**
 * Raised when a command is called before its slot has been loaded.
 */
export class UnloadedCommandError extends Error {
  /** Name of the command that was called. */
  public readonly command: string;
  /** Symbols that were looked up for it. */
  public readonly symbols: readonly string[];

  constructor(command: string, symbols: readonly string[]) {
    super(
      `Command '${command}' was called before it was loaded (symbols: ${symbols.join(', ')})`
    );
    this.name = 'UnloadedCommandError';
    this.command = command;
    this.symbols = symbols;
  }
}

/**
 * One slot per command of `S`.
 *
 * @typeParam S - Command names mapped to their function types.
 */
export class BindingTable<S extends { [K in keyof S]: Callable }> {
  private readonly symbols: SymbolNames<S>;
  private readonly slots: { [K in keyof S]?: S[K] } = {};

  constructor(symbols: SymbolNames<S>) {
    this.symbols = symbols;
  }

  /**
   * Loads one slot by trying each of its symbols in order.
   *
   * @returns Whether the slot is loaded afterwards.
   */
  load<K extends keyof S>(name: K, loader: SymbolLoader<S>): boolean {
    if (this.slots[name] !== undefined) {
      return true;
    }
    for (const symbol of this.symbols[name]) {
      const fn = loader(symbol, name);
      if (fn !== null && fn !== undefined) {
        this.slots[name] = fn;
        return true;
      }
    }
    return false;
  }

  /**
   * Loads every slot in one pass.
   *
   * @returns The number of loaded slots afterwards.
   */
  loadAll(loader: SymbolLoader<S>): number {
    for (const name in this.symbols) {
      this.load(name, loader);
    }
    return this.loadedCount;
  }

  isLoaded(name: keyof S): boolean {
    return this.slots[name] !== undefined;
  }

  state(name: keyof S): SlotState {
    return this.isLoaded(name) ? 'loaded' : 'unloaded';
  }

  /** Number of loaded slots. */
  get loadedCount(): number {
    let count = 0;
    for (const name in this.symbols) {
      if (this.isLoaded(name)) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Returns the loaded function of a command.
   *
   * @throws UnloadedCommandError if the slot is unloaded.
   */
  get<K extends keyof S>(name: K): S[K] {
    const fn = this.slots[name];
    if (fn === undefined) {
      throw new UnloadedCommandError(String(name), this.symbols[name]);
    }
    return fn;
  }
}
