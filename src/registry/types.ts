/**
 * Registry model types.
 *
 * Definitions come in two forms: the raw form read from a registry document,
 * which carries version/profile/extension provenance, and the resolved form
 * consumed by generators.
 *
 * @packageDocumentation
 */

/**
 * Supported API families.
 */
export type Namespace = 'gl' | 'gles1' | 'gles2' | 'glx' | 'wgl' | 'egl';

/**
 * Context profile. `compatibility` is a superset of `core` that keeps
 * deprecated members.
 */
export type Profile = 'core' | 'compatibility';

/**
 * A `major.minor` API version.
 */
export interface Version {
  readonly major: number;
  readonly minor: number;
}

/**
 * One named constant.
 */
export interface Enum {
  /** Identifier with the namespace prefix trimmed, e.g. `COLOR_BUFFER_BIT`. */
  readonly identifier: string;
  /** Literal value exactly as written in the document. */
  readonly value: string;
  /** Explicit type suffix from the document (`u`, `ull`) or an alias name. */
  readonly typeOverride?: string | undefined;
}

/**
 * One parameter or return slot of a command.
 */
export interface Binding {
  /** Parameter name. Empty for return slots. */
  readonly identifier: string;
  /** Registry type expression, e.g. `const GLchar *`. */
  readonly typeName: string;
  /** Advisory enum group. */
  readonly group?: string | undefined;
  /** Advisory length expression. */
  readonly len?: string | undefined;
}

/**
 * One API function.
 */
export interface Command {
  /** Identifier with the namespace prefix trimmed, e.g. `Clear`. */
  readonly identifier: string;
  /** Parameters in call-site order. */
  readonly params: readonly Binding[];
  /** Return slot. */
  readonly returns: Binding;
  /** Whether the command takes and returns no raw pointers. */
  readonly isSafe: boolean;
  /** Identifier of the command this one aliases. */
  readonly alias?: string | undefined;
}

/**
 * A removal of a definition from a profile at a version.
 * A removal without a profile applies to every profile.
 */
export interface Removal {
  readonly version: Version;
  readonly profile?: Profile | undefined;
}

/**
 * Version/profile/extension provenance of a raw definition.
 */
export interface Provenance {
  /** Version of the feature that introduced this record. */
  readonly introducedIn?: Version | undefined;
  /** Removals that apply to this record's identifier. */
  readonly removedIn: readonly Removal[];
  /** Name of the extension that introduced this record. */
  readonly extension?: string | undefined;
  /** Profile the introducing `<require>` block was restricted to. */
  readonly profile?: Profile | undefined;
}

/**
 * An enum as read from the document, before filtering.
 */
export interface RawEnum extends Enum, Provenance {}

/**
 * A command as read from the document, before filtering.
 */
export interface RawCommand extends Command, Provenance {}

/**
 * A named target type expression in the emitted `types` namespace.
 */
export interface TypeAlias {
  readonly name: string;
  readonly target: string;
}
