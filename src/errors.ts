/**
 * Error types raised while reading, resolving and emitting bindings.
 *
 * Every failure aborts the whole generation request; no partial output is
 * ever returned alongside one of these errors.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling.
 */
export type BindgenErrorCode =
  | 'MALFORMED_INPUT'
  | 'UNKNOWN_TYPE'
  | 'UNRESOLVABLE_SELECTION'
  | 'UNKNOWN_EXTENSION'
  | 'INVALID_EMISSION';

/**
 * Base class for every generation error.
 */
export class BindgenError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: BindgenErrorCode;
  /** The underlying cause if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new BindgenError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, code: BindgenErrorCode, cause?: Error) {
    super(message);
    this.name = 'BindgenError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * A registry record is missing a required field or carries an invalid one.
 */
export class MalformedInputError extends BindgenError {
  /** Identifier of the offending record (or its path when it has none). */
  public readonly recordId: string;
  /** Name of the missing or invalid field. */
  public readonly field: string;

  constructor(recordId: string, field: string, detail?: string, cause?: Error) {
    const suffix = detail !== undefined ? `: ${detail}` : '';
    super(`Malformed record '${recordId}': field '${field}'${suffix}`, 'MALFORMED_INPUT', cause);
    this.name = 'MalformedInputError';
    this.recordId = recordId;
    this.field = field;
  }
}

/**
 * A binding, return or enum type has no entry in the type alias table.
 */
export class UnknownTypeError extends BindgenError {
  /** The registry type expression that could not be mapped. */
  public readonly typeName: string;
  /** Identifier of the command or enum that references the type. */
  public readonly owner: string;

  constructor(typeName: string, owner: string) {
    super(`Unknown type '${typeName}' referenced by '${owner}'`, 'UNKNOWN_TYPE');
    this.name = 'UnknownTypeError';
    this.typeName = typeName;
    this.owner = owner;
  }
}

/**
 * A selection field (namespace, profile, version, generator, policy) holds a
 * value outside its accepted set.
 */
export class UnresolvableSelectionError extends BindgenError {
  /** The selection field, e.g. `"profile"`. */
  public readonly field: string;
  /** The value that was supplied. */
  public readonly value: string;
  /** The values the field accepts. */
  public readonly accepted: readonly string[];

  constructor(field: string, value: string, accepted: readonly string[]) {
    super(
      `Unknown ${field} '${value}': expected one of [${accepted.join(', ')}]`,
      'UNRESOLVABLE_SELECTION'
    );
    this.name = 'UnresolvableSelectionError';
    this.field = field;
    this.value = value;
    this.accepted = accepted;
  }
}

/**
 * Requested extensions are absent from the registry document. Only raised
 * under the `error` unknown-extension policy.
 */
export class UnknownExtensionError extends BindgenError {
  /** The extension names that were not found. */
  public readonly extensions: readonly string[];

  constructor(extensions: readonly string[]) {
    super(`Unknown extension(s): ${extensions.join(', ')}`, 'UNKNOWN_EXTENSION');
    this.name = 'UnknownExtensionError';
    this.extensions = extensions;
  }
}

/**
 * A syntax problem found in emitted source.
 */
export interface EmissionDiagnostic {
  /** 1-based line number, when known. */
  readonly line: number | undefined;
  /** The diagnostic message. */
  readonly message: string;
}

/**
 * Emitted source failed syntax verification.
 */
export class EmissionError extends BindgenError {
  /** Diagnostics reported for the emitted source. */
  public readonly diagnostics: readonly EmissionDiagnostic[];

  constructor(generator: string, diagnostics: readonly EmissionDiagnostic[]) {
    const first = diagnostics[0];
    const location = first?.line !== undefined ? ` (line ${String(first.line)})` : '';
    super(
      `Generator '${generator}' emitted invalid source${location}: ${first?.message ?? 'unknown diagnostic'}`,
      'INVALID_EMISSION'
    );
    this.name = 'EmissionError';
    this.diagnostics = diagnostics;
  }
}
