/**
 * Per-namespace naming conventions.
 *
 * @packageDocumentation
 */

import { UnresolvableSelectionError } from '../errors.js';
import type { Namespace, Profile } from './types.js';

/**
 * Naming and typing conventions of one namespace.
 */
export interface NamespaceInfo {
  /** Prefix of command symbols, e.g. `glX`. */
  readonly symbolPrefix: string;
  /** Prefix of enum names in the document, e.g. `GLX_`. */
  readonly enumPrefix: string;
  /** Key of the type alias table in `data/type-aliases.json`. */
  readonly typeTable: 'gl' | 'glx' | 'wgl' | 'egl';
  /** Alias of enum constants without a type override. */
  readonly enumType: string;
  /** Alias used for the `TRUE` and `FALSE` constants. */
  readonly booleanType: string;
  /** Aliases substituted for enum type overrides such as `u` and `ull`. */
  readonly typeOverrides: Readonly<Record<string, string>>;
  /** Name of the class emitted by the struct styles. */
  readonly structName: string;
}

const GL_OVERRIDES = { u: 'GLuint', ull: 'GLuint64' } as const;

/** Conventions for every supported namespace. */
export const NAMESPACE_INFO: Readonly<Record<Namespace, NamespaceInfo>> = {
  gl: {
    symbolPrefix: 'gl',
    enumPrefix: 'GL_',
    typeTable: 'gl',
    enumType: 'GLenum',
    booleanType: 'GLboolean',
    typeOverrides: GL_OVERRIDES,
    structName: 'Gl',
  },
  gles1: {
    symbolPrefix: 'gl',
    enumPrefix: 'GL_',
    typeTable: 'gl',
    enumType: 'GLenum',
    booleanType: 'GLboolean',
    typeOverrides: GL_OVERRIDES,
    structName: 'Gles1',
  },
  gles2: {
    symbolPrefix: 'gl',
    enumPrefix: 'GL_',
    typeTable: 'gl',
    enumType: 'GLenum',
    booleanType: 'GLboolean',
    typeOverrides: GL_OVERRIDES,
    structName: 'Gles2',
  },
  glx: {
    symbolPrefix: 'glX',
    enumPrefix: 'GLX_',
    typeTable: 'glx',
    enumType: 'GLenum',
    booleanType: 'Bool',
    typeOverrides: GL_OVERRIDES,
    structName: 'Glx',
  },
  wgl: {
    symbolPrefix: 'wgl',
    enumPrefix: 'WGL_',
    typeTable: 'wgl',
    enumType: 'GLenum',
    booleanType: 'BOOL',
    typeOverrides: { u: 'UINT', ull: 'INT64' },
    structName: 'Wgl',
  },
  egl: {
    symbolPrefix: 'egl',
    enumPrefix: 'EGL_',
    typeTable: 'egl',
    enumType: 'EGLenum',
    booleanType: 'EGLBoolean',
    typeOverrides: { u: 'EGLint', ull: 'EGLuint64KHR' },
    structName: 'Egl',
  },
};

/** Supported namespaces in declaration order. */
export const NAMESPACES: readonly Namespace[] = ['gl', 'gles1', 'gles2', 'glx', 'wgl', 'egl'];

/** Supported profiles. */
export const PROFILES: readonly Profile[] = ['core', 'compatibility'];

const NAMESPACE_NAMES: ReadonlySet<string> = new Set(NAMESPACES);
const PROFILE_NAMES: ReadonlySet<string> = new Set(PROFILES);

function isNamespace(value: string): value is Namespace {
  return NAMESPACE_NAMES.has(value);
}

function isProfile(value: string): value is Profile {
  return PROFILE_NAMES.has(value);
}

/**
 * Parses a namespace name.
 *
 * @throws UnresolvableSelectionError if the name is not supported.
 */
export function parseNamespace(value: string): Namespace {
  if (!isNamespace(value)) {
    throw new UnresolvableSelectionError('namespace', value, NAMESPACES);
  }
  return value;
}

/**
 * Parses a profile name.
 *
 * @throws UnresolvableSelectionError if the name is not supported.
 */
export function parseProfile(value: string): Profile {
  if (!isProfile(value)) {
    throw new UnresolvableSelectionError('profile', value, PROFILES);
  }
  return value;
}

/**
 * Removes a namespace prefix from a document name, e.g. `glClear` → `Clear`.
 * Names without the prefix are returned unchanged.
 */
export function trimPrefix(name: string, prefix: string): string {
  return name.startsWith(prefix) && name.length > prefix.length ? name.slice(prefix.length) : name;
}
