/**
 * Reading registry documents and writing generated modules.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { parseRegistryRecords } from '../registry/records.js';
import type { RawRegistry } from '../registry/registry.js';
import type { Namespace } from '../registry/types.js';
import { readRegistryXml } from '../registry/xml-reader.js';
import type { Logger } from '../utils/logger.js';
import { safeReadFile, safeWriteFile } from '../utils/safe-fs.js';

/** Formats a registry document may be written in. */
export type RegistryFormat = 'xml' | 'toml';

/**
 * Picks the reader for a registry document: `.toml` files are record
 * documents, everything else is read as Khronos XML.
 */
export function registryFormat(filePath: string): RegistryFormat {
  return path.extname(filePath).toLowerCase() === '.toml' ? 'toml' : 'xml';
}

/**
 * Parses registry document text.
 *
 * @param text - Document text.
 * @param format - Document format.
 * @param namespace - Namespace to read from an XML document. Record
 *   documents name their own namespace.
 */
export function parseRegistry(text: string, format: RegistryFormat, namespace: Namespace): RawRegistry {
  return format === 'toml' ? parseRegistryRecords(text) : readRegistryXml(text, namespace);
}

/**
 * Reads and parses a registry document.
 *
 * @throws PathValidationError for an invalid path, MalformedInputError for an
 *   invalid document.
 */
export async function readRegistryFile(
  filePath: string,
  namespace: Namespace,
  logger?: Logger
): Promise<RawRegistry> {
  const format = registryFormat(filePath);
  const raw = parseRegistry(await safeReadFile(filePath), format, namespace);
  logger?.info('registry_read', {
    path: filePath,
    format,
    namespace: raw.namespace(),
    enums: raw.enums().length,
    commands: raw.commands().length,
    extensions: raw.extensions().size,
  });
  return raw;
}

/**
 * Writes generated source to a file, creating missing directories.
 *
 * @throws PathValidationError for an invalid path.
 */
export async function writeBindings(
  source: string,
  outputPath: string,
  logger?: Logger
): Promise<void> {
  await safeWriteFile(outputPath, source);
  logger?.info('bindings_written', { path: outputPath, bytes: Buffer.byteLength(source, 'utf-8') });
}
