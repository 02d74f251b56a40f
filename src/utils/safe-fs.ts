/**
 * File system helpers that validate paths before use.
 *
 * Registry, configuration and output paths come from users; each is checked
 * to be a non-empty string without null bytes and resolved to an absolute
 * path before any file system call.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The path that failed validation. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes or
 *   does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path, creating missing
 * parent directories.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.mkdir(path.dirname(validatedPath), { recursive: true });
  await fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Synchronously checks whether a file or directory exists.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}

/**
 * Synchronously reads file status after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the path does not exist.
 */
export function safeStatSync(filePath: string): fsSync.Stats {
  const validatedPath = validatePath(filePath);
  return fsSync.statSync(validatedPath);
}
