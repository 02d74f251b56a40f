/**
 * Access to the registry documents under test-fixtures/.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const FIXTURES_URL = new URL('../../test-fixtures/registry/', import.meta.url);

/** Absolute path of a registry fixture. */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(name, FIXTURES_URL));
}

/** Text of a registry fixture. */
export function readFixture(name: string): string {
  return readFileSync(new URL(name, FIXTURES_URL), 'utf-8');
}
