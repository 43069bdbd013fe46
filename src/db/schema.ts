import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * schema.sql sits next to this module, in src/ and in dist/ alike
 * (the build copies it)
 */
export const SCHEMA_PATH = join(__dirname, 'schema.sql');

export function readSchema(): string {
  return readFileSync(SCHEMA_PATH, 'utf-8');
}
