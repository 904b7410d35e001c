import * as TOML from 'smol-toml';
import { readTextFile } from '../../utils/fs.js';
import { ManifestError } from '../../utils/errors.js';

/**
 * Narrowing helpers over parsed TOML documents.
 */

export type TomlObject = Record<string, unknown>;

export function isTable(value: unknown): value is TomlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function getTable(parent: TomlObject, key: string): TomlObject | null {
  const value = parent[key];
  return isTable(value) ? value : null;
}

export function getString(parent: TomlObject, key: string): string | null {
  const value = parent[key];
  return typeof value === 'string' ? value : null;
}

export function getStringArray(parent: TomlObject, key: string): string[] {
  const value = parent[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Walk a table path, returning null when any segment is missing.
 */
export function getTablePath(root: TomlObject, path: string[]): TomlObject | null {
  let current: TomlObject | null = root;
  for (const segment of path) {
    if (!current) {
      return null;
    }
    current = getTable(current, segment);
  }
  return current;
}

export function parseToml(content: string, path: string): TomlObject {
  try {
    return TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Failed to parse ${path}: ${reason}`, { path });
  }
}

export async function readTomlFile(path: string): Promise<TomlObject> {
  return parseToml(await readTextFile(path), path);
}
