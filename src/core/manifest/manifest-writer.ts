import { ManifestError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { getTablePath, parseToml } from './toml-values.js';
import type { ManifestEdit } from './types.js';

/**
 * Line-level Cargo.toml editing.
 *
 * Only the characters between the quotes of a targeted version string
 * change. Handled forms, for an edit on table `dependencies` and key `serde`:
 *
 *   [dependencies]
 *   serde = "1.0"
 *   serde = { version = "1.0", features = ["derive"] }
 *   serde.version = "1.0"
 *
 *   [dependencies.serde]
 *   version = "1.0"
 */

const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;
const INLINE_VERSION = /([{,]\s*)(version)(\s*=\s*)(["'])([^"']*)\4/;

interface ParsedKeys {
  keys: string[];
  end: number;
}

function skipSpaces(text: string, index: number): number {
  let i = index;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) {
    i++;
  }
  return i;
}

/**
 * Parse a dotted TOML key (`a."b.c".'d'`) starting at `start`.
 */
function parseKeys(text: string, start: number): ParsedKeys | null {
  const keys: string[] = [];
  let i = skipSpaces(text, start);

  for (;;) {
    const quote = text[i];
    if (quote === '"' || quote === "'") {
      let key = '';
      let j = i + 1;
      while (j < text.length && text[j] !== quote) {
        if (quote === '"' && text[j] === '\\' && j + 1 < text.length) {
          key += text[j + 1];
          j += 2;
          continue;
        }
        key += text[j];
        j++;
      }
      if (j >= text.length) {
        return null;
      }
      keys.push(key);
      i = j + 1;
    } else {
      let j = i;
      while (j < text.length && BARE_KEY_CHAR.test(text[j])) {
        j++;
      }
      if (j === i) {
        return null;
      }
      keys.push(text.slice(i, j));
      i = j;
    }

    i = skipSpaces(text, i);
    if (text[i] !== '.') {
      return { keys, end: i };
    }
    i = skipSpaces(text, i + 1);
  }
}

function parseHeader(trimmed: string): string[] | null {
  const isArrayTable = trimmed.startsWith('[[');
  const parsed = parseKeys(trimmed, isArrayTable ? 2 : 1);
  if (!parsed) {
    return null;
  }
  const close = isArrayTable ? ']]' : ']';
  if (!trimmed.startsWith(close, parsed.end)) {
    return null;
  }
  // Array-of-tables never hold dependency entries; mark them unmatchable.
  return isArrayTable ? ['[[', ...parsed.keys] : parsed.keys;
}

function parseKeyValue(line: string): { keys: string[]; valueStart: number } | null {
  const parsed = parseKeys(line, 0);
  if (!parsed || line[parsed.end] !== '=') {
    return null;
  }
  return { keys: parsed.keys, valueStart: skipSpaces(line, parsed.end + 1) };
}

function pathEquals(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

function replaceQuoted(line: string, valueStart: number, requirement: string): string | null {
  const quote = line[valueStart];
  if ((quote !== '"' && quote !== "'") || line.startsWith(quote.repeat(3), valueStart)) {
    return null;
  }
  const end = line.indexOf(quote, valueStart + 1);
  if (end === -1) {
    return null;
  }
  return line.slice(0, valueStart + 1) + requirement + line.slice(end);
}

function replaceInline(line: string, valueStart: number, requirement: string): string | null {
  if (line[valueStart] !== '{') {
    return null;
  }
  const head = line.slice(0, valueStart);
  const body = line.slice(valueStart);
  if (INLINE_VERSION.test(body)) {
    return head + body.replace(INLINE_VERSION, (_match, lead: string, key: string, eq: string, quote: string) =>
      `${lead}${key}${eq}${quote}${requirement}${quote}`
    );
  }
  return `${head}{ version = "${requirement}",${body.slice(1)}`;
}

/**
 * Track whether a line leaves a multi-line string open.
 */
function multilineDelimiter(text: string, open: string | null): string | null {
  let current = open;
  let i = 0;
  while (i < text.length) {
    if (current) {
      const close = text.indexOf(current, i);
      if (close === -1) {
        return current;
      }
      i = close + 3;
      current = null;
      continue;
    }
    const basic = text.indexOf('"""', i);
    const literal = text.indexOf("'''", i);
    const candidates = [basic, literal].filter(index => index !== -1);
    if (candidates.length === 0) {
      return null;
    }
    const next = Math.min(...candidates);
    current = next === basic ? '"""' : "'''";
    i = next + 3;
  }
  return current;
}

function dedupeEdits(edits: ManifestEdit[]): ManifestEdit[] {
  const byTarget = new Map<string, ManifestEdit>();
  for (const edit of edits) {
    byTarget.set(JSON.stringify([...edit.table, edit.key]), edit);
  }
  return [...byTarget.values()];
}

function verifyEdits(content: string, edits: ManifestEdit[], manifestPath: string): void {
  const document = parseToml(content, manifestPath);
  for (const edit of edits) {
    const table = getTablePath(document, edit.table);
    const entry = table?.[edit.key];
    const written = typeof entry === 'string'
      ? entry
      : typeof entry === 'object' && entry !== null && 'version' in entry ? entry.version : undefined;
    if (written !== edit.requirement) {
      throw new ManifestError(
        `Rewriting '${edit.key}' in ${manifestPath} did not produce version '${edit.requirement}'`,
        { manifestPath, key: edit.key, table: edit.table.join('.') }
      );
    }
  }
}

/**
 * Apply version edits to manifest text. Lines that no edit targets are
 * returned byte-for-byte; applying the same edits twice is a no-op.
 */
export function applyManifestEdits(content: string, edits: ManifestEdit[], manifestPath: string = 'Cargo.toml'): string {
  const pending = dedupeEdits(edits);
  if (pending.length === 0) {
    return content;
  }

  const newline = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(newline);
  const applied = new Set<ManifestEdit>();
  let header: string[] = [];
  let openString: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (openString) {
      openString = multilineDelimiter(line, openString);
      continue;
    }

    const trimmed = line.trimStart();
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }
    if (trimmed.startsWith('[')) {
      header = parseHeader(trimmed) ?? ['['];
      continue;
    }

    const keyValue = parseKeyValue(line);
    if (!keyValue) {
      continue;
    }
    const path = [...header, ...keyValue.keys];

    let updated = line;
    for (const edit of pending) {
      const entryPath = [...edit.table, edit.key];
      let next: string | null = null;
      if (pathEquals(path, entryPath)) {
        next = replaceQuoted(updated, keyValue.valueStart, edit.requirement)
          ?? replaceInline(updated, keyValue.valueStart, edit.requirement);
      } else if (pathEquals(path, [...entryPath, 'version'])) {
        next = replaceQuoted(updated, keyValue.valueStart, edit.requirement);
      }
      if (next !== null) {
        updated = next;
        applied.add(edit);
      }
    }
    lines[i] = updated;
    openString = multilineDelimiter(updated.slice(keyValue.valueStart), null);
  }

  const missing = pending.filter(edit => !applied.has(edit));
  if (missing.length > 0) {
    const names = missing.map(edit => `${edit.table.join('.')}.${edit.key}`).join(', ');
    throw new ManifestError(`Could not locate version entries for ${names} in ${manifestPath}`, {
      manifestPath,
      missing: names
    });
  }

  const result = lines.join(newline);
  verifyEdits(result, pending, manifestPath);
  if (result !== content) {
    logger.debug(`Rewrote ${applied.size} version entr${applied.size === 1 ? 'y' : 'ies'} in ${manifestPath}`);
  }
  return result;
}
