import { homedir } from 'os';
import { relative, isAbsolute } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses relative paths from cwd for paths inside the working directory
 * - Uses tilde notation (~) for paths under the home directory
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/work/app/Cargo.toml', '/work/app') // => 'Cargo.toml'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd(), home: string = homedir()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  const fromHome = relative(home, path);
  if (fromHome === '') {
    return '~';
  }
  if (!fromHome.startsWith('..') && !isAbsolute(fromHome)) {
    return `~/${fromHome}`;
  }

  return path;
}

/**
 * Format a version change, e.g. `serde 1.0.100 → 1.0.200`
 */
export function formatVersionChange(name: string, from: string | undefined, to: string): string {
  if (from === undefined || from === to) {
    return `${name} ${to}`;
  }
  return `${name} ${from} → ${to}`;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format a timestamp as dd/mm/yyyy HH:MM:SS in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Format an age in milliseconds as hours with one decimal, e.g. `5.5h`
 */
export function formatAgeHours(ageMs: number): string {
  return `${(Math.max(0, ageMs) / 3_600_000).toFixed(1)}h`;
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
