import { dirname, join, resolve, basename, posix } from 'path';
import fg from 'fast-glob';
import { minimatch } from 'minimatch';
import { DEPENDENCY_TABLES, FILE_PATTERNS } from '../../constants/index.js';
import type { DependencyKind, DependencySource } from '../../types/index.js';
import { exists, isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ManifestError, NoMembersMatchedError } from '../../utils/errors.js';
import { normalizeCrateName } from '../registry/crate-record.js';
import { getString, getStringArray, getTable, isTable, readTomlFile, type TomlObject } from './toml-values.js';
import type { CargoPackage, CargoProject, DependencyLocation, ManifestDependency, PackageSelection } from './types.js';

/**
 * Cargo.toml discovery and dependency extraction.
 */

const GLOB_IGNORE = ['**/target/**', '**/node_modules/**', '**/.git/**'];

interface DependencySpec {
  requirement: string | null;
  source: DependencySource;
  optional: boolean;
  packageName: string | null;
  workspace: boolean;
}

interface WorkspaceContext {
  manifestPath: string;
  dependencies: TomlObject | null;
}

function normalizePattern(pattern: string): string {
  return pattern.trim().replace(/^\.\//, '').replace(/\/+$/, '') || '.';
}

function parseDependencySpec(key: string, value: unknown, manifestPath: string): DependencySpec {
  if (typeof value === 'string') {
    return { requirement: value, source: 'registry', optional: false, packageName: null, workspace: false };
  }
  if (!isTable(value)) {
    throw new ManifestError(`Invalid dependency entry '${key}' in ${manifestPath}`, { manifestPath, key });
  }

  const source: DependencySource = getString(value, 'git') !== null
    ? 'git'
    : getString(value, 'path') !== null ? 'path' : 'registry';

  return {
    requirement: getString(value, 'version'),
    source,
    optional: value.optional === true,
    packageName: getString(value, 'package'),
    workspace: value.workspace === true
  };
}

function collectTable(
  value: unknown,
  table: string[],
  kind: DependencyKind,
  target: string | undefined,
  manifestPath: string,
  workspace: WorkspaceContext | null
): ManifestDependency[] {
  if (!isTable(value)) {
    return [];
  }

  const dependencies: ManifestDependency[] = [];
  for (const [key, entry] of Object.entries(value)) {
    let spec = parseDependencySpec(key, entry, manifestPath);
    let location: DependencyLocation = { manifestPath, table, key };
    let inherited = false;

    if (spec.workspace) {
      const inheritedEntry = workspace?.dependencies?.[key];
      if (!workspace || inheritedEntry === undefined) {
        throw new ManifestError(
          `Dependency '${key}' in ${manifestPath} sets workspace = true but the workspace does not declare it`,
          { manifestPath, key }
        );
      }
      const base = parseDependencySpec(key, inheritedEntry, workspace.manifestPath);
      spec = { ...base, optional: spec.optional || base.optional, workspace: false };
      location = { manifestPath: workspace.manifestPath, table: ['workspace', 'dependencies'], key };
      inherited = true;
    }

    const dependency: ManifestDependency = {
      key,
      name: normalizeCrateName(spec.packageName ?? key),
      requirement: spec.requirement ?? (spec.source === 'registry' ? '*' : null),
      kind,
      source: spec.source,
      optional: spec.optional,
      inherited,
      location
    };
    if (target !== undefined) {
      dependency.target = target;
    }
    dependencies.push(dependency);
  }
  return dependencies;
}

/**
 * Every dependency declared by a manifest, across normal, dev and build
 * tables and their `[target.<cfg>.*]` variants.
 */
export function collectDependencies(
  manifest: TomlObject,
  manifestPath: string,
  workspace: WorkspaceContext | null
): ManifestDependency[] {
  const dependencies: ManifestDependency[] = [];
  const tables = Object.entries(DEPENDENCY_TABLES);

  for (const [tableName, kind] of tables) {
    dependencies.push(...collectTable(manifest[tableName], [tableName], kind, undefined, manifestPath, workspace));
  }

  const targets = getTable(manifest, 'target');
  if (targets) {
    for (const [cfg, targetTable] of Object.entries(targets)) {
      if (!isTable(targetTable)) {
        continue;
      }
      for (const [tableName, kind] of tables) {
        dependencies.push(
          ...collectTable(targetTable[tableName], ['target', cfg, tableName], kind, cfg, manifestPath, workspace)
        );
      }
    }
  }
  return dependencies;
}

function toPackage(
  manifest: TomlObject,
  manifestPath: string,
  rootDir: string,
  workspace: WorkspaceContext | null
): CargoPackage {
  const pkg = getTable(manifest, 'package');
  const name = pkg ? getString(pkg, 'name') : null;
  if (!pkg || !name) {
    throw new ManifestError(`${manifestPath} has no [package] name`, { manifestPath });
  }

  const directory = dirname(manifestPath);
  const relativeDir = posix.normalize(
    directory === rootDir ? '.' : directory.slice(rootDir.length + 1).split('\\').join('/')
  );

  return {
    name,
    version: getString(pkg, 'version'),
    manifestPath,
    directory,
    relativeDir,
    dependencies: collectDependencies(manifest, manifestPath, workspace)
  };
}

/**
 * Resolve a path argument (directory or Cargo.toml) to a manifest path.
 */
export async function locateManifest(target: string): Promise<string> {
  const absolute = resolve(target);
  const manifestPath = (await isDirectory(absolute)) ? join(absolute, FILE_PATTERNS.CARGO_TOML) : absolute;

  if (basename(manifestPath) !== FILE_PATTERNS.CARGO_TOML || !(await exists(manifestPath))) {
    throw new ManifestError(`No ${FILE_PATTERNS.CARGO_TOML} found at ${absolute}`, { path: absolute });
  }
  return manifestPath;
}

/**
 * Read a package or workspace rooted at `target`.
 */
export async function scanProject(target: string): Promise<CargoProject> {
  const rootManifestPath = await locateManifest(target);
  const rootDir = dirname(rootManifestPath);
  const rootManifest = await readTomlFile(rootManifestPath);
  const workspaceTable = getTable(rootManifest, 'workspace');

  if (!workspaceTable) {
    logger.debug(`Scanning single package at ${rootManifestPath}`);
    return {
      rootDir,
      rootManifestPath,
      isWorkspace: false,
      packages: [toPackage(rootManifest, rootManifestPath, rootDir, null)]
    };
  }

  const workspace: WorkspaceContext = {
    manifestPath: rootManifestPath,
    dependencies: getTable(workspaceTable, 'dependencies')
  };
  const members = getStringArray(workspaceTable, 'members').map(normalizePattern);
  const excludes = getStringArray(workspaceTable, 'exclude').map(normalizePattern);

  const packages: CargoPackage[] = [];
  if (getTable(rootManifest, 'package')) {
    packages.push(toPackage(rootManifest, rootManifestPath, rootDir, workspace));
  }

  const found = await fg(`**/${FILE_PATTERNS.CARGO_TOML}`, {
    cwd: rootDir,
    onlyFiles: true,
    ignore: GLOB_IGNORE
  });

  for (const relativePath of found.sort()) {
    if (relativePath === FILE_PATTERNS.CARGO_TOML) {
      continue;
    }
    const memberDir = posix.dirname(relativePath);
    const included = members.some(pattern => minimatch(memberDir, pattern));
    const excluded = excludes.some(pattern => memberDir === pattern
      || memberDir.startsWith(`${pattern}/`)
      || minimatch(memberDir, pattern));
    if (!included || excluded) {
      continue;
    }

    const manifestPath = join(rootDir, relativePath);
    const manifest = await readTomlFile(manifestPath);
    if (getTable(manifest, 'workspace')) {
      throw new ManifestError(
        `Nested workspace at ${manifestPath}: workspace members cannot declare [workspace]`,
        { manifestPath, root: rootManifestPath }
      );
    }
    packages.push(toPackage(manifest, manifestPath, rootDir, workspace));
  }

  logger.debug(`Scanned workspace at ${rootDir}`, { members: packages.map(pkg => pkg.name) });
  return { rootDir, rootManifestPath, isWorkspace: true, packages };
}

/**
 * Pick the packages to process. Workspaces need at least one include
 * pattern, matched against package names and member directories.
 */
export function selectPackages(project: CargoProject, includes: string[]): PackageSelection {
  const warnings: string[] = [];
  const patterns = includes.map(pattern => pattern.trim()).filter(pattern => pattern !== '');

  if (!project.isWorkspace) {
    if (patterns.length > 0) {
      warnings.push(`Include patterns are ignored for a single package (${project.packages[0].name})`);
    }
    return { packages: project.packages, warnings };
  }

  const available = project.packages.map(pkg => pkg.name);
  if (patterns.length === 0) {
    throw new NoMembersMatchedError([], available);
  }

  const selected = project.packages.filter(pkg => patterns.some(pattern =>
    minimatch(pkg.name, pattern) || minimatch(pkg.relativeDir, normalizePattern(pattern))
  ));
  if (selected.length === 0) {
    throw new NoMembersMatchedError(patterns, available);
  }
  return { packages: selected, warnings };
}
