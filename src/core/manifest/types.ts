import type { DependencyKind, DependencySource } from '../../types/index.js';

/**
 * Where a dependency's version string lives, for the manifest writer.
 */
export interface DependencyLocation {
  manifestPath: string;
  /** Table path, e.g. ['dependencies'], ['target', 'cfg(unix)', 'dev-dependencies'], ['workspace', 'dependencies'] */
  table: string[];
  /** Key of the entry inside that table (the local alias when renamed) */
  key: string;
}

export interface ManifestDependency {
  /** Key as written in the manifest */
  key: string;
  /** Registry crate name (`package` when renamed), normalized */
  name: string;
  /** Requirement string; null for git/path entries without a version */
  requirement: string | null;
  kind: DependencyKind;
  source: DependencySource;
  optional: boolean;
  /** cfg() expression for `[target.<cfg>.*]` tables */
  target?: string;
  /** Inherited from `[workspace.dependencies]` */
  inherited: boolean;
  location: DependencyLocation;
}

export interface CargoPackage {
  name: string;
  version: string | null;
  manifestPath: string;
  directory: string;
  /** Directory relative to the project root, posix separators, '.' for the root */
  relativeDir: string;
  dependencies: ManifestDependency[];
}

export interface CargoProject {
  rootDir: string;
  rootManifestPath: string;
  isWorkspace: boolean;
  packages: CargoPackage[];
}

export interface PackageSelection {
  packages: CargoPackage[];
  warnings: string[];
}

export interface ManifestEdit {
  table: string[];
  key: string;
  /** New requirement string written between the existing quotes */
  requirement: string;
}
