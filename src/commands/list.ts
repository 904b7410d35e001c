import { resolve } from 'path';
import { Command } from 'commander';
import pico from 'picocolors';

import type { CommandResult, DependencyKind } from '../types/index.js';
import { scanProject, selectPackages } from '../core/manifest/cargo-manifest.js';
import type { CargoPackage, ManifestDependency } from '../core/manifest/types.js';
import { applyLogLevel, collectList, createCommandContext, readGlobalOptions } from '../cli/global-options.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, getTreeConnector } from '../utils/formatters.js';

interface ListOptions {
  include?: string[];
}

const KIND_LABELS: Record<DependencyKind, string> = {
  normal: 'dependencies',
  build: 'build-dependencies',
  dev: 'dev-dependencies'
};

const KIND_ORDER: DependencyKind[] = ['normal', 'build', 'dev'];

export function formatDependencyLine(dep: ManifestDependency): string {
  const markers: string[] = [];
  if (dep.optional) markers.push('(optional)');
  if (dep.source === 'git') markers.push('(git)');
  if (dep.source === 'path') markers.push('(path)');
  if (dep.target !== undefined) markers.push(`[${dep.target}]`);

  const label = dep.key === dep.name ? dep.name : `${dep.key} → ${dep.name}`;
  const requirement = dep.requirement !== null ? ` ${dep.requirement}` : '';
  return [`${label}${requirement}`, ...markers].join(' ');
}

/**
 * Render one package as a tree grouped by dependency kind.
 */
export function renderPackage(pkg: CargoPackage, cwd: string): string[] {
  const header = `${pico.bold(pkg.name)}${pkg.version ? pico.dim(`@${pkg.version}`) : ''} `
    + pico.dim(`(${formatPathForDisplay(pkg.manifestPath, cwd)})`);
  const lines = [header];

  const groups = KIND_ORDER
    .map(kind => ({ kind, deps: pkg.dependencies.filter(dep => dep.kind === kind) }))
    .filter(group => group.deps.length > 0);

  if (groups.length === 0) {
    lines.push(`${getTreeConnector(true)}${pico.dim('no dependencies')}`);
    return lines;
  }

  groups.forEach((group, groupIndex) => {
    const lastGroup = groupIndex === groups.length - 1;
    lines.push(`${getTreeConnector(lastGroup)}${KIND_LABELS[group.kind]}`);
    const indent = lastGroup ? '    ' : '│   ';
    group.deps.forEach((dep, depIndex) => {
      lines.push(`${indent}${getTreeConnector(depIndex === group.deps.length - 1)}${formatDependencyLine(dep)}`);
    });
  });
  return lines;
}

async function listCommand(pathArg: string | undefined, options: ListOptions, command: Command): Promise<CommandResult<CargoPackage[]>> {
  const globals = readGlobalOptions(command);
  applyLogLevel(globals);
  const ctx = createCommandContext(globals);
  const { output } = ctx;

  const project = await scanProject(resolve(ctx.cwd, pathArg ?? '.'));
  const selection = selectPackages(project, options.include ?? []);
  for (const warning of selection.warnings) {
    output.warn(warning);
  }

  for (const pkg of selection.packages) {
    output.message(renderPackage(pkg, ctx.cwd).join('\n'));
  }
  return { success: true, data: selection.packages };
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .argument('[path]', 'package or workspace directory (or its Cargo.toml)', '.')
    .description('Show the selected packages and their declared dependencies')
    .option('--include <glob...>', 'workspace members to show, by package name or directory', collectList)
    .action(withErrorHandling(async (pathArg: string | undefined, options: ListOptions, command: Command) => {
      await listCommand(pathArg, options, command);
    }));
}
