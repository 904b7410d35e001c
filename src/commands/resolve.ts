import { resolve } from 'path';
import { Command } from 'commander';
import pico from 'picocolors';

import type { OutputPort } from '../core/ports/output.js';
import { runResolvePipeline, type ResolvePipelineResult } from '../core/resolve/resolve-pipeline.js';
import { getNarrowingStrategy } from '../core/validation/narrowing.js';
import {
  applyLogLevel,
  collectList,
  createCommandContext,
  loadSettings,
  parsePositiveNumber,
  readGlobalOptions
} from '../cli/global-options.js';
import { BaselineFailedError, withErrorHandling, ValidationError, ValidationExhaustedError } from '../utils/errors.js';
import { formatVersionChange, pluralize } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

interface ResolveCommandOptions {
  include?: string[];
  cargoPath?: string;
  release?: boolean;
  /** false with --no-test */
  test: boolean;
  features?: string[];
  strategy?: string;
  /** Minutes */
  linearBudget?: number;
  checkBaseline?: boolean;
  clean?: boolean;
}

const RESPONSIBLE_USE_NOTICE =
  'Resolution reads crate metadata from the public registry. Cached records are reused '
  + 'while fresh; please keep --cache-age reasonable and avoid running resolve in tight loops.';

function reportResult(output: OutputPort, result: ResolvePipelineResult): void {
  if (result.pins.size === 0) {
    return;
  }

  const lines = [...result.pins].map(([crate, version]) => {
    const baseline = result.baselines.get(crate);
    const line = formatVersionChange(crate, baseline, version);
    return baseline !== undefined && baseline !== version ? pico.green(line) : pico.dim(line);
  });
  output.note(lines.join('\n'), 'Pinned versions');

  output.success(
    `Pinned ${pluralize(result.pins.size, 'crate')} in ${result.packages.join(', ')} after ${pluralize(result.trials, 'trial')}`
  );
  if (result.stale) {
    output.warn(`Result is based on stale metadata for: ${result.staleCrates.join(', ')}`);
  }
}

function reportExhaustion(output: OutputPort, error: ValidationExhaustedError): void {
  const { report } = error;
  const lines = Object.entries(report.lastAssignment).map(([crate, version]) => {
    const interval = report.constraints[crate];
    const original = report.originalVersions[crate];
    const range = interval ? ` (remaining ${interval.min}..=${interval.max})` : '';
    return `${formatVersionChange(crate, original, version)}${range}`;
  });
  if (lines.length > 0) {
    output.note(lines.join('\n'), 'Last attempted assignment');
  }
  if (report.lastLog !== '') {
    output.note(report.lastLog, 'Last build log');
  }
}

function reportBaselineFailure(output: OutputPort, error: BaselineFailedError): void {
  const lines = Object.entries(error.failure.pins).map(([crate, version]) => `${crate} ${version}`);
  if (lines.length > 0) {
    output.note(lines.join('\n'), 'Original pins');
  }
  if (error.failure.log !== '') {
    output.note(error.failure.log, 'Baseline build log');
  }
}

async function resolveCommand(pathArg: string | undefined, options: ResolveCommandOptions, command: Command): Promise<void> {
  const globals = readGlobalOptions(command);
  applyLogLevel(globals);
  const ctx = createCommandContext(globals);
  const { output } = ctx;

  const strategyName = options.strategy ?? 'adaptive';
  const strategy = getNarrowingStrategy(strategyName);
  if (!strategy) {
    throw new ValidationError(`Unknown narrowing strategy '${strategyName}' (expected adaptive, bisection or linear)`);
  }
  if (options.linearBudget !== undefined && strategy.name !== 'adaptive') {
    throw new ValidationError('--linear-budget only applies to the adaptive strategy');
  }

  const settings = await loadSettings(globals, ctx.cwd, options.cargoPath !== undefined ? { cargoPath: options.cargoPath } : {});
  output.info(RESPONSIBLE_USE_NOTICE);

  const controller = new AbortController();
  const onSigint = (): void => {
    output.warn('Interrupted; stopping after the current trial and restoring manifests');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await runResolvePipeline({
      path: resolve(ctx.cwd, pathArg ?? '.'),
      includes: options.include ?? [],
      settings,
      release: options.release === true,
      features: options.features ?? [],
      runTests: options.test,
      // The validator builds the adaptive strategy itself, around its measured trial cost.
      strategy: strategy.name === 'adaptive' ? undefined : strategy,
      linearBudgetMs: options.linearBudget !== undefined ? options.linearBudget * 60_000 : undefined,
      checkBaseline: options.checkBaseline === true,
      clean: options.clean === true,
      output,
      signal: controller.signal
    });
    reportResult(output, result);
  } catch (error) {
    if (error instanceof ValidationExhaustedError) {
      reportExhaustion(output, error);
    } else if (error instanceof BaselineFailedError) {
      reportBaselineFailure(output, error);
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
    logger.debug('Resolve command finished');
  }
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .argument('[path]', 'package or workspace directory (or its Cargo.toml)', '.')
    .description('Pin direct dependencies to the newest versions that build and pass tests')
    .option('--include <glob...>', 'workspace members to process, by package name or directory', collectList)
    .option('--cargo-path <path>', 'path to the cargo executable')
    .option('--release', 'build and test in release mode')
    .option('--no-test', 'only build; skip cargo test')
    .option('--features <feature...>', 'features to enable during trials', collectList)
    .option('--strategy <name>', 'narrowing strategy: adaptive, bisection or linear')
    .option('--linear-budget <minutes>', 'with the adaptive strategy, scan linearly while it fits this many minutes', parsePositiveNumber)
    .option('--check-baseline', 'first build the original pins and stop if they fail')
    .option('--clean', 'run cargo clean when the run ends')
    .action(withErrorHandling(resolveCommand));
}
