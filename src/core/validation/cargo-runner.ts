import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../../utils/logger.js';
import { BuildToolError } from '../../utils/errors.js';

const execFileAsync = promisify(execFile);

/** Build logs of large workspaces easily exceed the 1 MiB default. */
const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export interface BuildRunOutcome {
  succeeded: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs the external build tool. The validator only sees this interface.
 */
export interface BuildRunner {
  run(workdir: string, args: string[]): Promise<BuildRunOutcome>;
}

export type CargoStep = 'build' | 'test';

export interface BuildOptions {
  /** Packages passed as --package */
  packages: string[];
  features: string[];
  release: boolean;
}

export function buildCargoArgs(step: CargoStep, options: BuildOptions): string[] {
  const args: string[] = [step];
  for (const pkg of options.packages) {
    args.push('--package', pkg);
  }
  const features = options.features.map(feature => feature.trim()).filter(feature => feature !== '');
  if (features.length > 0) {
    args.push('--features', features.join(','));
  }
  if (options.release) {
    args.push('--release');
  }
  return args;
}

function readOutput(error: object, key: 'stdout' | 'stderr'): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string') {
      return value;
    }
    if (Buffer.isBuffer(value)) {
      return value.toString('utf8');
    }
  }
  return '';
}

/** Node kills the child once its output passes `maxBuffer`. */
const OUTPUT_OVERFLOW = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

/**
 * Exit code of a process that ran and failed; null when it was killed.
 * Spawn failures carry a string errno code (ENOENT, EACCES) instead.
 */
function processExitCode(error: object): number | null | undefined {
  const code: unknown = 'code' in error ? error.code : undefined;
  if (typeof code === 'number') {
    return code;
  }
  if (code === OUTPUT_OVERFLOW) {
    return null;
  }
  if ('signal' in error && typeof error.signal === 'string') {
    return null;
  }
  return undefined;
}

export interface CargoRunnerOptions {
  /** Bytes of stdout or stderr kept before the process is killed */
  maxBuffer?: number;
}

export class CargoRunner implements BuildRunner {
  private readonly cargoPath: string;
  private readonly maxBuffer: number;

  constructor(cargoPath: string, options: CargoRunnerOptions = {}) {
    this.cargoPath = cargoPath;
    this.maxBuffer = options.maxBuffer ?? DEFAULT_MAX_BUFFER;
  }

  async run(workdir: string, args: string[]): Promise<BuildRunOutcome> {
    logger.debug(`Running ${this.cargoPath} ${args.join(' ')}`, { cwd: workdir });
    try {
      const { stdout, stderr } = await execFileAsync(this.cargoPath, args, {
        cwd: workdir,
        maxBuffer: this.maxBuffer,
        encoding: 'utf8'
      });
      return { succeeded: true, exitCode: 0, stdout, stderr };
    } catch (error) {
      if (typeof error !== 'object' || error === null) {
        throw new BuildToolError(this.cargoPath, error);
      }
      const exitCode = processExitCode(error);
      if (exitCode === undefined) {
        throw new BuildToolError(this.cargoPath, error);
      }
      let stderr = readOutput(error, 'stderr');
      if ('code' in error && error.code === OUTPUT_OVERFLOW) {
        logger.warn(`Build output exceeded ${this.maxBuffer} bytes; counting the trial as failed`);
        stderr += `${stderr === '' || stderr.endsWith('\n') ? '' : '\n'}output exceeded ${this.maxBuffer} bytes; process stopped`;
      }
      return {
        succeeded: false,
        exitCode,
        stdout: readOutput(error, 'stdout'),
        stderr
      };
    }
  }
}
