import { resolve } from 'path';
import { ClackOutput } from './clack-output-adapter.js';
import { consoleOutput, silentOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

/**
 * What a command handler gets from the CLI: the directory its path
 * arguments resolve against and where its messages go.
 */
export interface CommandContext {
  cwd: string;
  output: OutputPort;
}

export interface CommandContextOptions {
  cwd?: string;
  silent?: boolean;
  /** Undefined means detect from the terminal */
  interactive?: boolean;
}

let clackOutput: OutputPort | undefined;

function isInteractiveSession(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Clack renders trial progress on a TTY; CI logs and pipes get plain lines.
 */
function pickOutput(options: CommandContextOptions): OutputPort {
  if (options.silent) {
    return silentOutput;
  }
  if (isInteractiveSession(options.interactive)) {
    clackOutput ??= new ClackOutput();
    return clackOutput;
  }
  return consoleOutput;
}

export function createCliContext(options: CommandContextOptions = {}): CommandContext {
  return {
    cwd: resolve(options.cwd ?? process.cwd()),
    output: pickOutput(options)
  };
}
