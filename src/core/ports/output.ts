/**
 * Where user-facing messages go. The resolve pipeline, cache maintenance
 * and the commands write here and never to the console directly.
 *
 * ClackOutput renders on a TTY, consoleOutput in CI and pipes,
 * silentOutput under --silent.
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** One line per trial */
  step(message: string): void;
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  /** Boxed block, used for pin tables and build logs */
  note(content: string, title?: string): void;
  spinner(): UnifiedSpinner;
}
