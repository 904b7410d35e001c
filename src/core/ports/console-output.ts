import type { OutputPort, UnifiedSpinner } from './output.js';

/**
 * Line-per-message output for CI logs and pipes. Spinners print their
 * start and stop lines only.
 */
export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  step: message => console.log(`→ ${message}`),
  message: message => console.log(message),
  success: message => console.log(`✓ ${message}`),
  error: message => console.error(`✗ ${message}`),
  warn: message => console.log(`⚠ ${message}`),

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}\n` : `\n${content}\n`);
  },

  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? current}`);
      },
      message(text: string) {
        current = text;
      }
    };
  }
};

const noop = (): void => undefined;

/** --silent */
export const silentOutput: OutputPort = {
  info: noop,
  step: noop,
  message: noop,
  success: noop,
  error: noop,
  warn: noop,
  note: noop,
  spinner: () => ({ start: noop, stop: noop, message: noop })
};
