import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Terminal output through @clack/prompts. Registry fetches and the
 * initial resolution show a spinner; each trial is a clack step.
 */
export class ClackOutput implements OutputPort {
  info(message: string): void {
    log.info(message);
  }

  step(message: string): void {
    log.step(message);
  }

  message(message: string): void {
    log.message(message);
  }

  success(message: string): void {
    log.success(message);
  }

  error(message: string): void {
    log.error(message);
  }

  warn(message: string): void {
    log.warn(message);
  }

  note(content: string, title?: string): void {
    note(content, title ?? '');
  }

  spinner(): UnifiedSpinner {
    return new ClackSpinner();
  }
}

/**
 * Clack draws over the current line, so calls outside start/stop are dropped.
 */
class ClackSpinner implements UnifiedSpinner {
  private readonly inner = spinner();
  private running = false;

  start(message: string): void {
    if (this.running) return;
    this.inner.start(message);
    this.running = true;
  }

  stop(finalMessage?: string): void {
    if (!this.running) return;
    this.inner.stop(finalMessage);
    this.running = false;
  }

  message(text: string): void {
    if (this.running) {
      this.inner.message(text);
    }
  }
}
