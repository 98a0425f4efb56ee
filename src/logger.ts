/**
 * Minimal logging seam.
 *
 * Library code logs through the `Logger` interface; callers pass a
 * `ConsoleLogger` (or their own implementation) to see output. The default
 * is `silentLogger`.
 */

export interface Logger {
  debug(message: string, extra?: unknown): void;
  info(message: string, extra?: unknown): void;
  warn(message: string, extra?: unknown): void;
  error(message: string, extra?: unknown): void;
  withContext(context: string): Logger;
}

export class ConsoleLogger implements Logger {
  private module: string;
  private context: string;

  constructor(module: string, context: string = '') {
    this.module = module;
    this.context = context;
  }

  private format(message: string): string {
    const source = this.context ? `${this.module}:${this.context}` : this.module;
    return `[${source}] ${message}`;
  }

  debug(message: string, extra?: unknown): void {
    if (extra !== undefined) console.debug(this.format(message), extra);
    else console.debug(this.format(message));
  }

  info(message: string, extra?: unknown): void {
    if (extra !== undefined) console.info(this.format(message), extra);
    else console.info(this.format(message));
  }

  warn(message: string, extra?: unknown): void {
    if (extra !== undefined) console.warn(this.format(message), extra);
    else console.warn(this.format(message));
  }

  error(message: string, extra?: unknown): void {
    if (extra !== undefined) console.error(this.format(message), extra);
    else console.error(this.format(message));
  }

  // Chainable context builder
  withContext(context: string): Logger {
    return new ConsoleLogger(this.module, this.context ? `${this.context}:${context}` : context);
  }
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  withContext: () => silentLogger,
};
