/**
 * Minimal console-backed logger shared by the selectext packages.
 *
 * `debug` output is opt-in per instance; warnings and errors are always written,
 * since they point at caller mistakes or failed callbacks.
 */
export type LogSink = Pick<Console, 'debug' | 'warn' | 'error'>;

export class Logger {
  private readonly enabled: boolean;
  private readonly scope: string;
  private readonly sink: LogSink;

  constructor(enabled = false, scope = 'selectext', sink: LogSink = console) {
    this.enabled = enabled;
    this.scope = scope;
    this.sink = sink;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Returns a logger with the same settings and a nested scope, e.g. `[selectext:bridge]`. */
  child(scope: string): Logger {
    return new Logger(this.enabled, `${this.scope}:${scope}`, this.sink);
  }

  debug(message: string, ...details: unknown[]): void {
    if (!this.enabled) return;
    this.sink.debug(`[${this.scope}] ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.sink.warn(`[${this.scope}] ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    this.sink.error(`[${this.scope}] ${message}`, ...details);
  }
}
