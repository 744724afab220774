export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

/** Console logging with a verbose switch for per-sentence diagnostics */
export class Logger {
  constructor(readonly verbose = false, private sink: LogSink = console) {}

  info(message: string) {
    this.sink.log(message);
  }

  debug(message: string) {
    if (this.verbose) this.sink.log(message);
  }

  warn(message: string) {
    this.sink.warn(`⚠️ ${message}`);
  }

  error(message: string, err?: unknown) {
    if (err === undefined) this.sink.error(`❌ ${message}`);
    else this.sink.error(`❌ ${message}:`, err instanceof Error ? err.message : err);
  }
}
