export type LogLevel = 'info' | 'warn' | 'error' | 'dim';

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class Logger {
  private sink: LogSink;
  private scope: string | null;

  constructor(sink: LogSink = console, scope: string | null = null) {
    this.sink = sink;
    this.scope = scope;
  }

  child(scope: string): Logger {
    return new Logger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  log(message: string, level: LogLevel = 'info') {
    const t = new Date().toISOString();
    const line = this.scope ? `${t} [${this.scope}] ${message}` : `${t} ${message}`;
    switch (level) {
      case 'warn':
        this.sink.warn(line);
        break;
      case 'error':
        this.sink.error(line);
        break;
      default:
        this.sink.log(level === 'dim' ? `  ${line}` : line);
    }
  }

  info(message: string) {
    this.log(message, 'info');
  }

  warn(message: string) {
    this.log(message, 'warn');
  }

  error(message: string) {
    this.log(message, 'error');
  }

  dim(message: string) {
    this.log(message, 'dim');
  }
}

/** Logger that drops everything; the default for library callers that pass none. */
export const silentLogger = new Logger({ log() {}, warn() {}, error() {} });
