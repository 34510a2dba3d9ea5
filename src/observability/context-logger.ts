/**
 * Structured logging for configuration loading.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export class ContextLogger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _traceId: string | null = null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'extconf';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  get name(): string {
    return this._name;
  }

  get traceId(): string | null {
    return this._traceId;
  }

  /**
   * A logger sharing this one's settings whose records carry `traceId`.
   */
  withTrace(traceId: string): ContextLogger {
    const logger = new ContextLogger({
      name: this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
    logger._traceId = traceId;
    return logger;
  }

  isEnabled(level: LogLevel): boolean {
    return (LEVELS[level] ?? 20) >= this._levelValue;
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isEnabled(levelName)) return;

    let redactedExtra = extra ?? null;
    if (extra != null && this._redactSensitive) {
      const copy: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(extra)) {
        copy[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
      redactedExtra = copy;
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        trace_id: this._traceId,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      const trace = this._traceId ?? 'none';
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [${this._name}] [trace=${trace}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

function formatValue(v: unknown): string {
  if (typeof v === 'object' && v !== null) return JSON.stringify(v);
  return String(v);
}
