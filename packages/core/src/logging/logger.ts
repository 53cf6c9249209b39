export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
};

type LogRecord = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatExtra(extra: Record<string, unknown>): string {
  const parts = Object.entries(extra).map(([key, value]) => {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    return `${key}=${rendered}`;
  });
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.options.level ?? 'info';
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(
        level: Exclude<LogLevel, 'silent'>,
        msg: string,
        extra?: Record<string, unknown>
      ): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: Exclude<LogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(extra ?? {}),
    };

    // stdout belongs to whoever embeds the engine
    if ((this.options.format ?? 'text') === 'json') {
      process.stderr.write(`${JSON.stringify(record)}\n`);
      return;
    }

    const { ts, level: recordLevel, msg: message, ...rest } = record;
    process.stderr.write(`[${ts}] ${recordLevel.toUpperCase()} ${message}${formatExtra(rest)}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'silent' });
}
