export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Level = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (level: Level, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  const sink = level === 'error' ? console.error : console.log;
  sink(line);
};

class JsonLogger implements Logger {
  constructor(
    private readonly bindings: Record<string, unknown>,
    private readonly minLevel: LogLevel,
    private readonly sink: LogSink,
  ) {}

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonLogger({ ...this.bindings, ...bindings }, this.minLevel, this.sink);
  }

  private log(level: Level, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      event,
      ...this.bindings,
      ...(data ?? {}),
    };

    this.sink(level, JSON.stringify(payload, (_key, value: unknown) => serializeValue(value)));
  }
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(bindings?: Record<string, unknown>, options: LoggerOptions = {}): Logger {
  return new JsonLogger(bindings ?? {}, options.level ?? 'info', options.sink ?? consoleSink);
}

/** Logger for tests and tools that must not write to stdout. */
export function createSilentLogger(): Logger {
  return createLogger({}, { level: 'silent' });
}
