export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return fallback;
}

function describeDetail(detail: unknown): string {
  if (detail === undefined) return '';
  if (detail instanceof Error) {
    return detail.stack ? ` ${detail.stack}` : ` ${detail.name}: ${detail.message}`;
  }
  if (typeof detail === 'string') return ` ${detail}`;
  try {
    return ` ${JSON.stringify(detail)}`;
  } catch {
    return ` ${String(detail)}`;
  }
}

/**
 * Console logger shared by the gateway, the CLI and the routing pipeline.
 * Output goes through console.* so the file mirror in unified-logging picks it up.
 */
export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, detail?: unknown): void {
    this.write('debug', message, detail);
  }

  info(message: string, detail?: unknown): void {
    this.write('info', message, detail);
  }

  warn(message: string, detail?: unknown): void {
    this.write('warn', message, detail);
  }

  error(message: string, detail?: unknown): void {
    this.write('error', message, detail);
  }

  private write(level: LogLevel, message: string, detail: unknown): void {
    if (!this.isEnabled(level)) return;
    const prefix = this.scope ? `[${this.scope}] ` : '';
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()}: ${prefix}${message}${describeDetail(detail)}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else if (level === 'debug') {
      console.debug(line);
    } else {
      console.log(line);
    }
  }
}

export function createLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger(parseLogLevel(env.TRADEWATCH_LOG_LEVEL));
}
