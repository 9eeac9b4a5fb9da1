export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}

export class Logger {
  private context: string;
  private logLevel: LogLevel;

  constructor(context: string) {
    this.context = context;
    const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.logLevel = isLogLevel(level) ? level : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.logLevel);
    const messageLevelIndex = LEVELS.indexOf(level);
    return messageLevelIndex <= currentLevelIndex;
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog('info')) {
      console.log(`[INFO] [${this.context}] ${message}`, meta || '');
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog('error')) {
      console.error(`[ERROR] [${this.context}] ${message}`, meta || '');
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog('warn')) {
      console.warn(`[WARN] [${this.context}] ${message}`, meta || '');
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog('debug')) {
      console.debug(`[DEBUG] [${this.context}] ${message}`, meta || '');
    }
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Strips query string and credentials so tokens or signed parameters never end up in logs.
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return url.length > 80 ? `${url.substring(0, 80)}...` : url;
  }
}
