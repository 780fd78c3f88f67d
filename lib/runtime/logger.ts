import { DEFAULT_CONSOLE_LOG_LEVEL } from '../constants';

export interface LogMeta {
  [key: string]: unknown;
  itemId?: string;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Reads CONSOLE_LOG_LEVEL; `WARN` is accepted as an alias for `WARNING`. */
export function logLevelFromEnvironment(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.CONSOLE_LOG_LEVEL ?? DEFAULT_CONSOLE_LOG_LEVEL).toUpperCase();
  const normalized = raw === 'WARN' ? 'WARNING' : raw;
  return isLogLevel(normalized) ? normalized : 'INFO';
}

export class Logger {
  private readonly serviceName: string;
  private readonly threshold: LogLevel;
  private defaultMeta?: LogMeta;

  constructor(serviceName: string, level: LogLevel = logLevelFromEnvironment()) {
    this.serviceName = serviceName;
    this.threshold = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = { ...this.defaultMeta, ...meta };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level}] [${this.serviceName}] ${message}${metaStr}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('DEBUG')) {
      console.log(this.formatMessage('DEBUG', message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('INFO')) {
      console.log(this.formatMessage('INFO', message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('WARNING')) {
      console.warn(this.formatMessage('WARNING', message, meta));
    }
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('ERROR', message, meta));
  }

  setContext(meta: LogMeta): void {
    this.defaultMeta = meta;
  }
}
