import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Level from SWARM_LOG_LEVEL; tests run silent unless told otherwise
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.SWARM_LOG_LEVEL;
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Logger wrapper for the swarm runtime
 */
export class Logger {
  private pino: pino.Logger;

  constructor(name: string = 'swarmkit', level: LogLevel = resolveLogLevel()) {
    this.pino = pino({
      name,
      level,
      transport: process.env.SWARM_LOG_PRETTY === 'true'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    });
  }

  debug(message: string, data?: object): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: object): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: object): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error({ detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger();
    child.pino = this.pino.child(bindings);
    return child;
  }

  get level(): string {
    return this.pino.level;
  }
}

// Default logger instance
export const logger = new Logger();
