import winston from 'winston';
import { getConfig } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const componentStr = component ? `[${String(component)}]` : '';
  const metaStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)}${metaStr}`;
});

// Create the base logger
function createLogger(): winston.Logger {
  const config = getConfig();

  return winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
    transports: [
      new winston.transports.Console({
        format: combine(colorize({ all: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
      }),
    ],
    // Don't exit on handled exceptions
    exitOnError: false,
  });
}

// Singleton logger instance
let loggerInstance: winston.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/**
 * Logger interface for type safety
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(options: { component: string }): Logger;
}

/**
 * Wrapper class that implements the Logger interface.
 * The winston child is created on first use so modules can hold a logger
 * at import time without forcing configuration to load.
 */
export class ComponentLogger implements Logger {
  private instance: winston.Logger | null = null;
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  private get logger(): winston.Logger {
    if (!this.instance) {
      this.instance = getLogger().child({ component: this.component });
    }
    return this.instance;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  child(options: { component: string }): Logger {
    return new ComponentLogger(`${this.component}:${options.component}`);
  }
}

/**
 * Create a typed logger for a component
 */
export function logger(component: string): Logger {
  return new ComponentLogger(component);
}

/**
 * Shorten an address or id for log lines
 */
export function abbreviate(value: string, head = 6, tail = 4): string {
  if (value.length <= head + tail + 3) return value;
  return `${value.slice(0, head)}...${tail > 0 ? value.slice(-tail) : ''}`;
}
