/**
 * Structured logger for production use
 * Provides consistent logging with proper levels and context
 */

import type { Context } from "hono";
import { HEADERS } from "~/types";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  requestId?: string;
  repository?: string;
  action?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Minimum level emitted */
  level?: LogLevel;
  /** Human-readable output instead of JSON lines */
  pretty?: boolean;
}

export class Logger {
  private isDevelopment = process.env.NODE_ENV === "development";
  private level: LogLevel = "info";

  constructor(options: LoggerOptions = {}) {
    this.configure(options);
  }

  configure(options: LoggerOptions) {
    if (options.level) {
      this.level = options.level;
    }
    if (options.pretty !== undefined) {
      this.isDevelopment = options.pretty;
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();

    const logEntry = { timestamp, level, message, ...context };

    if (this.isDevelopment) {
      console.log(`[${level.toUpperCase()}]`, message, context || "");
    } else {
      // In production, emit JSON for log aggregation services
      console.log(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext) {
    const errorContext = {
      ...context,
      error: error instanceof Error
        ? {
          message: error.message,
          stack: this.isDevelopment ? error.stack : undefined,
          name: error.name,
        }
        : error,
    };
    this.log("error", message, errorContext);
  }

  /**
   * Create a logger instance bound to the request ID of a Hono context
   */
  withContext(c: Context): LoggerWithContext {
    const requestId: unknown = c.get("requestId");
    return new LoggerWithContext(this, {
      requestId: typeof requestId === "string"
        ? requestId
        : c.req.header(HEADERS.REQUEST_ID),
    });
  }
}

export class LoggerWithContext {
  constructor(
    private logger: Logger,
    private context: LogContext,
  ) {}

  debug(message: string, additionalContext?: LogContext) {
    this.logger.debug(message, { ...this.context, ...additionalContext });
  }

  info(message: string, additionalContext?: LogContext) {
    this.logger.info(message, { ...this.context, ...additionalContext });
  }

  warn(message: string, additionalContext?: LogContext) {
    this.logger.warn(message, { ...this.context, ...additionalContext });
  }

  error(
    message: string,
    error?: unknown,
    additionalContext?: LogContext,
  ) {
    this.logger.error(message, error, {
      ...this.context,
      ...additionalContext,
    });
  }
}

/** Logging surface shared by the root logger and bound children */
export type ContextLogger = Pick<LoggerWithContext, "debug" | "info" | "warn" | "error">;

// Singleton logger instance
export const logger = new Logger();
