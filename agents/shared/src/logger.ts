/**
 * Logging utilities for taskmesh components
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const prefix = component ? `[${String(component)}]` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level} ${prefix} ${String(message)}${metaStr}`;
});

function resolveLevel(): string {
  return process.env.COORD_LOG_LEVEL || process.env.LOG_LEVEL || 'info';
}

// Create base logger. Console output goes to stderr so the MCP stdio transport keeps stdout.
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: resolveLevel(),
    format: combine(
      errors({ stack: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      logFormat
    ),
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        format: combine(colorize({ all: true }), logFormat),
        silent: process.env.COORD_LOG_SILENT === 'true',
      }),
    ],
  });
}

// Structured logging helpers
export interface LogContext {
  taskId?: number;
  agentId?: string;
  clientId?: string;
  role?: string;
  operation?: string;
  status?: string;
  path?: string;
  pid?: number;
  attempt?: number;
  latencyMs?: number;
  error?: unknown;
  [key: string]: unknown;
}

export class AgentLogger {
  private logger: winston.Logger;

  constructor(component: string) {
    this.logger = createLogger(component);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, this.sanitizeContext(context));
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.sanitizeContext(context));
  }

  error(message: string, context?: LogContext): void {
    this.logger.error(message, this.sanitizeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.sanitizeContext(context));
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};

    const sanitized: Record<string, unknown> = { ...context };

    // Convert Error to string representation
    if (context.error instanceof Error) {
      sanitized.error = context.error.message;
      sanitized.stack = context.error.stack;
    } else if (context.error !== undefined) {
      sanitized.error = String(context.error);
    }

    return sanitized;
  }
}
