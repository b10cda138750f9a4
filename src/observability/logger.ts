import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  contractVersion?: string;
  role?: string;
  service?: string;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  contractVersion?: string;
  role?: string;
  service?: string;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export function parseLogThreshold(value: string | undefined): LogThreshold {
  if (value === 'info' || value === 'warn' || value === 'error' || value === 'silent') {
    return value;
  }
  return 'info';
}

class Logger {
  private context: LogContext | null = null;
  private threshold: LogThreshold = parseLogThreshold(process.env.LOG_LEVEL);

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(threshold: LogThreshold): void {
    this.threshold = threshold;
  }

  getLevel(): LogThreshold {
    return this.threshold;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      phase,
      message,
      data,
    };

    if (this.context?.contractVersion) entry.contractVersion = this.context.contractVersion;
    if (this.context?.role) entry.role = this.context.role;
    if (this.context?.service) entry.service = this.context.service;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateCallId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
