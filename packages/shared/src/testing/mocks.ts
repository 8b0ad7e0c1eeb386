/**
 * Mock implementations of the logger and the database client so tests never
 * need a running Postgres.
 */

import { type Logger, type LogContext } from '../utils/logger.js';

export interface CapturedLog {
  level: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  message: string;
  data?: Record<string, unknown>;
  error?: Error | unknown;
}

export interface MockLogger extends Logger {
  logs: CapturedLog[];
  clear(): void;
  getLogsByLevel(level: CapturedLog['level']): CapturedLog[];
  hasLog(level: CapturedLog['level'], messagePattern: string | RegExp): boolean;
}

/**
 * Create a mock logger that captures log calls for assertions.
 * Children write into the same `logs` array as their parent.
 */
export function createMockLogger(logs: CapturedLog[] = [], context: LogContext = {}): MockLogger {
  return {
    logs,

    debug(msg: string, data?: Record<string, unknown>): void {
      logs.push({ level: 'debug', message: msg, data: { ...context, ...data } });
    },

    info(msg: string, data?: Record<string, unknown>): void {
      logs.push({ level: 'info', message: msg, data: { ...context, ...data } });
    },

    warn(msg: string, data?: Record<string, unknown>): void {
      logs.push({ level: 'warn', message: msg, data: { ...context, ...data } });
    },

    error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
      logs.push({ level: 'error', message: msg, error, data: { ...context, ...data } });
    },

    fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
      logs.push({ level: 'fatal', message: msg, error, data: { ...context, ...data } });
    },

    child(childContext: LogContext): MockLogger {
      return createMockLogger(logs, { ...context, ...childContext });
    },

    getContext(): LogContext {
      return { ...context };
    },

    clear(): void {
      logs.length = 0;
    },

    getLogsByLevel(level: CapturedLog['level']): CapturedLog[] {
      return logs.filter(log => log.level === level);
    },

    hasLog(level: CapturedLog['level'], messagePattern: string | RegExp): boolean {
      return logs.some(log => {
        if (log.level !== level) return false;
        if (typeof messagePattern === 'string') {
          return log.message.includes(messagePattern);
        }
        return messagePattern.test(log.message);
      });
    },
  };
}

export interface MockQueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
}

/**
 * Mock database client whose results are keyed by a SQL substring or pattern.
 * Structurally satisfies the `Queryable` seam of the database package.
 */
export interface MockDatabaseClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<MockQueryResult<T>>;
  setQueryResult<T>(pattern: string | RegExp, result: MockQueryResult<T>): void;
  setQueryError(pattern: string | RegExp, error: Error): void;
  getExecutedQueries(): Array<{ sql: string; params?: unknown[] }>;
  reset(): void;
}

export function createMockDatabaseClient(): MockDatabaseClient {
  const queryResults = new Map<string | RegExp, MockQueryResult | Error>();
  const executedQueries: Array<{ sql: string; params?: unknown[] }> = [];

  return {
    async query<T = unknown>(sql: string, params?: unknown[]): Promise<MockQueryResult<T>> {
      executedQueries.push({ sql, params });

      for (const [pattern, result] of queryResults) {
        const matches = typeof pattern === 'string'
          ? sql.includes(pattern)
          : pattern.test(sql);

        if (matches) {
          if (result instanceof Error) {
            throw result;
          }
          return result as MockQueryResult<T>;
        }
      }

      return { rows: [], rowCount: 0 };
    },

    setQueryResult<T>(pattern: string | RegExp, result: MockQueryResult<T>): void {
      queryResults.set(pattern, result);
    },

    setQueryError(pattern: string | RegExp, error: Error): void {
      queryResults.set(pattern, error);
    },

    getExecutedQueries() {
      return [...executedQueries];
    },

    reset(): void {
      queryResults.clear();
      executedQueries.length = 0;
    },
  };
}
