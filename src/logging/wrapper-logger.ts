/**
 * Wrapper Logger
 *
 * Structured log of everything the launcher decides during a run:
 * which files were merged, how the executable resolved, when the child
 * started and how it ended.
 */

export type WrapperLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ConsoleLogLevel = WrapperLogLevel | 'silent';

export type WrapperLogCategory =
  | 'PRE_RUN'
  | 'ENVIRONMENT'
  | 'RESOLUTION'
  | 'SPAWN'
  | 'OUTPUT'
  | 'TERMINATION'
  | 'POST_RUN'
  | 'DISCOVERY'
  | 'COMMANDS'
  | 'CLI'
  | 'ERROR';

export interface WrapperLogEntry {
  timestamp: string;
  level: WrapperLogLevel;
  category: WrapperLogCategory;
  message: string;
  details?: Record<string, unknown>;
  runId?: string;
}

export interface WrapperLogSubscriber {
  onLog(entry: WrapperLogEntry): void;
}

export interface WrapperLoggerOptions {
  /** Maximum entries kept in memory (default: 1000) */
  maxEntries?: number;
  /** Lowest level echoed to the console sink (default: 'warn') */
  consoleLevel?: ConsoleLogLevel;
  /** Console sink (default: process.stderr) */
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<ConsoleLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Check that a string names a console level
 */
export function isConsoleLogLevel(value: string): value is ConsoleLogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * WrapperLogger - Centralized logging for launcher decisions
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent logs
 * - Subscriber pattern for consumers that want every entry
 * - Console sink filtered by level
 */
export class WrapperLogger {
  private entries: WrapperLogEntry[] = [];
  private subscribers: Set<WrapperLogSubscriber> = new Set();
  private maxEntries: number;
  private consoleLevel: ConsoleLogLevel;
  private write: (line: string) => void;

  constructor(options: WrapperLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.consoleLevel = options.consoleLevel ?? 'warn';
    this.write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  }

  /**
   * Log a launcher decision
   */
  log(
    level: WrapperLogLevel,
    category: WrapperLogCategory,
    message: string,
    options: {
      details?: Record<string, unknown>;
      runId?: string;
    } = {}
  ): WrapperLogEntry {
    const entry: WrapperLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      runId: options.runId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (LEVEL_RANK[level] >= LEVEL_RANK[this.consoleLevel]) {
      this.write(`[envoy] ${level.toUpperCase()} ${message}`);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch {
        // Subscribers never break logging
      }
    }

    return entry;
  }

  debug(category: WrapperLogCategory, message: string, details?: Record<string, unknown>, runId?: string): WrapperLogEntry {
    return this.log('debug', category, message, { details, runId });
  }

  info(category: WrapperLogCategory, message: string, details?: Record<string, unknown>, runId?: string): WrapperLogEntry {
    return this.log('info', category, message, { details, runId });
  }

  warn(category: WrapperLogCategory, message: string, details?: Record<string, unknown>, runId?: string): WrapperLogEntry {
    return this.log('warn', category, message, { details, runId });
  }

  logError(
    message: string,
    error: unknown,
    options: { category?: WrapperLogCategory; runId?: string } = {}
  ): WrapperLogEntry {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', options.category ?? 'ERROR', `${message}: ${errorMessage}`, {
      details: {
        error: errorMessage,
        stack: errorStack,
      },
      runId: options.runId,
    });
  }

  /**
   * Change the console sink threshold
   */
  setConsoleLevel(level: ConsoleLogLevel): void {
    this.consoleLevel = level;
  }

  getConsoleLevel(): ConsoleLogLevel {
    return this.consoleLevel;
  }

  // Retrieval methods

  getAll(): WrapperLogEntry[] {
    return [...this.entries];
  }

  getByRunId(runId: string): WrapperLogEntry[] {
    return this.entries.filter((e) => e.runId === runId);
  }

  getByCategory(category: WrapperLogCategory): WrapperLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getRecent(count: number = 50): WrapperLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  // Subscription

  /**
   * Subscribe to log events; returns the unsubscribe function
   */
  subscribe(subscriber: WrapperLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

// Singleton instance for global access
let globalLogger: WrapperLogger | null = null;

export function getWrapperLogger(): WrapperLogger {
  if (!globalLogger) {
    globalLogger = new WrapperLogger();
  }
  return globalLogger;
}

export function resetWrapperLogger(): void {
  globalLogger = null;
}
