/**
 * Pipeline Logger
 *
 * Structured log of routing, execution and resilience decisions.
 * Entries are kept in a bounded in-memory buffer and pushed to subscribers
 * (the CLI attaches a console subscriber).
 */

export type PipelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type PipelineLogCategory =
  | 'VALIDATION'
  | 'ROUTING'
  | 'STEP_START'
  | 'STEP_END'
  | 'RETRY'
  | 'FALLBACK'
  | 'CIRCUIT'
  | 'RATE_LIMIT'
  | 'CACHE'
  | 'COST'
  | 'ERROR';

export interface PipelineLogEntry {
  timestamp: string;
  level: PipelineLogLevel;
  category: PipelineLogCategory;
  message: string;
  details?: Record<string, unknown>;
  pipelineId?: string;
  requestId?: string;
}

export interface PipelineLogSubscriber {
  onLog(entry: PipelineLogEntry): void;
}

export interface LogOptions {
  details?: Record<string, unknown>;
  pipelineId?: string;
  requestId?: string;
}

const LEVEL_ORDER: Record<PipelineLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MASKED = '***';

/**
 * Patterns for credentials that must never reach a log line
 */
export const MASKING_PATTERNS: readonly RegExp[] = [
  /sk-[A-Za-z0-9_-]{8,}/g,
  /Bearer\s+[A-Za-z0-9._~+/=-]+/g,
];

/**
 * Mask API keys and bearer tokens in a string
 */
export function maskSensitiveData(text: string): string {
  return MASKING_PATTERNS.reduce((masked, pattern) => masked.replace(pattern, MASKED), text);
}

function maskValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSensitiveData(value);
  }
  if (Array.isArray(value)) {
    return value.map(maskValue);
  }
  if (value !== null && typeof value === 'object') {
    return maskDetails(value);
  }
  return value;
}

function maskDetails(details: object): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    masked[key] = /api[_-]?key|authorization/i.test(key) ? MASKED : maskValue(value);
  }
  return masked;
}

export class PipelineLogger {
  private entries: PipelineLogEntry[] = [];
  private subscribers: Set<PipelineLogSubscriber> = new Set();
  private maxEntries: number;
  private failedNotifications = 0;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  log(
    level: PipelineLogLevel,
    category: PipelineLogCategory,
    message: string,
    options: LogOptions = {}
  ): PipelineLogEntry {
    const entry: PipelineLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message: maskSensitiveData(message),
      details: options.details ? maskDetails(options.details) : undefined,
      pipelineId: options.pipelineId,
      requestId: options.requestId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch {
        // counted, never rethrown
        this.failedNotifications++;
      }
    }

    return entry;
  }

  debug(category: PipelineLogCategory, message: string, options?: LogOptions): PipelineLogEntry {
    return this.log('debug', category, message, options);
  }

  info(category: PipelineLogCategory, message: string, options?: LogOptions): PipelineLogEntry {
    return this.log('info', category, message, options);
  }

  warn(category: PipelineLogCategory, message: string, options?: LogOptions): PipelineLogEntry {
    return this.log('warn', category, message, options);
  }

  error(category: PipelineLogCategory, message: string, options?: LogOptions): PipelineLogEntry {
    return this.log('error', category, message, options);
  }

  getEntries(): PipelineLogEntry[] {
    return [...this.entries];
  }

  getEntriesByCategory(category: PipelineLogCategory): PipelineLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getEntriesByRequest(requestId: string): PipelineLogEntry[] {
    return this.entries.filter((e) => e.requestId === requestId);
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLeast(level: PipelineLogLevel): PipelineLogEntry[] {
    return this.entries.filter((e) => LEVEL_ORDER[e.level] >= LEVEL_ORDER[level]);
  }

  getFailedNotificationCount(): number {
    return this.failedNotifications;
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: PipelineLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

/**
 * Format an entry as a single console line
 */
export function formatLogEntry(entry: PipelineLogEntry): string {
  const scope = entry.requestId ? ` (${entry.requestId.slice(0, 8)})` : '';
  return `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} [${entry.category}]${scope} ${entry.message}`;
}

/**
 * Subscriber writing entries at or above `minLevel` to the console
 */
export function createConsoleSubscriber(
  minLevel: PipelineLogLevel = 'info',
  write: (line: string) => void = (line) => console.error(line)
): PipelineLogSubscriber {
  return {
    onLog(entry: PipelineLogEntry): void {
      if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER[minLevel]) {
        write(formatLogEntry(entry));
      }
    },
  };
}

// Singleton instance for global access
let globalLogger: PipelineLogger | null = null;

export function getPipelineLogger(): PipelineLogger {
  if (!globalLogger) {
    globalLogger = new PipelineLogger();
  }
  return globalLogger;
}

export function resetPipelineLogger(): void {
  globalLogger = null;
}
