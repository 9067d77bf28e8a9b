/**
 * Logger - Pub/Sub event log for a configuration run
 *
 * Every component (detector, resolver, allocator, bridge modes,
 * configurators) publishes events: fallback tier taken, token dropped,
 * port assigned, statement emitted. Subscribers can listen to all events
 * or filter by source, event prefix or level.
 *
 * One instance is created per run and handed to each component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RunLog {
  timestamp: number;
  level: LogLevel;
  source: string;         // component that emitted the event (e.g. "hw-detect")
  event: string;          // event name (e.g. "detect:mode", "resolve:dropped")
  message: string;        // human-readable description
  data?: Record<string, unknown>; // optional structured data
}

export type LogSubscriber = (log: RunLog) => void;

export interface LogFilter {
  source?: string;
  event?: string;
  /** Minimum level to deliver */
  level?: LogLevel;
}

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: LogFilter;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: RunLog[] = [];

  constructor(private readonly maxLogs: number = 10000) {}

  /**
   * Publish a log event
   */
  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    const entry: RunLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-Math.floor(this.maxLogs / 2));
    }

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && LEVEL_RANK[level] < LEVEL_RANK[sub.filter.level]) continue;
      }
      sub.subscriber(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /**
   * Subscribe to log events with optional filter
   */
  subscribe(subscriber: LogSubscriber, filter?: LogFilter): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  getLogs(): RunLog[] {
    return [...this.logs];
  }

  /** Events whose name starts with the given prefix */
  getLogsByEvent(prefix: string): RunLog[] {
    return this.logs.filter(l => l.event.startsWith(prefix));
  }

  getLogsBySource(source: string): RunLog[] {
    return this.logs.filter(l => l.source === source);
  }

  /**
   * Clear all logs and subscriptions
   */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
  }
}
