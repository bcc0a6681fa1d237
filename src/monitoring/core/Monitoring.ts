import { EventEmitter } from 'events';
import winston from 'winston';
import { LogEntry, LogLevel, Metric } from '../../core/types';

type Labels = Record<string, string>;

export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
}

export class MetricsCollector extends EventEmitter {
  private series: Map<string, Metric[]> = new Map();
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  constructor(private readonly retentionMs: number = 3600000) {
    super();
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const value = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, value);
    this.record(name, value, labels);
  }

  setGauge(name: string, value: number, labels: Labels = {}): void {
    this.gauges.set(this.makeKey(name, labels), value);
    this.record(name, value, labels);
  }

  recordHistogram(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > 1000) values.shift();
    this.histograms.set(key, values);
    this.record(name, value, labels);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getGauge(name: string, labels: Labels = {}): number {
    return this.gauges.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogramStats(name: string, labels: Labels = {}): HistogramStats | undefined {
    const values = this.histograms.get(this.makeKey(name, labels));
    if (!values || values.length === 0) return undefined;

    const sorted = [...values].sort((a, b) => a - b);
    return {
      count: sorted.length,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      avg: sorted.reduce((a, b) => a + b, 0) / sorted.length,
      p50: sorted[Math.floor(sorted.length * 0.5)],
      p95: sorted[Math.floor(sorted.length * 0.95)],
    };
  }

  getSeries(name: string): Metric[] {
    return this.series.get(name) ?? [];
  }

  getMetricNames(): string[] {
    return Array.from(this.series.keys());
  }

  /** Drops raw samples older than the retention window. Aggregates are kept. */
  prune(now: number = Date.now()): void {
    const cutoff = now - this.retentionMs;
    for (const [name, samples] of this.series.entries()) {
      const kept = samples.filter((m) => m.timestamp.getTime() > cutoff);
      if (kept.length === 0) {
        this.series.delete(name);
      } else {
        this.series.set(name, kept);
      }
    }
  }

  snapshot(): { counters: Record<string, number>; gauges: Record<string, number> } {
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
    };
  }

  private record(name: string, value: number, labels: Labels): void {
    const metric: Metric = { name, value, labels, timestamp: new Date() };
    const samples = this.series.get(name) ?? [];
    samples.push(metric);
    this.series.set(name, samples);
    this.emit('metric', metric);
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export interface LogAggregatorOptions {
  level?: LogLevel;
  silent?: boolean;
  maxLogs?: number;
}

export interface LogQuery {
  level?: LogLevel;
  agentId?: string;
  traceId?: string;
  startTime?: Date;
  endTime?: Date;
  searchText?: string;
  limit?: number;
}

/** winston-backed logger that also keeps a bounded, queryable buffer. */
export class LogAggregator extends EventEmitter {
  private logs: LogEntry[] = [];
  private readonly maxLogs: number;
  private logger: winston.Logger;

  constructor(options: LogAggregatorOptions = {}) {
    super();
    this.maxLogs = options.maxLogs ?? 10000;
    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports: [new winston.transports.Console()],
    });
  }

  log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      agentId: readString(metadata, 'agentId'),
      traceId: readString(metadata, 'traceId'),
      metadata,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    this.logger.log(level, message, metadata);
    this.emit('log', entry);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata);
  }

  query(filters: LogQuery): LogEntry[] {
    const searchLower = filters.searchText?.toLowerCase();
    const results = this.logs.filter((l) => {
      if (filters.level && l.level !== filters.level) return false;
      if (filters.agentId && l.agentId !== filters.agentId) return false;
      if (filters.traceId && l.traceId !== filters.traceId) return false;
      if (filters.startTime && l.timestamp < filters.startTime) return false;
      if (filters.endTime && l.timestamp > filters.endTime) return false;
      if (searchLower) {
        return (
          l.message.toLowerCase().includes(searchLower) ||
          JSON.stringify(l.metadata ?? {}).toLowerCase().includes(searchLower)
        );
      }
      return true;
    });
    return results.slice(-(filters.limit ?? 100));
  }

  getRecent(limit: number = 100): LogEntry[] {
    return this.logs.slice(-limit);
  }

  clear(): void {
    this.logs = [];
  }
}

function readString(metadata: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = metadata?.[key];
  return typeof value === 'string' ? value : undefined;
}
