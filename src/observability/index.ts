/**
 * Logging and metrics for operation polling.
 *
 * Loggers and collectors are plain objects handed to the poller and the
 * clients through the context; nothing here is held in module state.
 * @module observability
 */

/**
 * Metric names emitted by the poller.
 */
export const MetricNames = {
  POLLS_TOTAL: 'operation_polls_total',
  WAIT_DURATION_MS: 'operation_wait_duration_ms',
  OUTCOMES_TOTAL: 'operation_outcomes_total',
  REQUESTS_TOTAL: 'operation_requests_total',
} as const;

/**
 * Labels for metrics.
 */
export interface MetricLabels {
  /** Client operation (get, list, cancel, delete, wait) */
  operation?: string;
  /** Terminal outcome (success, failed, deadline_exceeded, cancelled, transport_error) */
  outcome?: string;
  /** HTTP status code */
  status?: number;
}

/**
 * Metric collector interface.
 */
export interface MetricCollector {
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * No-op metric collector for when metrics are disabled.
 */
export class NoOpMetricCollector implements MetricCollector {
  incrementCounter(_name: string, _labels?: MetricLabels, _value?: number): void {}
  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}
}

/**
 * Writes one line per entry to the console stream matching its level.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(options?: { prefix?: string; minLevel?: LogLevel }) {
    this.prefix = options?.prefix ?? '[operations]';
    this.threshold = LEVELS.indexOf(options?.minLevel ?? 'info');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const suffix = context === undefined ? '' : ` ${JSON.stringify(context)}`;
    const line = `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}${suffix}`;
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Series key: the metric name followed by its defined labels in key order,
 * e.g. `operation_outcomes_total{outcome=failed}`.
 */
function seriesKey(name: string, labels: MetricLabels = {}): string {
  const pairs = Object.entries(labels)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([label, value]) => `${label}=${String(value)}`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(',')}}`;
}

/**
 * Keeps counters and histograms in memory, keyed by series.
 */
export class InMemoryMetricCollector implements MetricCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();

  incrementCounter(name: string, labels?: MetricLabels, value = 1): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, this.getCounterByKey(key) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const existing = this.histograms.get(key);
    if (existing) {
      existing.push(value);
    } else {
      this.histograms.set(key, [value]);
    }
  }

  /** Value of one series, 0 when never incremented */
  getCounter(name: string, labels?: MetricLabels): number {
    return this.getCounterByKey(seriesKey(name, labels));
  }

  /** Snapshot of every counter series */
  getCounters(): Map<string, number> {
    return new Map(this.counters);
  }

  /** Snapshot of every histogram series */
  getHistograms(): Map<string, number[]> {
    return new Map([...this.histograms].map(([key, values]) => [key, [...values]]));
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private getCounterByKey(key: string): number {
    return this.counters.get(key) ?? 0;
  }
}
