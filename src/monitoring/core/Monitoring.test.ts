import { describe, it, expect, vi } from 'vitest';
import { LogAggregator, MetricsCollector } from './Monitoring';

describe('MetricsCollector', () => {
  it('should count per label set regardless of label order', () => {
    const metrics = new MetricsCollector();
    metrics.incrementCounter('requests_total', { agent: 'a', outcome: 'ok' });
    metrics.incrementCounter('requests_total', { outcome: 'ok', agent: 'a' });
    metrics.incrementCounter('requests_total', { agent: 'b', outcome: 'ok' });

    expect(metrics.getCounter('requests_total', { agent: 'a', outcome: 'ok' })).toBe(2);
    expect(metrics.getCounter('requests_total', { agent: 'c' })).toBe(0);
    expect(metrics.snapshot().counters).toEqual({
      'requests_total{agent=a,outcome=ok}': 2,
      'requests_total{agent=b,outcome=ok}': 1,
    });
  });

  it('should keep the last gauge value', () => {
    const metrics = new MetricsCollector();
    metrics.setGauge('active_workflows', 3);
    metrics.setGauge('active_workflows', 1);
    expect(metrics.getGauge('active_workflows')).toBe(1);
  });

  it('should summarise histograms', () => {
    const metrics = new MetricsCollector();
    for (const value of [40, 10, 30, 20]) {
      metrics.recordHistogram('latency_ms', value);
    }
    expect(metrics.getHistogramStats('latency_ms')).toEqual({ count: 4, min: 10, max: 40, avg: 25, p50: 30, p95: 40 });
    expect(metrics.getHistogramStats('missing')).toBeUndefined();
  });

  it('should emit samples and prune old ones', () => {
    const metrics = new MetricsCollector(1000);
    const listener = vi.fn();
    metrics.on('metric', listener);
    metrics.incrementCounter('jobs_total');

    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ name: 'jobs_total', value: 1 }));
    expect(metrics.getMetricNames()).toEqual(['jobs_total']);

    metrics.prune(Date.now() + 5000);
    expect(metrics.getSeries('jobs_total')).toEqual([]);
    expect(metrics.getCounter('jobs_total')).toBe(1);
  });
});

describe('LogAggregator', () => {
  it('should buffer entries and lift trace and agent ids from metadata', () => {
    const logs = new LogAggregator({ silent: true });
    const listener = vi.fn();
    logs.on('log', listener);

    logs.info('Agent registered', { agentId: 'a1', traceId: 't1' });

    expect(logs.getRecent(1)[0]).toMatchObject({ level: 'info', message: 'Agent registered', agentId: 'a1', traceId: 't1' });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should filter by level, trace and text', () => {
    const logs = new LogAggregator({ silent: true });
    logs.info('Request routed', { traceId: 't1' });
    logs.warn('Agent slow', { traceId: 't1', agentId: 'a2' });
    logs.error('Agent failed', { traceId: 't2', reason: 'Quota exceeded' });

    expect(logs.query({ level: 'warn' }).map((l) => l.message)).toEqual(['Agent slow']);
    expect(logs.query({ traceId: 't1' }).map((l) => l.message)).toEqual(['Request routed', 'Agent slow']);
    expect(logs.query({ searchText: 'quota' }).map((l) => l.message)).toEqual(['Agent failed']);
    expect(logs.query({ limit: 1 }).map((l) => l.message)).toEqual(['Agent failed']);
  });

  it('should drop the oldest entries past the cap', () => {
    const logs = new LogAggregator({ silent: true, maxLogs: 2 });
    logs.debug('one');
    logs.debug('two');
    logs.debug('three');
    expect(logs.getRecent().map((l) => l.message)).toEqual(['two', 'three']);

    logs.clear();
    expect(logs.getRecent()).toEqual([]);
  });
});
