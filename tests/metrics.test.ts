import { afterEach, describe, expect, it } from 'vitest';
import metrics, { SelfMetrics } from '../src/metrics/index.js';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from '../src/logger.js';

describe('SelfMetrics', () => {
  it('counts received and failed samples per flow and stream', async () => {
    const selfMetrics = new SelfMetrics();
    selfMetrics.recordReceived('checkout', 'default');
    selfMetrics.recordReceived('checkout', 'default');
    selfMetrics.recordReceived('checkout', 'errors');
    selfMetrics.recordFailed('checkout', 'errors');
    selfMetrics.recordRestart('checkout');
    selfMetrics.setFlowUp('checkout', true);

    const snapshot = await selfMetrics.snapshot();
    expect(snapshot.received).toEqual({ checkout: { default: 2, errors: 1 } });
    expect(snapshot.failed).toEqual({ checkout: { errors: 1 } });
    expect(snapshot.restarts).toEqual({ checkout: 1 });
    expect(snapshot.up).toEqual({ checkout: 1 });
    expect(Number.isNaN(Date.parse(snapshot.createdAt))).toBe(false);
  });

  it('renders its counters in the exposition format', async () => {
    const selfMetrics = new SelfMetrics();
    selfMetrics.recordReceived('checkout', 'default');

    const lines = (await selfMetrics.metrics()).split('\n');
    expect(lines).toContain('# HELP sfxpe_flow_metrics_received_total Number of received metrics');
    expect(lines).toContain('# TYPE sfxpe_flow_metrics_received_total counter');
    expect(lines).toContain('sfxpe_flow_metrics_received_total{flow="checkout",stream="default"} 1');
    expect(lines).not.toContain('# TYPE process_cpu_seconds_total counter');
  });

  it('includes process metrics only when asked to', async () => {
    const selfMetrics = new SelfMetrics({ collectDefaults: true });
    const lines = (await selfMetrics.metrics()).split('\n');
    expect(lines).toContain('# TYPE process_cpu_seconds_total counter');
  });

  it('clears every series on reset', async () => {
    const selfMetrics = new SelfMetrics();
    selfMetrics.recordReceived('checkout', 'default');
    selfMetrics.incrementLogLevel('warn');
    selfMetrics.reset();

    const snapshot = await selfMetrics.snapshot();
    expect(snapshot.received).toEqual({});
    expect(snapshot.logs).toEqual({});
  });
});

describe('Logger', () => {
  const defaultLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(defaultLevel);
    metrics.reset();
  });

  it('counts log lines by level on the default metrics', async () => {
    setLogLevel('trace');
    metrics.reset();

    logger.trace('trace baseline');
    logger.debug({ flow: 'checkout' }, 'debug baseline');
    logger.warn({ flow: 'checkout' }, 'warn baseline');
    logger.warn('warn again');

    const snapshot = await metrics.snapshot();
    expect(snapshot.logs).toEqual({ trace: 1, debug: 1, warn: 2 });
  });

  it('does not count lines below the active level', async () => {
    setLogLevel('error');
    metrics.reset();

    logger.info('hidden');
    logger.error('visible');

    expect((await metrics.snapshot()).logs).toEqual({ error: 1 });
  });

  it('validates log levels', () => {
    expect(getAvailableLogLevels()).toEqual(['debug', 'error', 'fatal', 'info', 'silent', 'trace', 'warn']);
    expect(setLogLevel(' DEBUG ')).toBe('debug');
    expect(getLogLevel()).toBe('debug');
    expect(() => setLogLevel('verbose')).toThrowError(
      'Unknown log level "verbose" (available: debug, error, fatal, info, silent, trace, warn)'
    );
  });
});
