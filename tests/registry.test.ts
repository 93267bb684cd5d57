import { describe, expect, it } from 'vitest';
import {
  InstrumentConflictError,
  InstrumentRegistry,
  InvalidCounterIncrementError,
  InvalidMetricNameError
} from '../src/metrics/registry.js';

async function valuesOf(registry: InstrumentRegistry, name: string) {
  const handle = registry.get(name);
  if (!handle) {
    throw new Error(`no instrument ${name}`);
  }
  const current = await handle.metric.get();
  return current.values.map(entry => ({ labels: entry.labels, value: entry.value }));
}

describe('InstrumentRegistry', () => {
  it('creates an instrument once and hands the same one to later callers', () => {
    const registry = new InstrumentRegistry();
    const first = registry.getOrCreate('checkout_rate', 'gauge', ['host']);
    const second = registry.getOrCreate('checkout_rate', 'gauge', ['host']);

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(first.help).toBe('checkout_rate exported from SignalFlow');
  });

  it('keeps the last written gauge value', async () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('queue_depth', 'gauge', ['queue']);

    registry.record(handle, ['orders'], 7);
    registry.record(handle, ['orders'], 7);

    expect(await valuesOf(registry, 'queue_depth')).toEqual([{ labels: { queue: 'orders' }, value: 7 }]);
  });

  it('accumulates counter increments', async () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('requests_total', 'counter', ['code'], 'Requests served');

    registry.record(handle, ['200'], 3);
    registry.record(handle, ['200'], 4.5);

    expect(await valuesOf(registry, 'requests_total')).toEqual([{ labels: { code: '200' }, value: 7.5 }]);
  });

  it('rejects negative and NaN counter increments', () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('errors_total', 'counter', []);

    expect(() => registry.record(handle, [], -1)).toThrowError(
      new InvalidCounterIncrementError('errors_total', -1)
    );
    expect(() => registry.record(handle, [], Number.NaN)).toThrowError(InvalidCounterIncrementError);
  });

  it('refuses a name already bound to another kind', () => {
    const registry = new InstrumentRegistry();
    registry.getOrCreate('latency', 'gauge', []);

    expect(() => registry.getOrCreate('latency', 'counter', [])).toThrowError(
      'metric latency is already registered as a gauge, not a counter'
    );
  });

  it('refuses a different label set and accepts a reordered one', () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('cpu', 'gauge', ['host', 'region']);

    let conflict: unknown;
    try {
      registry.getOrCreate('cpu', 'gauge', ['host']);
    } catch (error) {
      conflict = error;
    }
    expect(conflict).toBeInstanceOf(InstrumentConflictError);
    expect(conflict).toMatchObject({ reason: 'labels', metricName: 'cpu' });

    expect(registry.getOrCreate('cpu', 'gauge', ['region', 'host'])).toBe(handle);
  });

  it('maps label values by the order the caller declares', async () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('cpu', 'gauge', ['host', 'region']);

    registry.record(handle, ['eu', 'web-1'], 0.5, ['region', 'host']);

    expect(await valuesOf(registry, 'cpu')).toEqual([
      { labels: { host: 'web-1', region: 'eu' }, value: 0.5 }
    ]);
  });

  it('rejects label values that do not fit the instrument', () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('cpu', 'gauge', ['host']);

    expect(() => registry.record(handle, ['a', 'b'], 1)).toThrowError(InstrumentConflictError);
    expect(() => registry.record(handle, ['a'], 1, ['zone'])).toThrowError('metric cpu has no label zone');
  });

  it('validates metric and label names', () => {
    const registry = new InstrumentRegistry();

    expect(() => registry.getOrCreate('1bad', 'gauge', [])).toThrowError(InvalidMetricNameError);
    expect(() => registry.getOrCreate('good', 'gauge', ['__reserved'])).toThrowError(InvalidMetricNameError);
    expect(() => registry.getOrCreate('good', 'gauge', ['a', 'a'])).toThrowError(
      'metric good repeats label name a'
    );
    expect(registry.size).toBe(0);
  });

  it('registers instruments with the wrapped prom-client registry', async () => {
    const registry = new InstrumentRegistry();
    const handle = registry.getOrCreate('up', 'gauge', []);
    registry.record(handle, [], 1);

    const exposition = await registry.prometheus.metrics();
    expect(exposition.split('\n')).toContain('up 1');

    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.prometheus.getMetricsAsArray()).toHaveLength(0);
  });
});
