import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricKind } from '../config/index.js';

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export type Instrument =
  | { kind: 'gauge'; metric: Gauge<string> }
  | { kind: 'counter'; metric: Counter<string> };

export type InstrumentHandle = Instrument & {
  readonly name: string;
  readonly help: string;
  readonly labelNames: readonly string[];
};

export class InvalidMetricNameError extends Error {
  readonly metricName: string;

  constructor(metricName: string, message: string) {
    super(message);
    this.name = 'InvalidMetricNameError';
    this.metricName = metricName;
  }
}

export type InstrumentConflictReason = 'kind' | 'labels';

export class InstrumentConflictError extends Error {
  readonly metricName: string;
  readonly reason: InstrumentConflictReason;

  constructor(metricName: string, reason: InstrumentConflictReason, message: string) {
    super(message);
    this.name = 'InstrumentConflictError';
    this.metricName = metricName;
    this.reason = reason;
  }
}

export class InvalidCounterIncrementError extends Error {
  readonly metricName: string;
  readonly value: number;

  constructor(metricName: string, value: number) {
    super(`counter ${metricName} cannot be incremented by ${value}`);
    this.name = 'InvalidCounterIncrementError';
    this.metricName = metricName;
    this.value = value;
  }
}

export type InstrumentRegistryOptions = {
  registry?: Registry;
};

/**
 * Every instrument the flows have created, keyed by metric name. Each name
 * is bound to one kind and one set of label names for the life of the
 * process; nothing is ever evicted.
 *
 * getOrCreate and record never await, so on Node's single event loop a
 * name is created exactly once even when several flows resolve it at the
 * same time, and a scrape never sees a half-written series.
 */
export class InstrumentRegistry {
  readonly prometheus: Registry;
  private readonly handles = new Map<string, InstrumentHandle>();

  constructor(options: InstrumentRegistryOptions = {}) {
    this.prometheus = options.registry ?? new Registry();
  }

  get size(): number {
    return this.handles.size;
  }

  get(name: string): InstrumentHandle | undefined {
    return this.handles.get(name);
  }

  instruments(): InstrumentHandle[] {
    return Array.from(this.handles.values());
  }

  getOrCreate(
    name: string,
    kind: MetricKind,
    labelNames: readonly string[],
    help?: string
  ): InstrumentHandle {
    const existing = this.handles.get(name);
    if (existing) {
      assertCompatible(existing, kind, labelNames);
      return existing;
    }

    assertValidNames(name, labelNames);
    const handle = this.createHandle(name, kind, [...labelNames], help ?? `${name} exported from SignalFlow`);
    this.handles.set(name, handle);
    return handle;
  }

  /**
   * `labelNames` gives the order of `labelValues` when it differs from the
   * order the instrument was created with.
   */
  record(
    handle: InstrumentHandle,
    labelValues: readonly string[],
    value: number,
    labelNames: readonly string[] = handle.labelNames
  ) {
    if (labelValues.length !== handle.labelNames.length || labelNames.length !== labelValues.length) {
      throw new InstrumentConflictError(
        handle.name,
        'labels',
        `metric ${handle.name} expects ${handle.labelNames.length} label values, got ${labelValues.length}`
      );
    }

    const labels: Record<string, string> = {};
    labelNames.forEach((labelName, index) => {
      if (!handle.labelNames.includes(labelName)) {
        throw new InstrumentConflictError(
          handle.name,
          'labels',
          `metric ${handle.name} has no label ${labelName}`
        );
      }
      labels[labelName] = labelValues[index] ?? '';
    });

    if (handle.kind === 'gauge') {
      handle.metric.set(labels, value);
      return;
    }

    if (!(value >= 0)) {
      throw new InvalidCounterIncrementError(handle.name, value);
    }
    handle.metric.inc(labels, value);
  }

  clear() {
    this.handles.clear();
    this.prometheus.clear();
  }

  private createHandle(
    name: string,
    kind: MetricKind,
    labelNames: string[],
    help: string
  ): InstrumentHandle {
    const configuration = { name, help, labelNames, registers: [this.prometheus] };
    if (kind === 'gauge') {
      return { kind, name, help, labelNames, metric: new Gauge(configuration) };
    }
    return { kind, name, help, labelNames, metric: new Counter(configuration) };
  }
}

function assertValidNames(name: string, labelNames: readonly string[]) {
  if (!METRIC_NAME_PATTERN.test(name)) {
    throw new InvalidMetricNameError(name, `invalid metric name ${JSON.stringify(name)}`);
  }

  const seen = new Set<string>();
  for (const labelName of labelNames) {
    if (!LABEL_NAME_PATTERN.test(labelName) || labelName.startsWith('__')) {
      throw new InvalidMetricNameError(name, `metric ${name} has invalid label name ${JSON.stringify(labelName)}`);
    }
    if (seen.has(labelName)) {
      throw new InvalidMetricNameError(name, `metric ${name} repeats label name ${labelName}`);
    }
    seen.add(labelName);
  }
}

function assertCompatible(existing: InstrumentHandle, kind: MetricKind, labelNames: readonly string[]) {
  if (existing.kind !== kind) {
    throw new InstrumentConflictError(
      existing.name,
      'kind',
      `metric ${existing.name} is already registered as a ${existing.kind}, not a ${kind}`
    );
  }

  const expected = new Set(existing.labelNames);
  const sameShape =
    labelNames.length === expected.size && labelNames.every(labelName => expected.has(labelName));
  if (!sameShape) {
    throw new InstrumentConflictError(
      existing.name,
      'labels',
      `metric ${existing.name} has labels [${existing.labelNames.join(', ')}], got [${labelNames.join(', ')}]`
    );
  }
}
