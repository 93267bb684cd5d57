import { Counter, Gauge, Registry } from 'prom-client';
import type { MatchMode, MetricKind } from '../config/index.js';
import type { InstrumentHandle, InstrumentRegistry } from './registry.js';
import { matchesLabels, METRIC_NAME_LABEL, type Selector } from './selector.js';

export type SeriesSnapshot = {
  labels: Record<string, string>;
  value: number;
};

export type MetricFamilySnapshot = {
  name: string;
  kind: MetricKind;
  help: string;
  labelNames: string[];
  series: SeriesSnapshot[];
};

export type FilteringGathererOptions = {
  matchMode?: MatchMode;
};

/**
 * Scrape-time view of an InstrumentRegistry. The family list is fixed when
 * gather() starts; each series value is whatever was last written when that
 * family is read.
 */
export class FilteringGatherer {
  readonly matchMode: MatchMode;

  constructor(
    private readonly registry: InstrumentRegistry,
    options: FilteringGathererOptions = {}
  ) {
    this.matchMode = options.matchMode ?? 'first';
  }

  async gather(selectors: readonly Selector[] = []): Promise<MetricFamilySnapshot[]> {
    const handles = this.registry.instruments();
    const families = await Promise.all(handles.map(handle => readFamily(handle)));

    if (selectors.length === 0) {
      return families;
    }

    const predicate = this.buildPredicate(selectors);
    const filtered: MetricFamilySnapshot[] = [];
    for (const family of families) {
      const series = family.series.filter(entry =>
        predicate({ ...entry.labels, [METRIC_NAME_LABEL]: family.name })
      );
      if (series.length > 0) {
        filtered.push({ ...family, series });
      }
    }
    return filtered;
  }

  private buildPredicate(selectors: readonly Selector[]) {
    const [first] = selectors;
    switch (this.matchMode) {
      case 'first':
        return (labels: Record<string, string>) => (first ? matchesLabels(first, labels) : true);
      case 'all':
        return (labels: Record<string, string>) =>
          selectors.every(selector => matchesLabels(selector, labels));
      case 'any':
        return (labels: Record<string, string>) =>
          selectors.some(selector => matchesLabels(selector, labels));
    }
  }
}

async function readFamily(handle: InstrumentHandle): Promise<MetricFamilySnapshot> {
  const current = await handle.metric.get();
  const series = current.values.map(entry => {
    const labels: Record<string, string> = {};
    for (const [key, value] of Object.entries(entry.labels)) {
      if (value !== undefined) {
        labels[key] = String(value);
      }
    }
    return { labels, value: entry.value };
  });

  return {
    name: handle.name,
    kind: handle.kind,
    help: handle.help,
    labelNames: [...handle.labelNames],
    series
  };
}

export async function serializeSnapshot(families: readonly MetricFamilySnapshot[]): Promise<string> {
  const registry = new Registry();

  for (const family of families) {
    const configuration = {
      name: family.name,
      help: family.help,
      labelNames: family.labelNames,
      registers: [registry]
    };

    if (family.kind === 'gauge') {
      const gauge = new Gauge(configuration);
      for (const entry of family.series) {
        gauge.set(entry.labels, entry.value);
      }
    } else {
      const counter = new Counter(configuration);
      for (const entry of family.series) {
        counter.inc(entry.labels, entry.value);
      }
    }
  }

  return registry.metrics();
}

export const EXPOSITION_CONTENT_TYPE = Registry.PROMETHEUS_CONTENT_TYPE;
