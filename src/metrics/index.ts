import { collectDefaultMetrics, Counter, Gauge, Registry } from 'prom-client';

type CounterMap = Record<string, number>;

type FlowStreamLabels = 'flow' | 'stream';

export type SelfMetricsOptions = {
  registry?: Registry;
  collectDefaults?: boolean;
};

export type SelfMetricsSnapshot = {
  createdAt: string;
  received: Record<string, CounterMap>;
  failed: Record<string, CounterMap>;
  restarts: CounterMap;
  up: CounterMap;
  logs: CounterMap;
};

/**
 * Counters describing the exporter itself. Served unfiltered on the
 * observability endpoint, never mixed into the probe registry.
 */
class SelfMetrics {
  readonly registry: Registry;
  readonly flowMetricsReceived: Counter<FlowStreamLabels>;
  readonly flowMetricsFailed: Counter<FlowStreamLabels>;
  readonly flowRestarts: Counter<'flow'>;
  readonly flowUp: Gauge<'flow'>;
  readonly logMessages: Counter<'level'>;

  constructor(options: SelfMetricsOptions = {}) {
    this.registry = options.registry ?? new Registry();
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.flowMetricsReceived = new Counter({
      name: 'sfxpe_flow_metrics_received_total',
      help: 'Number of received metrics',
      labelNames: ['flow', 'stream'],
      registers: [this.registry]
    });
    this.flowMetricsFailed = new Counter({
      name: 'sfxpe_flow_metrics_failed',
      help: 'Number of metrics that failed to process',
      labelNames: ['flow', 'stream'],
      registers: [this.registry]
    });
    this.flowRestarts = new Counter({
      name: 'sfxpe_flow_restarts_total',
      help: 'Number of times a flow was restarted by its supervisor',
      labelNames: ['flow'],
      registers: [this.registry]
    });
    this.flowUp = new Gauge({
      name: 'sfxpe_flow_up',
      help: 'Whether the flow is currently streaming (1) or not (0)',
      labelNames: ['flow'],
      registers: [this.registry]
    });
    this.logMessages = new Counter({
      name: 'sfxpe_log_messages_total',
      help: 'Number of log lines written, by level',
      labelNames: ['level'],
      registers: [this.registry]
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  recordReceived(flow: string, stream: string) {
    this.flowMetricsReceived.inc({ flow, stream });
  }

  recordFailed(flow: string, stream: string) {
    this.flowMetricsFailed.inc({ flow, stream });
  }

  recordRestart(flow: string) {
    this.flowRestarts.inc({ flow });
  }

  setFlowUp(flow: string, up: boolean) {
    this.flowUp.set({ flow }, up ? 1 : 0);
  }

  incrementLogLevel(level: string) {
    this.logMessages.inc({ level });
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  async snapshot(): Promise<SelfMetricsSnapshot> {
    const [received, failed, restarts, up, logs] = await Promise.all([
      this.flowMetricsReceived.get(),
      this.flowMetricsFailed.get(),
      this.flowRestarts.get(),
      this.flowUp.get(),
      this.logMessages.get()
    ]);

    return {
      createdAt: new Date().toISOString(),
      received: mapByFlowAndStream(received.values),
      failed: mapByFlowAndStream(failed.values),
      restarts: mapByLabel(restarts.values, 'flow'),
      up: mapByLabel(up.values, 'flow'),
      logs: mapByLabel(logs.values, 'level')
    };
  }

  reset() {
    this.flowMetricsReceived.reset();
    this.flowMetricsFailed.reset();
    this.flowRestarts.reset();
    this.flowUp.reset();
    this.logMessages.reset();
  }
}

type LabeledValue = {
  labels: Partial<Record<string, string | number>>;
  value: number;
};

function mapByFlowAndStream(values: LabeledValue[]): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const entry of values) {
    const flow = entry.labels.flow;
    const stream = entry.labels.stream;
    if (flow === undefined || stream === undefined) {
      continue;
    }
    const byStream = (result[String(flow)] ??= {});
    byStream[String(stream)] = entry.value;
  }
  return result;
}

function mapByLabel(values: LabeledValue[], label: string): CounterMap {
  const result: CounterMap = {};
  for (const entry of values) {
    const key = entry.labels[label];
    if (key !== undefined) {
      result[String(key)] = entry.value;
    }
  }
  return result;
}

const defaultMetrics = new SelfMetrics({ collectDefaults: true });

export { SelfMetrics };
export default defaultMetrics;
