import { setTimeout as delay } from 'node:timers/promises';
import type { FlowConfig, SupervisionConfig } from '../config/index.js';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type SelfMetrics } from '../metrics/index.js';
import type { InstrumentRegistry } from '../metrics/registry.js';
import { FlowRunner, type FlowState, type RecordingPolicies } from './ingestion.js';
import type { FlowSource } from './source.js';

export const DEFAULT_SUPERVISION: SupervisionConfig = {
  strategy: 'fail-fast',
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterFactor: 0.2,
  maxRestarts: null
};

export type RestartDelay = {
  delayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
};

export type IngestionCoordinatorOptions = {
  flows: FlowConfig[];
  source: FlowSource;
  registry: InstrumentRegistry;
  metrics?: SelfMetrics;
  policies?: Partial<RecordingPolicies>;
  supervision?: Partial<SupervisionConfig>;
  logger?: Logger;
  random?: () => number;
};

export function computeRestartDelay(
  attempt: number,
  supervision: SupervisionConfig,
  random: () => number = Math.random
): RestartDelay {
  const minDelayMs = Math.max(0, supervision.initialDelayMs);
  const maxDelayMs = Math.max(minDelayMs, supervision.maxDelayMs);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    baseDelayMs = Math.min(maxDelayMs, Math.round(minDelayMs * 2 ** (attempt - 1)));
  }

  const jitterRange = Math.round(baseDelayMs * Math.max(0, supervision.jitterFactor));
  let delayMs = baseDelayMs;
  if (jitterRange > 0) {
    delayMs += Math.round((random() * 2 - 1) * jitterRange);
  }
  delayMs = Math.min(maxDelayMs, Math.max(minDelayMs, delayMs));

  return { delayMs, baseDelayMs, appliedJitterMs: delayMs - baseDelayMs };
}

/**
 * Runs one FlowRunner per configured flow. Under `fail-fast` the first
 * fatal flow error cancels every sibling and is rethrown once they have all
 * stopped. Under `restart` a failed flow is started again after a backoff,
 * and only exhausting `maxRestarts` consecutive failed attempts is fatal.
 * An attempt that recorded at least one sample resets the count and the
 * backoff.
 */
export class IngestionCoordinator {
  private readonly options: IngestionCoordinatorOptions;
  private readonly supervision: SupervisionConfig;
  private readonly metrics: SelfMetrics;
  private readonly logger: Logger;
  private readonly runners = new Map<string, FlowRunner>();

  constructor(options: IngestionCoordinatorOptions) {
    this.options = options;
    this.supervision = { ...DEFAULT_SUPERVISION, ...options.supervision };
    this.metrics = options.metrics ?? defaultMetrics;
    this.logger = options.logger ?? defaultLogger;
  }

  states(): Record<string, FlowState> {
    const result: Record<string, FlowState> = {};
    for (const [name, runner] of this.runners) {
      result[name] = runner.state;
    }
    return result;
  }

  async run(signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const failure: { failed: boolean; error: unknown } = { failed: false, error: null };
    const tasks = this.options.flows.map(async flow => {
      try {
        await this.superviseFlow(flow, controller.signal);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
          this.logger.error({ err: error, flow: flow.name }, 'Flow failed, stopping remaining flows');
          controller.abort(error);
        }
      }
    });

    try {
      await Promise.all(tasks);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (failure.failed) {
      throw failure.error;
    }
  }

  private async superviseFlow(flow: FlowConfig, signal: AbortSignal): Promise<void> {
    let failures = 0;

    for (;;) {
      const runner = this.createRunner(flow);
      try {
        await runner.run(signal);
        return;
      } catch (error) {
        if (signal.aborted || this.supervision.strategy === 'fail-fast') {
          throw error;
        }

        // an attempt that recorded data starts a new run of failures
        if (runner.recorded > 0) {
          failures = 0;
        }
        failures += 1;
        const maxRestarts = this.supervision.maxRestarts;
        if (maxRestarts !== null && failures > maxRestarts) {
          this.logger.error({ err: error, flow: flow.name, restarts: maxRestarts }, 'Flow exhausted its restarts');
          throw error;
        }

        const { delayMs } = computeRestartDelay(failures, this.supervision, this.options.random);
        this.logger.warn({ err: error, flow: flow.name, attempt: failures, delayMs }, 'Restarting flow');
        this.metrics.recordRestart(flow.name);

        try {
          await delay(delayMs, undefined, { signal });
        } catch {
          // cancelled while backing off
          return;
        }
      }
    }
  }

  private createRunner(flow: FlowConfig): FlowRunner {
    const runner = new FlowRunner({
      flow,
      source: this.options.source,
      registry: this.options.registry,
      metrics: this.metrics,
      policies: this.options.policies,
      logger: this.logger
    });
    runner.on('state', (state: FlowState) => {
      this.metrics.setFlowUp(flow.name, state === 'streaming');
      this.logger.debug({ flow: flow.name, state }, 'Flow state changed');
    });
    this.runners.set(flow.name, runner);
    return runner;
  }
}
