import { EventEmitter } from 'node:events';
import {
  getMetricTemplateForStream,
  type FlowConfig,
  type RecordingPolicy
} from '../config/index.js';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type SelfMetrics } from '../metrics/index.js';
import {
  InstrumentConflictError,
  InvalidCounterIncrementError,
  type InstrumentRegistry
} from '../metrics/registry.js';
import { resolveIdentity } from './identity.js';
import {
  EMPTY_METADATA,
  ProgramRejectedError,
  resolveStreamLabel,
  type FlowSource,
  type FlowSubscription,
  type SampleBatch,
  type SamplePayload
} from './source.js';

export type FlowState = 'idle' | 'connecting' | 'streaming' | 'draining' | 'failed' | 'stopped';

export type FlowPhase = 'connect' | 'query' | 'stream' | 'record';

export type RecordingPolicies = {
  labelMismatch: RecordingPolicy;
  negativeCounter: RecordingPolicy;
};

export const DEFAULT_RECORDING_POLICIES: RecordingPolicies = {
  labelMismatch: 'reject',
  negativeCounter: 'reject'
};

export class FlowError extends Error {
  readonly flow: string;
  readonly phase: FlowPhase;

  constructor(flow: string, phase: FlowPhase, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FlowError';
    this.flow = flow;
    this.phase = phase;
  }
}

export class FlowConnectError extends FlowError {
  constructor(flow: string, cause: unknown) {
    super(flow, 'connect', `Flow ${flow} could not connect: ${describe(cause)}`, { cause });
    this.name = 'FlowConnectError';
  }
}

export class FlowQueryError extends FlowError {
  constructor(flow: string, cause: unknown) {
    super(flow, 'query', `SignalFlow program for ${flow} is invalid - ${describe(cause)}`, { cause });
    this.name = 'FlowQueryError';
  }
}

export class FlowTerminatedError extends FlowError {
  constructor(flow: string, cause: unknown) {
    super(flow, 'stream', `Flow ${flow} terminated: ${describe(cause)}`, { cause });
    this.name = 'FlowTerminatedError';
  }
}

export class FlowRecordingError extends FlowError {
  constructor(flow: string, cause: unknown) {
    super(flow, 'record', `Flow ${flow} stopped on a fatal recording error: ${describe(cause)}`, {
      cause
    });
    this.name = 'FlowRecordingError';
  }
}

export type FlowRunnerOptions = {
  flow: FlowConfig;
  source: FlowSource;
  registry: InstrumentRegistry;
  metrics?: SelfMetrics;
  policies?: Partial<RecordingPolicies>;
  logger?: Logger;
};

/**
 * Drives one flow: opens its computation, then turns every streamed sample
 * into a recorded value. Per-sample problems are counted and skipped; only
 * connection problems, a failed computation and failures configured as
 * fatal end the run with a FlowError.
 */
export class FlowRunner extends EventEmitter {
  readonly flow: FlowConfig;
  private readonly source: FlowSource;
  private readonly registry: InstrumentRegistry;
  private readonly metrics: SelfMetrics;
  private readonly policies: RecordingPolicies;
  private readonly logger: Logger;
  private currentState: FlowState = 'idle';
  private recordedSamples = 0;

  constructor(options: FlowRunnerOptions) {
    super();
    this.flow = options.flow;
    this.source = options.source;
    this.registry = options.registry;
    this.metrics = options.metrics ?? defaultMetrics;
    this.policies = { ...DEFAULT_RECORDING_POLICIES, ...options.policies };
    this.logger = (options.logger ?? defaultLogger).child({ flow: options.flow.name });
  }

  get state(): FlowState {
    return this.currentState;
  }

  /** Samples written to the registry during this run. */
  get recorded(): number {
    return this.recordedSamples;
  }

  async run(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      this.transition('stopped');
      return;
    }

    this.transition('connecting');
    let subscription: FlowSubscription;
    try {
      subscription = await this.source.execute(
        { flow: this.flow.name, program: this.flow.query },
        signal
      );
    } catch (error) {
      if (signal?.aborted) {
        this.transition('stopped');
        return;
      }
      this.transition('failed');
      throw error instanceof ProgramRejectedError
        ? new FlowQueryError(this.flow.name, error)
        : new FlowConnectError(this.flow.name, error);
    }

    if (signal?.aborted) {
      subscription.close();
      this.transition('stopped');
      return;
    }

    const onAbort = () => subscription.close();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.transition('streaming');
    try {
      for await (const batch of subscription) {
        this.processBatch(subscription, batch);
      }
    } catch (error) {
      subscription.close();
      this.transition('failed');
      throw error instanceof FlowError ? error : new FlowTerminatedError(this.flow.name, error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      this.transition('stopped');
      return;
    }

    this.transition('draining');
    const terminal = subscription.error();
    if (terminal) {
      this.transition('failed');
      throw new FlowTerminatedError(this.flow.name, terminal);
    }
    this.transition('stopped');
  }

  private processBatch(subscription: FlowSubscription, batch: SampleBatch) {
    if (batch.payloads.length === 0) {
      return;
    }
    for (const payload of batch.payloads) {
      this.processSample(subscription, payload);
    }
  }

  private processSample(subscription: FlowSubscription, payload: SamplePayload) {
    const metadata = subscription.metadata(payload.tsId) ?? EMPTY_METADATA;
    const stream = resolveStreamLabel(metadata);
    this.metrics.recordReceived(this.flow.name, stream);

    try {
      const template = getMetricTemplateForStream(this.flow, stream);
      const identity = resolveIdentity(metadata, template);
      const handle = this.registry.getOrCreate(
        identity.name,
        template.type,
        identity.labelNames,
        template.help
      );
      this.registry.record(handle, identity.labelValues, payload.value, identity.labelNames);
      this.recordedSamples += 1;
    } catch (error) {
      this.metrics.recordFailed(this.flow.name, stream);
      if (this.isFatal(error)) {
        throw new FlowRecordingError(this.flow.name, error);
      }
      this.logger.debug({ err: error, stream, tsId: payload.tsId }, 'Dropped sample');
    }
  }

  private isFatal(error: unknown): boolean {
    if (error instanceof InstrumentConflictError) {
      return this.policies.labelMismatch === 'fatal';
    }
    if (error instanceof InvalidCounterIncrementError) {
      return this.policies.negativeCounter === 'fatal';
    }
    return false;
  }

  private transition(next: FlowState) {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    this.emit('state', next, previous);
  }
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
