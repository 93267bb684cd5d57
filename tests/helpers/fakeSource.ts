import type {
  ExecuteRequest,
  FlowSource,
  FlowSubscription,
  SampleBatch,
  SampleMetadata,
  SamplePayload
} from '../../src/flows/source.js';

type MetadataInput = {
  metric?: string;
  stream?: string;
  labels?: Record<string, string>;
};

export function sampleMetadata(input: MetadataInput = {}): SampleMetadata {
  const internalProperties: Record<string, unknown> = {};
  if (input.metric !== undefined) {
    internalProperties.sf_originatingMetric = input.metric;
  }
  if (input.stream !== undefined) {
    internalProperties.sf_streamLabel = input.stream;
  }
  return {
    originatingMetric: input.metric,
    customProperties: { ...input.labels },
    internalProperties
  };
}

export class FakeSubscription implements FlowSubscription {
  closed = false;
  private readonly metadataByTsId = new Map<string, SampleMetadata>();
  private readonly pending: SampleBatch[] = [];
  private wake: (() => void) | null = null;
  private done = false;
  private terminal: Error | null = null;

  describe(tsId: string, metadata: SampleMetadata): this {
    this.metadataByTsId.set(tsId, metadata);
    return this;
  }

  push(payloads: SamplePayload[], timestampMs = 1_000): this {
    this.pending.push({ timestampMs, payloads });
    this.notify();
    return this;
  }

  end(error: Error | null = null): this {
    if (!this.done) {
      this.done = true;
      this.terminal = error;
      this.notify();
    }
    return this;
  }

  metadata(tsId: string): SampleMetadata | undefined {
    return this.metadataByTsId.get(tsId);
  }

  error(): Error | null {
    return this.terminal;
  }

  close() {
    this.closed = true;
    this.end(null);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<SampleBatch, void, undefined> {
    for (;;) {
      const batch = this.pending.shift();
      if (batch) {
        yield batch;
        continue;
      }
      if (this.done) {
        return;
      }
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  private notify() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

type ExecuteHandler = (request: ExecuteRequest, signal?: AbortSignal) => FlowSubscription | Promise<FlowSubscription>;

export class FakeFlowSource implements FlowSource {
  readonly requests: ExecuteRequest[] = [];
  private readonly handlers = new Map<string, ExecuteHandler>();

  on(flow: string, handler: ExecuteHandler): this {
    this.handlers.set(flow, handler);
    return this;
  }

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<FlowSubscription> {
    this.requests.push(request);
    const handler = this.handlers.get(request.flow);
    if (!handler) {
      throw new Error(`no subscription scripted for ${request.flow}`);
    }
    return handler(request, signal);
  }

  executions(flow: string): number {
    return this.requests.filter(request => request.flow === flow).length;
  }
}
