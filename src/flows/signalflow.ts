import signalfx, {
  type SignalFlowClient,
  type SignalFlowHandle,
  type SignalFlowMessage,
  type SignalFlowOptions
} from 'signalfx';
import logger from '../logger.js';
import {
  ProgramRejectedError,
  type ExecuteRequest,
  type FlowSource,
  type FlowSubscription,
  type SampleBatch,
  type SampleMetadata,
  type SamplePayload
} from './source.js';

export type SignalFlowSourceOptions = {
  realm: string;
  token: string;
  createClient?: (token: string, options: SignalFlowOptions) => SignalFlowClient;
};

const INTERNAL_PROPERTY_PREFIX = 'sf_';

export function streamEndpointForRealm(realm: string): string {
  return `wss://stream.${realm}.signalfx.com`;
}

export function apiEndpointForRealm(realm: string): string {
  return `https://api.${realm}.signalfx.com`;
}

export class SignalFlowSource implements FlowSource {
  private readonly options: SignalFlowSourceOptions;

  constructor(options: SignalFlowSourceOptions) {
    this.options = options;
  }

  async execute(request: ExecuteRequest, signal?: AbortSignal): Promise<FlowSubscription> {
    const { realm, token } = this.options;
    const createClient =
      this.options.createClient ??
      ((accessToken: string, clientOptions: SignalFlowOptions) =>
        new signalfx.SignalFlow(accessToken, clientOptions));

    let client: SignalFlowClient;
    try {
      client = createClient(token, {
        signalflowEndpoint: streamEndpointForRealm(realm),
        apiEndpoint: apiEndpointForRealm(realm),
        webSocketErrorCallback: error => {
          logger.warn({ err: error, flow: request.flow, realm }, 'SignalFlow websocket error');
        }
      });
    } catch (error) {
      throw new Error(`Error connecting to SignalFx realm ${realm}`, { cause: error });
    }

    const handle = client.execute({ program: request.program });
    const subscription = new SignalFlowSubscription(client, handle);
    await subscription.started(signal);
    return subscription;
  }
}

class SignalFlowSubscription implements FlowSubscription {
  private readonly metadataByTsId = new Map<string, SampleMetadata>();
  private readonly pending: SampleBatch[] = [];
  private wake: (() => void) | null = null;
  private done = false;
  private terminalError: Error | null = null;
  private isStarted = false;
  private readonly ready: Promise<void>;
  private resolveReady: () => void = () => {};
  private rejectReady: (error: Error) => void = () => {};

  constructor(
    private readonly client: SignalFlowClient,
    private readonly handle: SignalFlowHandle
  ) {
    this.ready = new Promise<void>((resolve, reject) => {
      this.resolveReady = resolve;
      this.rejectReady = reject;
    });
    this.handle.stream((error, message) => {
      this.handleMessage(error, message);
    });
  }

  async started(signal?: AbortSignal): Promise<void> {
    if (!signal) {
      return this.ready;
    }
    const onAbort = () => {
      this.close();
      this.rejectReady(new Error('execution cancelled before the computation started'));
    };
    if (signal.aborted) {
      onAbort();
      return this.ready;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    try {
      await this.ready;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  metadata(tsId: string): SampleMetadata | undefined {
    return this.metadataByTsId.get(tsId);
  }

  error(): Error | null {
    return this.terminalError;
  }

  close() {
    if (this.done) {
      return;
    }
    this.finish(null);
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

  private handleMessage(error: unknown, message: SignalFlowMessage | undefined) {
    if (this.done) {
      return;
    }
    if (error) {
      this.fail(toError(error, 'SignalFlow stream failed'));
      return;
    }
    if (!message) {
      return;
    }

    switch (message.type) {
      case 'metadata': {
        const tsId = message.tsId;
        if (typeof tsId === 'string') {
          this.metadataByTsId.set(tsId, toSampleMetadata(message.properties));
        }
        this.markStarted();
        return;
      }
      case 'data': {
        this.pending.push(toSampleBatch(message));
        this.markStarted();
        this.notify();
        return;
      }
      case 'control-message': {
        if (message.event === 'END_OF_CHANNEL') {
          this.markStarted();
          this.finish(null);
        } else if (message.event === 'CHANNEL_ABORT') {
          this.fail(new Error(`computation aborted: ${describeAbort(message.abortInfo)}`));
        } else {
          this.markStarted();
        }
        return;
      }
      case 'error': {
        this.fail(new Error(describeErrorMessage(message)));
        return;
      }
      default:
        this.markStarted();
    }
  }

  private markStarted() {
    if (!this.isStarted) {
      this.isStarted = true;
      this.resolveReady();
    }
  }

  private fail(error: Error) {
    if (!this.isStarted) {
      this.rejectReady(new ProgramRejectedError(error.message, { cause: error }));
      this.finish(null);
      return;
    }
    this.finish(error);
  }

  private finish(error: Error | null) {
    this.done = true;
    this.terminalError = error;
    this.notify();
    try {
      this.handle.close();
      this.client.disconnect();
    } catch (closeError) {
      logger.debug({ err: closeError }, 'Failed to close SignalFlow computation');
    }
  }

  private notify() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toError(value: unknown, fallback: string): Error {
  if (value instanceof Error) {
    return value;
  }
  if (isRecord(value) && typeof value.message === 'string') {
    return new Error(value.message);
  }
  return new Error(typeof value === 'string' ? value : fallback);
}

export function toSampleMetadata(properties: unknown): SampleMetadata {
  const customProperties: Record<string, string> = {};
  const internalProperties: Record<string, unknown> = {};
  if (!isRecord(properties)) {
    return { customProperties, internalProperties };
  }

  for (const [key, value] of Object.entries(properties)) {
    if (key.startsWith(INTERNAL_PROPERTY_PREFIX)) {
      internalProperties[key] = value;
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      customProperties[key] = String(value);
    }
  }

  const originatingMetric = internalProperties.sf_originatingMetric;
  const metric = internalProperties.sf_metric;
  return {
    originatingMetric: typeof originatingMetric === 'string' ? originatingMetric : undefined,
    metric: typeof metric === 'string' ? metric : undefined,
    customProperties,
    internalProperties
  };
}

export function toSampleBatch(message: SignalFlowMessage): SampleBatch {
  const payloads: SamplePayload[] = [];
  const entries = Array.isArray(message.data) ? message.data : [];
  for (const entry of entries) {
    // entries without a usable value (null for a gap) are not samples
    if (!isRecord(entry) || typeof entry.tsId !== 'string' || !Number.isFinite(entry.value)) {
      continue;
    }
    payloads.push({ tsId: entry.tsId, value: Number(entry.value) });
  }

  const timestamp = message.logicalTimestampMs;
  return {
    timestampMs: typeof timestamp === 'number' ? timestamp : Date.now(),
    payloads
  };
}

function describeAbort(abortInfo: unknown): string {
  if (isRecord(abortInfo)) {
    const reason = abortInfo.sf_job_abortReason ?? abortInfo.sf_job_abortState;
    if (typeof reason === 'string') {
      return reason;
    }
  }
  return 'unknown reason';
}

function describeErrorMessage(message: SignalFlowMessage): string {
  if (typeof message.message === 'string') {
    return message.message;
  }
  if (Array.isArray(message.errors) && message.errors.length > 0) {
    return JSON.stringify(message.errors);
  }
  return 'SignalFlow computation reported an error';
}
