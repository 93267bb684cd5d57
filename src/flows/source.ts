export type SamplePayload = {
  tsId: string;
  value: number;
};

export type SampleBatch = {
  timestampMs: number;
  payloads: SamplePayload[];
};

export type SampleMetadata = {
  originatingMetric?: string;
  metric?: string;
  customProperties: Readonly<Record<string, string>>;
  internalProperties: Readonly<Record<string, unknown>>;
};

export type ExecuteRequest = {
  flow: string;
  program: string;
};

/**
 * One open streaming computation. Iterating yields batches in time order
 * until the computation ends; `error()` then reports why it ended, or null
 * when it ended cleanly.
 */
export interface FlowSubscription extends AsyncIterable<SampleBatch> {
  metadata(tsId: string): SampleMetadata | undefined;
  error(): Error | null;
  close(): void;
}

export interface FlowSource {
  execute(request: ExecuteRequest, signal?: AbortSignal): Promise<FlowSubscription>;
}

/**
 * The source accepted the connection but refused to run the program,
 * e.g. because it does not parse.
 */
export class ProgramRejectedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProgramRejectedError';
  }
}

export const STREAM_LABEL_PROPERTY = 'sf_streamLabel';
export const DEFAULT_STREAM = 'default';

export const EMPTY_METADATA: SampleMetadata = Object.freeze({
  customProperties: Object.freeze({}),
  internalProperties: Object.freeze({})
});

export function resolveStreamLabel(metadata: SampleMetadata): string {
  const label = metadata.internalProperties[STREAM_LABEL_PROPERTY];
  return typeof label === 'string' ? label : DEFAULT_STREAM;
}
