import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { parse as parseYaml } from 'yaml';
import { compileTemplate } from '../flows/template.js';

export type MetricKind = 'gauge' | 'counter';

export type MetricTemplateConfig = {
  type: MetricKind;
  name: string;
  help?: string;
  labels?: Record<string, string>;
};

export type FlowConfig = {
  name: string;
  query: string;
  templates: Record<string, MetricTemplateConfig>;
};

export type SignalFxConfig = {
  realm: string;
  token: string;
};

export type ExporterConfig = {
  sfx: SignalFxConfig;
  flows: FlowConfig[];
};

export type RecordingPolicy = 'reject' | 'fatal';

export type MatchMode = 'first' | 'all' | 'any';

export type SupervisionStrategy = 'fail-fast' | 'restart';

export type SupervisionConfig = {
  strategy: SupervisionStrategy;
  initialDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  maxRestarts: number | null;
};

export type PolicyConfig = {
  labelMismatch: RecordingPolicy;
  negativeCounter: RecordingPolicy;
  matchMode: MatchMode;
};

export type ServerConfig = {
  host: string;
  port: number;
  observabilityPort: number;
  probeTimeoutMs: number;
  shutdownGraceMs: number;
};

export type RuntimeSettings = {
  server: ServerConfig;
  configFile: string;
  policies: PolicyConfig;
  supervision: SupervisionConfig;
};

export class UnknownStreamError extends Error {
  readonly flow: string;
  readonly stream: string;

  constructor(flow: string, stream: string) {
    super(`flow ${flow} has no metric template for stream "${stream}"`);
    this.name = 'UnknownStreamError';
    this.flow = flow;
    this.stream = stream;
  }
}

type JsonSchema =
  | {
      type: 'object';
      properties?: Record<string, JsonSchema>;
      required?: string[];
      additionalProperties?: false | JsonSchema;
    }
  | { type: 'array'; items: JsonSchema }
  | { type: 'string'; enum?: string[] }
  | { type: 'number'; nullable?: true; minimum?: number; maximum?: number };

const metricTemplateSchema: JsonSchema = {
  type: 'object',
  required: ['type', 'name'],
  additionalProperties: false,
  properties: {
    type: { type: 'string', enum: ['gauge', 'counter'] },
    name: { type: 'string' },
    help: { type: 'string' },
    labels: {
      type: 'object',
      additionalProperties: { type: 'string' }
    }
  }
};

const exporterConfigSchema: JsonSchema = {
  type: 'object',
  required: ['sfx', 'flows'],
  additionalProperties: false,
  properties: {
    sfx: {
      type: 'object',
      required: ['realm', 'token'],
      additionalProperties: false,
      properties: {
        realm: { type: 'string' },
        token: { type: 'string' }
      }
    },
    flows: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'query', 'templates'],
        additionalProperties: false,
        properties: {
          name: { type: 'string' },
          query: { type: 'string' },
          templates: {
            type: 'object',
            additionalProperties: metricTemplateSchema
          }
        }
      }
    }
  }
};

const runtimeSettingsSchema: JsonSchema = {
  type: 'object',
  required: ['server', 'configFile', 'policies', 'supervision'],
  properties: {
    server: {
      type: 'object',
      required: ['host', 'port', 'observabilityPort', 'probeTimeoutMs', 'shutdownGraceMs'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 },
        observabilityPort: { type: 'number', minimum: 0, maximum: 65535 },
        probeTimeoutMs: { type: 'number', minimum: 1 },
        shutdownGraceMs: { type: 'number', minimum: 0 }
      }
    },
    configFile: { type: 'string' },
    policies: {
      type: 'object',
      required: ['labelMismatch', 'negativeCounter', 'matchMode'],
      additionalProperties: false,
      properties: {
        labelMismatch: { type: 'string', enum: ['reject', 'fatal'] },
        negativeCounter: { type: 'string', enum: ['reject', 'fatal'] },
        matchMode: { type: 'string', enum: ['first', 'all', 'any'] }
      }
    },
    supervision: {
      type: 'object',
      required: ['strategy', 'initialDelayMs', 'maxDelayMs', 'jitterFactor', 'maxRestarts'],
      additionalProperties: false,
      properties: {
        strategy: { type: 'string', enum: ['fail-fast', 'restart'] },
        initialDelayMs: { type: 'number', minimum: 0 },
        maxDelayMs: { type: 'number', minimum: 0 },
        jitterFactor: { type: 'number', minimum: 0, maximum: 1 },
        maxRestarts: { type: 'number', nullable: true, minimum: 0 }
      }
    }
  }
};

const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Collects every mismatch between `value` and `schema`, each prefixed with its path. */
function validateAgainstSchema(schema: JsonSchema, value: unknown, at: string): string[] {
  switch (schema.type) {
    case 'object':
      return isRecord(value) ? validateObject(schema, value, at) : [`${at} must be an object`];
    case 'array':
      if (!Array.isArray(value)) {
        return [`${at} must be an array`];
      }
      return value.flatMap((item, index) => validateAgainstSchema(schema.items, item, `${at}[${index}]`));
    case 'string':
      if (typeof value !== 'string') {
        return [`${at} must be a string`];
      }
      return schema.enum && !schema.enum.includes(value) ? [`${at} must be one of ${schema.enum.join(', ')}`] : [];
    case 'number':
      if (value === null && schema.nullable) {
        return [];
      }
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return [`${at} must be a number`];
      }
      if (schema.minimum !== undefined && value < schema.minimum) {
        return [`${at} must be >= ${schema.minimum}`];
      }
      if (schema.maximum !== undefined && value > schema.maximum) {
        return [`${at} must be <= ${schema.maximum}`];
      }
      return [];
  }
}

function validateObject(
  schema: Extract<JsonSchema, { type: 'object' }>,
  value: Record<string, unknown>,
  at: string
): string[] {
  const properties = schema.properties ?? {};
  const errors = (schema.required ?? []).filter(key => !(key in value)).map(key => `${at}.${key} is required`);

  for (const [key, child] of Object.entries(value)) {
    const childSchema = Object.hasOwn(properties, key) ? properties[key] : schema.additionalProperties;
    if (childSchema === false) {
      errors.push(`${at}.${key} is not allowed`);
    } else if (childSchema) {
      errors.push(...validateAgainstSchema(childSchema, child, `${at}.${key}`));
    }
  }

  return errors;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(value: unknown): asserts value is ExporterConfig {
  const errors = validateAgainstSchema(exporterConfigSchema, value, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // The schema check above guarantees the shape from here on.
  validateLogicalConfig(value as ExporterConfig);
}

export function parseConfig(contents: string): ExporterConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`, { cause: error });
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ExporterConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(exporterConfig: ExporterConfig) {
  const messages: string[] = [];

  if (exporterConfig.sfx.realm.trim().length === 0) {
    messages.push('config.sfx.realm must be a non-empty string');
  }

  const seenNames = new Map<string, number>();
  exporterConfig.flows.forEach((flow, index) => {
    const label = `config.flows[${index}]`;
    const name = flow.name.trim();

    if (!name) {
      messages.push(`${label}.name must be a non-empty string`);
    } else {
      const existing = seenNames.get(name);
      if (existing !== undefined) {
        messages.push(`${label} duplicates flow name "${name}" already used by config.flows[${existing}]`);
      } else {
        seenNames.set(name, index);
      }
    }

    if (flow.query.trim().length === 0) {
      messages.push(`${label}.query must be a non-empty string`);
    }

    const streams = Object.entries(flow.templates);
    if (streams.length === 0) {
      messages.push(`${label}.templates must define at least one stream`);
    }

    for (const [stream, template] of streams) {
      const templateLabel = `${label}.templates.${stream}`;
      messages.push(...checkTemplateSyntax(template.name, `${templateLabel}.name`));

      for (const [labelName, valueTemplate] of Object.entries(template.labels ?? {})) {
        if (!LABEL_NAME_PATTERN.test(labelName) || labelName.startsWith('__')) {
          messages.push(`${templateLabel}.labels.${labelName} is not a valid label name`);
        }
        messages.push(...checkTemplateSyntax(valueTemplate, `${templateLabel}.labels.${labelName}`));
      }
    }
  });

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function checkTemplateSyntax(source: string, pathLabel: string): string[] {
  try {
    compileTemplate(source);
    return [];
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return [`${pathLabel} ${message}`];
  }
}

export function getMetricTemplateForStream(flow: FlowConfig, stream: string): MetricTemplateConfig {
  const template = Object.hasOwn(flow.templates, stream) ? flow.templates[stream] : undefined;
  if (!template) {
    throw new UnknownStreamError(flow.name, stream);
  }
  return template;
}

export function getRuntimeSettings(source: config.IConfig = config): RuntimeSettings {
  const candidate: unknown = {
    server: source.get<unknown>('server'),
    configFile: source.get<unknown>('exporter.configFile'),
    policies: source.get<unknown>('exporter.policies'),
    supervision: source.get<unknown>('exporter.supervision')
  };

  const errors = validateAgainstSchema(runtimeSettingsSchema, candidate, 'settings');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }

  // Shape verified by runtimeSettingsSchema.
  return candidate as RuntimeSettings;
}
