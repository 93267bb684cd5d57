import type { MetricTemplateConfig } from '../config/index.js';
import type { SampleMetadata } from './source.js';
import { compileTemplate, type TemplateVariables } from './template.js';

export type ResolvedIdentity = {
  name: string;
  labelNames: string[];
  labelValues: string[];
};

const DISALLOWED_METRIC_CHARACTERS = /[.:]/g;

export function sanitizeMetricName(name: string): string {
  return name.replace(DISALLOWED_METRIC_CHARACTERS, '_');
}

export function buildTemplateVariables(metadata: SampleMetadata): TemplateVariables {
  return {
    SignalFxMetricName: sanitizeMetricName(metadata.originatingMetric ?? ''),
    SignalFxLabels: metadata.customProperties
  };
}

/**
 * Turns one sample's metadata into the metric name and label pairs it is
 * recorded under. Labels keep the order they are declared in the template.
 * Throws TemplateRenderError; nothing should be recorded in that case.
 */
export function resolveIdentity(
  metadata: SampleMetadata,
  template: MetricTemplateConfig
): ResolvedIdentity {
  const variables = buildTemplateVariables(metadata);
  const name = compileTemplate(template.name).render(variables);

  const labels = Object.entries(template.labels ?? {});
  const labelNames: string[] = [];
  const labelValues: string[] = [];
  for (const [labelName, valueTemplate] of labels) {
    labelNames.push(labelName);
    labelValues.push(compileTemplate(valueTemplate).render(variables));
  }

  return { name, labelNames, labelValues };
}
