import { describe, expect, it } from 'vitest';
import { buildTemplateVariables, resolveIdentity, sanitizeMetricName } from '../src/flows/identity.js';
import { TemplateRenderError } from '../src/flows/template.js';
import { sampleMetadata } from './helpers/fakeSource.js';

describe('Metric identity', () => {
  it('sanitizes dots and colons in metric names', () => {
    expect(sanitizeMetricName('http.request:count')).toBe('http_request_count');
    expect(sanitizeMetricName('already_fine')).toBe('already_fine');
  });

  it('exposes the sanitized name and custom properties to templates', () => {
    const metadata = sampleMetadata({ metric: 'cpu.utilization', labels: { host: 'db-1' } });
    expect(buildTemplateVariables(metadata)).toEqual({
      SignalFxMetricName: 'cpu_utilization',
      SignalFxLabels: { host: 'db-1' }
    });
  });

  it('renders name and labels in declared order', () => {
    const metadata = sampleMetadata({
      metric: 'http.request:count',
      labels: { region: 'eu', host: 'web-2' }
    });

    const identity = resolveIdentity(metadata, {
      type: 'counter',
      name: 'sfx_{{ .SignalFxMetricName }}',
      labels: {
        host: '{{ .SignalFxLabels.host }}',
        region: '{{ .SignalFxLabels.region }}'
      }
    });

    expect(identity).toEqual({
      name: 'sfx_http_request_count',
      labelNames: ['host', 'region'],
      labelValues: ['web-2', 'eu']
    });
  });

  it('resolves a template without labels', () => {
    const identity = resolveIdentity(sampleMetadata(), { type: 'gauge', name: 'checkout_rate' });
    expect(identity).toEqual({ name: 'checkout_rate', labelNames: [], labelValues: [] });
  });

  it('throws when a label template references an absent property', () => {
    const metadata = sampleMetadata({ metric: 'cpu', labels: {} });
    expect(() =>
      resolveIdentity(metadata, {
        type: 'gauge',
        name: 'cpu',
        labels: { host: '{{ .SignalFxLabels.host }}' }
      })
    ).toThrowError(TemplateRenderError);
  });
});
