import process from 'node:process';
import {
  getRuntimeSettings,
  loadConfigFromFile,
  type ExporterConfig,
  type RuntimeSettings,
  type SignalFxConfig
} from './config/index.js';
import { IngestionCoordinator } from './flows/coordinator.js';
import { SignalFlowSource } from './flows/signalflow.js';
import type { FlowSource } from './flows/source.js';
import logger from './logger.js';
import { FilteringGatherer } from './metrics/gatherer.js';
import defaultMetrics, { type SelfMetrics } from './metrics/index.js';
import { InstrumentRegistry } from './metrics/registry.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { createSelfMetricsRouter } from './server/routes/metrics.js';
import { createProbeRouter } from './server/routes/probe.js';

export type ExporterOptions = {
  config?: ExporterConfig;
  configFile?: string;
  settings?: RuntimeSettings;
  host?: string;
  port?: number;
  observabilityPort?: number;
  metrics?: SelfMetrics;
  createSource?: (sfx: SignalFxConfig) => FlowSource;
  random?: () => number;
};

export type ExporterRuntime = {
  probe: HttpServerRuntime;
  observability: HttpServerRuntime;
  registry: InstrumentRegistry;
  metrics: SelfMetrics;
  coordinator: IngestionCoordinator;
  finished: Promise<void>;
  stop: (reason?: string) => Promise<void>;
};

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function createSignalFlowSource(sfx: SignalFxConfig): FlowSource {
  return new SignalFlowSource({ realm: sfx.realm, token: sfx.token });
}

export async function startExporter(options: ExporterOptions = {}): Promise<ExporterRuntime> {
  const settings = options.settings ?? getRuntimeSettings();
  const configFile = options.configFile ?? settings.configFile;
  const exporterConfig = options.config ?? loadConfigFromFile(configFile);
  const metrics = options.metrics ?? defaultMetrics;
  const host = options.host ?? settings.server.host;

  const registry = new InstrumentRegistry();
  const gatherer = new FilteringGatherer(registry, { matchMode: settings.policies.matchMode });
  const source = (options.createSource ?? createSignalFlowSource)(exporterConfig.sfx);
  const coordinator = new IngestionCoordinator({
    flows: exporterConfig.flows,
    source,
    registry,
    metrics,
    policies: settings.policies,
    supervision: settings.supervision,
    random: options.random
  });

  const observability = await startHttpServer({
    name: 'observability',
    host,
    port: options.observabilityPort ?? settings.server.observabilityPort,
    routers: [createSelfMetricsRouter(metrics)]
  });

  let probe: HttpServerRuntime;
  try {
    probe = await startHttpServer({
      name: 'probe',
      host,
      port: options.port ?? settings.server.port,
      routers: [createProbeRouter({ gatherer, timeoutMs: settings.server.probeTimeoutMs })]
    });
  } catch (error) {
    await observability.close();
    throw error;
  }

  logger.info(
    { flows: exporterConfig.flows.map(flow => flow.name), realm: exporterConfig.sfx.realm },
    'Starting flows'
  );

  const controller = new AbortController();
  const finished = coordinator.run(controller.signal);
  const settled = finished.then(
    () => null,
    (error: unknown) => error
  );

  let stopping: Promise<void> | null = null;
  const stop = (reason = 'shutdown') => {
    stopping ??= (async () => {
      logger.info({ reason }, 'Stopping exporter');
      controller.abort(new Error(`exporter stopped: ${reason}`));
      await settled;

      try {
        await probe.close(settings.server.shutdownGraceMs);
      } finally {
        await observability.close(settings.server.shutdownGraceMs);
      }
      logger.info({ reason }, 'Exporter stopped');
    })();
    return stopping;
  };

  return { probe, observability, registry, metrics, coordinator, finished, stop };
}

/**
 * Runs the exporter until SIGINT/SIGTERM or a fatal flow failure. A flow
 * failure stops the servers and rejects with that failure.
 */
export async function serve(options: ExporterOptions = {}): Promise<void> {
  const runtime = await startExporter(options);

  let onSignal: (signal: NodeJS.Signals) => void = () => {};
  const outcome = new Promise<void>((resolve, reject) => {
    onSignal = signal => {
      logger.info({ signal }, 'Shutdown signal received');
      runtime.stop(signal).then(resolve, reject);
    };

    runtime.finished.catch((error: unknown) => {
      runtime.stop('flow-failure').then(
        () => reject(error),
        (stopError: unknown) => {
          logger.error({ err: stopError }, 'Exporter did not stop cleanly after a flow failure');
          reject(error);
        }
      );
    });
  });

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    await outcome;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}
