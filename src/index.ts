import { createApp } from './app';
import { getConfig } from './config';
import { getAircraftRegistry } from './lib/registry';
import { createRefreshTelemetryHooks } from './services/refreshTelemetry';
import { RabRefreshService } from './services/rabRefreshService';
import { RefreshScheduler } from './services/refreshScheduler';
import { initializeTelemetry } from './telemetry/appInsights';

const config = getConfig();
const telemetryClient = initializeTelemetry(config);
const registry = getAircraftRegistry();

const refreshService = new RabRefreshService({
  config,
  registry,
  metrics: telemetryClient ? createRefreshTelemetryHooks(telemetryClient) : undefined,
});

const app = createApp({ registry, refreshService });

if (config.scheduler.enabled) {
  const scheduler = new RefreshScheduler({
    service: refreshService,
    intervalMinutes: config.scheduler.intervalMinutes,
    enabled: config.scheduler.enabled,
    immediate: true,
  });
  scheduler.start();
} else {
  // Without the scheduler the registry is loaded once, from the cache when present
  refreshService.refresh('manual').catch((error) => {
    // eslint-disable-next-line no-console
    console.error('[RAB Server] Initial registry load failed', error);
  });
}

app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`[RAB Server] Listening on port ${config.port}`);
});
