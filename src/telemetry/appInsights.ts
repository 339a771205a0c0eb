import appInsights, { type TelemetryClient } from 'applicationinsights';

import type { AppConfig } from '../config';

const DEFAULT_ROLE_NAME = 'rab-registry-cleaner';

let client: TelemetryClient | null = null;

// The refresh job runs without an HTTP server, so request collection is optional
const configureTelemetry = (connectionString: string, collectRequests: boolean) => {
  appInsights
    .setup(connectionString)
    .setAutoDependencyCorrelation(collectRequests)
    .setAutoCollectConsole(false, false)
    .setAutoCollectDependencies(true)
    .setAutoCollectExceptions(true)
    .setAutoCollectPerformance(collectRequests, collectRequests)
    .setAutoCollectRequests(collectRequests)
    .setSendLiveMetrics(false);
};

type InitializeTelemetryOptions = {
  collectRequests?: boolean;
};

export const initializeTelemetry = (
  config: AppConfig,
  options: InitializeTelemetryOptions = {},
): TelemetryClient | null => {
  if (client) {
    return client;
  }

  const settings = config.telemetry.appInsights;
  if (!settings?.connectionString) {
    return null;
  }

  try {
    configureTelemetry(settings.connectionString, options.collectRequests ?? true);

    const defaultClient = appInsights.defaultClient;
    if (!defaultClient) {
      return null;
    }

    if (settings.samplingPercentage !== null) {
      defaultClient.config.samplingPercentage = settings.samplingPercentage;
    }

    const cloudRoleTag = defaultClient.context.keys.cloudRole;
    defaultClient.context.tags[cloudRoleTag] = settings.roleName ?? DEFAULT_ROLE_NAME;

    appInsights.start();
    client = defaultClient;

    return client;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('[RAB Telemetry] Failed to initialize Application Insights', error);
    return null;
  }
};

export const getTelemetryClient = (): TelemetryClient | null => client;
