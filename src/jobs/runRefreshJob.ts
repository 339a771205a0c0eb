import type { TelemetryClient } from 'applicationinsights';

import { getConfig } from '../config';
import { createPrefixedLogger, type Logger } from '../lib/logger';
import { getAircraftRegistry } from '../lib/registry';
import { initializeTelemetry } from '../telemetry/appInsights';
import {
  RabRefreshService,
  type RefreshResult,
} from '../services/rabRefreshService';
import { createRefreshTelemetryHooks, flushTelemetryClient } from '../services/refreshTelemetry';

type RunRefreshJobOptions = {
  logger?: Logger;
  telemetryClient?: TelemetryClient | null;
  update?: boolean;
};

/** One-shot download and clean of the RAB, writing the cleaned CSV to the data directory. */
export const runRefreshJob = async (options: RunRefreshJobOptions = {}): Promise<RefreshResult> => {
  const logger = options.logger ?? createPrefixedLogger('[RAB Refresh Job]');
  const config = getConfig();
  const telemetryClient =
    options.telemetryClient !== undefined
      ? options.telemetryClient
      : initializeTelemetry(config, { collectRequests: false });

  const refreshService = new RabRefreshService({
    config,
    registry: getAircraftRegistry(),
    logger,
    metrics: telemetryClient ? createRefreshTelemetryHooks(telemetryClient) : undefined,
  });

  logger.info('Starting RAB dataset refresh');

  try {
    const result = await refreshService.refresh('manual', { update: options.update ?? true });

    logger.info('RAB refresh completed', {
      refreshId: result.refreshId,
      durationMs: result.durationMs,
      totals: result.stats,
      cleanPath: result.cleanPath,
    });

    return result;
  } catch (error) {
    logger.error('RAB refresh failed', error);
    throw error;
  } finally {
    await flushTelemetryClient(telemetryClient).catch((flushError) => {
      logger.warn('Failed to flush telemetry', flushError);
    });
  }
};

const runFromCli = async () => {
  try {
    await runRefreshJob({ update: !process.argv.includes('--use-cache') });
    process.exitCode = 0;
  } catch (error) {
    console.error('[RAB Refresh Job] Fatal error', error);
    process.exitCode = 1;
  }
};

if (require.main === module) {
  // eslint-disable-next-line @typescript-eslint/no-floating-promises
  runFromCli();
}
