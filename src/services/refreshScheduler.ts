import type { Logger } from '../lib/logger';
import type { RabRefreshService } from './rabRefreshService';
import { RefreshInProgressError } from './rabRefreshService';

type RefreshSchedulerOptions = {
  service: Pick<RabRefreshService, 'refresh'>;
  intervalMinutes: number;
  enabled: boolean;
  logger?: Logger;
  immediate?: boolean;
};

const MIN_INTERVAL_MINUTES = 1;

const toMilliseconds = (minutes: number) => minutes * 60 * 1000;

/**
 * Periodically re-downloads and re-cleans the RAB. The startup run, when
 * `immediate` is set, reuses a cached raw file; interval runs always download.
 */
export class RefreshScheduler {
  private readonly service: Pick<RabRefreshService, 'refresh'>;
  private readonly intervalMinutes: number;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly immediate: boolean;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RefreshSchedulerOptions) {
    this.service = options.service;
    this.intervalMinutes = Math.max(options.intervalMinutes, MIN_INTERVAL_MINUTES);
    this.enabled = options.enabled;
    this.logger = options.logger ?? console;
    this.immediate = options.immediate ?? false;
  }

  start() {
    if (!this.enabled) {
      this.logger.info('[RAB Scheduler] Scheduler disabled via configuration');
      return;
    }

    if (this.timer) {
      return;
    }

    this.logger.info(
      `[RAB Scheduler] Starting dataset refresh scheduler (interval=${this.intervalMinutes} minutes)`,
    );

    if (this.immediate) {
      void this.runTick(false);
    }

    this.timer = setInterval(() => {
      void this.runTick(true);
    }, toMilliseconds(this.intervalMinutes));
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('[RAB Scheduler] Stopped dataset refresh scheduler');
    }
  }

  isActive(): boolean {
    return this.timer !== null;
  }

  private async runTick(update: boolean) {
    try {
      await this.service.refresh('scheduled', { update });
      this.logger.info('[RAB Scheduler] Completed scheduled RAB refresh');
    } catch (error) {
      if (error instanceof RefreshInProgressError) {
        this.logger.warn('[RAB Scheduler] Refresh already in progress, skipping scheduled run');
        return;
      }

      this.logger.error('[RAB Scheduler] Scheduled refresh failed', error);
    }
  }
}
