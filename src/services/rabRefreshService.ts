import path from 'path';

import { runPipeline, summarizeCleanTable, type CleanTable } from '../cleaning/pipeline';
import type { CleaningStats, PipelineOptions, RawTable } from '../cleaning/types';
import type { AppConfig } from '../config';
import { RabDatasetCache, writeCleanCsv } from '../ingest/rabDataset';
import type { RawDatasetSource } from '../ingest/types';
import type { Logger } from '../lib/logger';
import type { AircraftRegistry } from '../lib/registry';

export type RefreshTrigger = 'manual' | 'scheduled';

export type RefreshOptions = {
  update?: boolean;
};

export type RefreshResult = {
  refreshId: number;
  stats: CleaningStats;
  durationMs: number;
  trigger: RefreshTrigger;
  dataVersion: string | null;
  downloaded: boolean;
  startedAt: Date;
  cleanPath: string;
};

export type RefreshStatus = {
  id: number;
  status: 'RUNNING' | 'COMPLETED' | 'FAILED';
  trigger: RefreshTrigger;
  startedAt: Date;
  completedAt: Date | null;
  failedAt: Date | null;
  dataVersion: string | null;
  totals: CleaningStats | null;
  errorMessage: string | null;
};

type RunPipelineFn = (rawTable: RawTable, options?: PipelineOptions) => CleanTable;

type WriteCleanFn = (filePath: string, table: CleanTable) => Promise<void>;

type MetricsHooks = {
  onSuccess?: (options: { durationMs: number; stats: CleaningStats; trigger: RefreshTrigger }) => void;
  onFailure?: (options: { durationMs: number; error: unknown; trigger: RefreshTrigger }) => void;
};

type RabRefreshServiceOptions = {
  config: AppConfig;
  registry: AircraftRegistry;
  logger?: Logger;
  source?: RawDatasetSource;
  runPipeline?: RunPipelineFn;
  writeClean?: WriteCleanFn;
  metrics?: MetricsHooks;
};

export class RefreshInProgressError extends Error {
  constructor() {
    super('RAB dataset refresh is already in progress');
    this.name = 'RefreshInProgressError';
  }
}

const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};

export class RabRefreshService {
  private readonly registry: AircraftRegistry;
  private readonly logger: Logger;
  private readonly source: RawDatasetSource;
  private readonly runPipeline: RunPipelineFn;
  private readonly writeClean: WriteCleanFn;
  private readonly cleanPath: string;
  private readonly metrics?: MetricsHooks;

  private currentRefresh: Promise<RefreshResult> | null = null;
  private latestStatus: RefreshStatus | null = null;
  private refreshSequence = 1;

  constructor(options: RabRefreshServiceOptions) {
    const { dataset } = options.config;

    this.registry = options.registry;
    this.logger = options.logger ?? console;
    this.source =
      options.source ??
      new RabDatasetCache({
        url: dataset.url,
        dataDir: dataset.dataDir,
        format: dataset.format,
        logger: this.logger,
      });
    this.runPipeline = options.runPipeline ?? runPipeline;
    this.writeClean = options.writeClean ?? writeCleanCsv;
    this.cleanPath = path.join(dataset.dataDir, 'clean.csv');
    this.metrics = options.metrics;
  }

  isRunning(): boolean {
    return this.currentRefresh !== null;
  }

  async refresh(trigger: RefreshTrigger = 'manual', options: RefreshOptions = {}): Promise<RefreshResult> {
    if (this.currentRefresh) {
      throw new RefreshInProgressError();
    }

    const refreshPromise = this.executeRefresh(trigger, options);
    this.currentRefresh = refreshPromise;

    const release = () => {
      if (this.currentRefresh === refreshPromise) {
        this.currentRefresh = null;
      }
    };
    refreshPromise.then(release, release);

    return refreshPromise;
  }

  getLatestStatus(): RefreshStatus | null {
    return this.latestStatus;
  }

  private async executeRefresh(
    trigger: RefreshTrigger,
    options: RefreshOptions,
  ): Promise<RefreshResult> {
    const startedAt = new Date();
    const refreshId = this.refreshSequence++;
    const status: RefreshStatus = {
      id: refreshId,
      status: 'RUNNING',
      trigger,
      startedAt,
      completedAt: null,
      failedAt: null,
      dataVersion: null,
      totals: null,
      errorMessage: null,
    };
    this.latestStatus = status;

    this.logger.info(
      `[RAB Refresh] Starting ${trigger} refresh (refreshId=${refreshId}, update=${options.update ?? false})`,
    );

    try {
      const fetched = await this.source.fetchRaw({ update: options.update });
      status.dataVersion = fetched.dataVersion;

      const rawTable = await this.source.readRaw(fetched.filePath);
      this.logger.info(
        `[RAB Refresh] Cleaning ${rawTable.rows.length} raw rows from ${fetched.filePath}`,
      );

      const table = this.runPipeline(rawTable, {
        onStage: ({ stage, durationMs, rows }) =>
          this.logger.info(
            `[RAB Refresh] Stage ${stage} finished in ${durationMs.toFixed(1)}ms (rows=${rows})`,
          ),
      });
      const stats = summarizeCleanTable(table.rows, rawTable.rows.length);

      this.registry.replace({
        table,
        stats,
        loadedAt: new Date(),
        dataVersion: fetched.dataVersion,
      });
      await this.writeClean(this.cleanPath, table);

      const durationMs = Date.now() - startedAt.getTime();
      status.status = 'COMPLETED';
      status.completedAt = new Date();
      status.totals = stats;

      this.logger.info(
        `[RAB Refresh] Completed ${trigger} refresh (refreshId=${refreshId}) in ${durationMs}ms`,
        { stats, dataVersion: fetched.dataVersion },
      );
      this.metrics?.onSuccess?.({ durationMs, stats, trigger });

      return {
        refreshId,
        stats,
        durationMs,
        trigger,
        dataVersion: fetched.dataVersion,
        downloaded: fetched.downloaded,
        startedAt,
        cleanPath: this.cleanPath,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt.getTime();
      status.status = 'FAILED';
      status.failedAt = new Date();
      status.errorMessage = toErrorMessage(error);

      this.logger.error(`[RAB Refresh] ${trigger} refresh failed (refreshId=${refreshId})`, error);
      this.metrics?.onFailure?.({ durationMs, error, trigger });
      throw error;
    }
  }
}
