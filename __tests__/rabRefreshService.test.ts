import path from 'path';

import { SchemaMismatchError } from '../src/cleaning/errors';
import type { AppConfig } from '../src/config';
import type { RawDatasetSource } from '../src/ingest/types';
import { AircraftRegistry } from '../src/lib/registry';
import { RabRefreshService, RefreshInProgressError } from '../src/services/rabRefreshService';
import { buildRawTable, VALID_CNPJ } from './helpers/rab';

const config: AppConfig = {
  nodeEnv: 'test',
  port: 3000,
  dataset: {
    url: 'https://example.com/rab.csv',
    format: 'csv',
    dataDir: '/tmp/rab-test',
  },
  scheduler: {
    enabled: false,
    intervalMinutes: 60,
  },
  telemetry: {
    appInsights: null,
  },
};

const rawTable = buildRawTable([
  {
    tail_number: 'PRABC',
    owner_tax_id: VALID_CNPJ,
    operator_tax_id: VALID_CNPJ,
    mfg: 'AIR TRACTOR',
    model: 'AT-502B',
  },
  { tail_number: 'PRABC', mfg: 'CESSNA' },
  { tail_number: 'PTXYZ', owner_tax_id: '123', mfg: 'CESSNA', model: '172N' },
]);

describe('RabRefreshService', () => {
  let registry: AircraftRegistry;
  let source: {
    format: RawDatasetSource['format'];
    fetchRaw: jest.Mock;
    readRaw: jest.Mock;
  };
  let writeClean: jest.Mock;
  let metrics: {
    onSuccess: jest.Mock;
    onFailure: jest.Mock;
  };

  beforeEach(() => {
    registry = new AircraftRegistry();
    source = {
      format: 'csv',
      fetchRaw: jest.fn().mockResolvedValue({
        filePath: '/tmp/rab-test/raw.csv',
        downloaded: true,
        dataVersion: 'v1',
      }),
      readRaw: jest.fn().mockResolvedValue(rawTable),
    };
    writeClean = jest.fn().mockResolvedValue(undefined);
    metrics = {
      onSuccess: jest.fn(),
      onFailure: jest.fn(),
    };
  });

  const createService = () =>
    new RabRefreshService({
      config,
      registry,
      logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
      },
      source,
      writeClean,
      metrics,
    });

  const expectedStats = {
    rawRows: 3,
    aircraft: 2,
    duplicatesDropped: 1,
    agricultural: 1,
    ownedOperated: 1,
    invalidOwnerTaxIds: 1,
    invalidOperatorTaxIds: 0,
  };

  it('fetches, cleans and publishes the dataset', async () => {
    const service = createService();

    const result = await service.refresh('manual', { update: true });

    expect(source.fetchRaw).toHaveBeenCalledWith({ update: true });
    expect(source.readRaw).toHaveBeenCalledWith('/tmp/rab-test/raw.csv');

    const snapshot = registry.getSnapshot();
    expect(snapshot?.stats).toEqual(expectedStats);
    expect(snapshot?.dataVersion).toBe('v1');
    expect(registry.findByTailNumber('PR-ABC')?.mfg).toBe('AIR TRACTOR');

    const cleanPath = path.join('/tmp/rab-test', 'clean.csv');
    expect(writeClean).toHaveBeenCalledWith(cleanPath, snapshot?.table);

    expect(metrics.onSuccess).toHaveBeenCalledWith(
      expect.objectContaining({ trigger: 'manual', stats: expectedStats }),
    );
    expect(metrics.onFailure).not.toHaveBeenCalled();

    expect(result).toMatchObject({
      refreshId: 1,
      stats: expectedStats,
      trigger: 'manual',
      dataVersion: 'v1',
      downloaded: true,
      cleanPath,
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);

    expect(service.getLatestStatus()).toMatchObject({
      id: 1,
      status: 'COMPLETED',
      trigger: 'manual',
      dataVersion: 'v1',
      totals: expectedStats,
      failedAt: null,
      errorMessage: null,
    });
  });

  it('records the failure and keeps the previous snapshot', async () => {
    source.readRaw.mockRejectedValueOnce(new Error('boom'));
    const service = createService();

    await expect(service.refresh('scheduled')).rejects.toThrow('boom');

    expect(registry.getSnapshot()).toBeNull();
    expect(writeClean).not.toHaveBeenCalled();
    expect(metrics.onFailure).toHaveBeenCalledWith(
      expect.objectContaining({
        trigger: 'scheduled',
        error: expect.any(Error),
      }),
    );
    expect(metrics.onSuccess).not.toHaveBeenCalled();
    expect(service.getLatestStatus()).toMatchObject({
      status: 'FAILED',
      trigger: 'scheduled',
      completedAt: null,
      errorMessage: 'boom',
    });
  });

  it('fails on an unrecognised header row', async () => {
    source.readRaw.mockResolvedValueOnce({ columns: ['MARCA'], rows: [{ MARCA: 'PRABC' }] });
    const service = createService();

    await expect(service.refresh()).rejects.toBeInstanceOf(SchemaMismatchError);
    expect(service.getLatestStatus()?.status).toBe('FAILED');
  });

  it('prevents concurrent refresh executions', async () => {
    const service = createService();

    const firstRefresh = service.refresh('manual');

    expect(service.isRunning()).toBe(true);
    await expect(service.refresh('manual')).rejects.toBeInstanceOf(RefreshInProgressError);

    await firstRefresh;
    await Promise.resolve();

    expect(service.isRunning()).toBe(false);
    await expect(service.refresh('manual')).resolves.toMatchObject({ refreshId: 2 });
  });

  it('has no status before the first refresh', () => {
    expect(createService().getLatestStatus()).toBeNull();
  });
});
