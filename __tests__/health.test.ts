import request from 'supertest';

import { createApp } from '../src/app';
import { runPipeline, summarizeCleanTable } from '../src/cleaning/pipeline';
import { resetConfig } from '../src/config';
import { getAircraftRegistry } from '../src/lib/registry';
import { buildRawTable } from './helpers/rab';

describe('GET /health', () => {
  beforeEach(() => {
    resetConfig();
    getAircraftRegistry().clear();
    process.env.RAB_DATASET_URL = 'https://example.com/rab/dados_aeronaves.csv';
  });

  it('reports an empty registry before the first refresh', async () => {
    const response = await request(createApp()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'ok',
      registry: { loaded: false, aircraft: 0, loadedAt: null },
    });
  });

  it('reports the loaded snapshot', async () => {
    const table = runPipeline(buildRawTable([{ tail_number: 'PRABC' }, { tail_number: 'PTXYZ' }]));
    const loadedAt = new Date('2024-06-01T12:00:00Z');
    getAircraftRegistry().replace({
      table,
      stats: summarizeCleanTable(table.rows, 2),
      loadedAt,
      dataVersion: null,
    });

    const response = await request(createApp()).get('/health');

    expect(response.body).toEqual({
      status: 'ok',
      registry: { loaded: true, aircraft: 2, loadedAt: '2024-06-01T12:00:00.000Z' },
    });
  });
});
