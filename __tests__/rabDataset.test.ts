import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import { parse } from 'csv-parse/sync';

import { runPipeline } from '../src/cleaning/pipeline';
import {
  decodeRaw,
  parseRabCsv,
  parseRabJson,
  RabDatasetCache,
  serializeCleanCsv,
  writeCleanCsv,
} from '../src/ingest/rabDataset';
import type { DownloadDataset } from '../src/ingest/types';
import { buildRawTable, VALID_CPF } from './helpers/rab';

const createLogger = () => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

describe('parseRabCsv', () => {
  it('skips the banner line and reads the semicolon-separated rows', () => {
    const table = parseRabCsv(
      [
        'Atualizado em: 2024-06-01',
        'MARCA;PROPRIETARIO;PMD',
        'PRABC;  FAZENDA BOA VISTA ; 1500',
        'PTXYZ;;',
        '',
      ].join('\n'),
    );

    expect(table.columns).toEqual(['MARCA', 'PROPRIETARIO', 'PMD']);
    expect(table.rows).toEqual([
      { MARCA: 'PRABC', PROPRIETARIO: 'FAZENDA BOA VISTA', PMD: '1500' },
      { MARCA: 'PTXYZ', PROPRIETARIO: null, PMD: null },
    ]);
  });

  it('keeps duplicate headers in the column list', () => {
    const table = parseRabCsv(['banner', 'MARCA;MARCA;PMD', 'PRABC;PRABC;1500'].join('\n'));

    expect(table.columns).toEqual(['MARCA', 'MARCA', 'PMD']);
  });

  it('fills missing trailing cells with null', () => {
    const table = parseRabCsv(['banner', 'MARCA;PROPRIETARIO;PMD', 'PRABC'].join('\n'));

    expect(table.rows).toEqual([{ MARCA: 'PRABC', PROPRIETARIO: null, PMD: null }]);
  });
});

describe('parseRabJson', () => {
  it('collects the columns of every record in first-seen order', () => {
    const table = parseRabJson(
      JSON.stringify([
        { MARCA: 'PRABC', NRPMD: 1500 },
        { MARCA: 'PTXYZ', DSGRAVAME: null },
      ]),
    );

    expect(table.columns).toEqual(['MARCA', 'NRPMD', 'DSGRAVAME']);
    expect(table.rows).toEqual([
      { MARCA: 'PRABC', NRPMD: '1500', DSGRAVAME: null },
      { MARCA: 'PTXYZ', NRPMD: null, DSGRAVAME: null },
    ]);
  });

  it('rejects documents that are not arrays of records', () => {
    expect(() => parseRabJson('{"MARCA":"PRABC"}')).toThrow();
  });
});

describe('decodeRaw', () => {
  it('decodes Latin-1 bytes', () => {
    expect(decodeRaw(Buffer.from([0x53, 0xc3, 0x4f]))).toBe('S\u00c3O');
  });
});

describe('serializeCleanCsv', () => {
  it('writes a header row and renders booleans and nulls', () => {
    const table = runPipeline(
      buildRawTable([
        {
          tail_number: 'PTXYZ',
          owner_tax_id: VALID_CPF,
          operator_tax_id: VALID_CPF,
          year_mfg: '2000',
        },
      ]),
      { referenceYear: 2024 },
    );

    const csv = serializeCleanCsv(table);
    const [header, ...records] = csv.trimEnd().split('\n');

    expect(header).toBe(table.columns.join(','));
    expect(records).toHaveLength(1);

    const [record] = parse(csv, { columns: true });
    expect(record).toMatchObject({
      tail_number: 'PTXYZ',
      owner_tax_id_type: 'CPF',
      owned_operated: 'true',
      agaircraft: 'false',
      year_mfg: '2000',
      age: '24',
      max_takeoff_wgt: '-1',
      mfg: '',
    });
  });
});

describe('RabDatasetCache', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'rab-dataset-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  const createCache = (download: DownloadDataset) =>
    new RabDatasetCache({
      url: 'https://example.com/rab.csv',
      dataDir,
      format: 'csv',
      logger: createLogger(),
      download,
    });

  it('downloads once and reuses the cached file unless an update is requested', async () => {
    const download = jest.fn<ReturnType<DownloadDataset>, Parameters<DownloadDataset>>(
      async (_url, filePath) => {
        await writeFile(filePath, 'banner\nMARCA;PMD\nPRABC;1500\n', 'latin1');
        return { dataVersion: 'v1' };
      },
    );
    const cache = createCache(download);
    const rawPath = path.join(dataDir, 'raw.csv');

    await expect(cache.fetchRaw()).resolves.toEqual({
      filePath: rawPath,
      downloaded: true,
      dataVersion: 'v1',
    });
    await expect(cache.fetchRaw()).resolves.toEqual({
      filePath: rawPath,
      downloaded: false,
      dataVersion: null,
    });
    expect(download).toHaveBeenCalledTimes(1);
    expect(download).toHaveBeenCalledWith('https://example.com/rab.csv', rawPath);

    await cache.fetchRaw({ update: true });
    expect(download).toHaveBeenCalledTimes(2);

    await expect(cache.readRaw(rawPath)).resolves.toEqual({
      columns: ['MARCA', 'PMD'],
      rows: [{ MARCA: 'PRABC', PMD: '1500' }],
    });
  });

  it('propagates download failures', async () => {
    const cache = createCache(jest.fn().mockRejectedValue(new Error('Failed to download')));

    await expect(cache.fetchRaw()).rejects.toThrow('Failed to download');
  });
});

describe('writeCleanCsv', () => {
  it('creates the target directory', async () => {
    const dataDir = await mkdtemp(path.join(os.tmpdir(), 'rab-clean-'));
    const target = path.join(dataDir, 'nested', 'clean.csv');
    const table = runPipeline(buildRawTable([{ tail_number: 'PRABC' }]), { referenceYear: 2024 });

    try {
      await writeCleanCsv(target, table);

      await expect(readFile(target, 'utf8')).resolves.toBe(serializeCleanCsv(table));
    } finally {
      await rm(dataDir, { recursive: true, force: true });
    }
  });
});
