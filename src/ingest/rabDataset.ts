import { createWriteStream } from 'fs';
import { access, mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ReadableStream } from 'stream/web';

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { fetch } from 'undici';
import { z } from 'zod';

import type { CleanTable } from '../cleaning/pipeline';
import type { RawRecord, RawTable } from '../cleaning/types';
import type { Logger } from '../lib/logger';
import type {
  DatasetFormat,
  DownloadDataset,
  FetchRawOptions,
  FetchRawResult,
  RawDatasetSource,
} from './types';
import { toRawCell } from './utils';

const csvRowsSchema = z.array(z.array(z.string()));

const jsonRecordsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
);

/** ANAC publishes its exports in Latin-1. */
export const decodeRaw = (buffer: Buffer): string => buffer.toString('latin1');

/**
 * The CSV export starts with a banner line ("Atualizado em: ...") before the
 * `;`-separated header row.
 */
export const parseRabCsv = (text: string): RawTable => {
  const parsed = csvRowsSchema.parse(
    parse(text, {
      bom: true,
      delimiter: ';',
      from_line: 2,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    }),
  );

  const [header = [], ...records] = parsed;

  return {
    columns: header,
    rows: records.map((values) => {
      const row: RawRecord = {};
      header.forEach((column, index) => {
        row[column] = toRawCell(values[index]);
      });

      return row;
    }),
  };
};

export const parseRabJson = (text: string): RawTable => {
  const records = jsonRecordsSchema.parse(JSON.parse(text));
  const columns: string[] = [];
  const known = new Set<string>();

  for (const record of records) {
    for (const column of Object.keys(record)) {
      if (!known.has(column)) {
        known.add(column);
        columns.push(column);
      }
    }
  }

  return {
    columns,
    rows: records.map((record) => {
      const row: RawRecord = {};
      for (const column of columns) {
        row[column] = toRawCell(record[column]);
      }

      return row;
    }),
  };
};

export const readRawTable = async (filePath: string, format: DatasetFormat): Promise<RawTable> => {
  const text = decodeRaw(await readFile(filePath));

  return format === 'csv' ? parseRabCsv(text) : parseRabJson(text);
};

export const serializeCleanCsv = (table: CleanTable): string =>
  stringify(table.rows, {
    header: true,
    columns: table.columns,
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
    },
  });

export const writeCleanCsv = async (filePath: string, table: CleanTable): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeCleanCsv(table), 'utf8');
};

export const downloadDataset: DownloadDataset = async (url, filePath) => {
  const response = await fetch(url);

  if (!response.ok || !response.body) {
    throw new Error(`Failed to download dataset from ${url}: ${response.status}`);
  }

  await mkdir(path.dirname(filePath), { recursive: true });

  const readable = Readable.fromWeb(response.body as unknown as ReadableStream<Uint8Array>);
  const writable = createWriteStream(filePath);

  await pipeline(readable, writable);

  const dataVersion =
    response.headers.get('last-modified') ?? response.headers.get('etag') ?? undefined;

  return { dataVersion };
};

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
};

type RabDatasetCacheOptions = {
  url: string;
  dataDir: string;
  format: DatasetFormat;
  logger?: Logger;
  download?: DownloadDataset;
};

export class RabDatasetCache implements RawDatasetSource {
  readonly format: DatasetFormat;
  private readonly url: string;
  private readonly rawPath: string;
  private readonly logger: Logger;
  private readonly download: DownloadDataset;

  constructor(options: RabDatasetCacheOptions) {
    this.url = options.url;
    this.format = options.format;
    this.rawPath = path.join(options.dataDir, `raw.${options.format}`);
    this.logger = options.logger ?? console;
    this.download = options.download ?? downloadDataset;
  }

  async fetchRaw(options: FetchRawOptions = {}): Promise<FetchRawResult> {
    if (!options.update && (await fileExists(this.rawPath))) {
      this.logger.info(`[RAB Dataset] Using cached raw file ${this.rawPath}`);
      return { filePath: this.rawPath, downloaded: false, dataVersion: null };
    }

    this.logger.info(`[RAB Dataset] Downloading ${this.url} to ${this.rawPath}`);
    const { dataVersion } = await this.download(this.url, this.rawPath);

    return { filePath: this.rawPath, downloaded: true, dataVersion: dataVersion ?? null };
  }

  readRaw(filePath: string): Promise<RawTable> {
    return readRawTable(filePath, this.format);
  }
}
