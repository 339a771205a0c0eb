import type { RawTable } from '../cleaning/types';

export type DatasetFormat = 'csv' | 'json';

export type DownloadResult = {
  dataVersion?: string;
};

export type DownloadDataset = (url: string, filePath: string) => Promise<DownloadResult>;

export type FetchRawOptions = {
  update?: boolean;
};

export type FetchRawResult = {
  filePath: string;
  downloaded: boolean;
  dataVersion: string | null;
};

/** Retrieves the raw ANAC export, keeping a local copy between runs. */
export interface RawDatasetSource {
  readonly format: DatasetFormat;
  fetchRaw(options?: FetchRawOptions): Promise<FetchRawResult>;
  readRaw(filePath: string): Promise<RawTable>;
}
