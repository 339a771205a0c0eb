import dotenv from 'dotenv';
import { buildConfig, type AppConfig } from './schema';

let cachedConfig: AppConfig | null = null;
let environmentLoaded = false;

// .env values never override variables already present in the process
const loadEnvironmentFile = () => {
  if (!environmentLoaded) {
    dotenv.config();
    environmentLoaded = true;
  }
};

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    loadEnvironmentFile();
    cachedConfig = buildConfig(process.env);
  }

  return cachedConfig;
};

export const resetConfig = () => {
  cachedConfig = null;
};

export { DEFAULT_RAB_DATASET_URL } from './schema';
export type { AppConfig } from './schema';
