import { z } from 'zod';

export const DEFAULT_RAB_DATASET_URL =
  'https://sistemas.anac.gov.br/dadosabertos/Aeronaves/RAB/dados_aeronaves.csv';

const rawConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z
    .string()
    .regex(/^\d+$/)
    .optional(),
  RAB_DATASET_URL: z.string().url().default(DEFAULT_RAB_DATASET_URL),
  RAB_DATASET_FORMAT: z.enum(['csv', 'json']).optional(),
  RAB_DATA_DIR: z.string().min(1).default('./data/rab'),
  SCHEDULER_ENABLED: z
    .string()
    .transform((value) => value === 'true')
    .optional(),
  SCHEDULER_INTERVAL_MINUTES: z
    .string()
    .regex(/^\d+$/)
    .optional(),
  APPINSIGHTS_CONNECTION_STRING: z.string().optional(),
  APPINSIGHTS_ROLE_NAME: z.string().optional(),
  APPINSIGHTS_SAMPLING_PERCENTAGE: z.string().optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

export type AppConfig = {
  nodeEnv: RawConfig['NODE_ENV'];
  port: number;
  dataset: {
    url: string;
    format: 'csv' | 'json';
    dataDir: string;
  };
  scheduler: {
    enabled: boolean;
    intervalMinutes: number;
  };
  telemetry: {
    appInsights: {
      connectionString: string;
      roleName: string | null;
      samplingPercentage: number | null;
    } | null;
  };
};

// The format follows the URL's extension unless RAB_DATASET_FORMAT says otherwise
const inferDatasetFormat = (url: string, explicit?: 'csv' | 'json'): 'csv' | 'json' => {
  if (explicit) {
    return explicit;
  }

  return new URL(url).pathname.toLowerCase().endsWith('.json') ? 'json' : 'csv';
};

const normalizeSamplingPercentage = (value?: string | null): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const parsed = Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(
      'APPINSIGHTS_SAMPLING_PERCENTAGE must be a number between 0 and 100 when provided',
    );
  }

  return parsed;
};

export const buildConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = rawConfigSchema.parse(env);

  const samplingPercentage = normalizeSamplingPercentage(parsed.APPINSIGHTS_SAMPLING_PERCENTAGE);
  const appInsightsConnectionString = parsed.APPINSIGHTS_CONNECTION_STRING?.trim();

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT ? Number.parseInt(parsed.PORT, 10) : 3000,
    dataset: {
      url: parsed.RAB_DATASET_URL,
      format: inferDatasetFormat(parsed.RAB_DATASET_URL, parsed.RAB_DATASET_FORMAT),
      dataDir: parsed.RAB_DATA_DIR,
    },
    scheduler: {
      enabled: parsed.SCHEDULER_ENABLED ?? false,
      intervalMinutes: parsed.SCHEDULER_INTERVAL_MINUTES
        ? Number.parseInt(parsed.SCHEDULER_INTERVAL_MINUTES, 10)
        : 1440,
    },
    telemetry: {
      appInsights: appInsightsConnectionString
        ? {
            connectionString: appInsightsConnectionString,
            roleName: parsed.APPINSIGHTS_ROLE_NAME?.trim() || null,
            samplingPercentage,
          }
        : null,
    },
  };
};
