import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/utils/error-handler';
import {
  AlertThresholds,
  ENTITY_TYPES,
  EXPORT_FORMATS,
  EntityType,
  ExportFormat,
  RANK_METRICS,
  RankMetric
} from '@/utils/types';

// Load environment variables
config();

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;

  // HTTP trigger authentication
  etlApiKey: string | null;
  /** Browser origins the HTTP service accepts; empty allows none. */
  allowedOrigins: string[];

  meta: {
    accessToken: string;
    adAccountId: string;
    appId: string | null;
    appSecret: string | null;
    apiVersion: string;
    requestTimeoutMs: number;
    pageSize: number;
    maxRetries: number;
    retryDelayMs: number;
  };

  telegram: {
    botToken: string;
    chatId: string;
    messageLimit: number;
    maxRetries: number;
    retryDelayMs: number;
  } | null;

  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
  } | null;

  report: {
    days: number | null;
    startDate: string | null;
    endDate: string | null;
    entityType: EntityType;
    rankBy: RankMetric;
    topLimit: number;
    conversionActionTypes: string[];
    malformedTolerance: number;
  };

  thresholds: AlertThresholds;

  exports: {
    reportsDir: string;
    formats: ExportFormat[];
    storage: {
      supabaseUrl: string;
      supabaseServiceKey: string;
      bucket: string;
    } | null;
  };

  cache: {
    enabled: boolean;
    directory: string;
    ttlSeconds: number;
  };

  checkpointStaleMinutes: number;

  schedule: {
    enabled: boolean;
    dailyCron: string;
    weeklyCron: string;
    timezone: string;
  };
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const intWithDefault = (fallback: number, min = 0) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : value),
    z.coerce.number().int().min(min)
  );

const numberWithDefault = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : value),
    z.coerce.number().nonnegative()
  );

// An empty value disables the threshold
const optionalThreshold = z.preprocess(
  value => (value === undefined || value === '' ? undefined : value),
  z.coerce.number().nonnegative().optional()
);

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    value => (value === undefined || value === '' ? String(fallback) : String(value).toLowerCase()),
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform(flag => flag === 'true' || flag === '1' || flag === 'yes')
  );

const listWithDefault = (fallback: string) =>
  z.preprocess(
    value => (value === undefined ? fallback : value),
    z.string().transform(raw => raw.split(',').map(item => item.trim()).filter(item => item.length > 0))
  );

const envSchema = z.object({
  PORT: intWithDefault(8080, 1),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),
  ETL_API_KEY: optionalString,
  ALLOWED_ORIGINS: listWithDefault('http://localhost:3000').pipe(z.array(z.string().url('must be a URL'))),

  META_ACCESS_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  META_AD_ACCOUNT_ID: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  META_APP_ID: optionalString,
  META_APP_SECRET: optionalString,
  META_API_VERSION: z.string().regex(/^v\d+\.\d+$/, 'must look like v22.0').default('v22.0'),
  META_REQUEST_TIMEOUT_MS: intWithDefault(30000, 1),
  META_PAGE_SIZE: intWithDefault(100, 1),
  API_MAX_RETRIES: intWithDefault(3),
  API_RETRY_DELAY_MS: intWithDefault(5000),

  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  TELEGRAM_MESSAGE_LIMIT: intWithDefault(4096, 64),
  DELIVERY_MAX_RETRIES: intWithDefault(3),

  DB_HOST: optionalString,
  DB_PORT: intWithDefault(5432, 1),
  DB_NAME: optionalString,
  DB_USER: optionalString,
  DB_PASSWORD: optionalString,
  DB_SSL: booleanFlag(false),

  REPORT_DAYS: z.preprocess(
    value => (value === undefined || value === '' ? undefined : value),
    z.coerce.number().int().min(1).optional()
  ),
  REPORT_START_DATE: optionalString.refine(value => value === undefined || DATE_PATTERN.test(value), 'must be YYYY-MM-DD'),
  REPORT_END_DATE: optionalString.refine(value => value === undefined || DATE_PATTERN.test(value), 'must be YYYY-MM-DD'),
  REPORT_ENTITY_TYPE: z.enum(ENTITY_TYPES).default('campaign'),
  REPORT_RANK_BY: z.enum(RANK_METRICS).default('spend'),
  REPORT_TOP_LIMIT: intWithDefault(10, 1),
  CONVERSION_ACTION_TYPES: listWithDefault(
    'offsite_conversion.fb_pixel_purchase,lead,onsite_conversion.messaging_conversation_started_7d'
  ),
  MALFORMED_TOLERANCE: numberWithDefault(0.1).refine(value => value <= 1, 'must be between 0 and 1'),

  ALERT_HIGH_CPC: optionalThreshold.default(2),
  ALERT_LOW_CTR: optionalThreshold.default(1),
  ALERT_BUDGET_DEPLETED_PCT: optionalThreshold.default(90),

  REPORTS_DIR: z.string().default('reports'),
  EXPORT_FORMATS: listWithDefault('csv,json,txt').pipe(z.array(z.enum(EXPORT_FORMATS))),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_KEY: optionalString,
  SUPABASE_STORAGE_BUCKET: optionalString,

  CACHE_ENABLED: booleanFlag(false),
  CACHE_DIR: z.string().default('.cache'),
  CACHE_TTL_SECONDS: intWithDefault(3600),

  CHECKPOINT_STALE_MINUTES: intWithDefault(60, 1),

  SCHEDULER_ENABLED: booleanFlag(false),
  DAILY_REPORT_CRON: z.string().default('0 9 * * *'),
  WEEKLY_REPORT_CRON: z.string().default('0 9 * * 1'),
  SCHEDULE_TIMEZONE: z.string().default('UTC')
});

type ParsedEnv = z.infer<typeof envSchema>;

function checkGroups(env: ParsedEnv): string[] {
  const issues: string[] = [];

  if (Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
    issues.push('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together');
  }

  if (env.DB_HOST) {
    for (const name of ['DB_NAME', 'DB_USER', 'DB_PASSWORD'] as const) {
      if (!env[name]) {
        issues.push(`${name}: is required when DB_HOST is set`);
      }
    }
  }

  const storageVars = [env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, env.SUPABASE_STORAGE_BUCKET];
  const storageSet = storageVars.filter(Boolean).length;
  if (storageSet > 0 && storageSet < storageVars.length) {
    issues.push('SUPABASE_URL, SUPABASE_SERVICE_KEY and SUPABASE_STORAGE_BUCKET must be set together');
  }

  if (env.REPORT_START_DATE && env.REPORT_END_DATE && env.REPORT_START_DATE > env.REPORT_END_DATE) {
    issues.push('REPORT_START_DATE must not be after REPORT_END_DATE');
  }

  if (Boolean(env.REPORT_START_DATE) !== Boolean(env.REPORT_END_DATE)) {
    issues.push('REPORT_START_DATE and REPORT_END_DATE must be set together');
  }

  return issues;
}

export function normalizeAccountId(accountId: string): string {
  return accountId.startsWith('act_') ? accountId : `act_${accountId}`;
}

/**
 * Parse and validate the environment once. Every problem is collected so a
 * misconfigured deployment reports all of them in a single run.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const groupIssues = checkGroups(values);
  if (groupIssues.length > 0) {
    throw new ConfigError(groupIssues);
  }

  const thresholds: AlertThresholds = {};
  if (values.ALERT_HIGH_CPC !== undefined) thresholds.HIGH_CPC = values.ALERT_HIGH_CPC;
  if (values.ALERT_LOW_CTR !== undefined) thresholds.LOW_CTR = values.ALERT_LOW_CTR;
  if (values.ALERT_BUDGET_DEPLETED_PCT !== undefined) thresholds.BUDGET_DEPLETED = values.ALERT_BUDGET_DEPLETED_PCT;

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    etlApiKey: values.ETL_API_KEY ?? null,
    allowedOrigins: values.ALLOWED_ORIGINS,

    meta: {
      accessToken: values.META_ACCESS_TOKEN,
      adAccountId: normalizeAccountId(values.META_AD_ACCOUNT_ID),
      appId: values.META_APP_ID ?? null,
      appSecret: values.META_APP_SECRET ?? null,
      apiVersion: values.META_API_VERSION,
      requestTimeoutMs: values.META_REQUEST_TIMEOUT_MS,
      pageSize: values.META_PAGE_SIZE,
      maxRetries: values.API_MAX_RETRIES,
      retryDelayMs: values.API_RETRY_DELAY_MS
    },

    telegram: values.TELEGRAM_BOT_TOKEN && values.TELEGRAM_CHAT_ID
      ? {
          botToken: values.TELEGRAM_BOT_TOKEN,
          chatId: values.TELEGRAM_CHAT_ID,
          messageLimit: values.TELEGRAM_MESSAGE_LIMIT,
          maxRetries: values.DELIVERY_MAX_RETRIES,
          retryDelayMs: values.API_RETRY_DELAY_MS
        }
      : null,

    database: values.DB_HOST && values.DB_NAME && values.DB_USER && values.DB_PASSWORD
      ? {
          host: values.DB_HOST,
          port: values.DB_PORT,
          database: values.DB_NAME,
          user: values.DB_USER,
          password: values.DB_PASSWORD,
          ssl: values.DB_SSL
        }
      : null,

    report: {
      days: values.REPORT_DAYS ?? null,
      startDate: values.REPORT_START_DATE ?? null,
      endDate: values.REPORT_END_DATE ?? null,
      entityType: values.REPORT_ENTITY_TYPE,
      rankBy: values.REPORT_RANK_BY,
      topLimit: values.REPORT_TOP_LIMIT,
      conversionActionTypes: values.CONVERSION_ACTION_TYPES,
      malformedTolerance: values.MALFORMED_TOLERANCE
    },

    thresholds,

    exports: {
      reportsDir: values.REPORTS_DIR,
      formats: values.EXPORT_FORMATS,
      storage: values.SUPABASE_URL && values.SUPABASE_SERVICE_KEY && values.SUPABASE_STORAGE_BUCKET
        ? {
            supabaseUrl: values.SUPABASE_URL,
            supabaseServiceKey: values.SUPABASE_SERVICE_KEY,
            bucket: values.SUPABASE_STORAGE_BUCKET
          }
        : null
    },

    cache: {
      enabled: values.CACHE_ENABLED,
      directory: values.CACHE_DIR,
      ttlSeconds: values.CACHE_TTL_SECONDS
    },

    checkpointStaleMinutes: values.CHECKPOINT_STALE_MINUTES,

    schedule: {
      enabled: values.SCHEDULER_ENABLED,
      dailyCron: values.DAILY_REPORT_CRON,
      weeklyCron: values.WEEKLY_REPORT_CRON,
      timezone: values.SCHEDULE_TIMEZONE
    }
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(type => type === value);
}

export function isRankMetric(value: string): value is RankMetric {
  return RANK_METRICS.some(metric => metric === value);
}

export default getConfig;
