import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  MONGO_URI: z
    .string()
    .url('MONGO_URI must be a valid connection string')
    .default('mongodb://localhost:27017/photos'),
  MONGO_MAX_POOL_SIZE: z
    .string()
    .default('10')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(500).describe('MONGO_MAX_POOL_SIZE must be within 1-500')),
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z
    .string()
    .default('5000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_SERVER_SELECTION_TIMEOUT_MS must be >= 1000ms')),
  EXIFTOOL_TASK_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1000)
        .max(300000)
        .describe('EXIFTOOL_TASK_TIMEOUT_MS must be within 1000-300000ms')
    ),
  EXIFTOOL_MAX_PROCS: z
    .string()
    .default('1')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(16).describe('EXIFTOOL_MAX_PROCS must be within 1-16')),
  // Total pixel count of a synthesized thumbnail (160x120 at 4:3)
  THUMBNAIL_PIXEL_BUDGET: z
    .string()
    .default('19200')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1)
        .max(1_000_000)
        .describe('THUMBNAIL_PIXEL_BUDGET must be within 1-1000000')
    ),
  STORAGE_PATH: z.string().min(1).default('data')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
