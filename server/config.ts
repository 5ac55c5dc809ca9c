import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_MODEL_URL = 'https://github.com/danielgatis/rembg/releases/download/v0.0.0/u2netp.onnx';
const DEFAULT_MODEL_CHECKSUM = '8e83ca70e441ab06c318d82300c84806';
export const MAX_IMAGE_PIXELS = 89_478_485;

const parseOrigins = (raw: string): string[] | '*' => {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  if (origins.length === 0 || origins.includes('*')) {
    return '*';
  }
  return origins;
};

// A variable set to an empty string counts as unset, so `PORT=` keeps the default instead of coercing to 0.
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const envSchema = z.object({
  PORT: blankAsUnset(z.coerce.number().int().min(0).max(65535).default(8000)),
  HOST: z.string().min(1).default('0.0.0.0'),
  MAX_FILE_SIZE: blankAsUnset(z.coerce.number().int().positive().default(10 * 1024 * 1024)),
  MAX_IMAGE_PIXELS: blankAsUnset(z.coerce.number().int().positive().default(MAX_IMAGE_PIXELS)),
  WORKERS: blankAsUnset(z.coerce.number().int().min(1).default(4)),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  CORS_ORIGINS: z.string().default('*').transform(parseOrigins),
  MODEL_NAME: z.string().min(1).default('u2netp'),
  MODEL_URL: z.string().url().default(DEFAULT_MODEL_URL),
  MODEL_CHECKSUM: z.string().default(DEFAULT_MODEL_CHECKSUM),
  MODEL_DIR: z.string().min(1).optional(),
  SHUTDOWN_TIMEOUT_MS: blankAsUnset(z.coerce.number().int().min(0).default(10_000))
});

export interface ServiceConfig {
  port: number;
  host: string;
  maxFileSize: number;
  /** Largest decoded width × height */
  maxImagePixels: number;
  workers: number;
  logLevel: LogLevel;
  corsOrigins: string[] | '*';
  model: {
    name: string;
    url: string;
    /** md5 hex digest; `null` skips verification */
    checksum: string | null;
    dir: string;
  };
  shutdownTimeoutMs: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  return Object.freeze({
    port: values.PORT,
    host: values.HOST,
    maxFileSize: values.MAX_FILE_SIZE,
    maxImagePixels: values.MAX_IMAGE_PIXELS,
    workers: values.WORKERS,
    logLevel: values.LOG_LEVEL,
    corsOrigins: values.CORS_ORIGINS,
    model: Object.freeze({
      name: values.MODEL_NAME,
      url: values.MODEL_URL,
      checksum: values.MODEL_CHECKSUM.trim() ? values.MODEL_CHECKSUM.trim().toLowerCase() : null,
      dir: path.resolve(values.MODEL_DIR ?? path.join(os.homedir(), '.u2net'))
    }),
    shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS
  });
};
