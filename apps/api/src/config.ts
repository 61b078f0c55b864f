/**
 * API Configuration
 * Environment is loaded once (dotenv) and validated with zod at start-up.
 */
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ENGINE_DEFAULTS, type EngineOptionsInput } from '@tariffline/shared';

export const loadEnvFile = (cwd: string = process.cwd()): string | null => {
  const candidates = [
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '../.env'),
    path.resolve(cwd, '../../.env'),
  ];
  for (const file of candidates) {
    if (existsSync(file)) {
      dotenv.config({ path: file });
      return file;
    }
  }
  return null;
};

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  OUTPUT_DIR: z.string().min(1).default('outputs'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(16),
  CORS_ORIGIN: z.string().optional(),
  RETENTION_DAYS: z.coerce.number().int().min(0).default(7),
  STRUCTURED_MIN_MATCHING_COLUMNS: z.coerce
    .number()
    .int()
    .min(1)
    .default(ENGINE_DEFAULTS.STRUCTURED_MIN_MATCHING_COLUMNS),
  PAIRING_SIMILARITY_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(ENGINE_DEFAULTS.PAIRING_SIMILARITY_THRESHOLD),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  port: number;
  host: string;
  /** Absolute directory for generated CSV files */
  outputDir: string;
  maxUploadBytes: number;
  /** Allowed origins; true reflects the request origin */
  corsOrigin: string[] | true;
  retentionDays: number;
  engine: EngineOptionsInput;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = EnvSchema.parse(env);
  const origins = parsed.CORS_ORIGIN?.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
    host: parsed.API_HOST,
    outputDir: path.resolve(cwd, parsed.OUTPUT_DIR),
    maxUploadBytes: Math.round(parsed.MAX_UPLOAD_MB * 1024 * 1024),
    corsOrigin: origins && origins.length > 0 ? origins : true,
    retentionDays: parsed.RETENTION_DAYS,
    engine: {
      structuredMinMatchingColumns: parsed.STRUCTURED_MIN_MATCHING_COLUMNS,
      pairingSimilarityThreshold: parsed.PAIRING_SIMILARITY_THRESHOLD,
    },
  };
}
