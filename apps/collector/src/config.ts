import * as fs from 'fs';
import { z } from 'zod';
import { isValidDay, isValidTimeZone } from '@growatt-dashboard/integrations-core';
import { DEFAULT_GROWATT_BASE_URL } from '@growatt-dashboard/integrations-growatt';
import { ConfigError } from './errors.js';

// ============================================================================
// SCHEMAS
// ============================================================================

// Plant settings from the JSON config file
const plantConfigSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  plant_id: z
    .union([z.string(), z.number()])
    .transform(String)
    .pipe(z.string().min(1, 'plant_id is required')),
  start_date: z.string().refine(isValidDay, 'start_date must be a YYYY-MM-DD calendar date'),
  timezone: z.string().refine(isValidTimeZone, 'timezone must be an IANA time zone').default('UTC'),
  collect_device_history: z.boolean().default(false),
  backfill: z.boolean().default(true),
});

// Runtime knobs from the environment
const runtimeConfigSchema = z.object({
  CONFIG_PATH: z.string().default('config.json'),
  DATABASE_PATH: z.string().default('data/solar_data.sqlite'),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GROWATT_BASE_URL: z.string().url().default(DEFAULT_GROWATT_BASE_URL),
  INTEGRATION_MOCK_MODE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  FIXTURES_PATH: z.string().optional(),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export type PlantConfig = z.infer<typeof plantConfigSchema>;
export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export interface CollectorConfig {
  plant: PlantConfig;
  runtime: RuntimeConfig;
}

// ============================================================================
// LOADING
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parsePlantConfig(raw: unknown): PlantConfig {
  const result = plantConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid plant configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function loadPlantConfig(configPath: string): PlantConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`);
  }

  return parsePlantConfig(raw);
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = runtimeConfigSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const runtime = loadRuntimeConfig(env);
  return { plant: loadPlantConfig(runtime.CONFIG_PATH), runtime };
}
