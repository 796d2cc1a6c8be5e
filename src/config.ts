import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { PreconditionError } from './errors';
import type { PlatformConfig } from './types';

export type EnvMap = Record<string, string>;

export interface DatasetConfig {
  testsPath: string;
  groundTruthPath?: string;
  scoringPromptPath?: string;
}

export const DEFAULT_DATASET = 'retailing-benchmark';

export const DATASET_CONFIGS: Record<string, DatasetConfig> = {
  'retailing-benchmark': {
    testsPath: 'retailing-benchmark/shopping_paper_tests.xlsx',
    groundTruthPath: 'retailing-benchmark/product_ground_truth.xlsx',
    scoringPromptPath: 'retailing-benchmark/scoring_prompt.txt',
  },
};

export const DEFAULT_SCORING_PLATFORM_ID = 'CHATGPT';

export function resolveDatasetConfig(dataset?: string): DatasetConfig {
  const name = (dataset || DEFAULT_DATASET).trim().toLowerCase();
  const config = DATASET_CONFIGS[name];
  if (config) {
    return config;
  }
  const options = Object.keys(DATASET_CONFIGS).sort().join(', ');
  throw new PreconditionError(`Unknown dataset '${name}'. Available options: ${options}`);
}

/**
 * Read KEY=VALUE pairs from an env file. A missing file yields an empty map.
 */
export function loadEnvFile(envPath: string): EnvMap {
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath, 'utf-8'));
}

export function cleanEnvValue(value: string | undefined): string {
  if (value === undefined) return '';
  const trimmed = value.trim();
  const quoted =
    trimmed.length >= 2 && trimmed[0] === trimmed[trimmed.length - 1] && (trimmed[0] === '"' || trimmed[0] === "'");
  return quoted ? trimmed.slice(1, -1).trim() : trimmed;
}

/**
 * Build the connection config for a platform from `<PLATFORM>_API_KEY`,
 * `<PLATFORM>_BASE_URL` and `<PLATFORM>_MODEL`. Returns null without an API key.
 */
export function loadPlatformConfig(platformId: string, env: EnvMap, timeoutMs: number): PlatformConfig | null {
  const prefix = platformId.toUpperCase();
  let apiKey = cleanEnvValue(env[`${prefix}_API_KEY`]);
  const baseUrl = cleanEnvValue(env[`${prefix}_BASE_URL`]);
  const model = cleanEnvValue(env[`${prefix}_MODEL`]);

  if (apiKey.startsWith('Bearer ')) {
    apiKey = apiKey.slice('Bearer '.length).trim();
  }
  if (!apiKey) {
    return null;
  }
  return {
    apiKey,
    baseUrl: baseUrl || undefined,
    model: model || undefined,
    timeoutMs,
  };
}

// --- Runner settings ---

function emptyAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function nonNegativeNumber(defaultValue: number) {
  return z.preprocess(emptyAsUndefined, z.coerce.number().min(0).default(defaultValue));
}

function positiveNumber(defaultValue: number) {
  return z.preprocess(emptyAsUndefined, z.coerce.number().positive().default(defaultValue));
}

export function parseThrottleSpec(spec: string): Record<string, number> {
  const throttle: Record<string, number> = {};
  for (const entry of spec.split(',')) {
    const item = entry.trim();
    if (!item) continue;
    const [platform, seconds] = item.split('=').map((part) => part.trim());
    const value = Number(seconds);
    if (!platform || seconds === undefined || seconds === '' || !Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid throttle entry '${item}', expected PLATFORM=SECONDS`);
    }
    throttle[platform.toUpperCase()] = value;
  }
  return throttle;
}

const RunnerSettingsSchema = z.object({
  SCORING_PLATFORM_ID: z
    .string()
    .optional()
    .transform((value) => cleanEnvValue(value).toUpperCase() || DEFAULT_SCORING_PLATFORM_ID),
  STEP_RETRY_COUNT: nonNegativeNumber(2).pipe(z.number().int()),
  STEP_RETRY_BACKOFF_SECONDS: nonNegativeNumber(5),
  REQUEST_TIMEOUT_SECONDS: positiveNumber(60),
  PLATFORM_THROTTLE_SECONDS: z
    .string()
    .optional()
    .transform((value, ctx) => {
      try {
        return parseThrottleSpec(value ?? 'CLAUDE=10');
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
        return z.NEVER;
      }
    }),
});

export interface RunnerSettings {
  scoringPlatformId: string;
  retryCount: number;
  backoffSeconds: number;
  requestTimeoutMs: number;
  throttleSeconds: Record<string, number>;
}

export function loadRunnerSettings(env: EnvMap): RunnerSettings {
  const parsed = RunnerSettingsSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PreconditionError(`Invalid runner settings: ${details}`);
  }
  return {
    scoringPlatformId: parsed.data.SCORING_PLATFORM_ID,
    retryCount: parsed.data.STEP_RETRY_COUNT,
    backoffSeconds: parsed.data.STEP_RETRY_BACKOFF_SECONDS,
    requestTimeoutMs: parsed.data.REQUEST_TIMEOUT_SECONDS * 1000,
    throttleSeconds: parsed.data.PLATFORM_THROTTLE_SECONDS,
  };
}

export function parsePlatformList(value?: string): Set<string> {
  if (!value) {
    return new Set();
  }
  const items = value.split(',').map((item) => item.trim().toUpperCase());
  return new Set(items.filter((item) => item.length > 0));
}
