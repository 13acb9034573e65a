import { z } from 'zod';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const NodeEnvSchema = z.enum(['development', 'production', 'test']);

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseFloatValue(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function toLowerString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : undefined;
}

const PositiveIntEnvSchema = z.preprocess(parseInteger, z.number().int().positive());
const NonNegativeIntEnvSchema = z.preprocess(parseInteger, z.number().int().min(0));
const RatioEnvSchema = z.preprocess(parseFloatValue, z.number().gt(0).max(1));

export const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(toLowerString, LogLevelSchema).catch('info'),
  SERVICE_NAME: z.preprocess(toTrimmedString, z.string().min(1)).catch('loom'),
  NODE_ENV: z.preprocess(toLowerString, NodeEnvSchema).catch('development'),
  BASE_DIR: z.preprocess(toTrimmedString, z.string()).optional(),
});

export const ConfigEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(toLowerString, LogLevelSchema).catch('info'),
  SERVICE_NAME: z.preprocess(toTrimmedString, z.string().min(1)).catch('loom'),
  NODE_ENV: z.preprocess(toLowerString, NodeEnvSchema).catch('development'),
  BASE_DIR: z.preprocess(toTrimmedString, z.string()).optional(),
  LOOM_MODEL: z.preprocess(toTrimmedString, z.string()).catch('claude-sonnet-4-5'),
  LOOM_MAX_CONTEXT_SIZE: PositiveIntEnvSchema.catch(200_000),
  LOOM_MAX_OUTPUT_TOKENS: PositiveIntEnvSchema.catch(8192),
  LOOM_THINKING_BUDGET: PositiveIntEnvSchema.optional().catch(undefined),
  LOOM_MAX_STEPS_PER_TURN: PositiveIntEnvSchema.catch(100),
  LOOM_MAX_RETRIES_PER_STEP: PositiveIntEnvSchema.catch(3),
  LOOM_COMPACTION_TRIGGER_RATIO: RatioEnvSchema.catch(0.85),
  LOOM_RESERVED_CONTEXT_SIZE: NonNegativeIntEnvSchema.catch(50_000),
  LOOM_MAX_PRESERVED_MESSAGES: NonNegativeIntEnvSchema.catch(2),
  ANTHROPIC_API_KEY: z.preprocess(toTrimmedString, z.string()).optional(),
  ANTHROPIC_BASE_URL: z.preprocess(toTrimmedString, z.string()).optional(),
  npm_package_version: z.preprocess(toTrimmedString, z.string()).optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ConfigEnv = z.infer<typeof ConfigEnvSchema>;
