/**
 * Configuration Service
 *
 * Centralized configuration for the agent runtime, read from validated
 * environment variables (a `.env` file is loaded by the CLI before anything else).
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { type ConfigEnv, ConfigEnvSchema } from './env-schemas';
import { createLogger } from './logger.service';

const logger = createLogger('config');

/**
 * Expand environment variables in a string.
 * Handles $VAR and ${VAR} syntax.
 */
function expandEnvVars(value: string): string {
  return value.replace(/\$\{?([A-Z_][A-Z0-9_]*)\}?/gi, (match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return expandEnvVars(envValue);
    }
    return match;
  });
}

/**
 * Knobs of the turn/step loop and of automatic compaction.
 */
export interface LoopControl {
  maxStepsPerTurn: number;
  maxRetriesPerStep: number;
  compactionTriggerRatio: number;
  reservedContextSize: number;
  maxPreservedMessages: number;
}

export const DEFAULT_LOOP_CONTROL: LoopControl = {
  maxStepsPerTurn: 100,
  maxRetriesPerStep: 3,
  compactionTriggerRatio: 0.85,
  reservedContextSize: 50_000,
  maxPreservedMessages: 2,
};

export interface ModelConfig {
  model: string;
  maxContextSize: number;
  maxOutputTokens: number;
  /** Extended thinking budget in tokens; unset disables thinking. */
  thinkingBudget?: number;
  apiKey?: string;
  baseURL?: string;
}

interface SystemConfig {
  baseDir: string;
  sessionsDir: string;
  nodeEnv: 'development' | 'production' | 'test';
  version: string;
  loopControl: LoopControl;
  model: ModelConfig;
}

function loadSystemConfig(): SystemConfig {
  const env: ConfigEnv = ConfigEnvSchema.parse(process.env);
  const baseDir = env.BASE_DIR ? expandEnvVars(env.BASE_DIR) : join(homedir(), '.loom');

  return {
    baseDir,
    sessionsDir: join(baseDir, 'sessions'),
    nodeEnv: env.NODE_ENV,
    version: env.npm_package_version ?? '0.1.0',
    loopControl: {
      maxStepsPerTurn: env.LOOM_MAX_STEPS_PER_TURN,
      maxRetriesPerStep: env.LOOM_MAX_RETRIES_PER_STEP,
      compactionTriggerRatio: env.LOOM_COMPACTION_TRIGGER_RATIO,
      reservedContextSize: env.LOOM_RESERVED_CONTEXT_SIZE,
      maxPreservedMessages: env.LOOM_MAX_PRESERVED_MESSAGES,
    },
    model: {
      model: env.LOOM_MODEL,
      maxContextSize: env.LOOM_MAX_CONTEXT_SIZE,
      maxOutputTokens: env.LOOM_MAX_OUTPUT_TOKENS,
      thinkingBudget: env.LOOM_THINKING_BUDGET,
      apiKey: env.ANTHROPIC_API_KEY,
      baseURL: env.ANTHROPIC_BASE_URL,
    },
  };
}

class ConfigService {
  private config: SystemConfig;

  constructor() {
    this.config = loadSystemConfig();
    this.validateConfig();
  }

  private validateConfig(): void {
    const { loopControl, model } = this.config;
    if (loopControl.reservedContextSize >= model.maxContextSize) {
      logger.warn('Reserved context size is not smaller than the model context window', {
        reservedContextSize: loopControl.reservedContextSize,
        maxContextSize: model.maxContextSize,
      });
    }
    if (!model.apiKey) {
      logger.debug('ANTHROPIC_API_KEY is not set; prompts will fail until a model is configured');
    }
  }

  getSystemConfig(): SystemConfig {
    return { ...this.config };
  }

  /**
   * Get base directory for all loom data
   */
  getBaseDir(): string {
    return this.config.baseDir;
  }

  getSessionsDir(): string {
    return this.config.sessionsDir;
  }

  getLoopControl(): LoopControl {
    return { ...this.config.loopControl };
  }

  getModelConfig(): ModelConfig {
    return { ...this.config.model };
  }

  getVersion(): string {
    return this.config.version;
  }

  getEnvironment(): 'development' | 'production' | 'test' {
    return this.config.nodeEnv;
  }

  isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  /**
   * Reload configuration from environment
   */
  reload(): void {
    this.config = loadSystemConfig();
    this.validateConfig();
    logger.debug('Configuration reloaded');
  }
}

export const configService = new ConfigService();
