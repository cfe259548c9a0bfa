import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { InvalidConfigError } from '../errors';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type LLMProviderType = 'openai' | 'anthropic';

export const LLM_PROVIDER_TYPES: readonly LLMProviderType[] = ['openai', 'anthropic'];

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  staticDir: string;

  // OpenAI-compatible chat completions (OpenAI, Groq, ...)
  openaiApiKey: string;
  openaiApiBase: string;
  openaiModel: string;

  // Anthropic
  anthropicApiKey: string;
  anthropicModel: string;

  // LLM
  defaultLlmProvider: LLMProviderType;
  llmMaxTokens: number;
  llmMaxAttempts: number;

  // Summary pipeline
  chunkDurationSeconds: number;
  summaryConcurrency: number;
  summaryTimeoutMs: number;
  metadataTimeoutMs: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvProvider(key: string, defaultValue: LLMProviderType): LLMProviderType {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  const match = LLM_PROVIDER_TYPES.find((type) => type === value);
  if (!match) {
    throw new InvalidConfigError(`${key} must be one of ${LLM_PROVIDER_TYPES.join(', ')}`);
  }
  return match;
}

function requirePositive(key: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(`${key} must be a positive number, got ${value}`);
  }
  return value;
}

function requirePositiveInteger(key: string, value: number): number {
  const whole = Math.floor(value);
  if (!Number.isFinite(whole) || whole < 1) {
    throw new InvalidConfigError(`${key} must be a positive integer, got ${value}`);
  }
  return whole;
}

/**
 * Mirrors a default thread pool: a few more workers than cores, capped at 32.
 */
export function defaultConcurrency(): number {
  return Math.min(32, os.availableParallelism() + 4);
}

export function loadConfig(): Config {
  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),
    staticDir: getEnvString('STATIC_DIR', path.resolve(__dirname, '../../../frontend/dist')),

    // OpenAI-compatible
    openaiApiKey: getEnvString('OPENAI_API_KEY'),
    openaiApiBase: getEnvString('OPENAI_API_BASE', 'https://api.openai.com/v1'),
    openaiModel: getEnvString('OPENAI_MODEL', 'gpt-4o-mini'),

    // Anthropic
    anthropicApiKey: getEnvString('ANTHROPIC_API_KEY'),
    anthropicModel: getEnvString('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),

    // LLM
    defaultLlmProvider: getEnvProvider('DEFAULT_LLM_PROVIDER', 'openai'),
    llmMaxTokens: requirePositive('LLM_MAX_TOKENS', getEnvNumber('LLM_MAX_TOKENS', 500)),
    llmMaxAttempts: requirePositiveInteger('LLM_MAX_ATTEMPTS', getEnvNumber('LLM_MAX_ATTEMPTS', 1)),

    // Summary pipeline
    chunkDurationSeconds: requirePositive(
      'CHUNK_DURATION_SECONDS',
      getEnvNumber('CHUNK_DURATION_SECONDS', 4000)
    ),
    summaryConcurrency: requirePositiveInteger(
      'SUMMARY_CONCURRENCY',
      getEnvNumber('SUMMARY_CONCURRENCY', defaultConcurrency())
    ),
    summaryTimeoutMs: requirePositive('SUMMARY_TIMEOUT_MS', getEnvNumber('SUMMARY_TIMEOUT_MS', 30000)),
    metadataTimeoutMs: requirePositive('METADATA_TIMEOUT_MS', getEnvNumber('METADATA_TIMEOUT_MS', 5000)),
  };
}

export const config = loadConfig();
