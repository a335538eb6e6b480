/**
 * Environment configuration
 *
 * Read once at startup; `dotenv/config` is imported by the entry point
 * before this module is used.
 */

import { z } from 'zod';
import { CLAUDE_MODELS, type ClaudeModel } from '../integrations/llm/ClaudeClient.js';
import { SPONSOR_PAGE_URL } from '../integrations/registry/SponsorRegisterClient.js';
import { DEFAULT_NAME_COLUMN } from '../domain/services/RegistryIndex.js';
import { MIN_MATCH_SCORE } from '../domain/services/JobRanking.js';
import { DEFAULT_REQUEST_INTERVAL_MS } from '../domain/services/RequestPacer.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  ANTHROPIC_API_KEY: z.string().default(''),
  SCORING_MODEL: z.enum(CLAUDE_MODELS).default('claude-sonnet-4-20250514'),
  SCORING_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  SCORING_DELAY_MS: z.coerce.number().int().min(DEFAULT_REQUEST_INTERVAL_MS).default(DEFAULT_REQUEST_INTERVAL_MS),
  MIN_MATCH_SCORE: z.coerce.number().int().min(0).max(100).default(MIN_MATCH_SCORE),
  REGISTRY_SOURCE: z.string().min(1).default(SPONSOR_PAGE_URL),
  REGISTRY_NAME_COLUMN: z.string().min(1).default(DEFAULT_NAME_COLUMN),
  CORS_ORIGIN: z.string().default('*'),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  anthropicApiKey: string;
  scoringModel: ClaudeModel;
  scoringTimeoutMs: number;
  scoringDelayMs: number;
  minMatchScore: number;
  registrySource: string;
  registryNameColumn: string;
  corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY.trim().replace(/^["']|["']$/g, ''),
    scoringModel: parsed.SCORING_MODEL,
    scoringTimeoutMs: parsed.SCORING_TIMEOUT_MS,
    scoringDelayMs: parsed.SCORING_DELAY_MS,
    minMatchScore: parsed.MIN_MATCH_SCORE,
    registrySource: parsed.REGISTRY_SOURCE,
    registryNameColumn: parsed.REGISTRY_NAME_COLUMN,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}

let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
