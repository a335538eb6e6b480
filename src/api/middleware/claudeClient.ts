/**
 * Claude client for a request
 *
 * A per-request key (X-Anthropic-Api-Key) takes precedence over the
 * configured one.
 */

import type { Request } from 'express';
import type { AppConfig } from '../../config/env.js';
import { ClaudeClient, getClaudeClient } from '../../integrations/llm/ClaudeClient.js';
import { BadRequestError } from './errorHandler.js';

export function getRequestApiKey(req: Request): string | undefined {
  const header = req.headers['x-anthropic-api-key'];
  const value = (Array.isArray(header) ? header[0] : header)?.trim();
  return value || undefined;
}

export function createRequestClaudeClient(req: Request, config: AppConfig): ClaudeClient {
  const clientConfig = {
    defaultModel: config.scoringModel,
    timeoutMs: config.scoringTimeoutMs,
    maxRetries: 0,
  };

  const headerApiKey = getRequestApiKey(req);
  if (headerApiKey) {
    return new ClaudeClient({ ...clientConfig, apiKey: headerApiKey });
  }
  if (!config.anthropicApiKey) {
    throw new BadRequestError('An Anthropic API key is required (X-Anthropic-Api-Key header)');
  }
  return getClaudeClient({ ...clientConfig, apiKey: config.anthropicApiKey });
}
