/**
 * Test factories shared across suites
 */

import type { JobRecord } from '../../domain/entities/JobRecord.js';
import type { SponsorRegistry } from '../../domain/entities/SponsorRegistry.js';
import { loadRegistry } from '../../domain/services/RegistryIndex.js';
import type { StructuredResponse } from '../../integrations/llm/ClaudeClient.js';

export function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    companyName: 'Acme Consulting Ltd',
    title: 'Data Engineer',
    location: 'London, UK',
    description: 'Build batch and streaming pipelines in Python.',
    extra: {},
    ...overrides,
  };
}

export function makeRegistry(names: string[]): SponsorRegistry {
  const csv = ['Organisation Name,Town/City', ...names.map((name) => `"${name}",London`)].join('\n');
  return loadRegistry(csv);
}

export function structuredResponse(output: unknown, content = ''): StructuredResponse {
  return {
    content,
    output,
    model: 'claude-sonnet-4-20250514',
    usage: { inputTokens: 100, outputTokens: 20, totalTokens: 120 },
    stopReason: 'tool_use',
    latencyMs: 5,
  };
}

export function scoreOutput(match_score: number, reasoning = `Scored ${match_score}`) {
  return structuredResponse({ match_score, reasoning });
}
