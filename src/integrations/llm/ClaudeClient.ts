/**
 * Claude Client - LLM integration for job scoring
 *
 * Dedicated Claude integration (no abstraction layer). Scoring needs
 * answers in a fixed shape, so the one entry point is `structured`:
 * a schema-constrained completion via forced tool use.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  Message,
  MessageParam,
  ContentBlock,
  Tool,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  defaultModel: ClaudeModel;
  maxRetries: number;
  timeoutMs: number;
}

export type ClaudeModel =
  | 'claude-sonnet-4-20250514'
  | 'claude-opus-4-20250514'
  | 'claude-3-5-sonnet-20241022'
  | 'claude-3-5-haiku-20241022';

export const CLAUDE_MODELS = [
  'claude-sonnet-4-20250514',
  'claude-opus-4-20250514',
  'claude-3-5-sonnet-20241022',
  'claude-3-5-haiku-20241022',
] as const satisfies readonly ClaudeModel[];

// No SDK retries: a failed call fails its row and the batch moves on
const DEFAULT_CONFIG: Omit<ClaudeClientConfig, 'apiKey'> = {
  defaultModel: 'claude-sonnet-4-20250514',
  maxRetries: 0,
  timeoutMs: 120000,
};

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface ClaudeRequest {
  prompt: string;
  systemPrompt?: string;
  model?: ClaudeModel;
  maxTokens?: number;
  temperature?: number;
}

export interface ClaudeResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  stopReason: string | null;
  latencyMs: number;
}

/**
 * Response schema descriptor. Sent as the only tool the model may call, so
 * the tool input is the structured answer.
 */
export interface ResponseSchema {
  name: string;
  description: string;
  inputSchema: Tool.InputSchema;
}

export interface StructuredRequest extends ClaudeRequest {
  schema: ResponseSchema;
}

export interface StructuredResponse extends ClaudeResponse {
  // Tool input as returned by the model; unvalidated
  output: unknown;
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

/** The part of the client that services depend on */
export type StructuredClient = Pick<ClaudeClient, 'structured'>;

export class ClaudeClient {
  private client: Anthropic;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig>) {
    this.config = {
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY || '',
      defaultModel: config.defaultModel ?? DEFAULT_CONFIG.defaultModel,
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required');
    }

    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      maxRetries: this.config.maxRetries,
      timeout: this.config.timeoutMs,
    });
  }

  // ===========================================================================
  // CORE API
  // ===========================================================================

  /**
   * Ask for an answer shaped by `request.schema`.
   *
   * The model is forced to call the schema's tool; `output` is that call's
   * input. If the model answers in text instead, `output` is undefined and
   * the caller can fall back to `parseJsonContent(content)`.
   */
  async structured(request: StructuredRequest): Promise<StructuredResponse> {
    const startTime = Date.now();

    const response: Message = await this.client.messages.create({
      model: request.model || this.config.defaultModel,
      max_tokens: request.maxTokens || 1024,
      system: request.systemPrompt,
      messages: this.buildMessages(request),
      temperature: request.temperature,
      tools: [
        {
          name: request.schema.name,
          description: request.schema.description,
          input_schema: request.schema.inputSchema,
        },
      ],
      tool_choice: { type: 'tool', name: request.schema.name },
    });

    const toolUse = response.content.find(
      (block): block is ToolUseBlock => block.type === 'tool_use' && block.name === request.schema.name
    );

    return {
      ...this.toClaudeResponse(response, startTime),
      output: toolUse?.input,
    };
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private buildMessages(request: ClaudeRequest): MessageParam[] {
    return [
      {
        role: 'user',
        content: request.prompt,
      },
    ];
  }

  private toClaudeResponse(response: Message, startTime: number): ClaudeResponse {
    const textContent = response.content
      .filter((block): block is ContentBlock & { type: 'text' } => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content: textContent,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: response.stop_reason,
      latencyMs: Date.now() - startTime,
    };
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export interface UsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  avgLatencyMs: number;
}

/**
 * Get token usage statistics
 */
export function getUsageStats(responses: readonly ClaudeResponse[]): UsageStats {
  const totalInputTokens = responses.reduce((sum, r) => sum + r.usage.inputTokens, 0);
  const totalOutputTokens = responses.reduce((sum, r) => sum + r.usage.outputTokens, 0);
  const avgLatencyMs =
    responses.length > 0 ? responses.reduce((sum, r) => sum + r.latencyMs, 0) / responses.length : 0;

  return {
    totalInputTokens,
    totalOutputTokens,
    totalTokens: totalInputTokens + totalOutputTokens,
    avgLatencyMs: Math.round(avgLatencyMs),
  };
}

/**
 * Parse JSON from a text reply, handling markdown code fences.
 * Throws SyntaxError when the content is not JSON.
 */
export function parseJsonContent(content: string): unknown {
  let text = content.trim();

  if (text.startsWith('```json')) {
    text = text.slice(7);
  } else if (text.startsWith('```')) {
    text = text.slice(3);
  }
  if (text.endsWith('```')) {
    text = text.slice(0, -3);
  }

  return JSON.parse(text.trim());
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let clientInstance: ClaudeClient | null = null;

export function getClaudeClient(config?: Partial<ClaudeClientConfig>): ClaudeClient {
  if (!clientInstance) {
    clientInstance = new ClaudeClient(config || {});
  }
  return clientInstance;
}

export function resetClaudeClient(): void {
  clientInstance = null;
}
