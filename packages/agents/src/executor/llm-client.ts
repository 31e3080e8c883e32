import pino from 'pino';
import { z } from 'zod';

import type { TokenUsage } from '@cadre/protocol';
import { PermanentExternalError, TransientExternalError, addUsage, emptyUsage } from '@cadre/protocol';

import type { ReasoningClient, ReasoningRequest, ReasoningResult } from '../types.js';

const logger = pino({ name: 'llm-client', level: process.env.LOG_LEVEL ?? 'info' });

/**
 * LLM message format
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * LLM completion options
 */
export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

/**
 * LLM completion response
 */
export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

export type LLMProvider = 'openai' | 'anthropic';

export interface LLMClientConfig {
  provider?: LLMProvider;
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  /** Per-call timeout, default 120s */
  timeoutMs?: number;
}

export interface UsageSummary extends TokenUsage {
  calls: number;
  byModel: Record<string, TokenUsage & { calls: number }>;
}

// Cost per 1K tokens (approximate)
const MODEL_COSTS: Record<string, { input: number; output: number }> = {
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'claude-3-5-sonnet-20241022': { input: 0.003, output: 0.015 },
  'claude-3-5-haiku-20241022': { input: 0.0008, output: 0.004 },
  'claude-3-opus-20240229': { input: 0.015, output: 0.075 },
};

// Statuses worth another attempt: timeouts, conflicts, rate limits, overload
const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

const OpenAIResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable(),
      }),
    )
    .min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }),
});

const AnthropicResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
  stop_reason: z.string().nullable(),
});

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Retry-After is either delay-seconds or an HTTP date
 */
export function parseRetryAfter(header: string | null, now: Date = new Date()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now.getTime());
}

function costOf(model: string, inputTokens: number, outputTokens: number, fallback: { input: number; output: number }): number {
  const costs = MODEL_COSTS[model] ?? fallback;
  return (inputTokens * costs.input + outputTokens * costs.output) / 1000;
}

/**
 * LLM client supporting OpenAI and Anthropic.
 *
 * Every failure is classified: network errors, timeouts, 408/409/425/429 and
 * 5xx are transient; other 4xx and malformed bodies are permanent. The client
 * does not retry; the Runner owns the retry policy.
 */
export class LLMClient implements ReasoningClient {
  private provider: LLMProvider;
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;
  private usage: UsageSummary = { ...emptyUsage(), calls: 0, byModel: {} };

  constructor(config: LLMClientConfig = {}) {
    this.provider = config.provider ?? 'anthropic';
    this.apiKey = config.apiKey ?? '';
    this.timeoutMs = config.timeoutMs ?? 120_000;

    if (config.baseUrl) {
      this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    } else if (this.provider === 'anthropic') {
      this.baseUrl = 'https://api.anthropic.com';
    } else {
      this.baseUrl = 'https://api.openai.com';
    }

    if (config.defaultModel) {
      this.defaultModel = config.defaultModel;
    } else if (this.provider === 'anthropic') {
      this.defaultModel = 'claude-3-5-sonnet-20241022';
    } else {
      this.defaultModel = 'gpt-4o-mini';
    }
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    const response = await this.complete(
      [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      { model: request.model, maxTokens: request.maxTokens },
    );

    logger.debug(
      { agentId: request.agentId, model: response.model, tokens: response.usage.totalTokens },
      'Reasoning call completed',
    );

    return { text: response.content, usage: response.usage, model: response.model };
  }

  /**
   * Create a completion
   */
  async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<CompletionResponse> {
    const model = options.model || this.defaultModel;

    const response =
      this.provider === 'anthropic'
        ? await this.completeAnthropic(messages, { ...options, model })
        : await this.completeOpenAI(messages, { ...options, model });

    this.track(response);
    return response;
  }

  /**
   * Cumulative usage since construction
   */
  getUsageSummary(): UsageSummary {
    const byModel: UsageSummary['byModel'] = {};
    for (const [model, usage] of Object.entries(this.usage.byModel)) {
      byModel[model] = { ...usage };
    }
    return { ...this.usage, byModel };
  }

  private track(response: CompletionResponse): void {
    const { calls, byModel, ...totals } = this.usage;
    const previous = byModel[response.model];
    byModel[response.model] = {
      ...addUsage(previous ?? emptyUsage(), response.usage),
      calls: (previous?.calls ?? 0) + 1,
    };
    this.usage = { ...addUsage(totals, response.usage), calls: calls + 1, byModel };
  }

  private async post(path: string, headers: Record<string, string>, body: unknown, label: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ reason }, `${label} request did not complete`);
      throw new TransientExternalError(`${label} request failed: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      logger.error({ error: detail, status: response.status }, `${label} API error`);
      const message = `${label} API error: ${response.status} - ${detail}`;

      if (isTransientStatus(response.status)) {
        throw new TransientExternalError(message, {
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        });
      }
      throw new PermanentExternalError(message);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new PermanentExternalError(`${label} returned a body that is not JSON`, { cause: error });
    }
  }

  private async completeOpenAI(
    messages: LLMMessage[],
    options: CompletionOptions & { model: string },
  ): Promise<CompletionResponse> {
    const body = await this.post(
      '/v1/chat/completions',
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: options.model,
        messages,
        max_tokens: options.maxTokens || 4096,
        temperature: options.temperature ?? 0.7,
        stop: options.stopSequences,
      },
      'OpenAI',
    );

    const parsed = OpenAIResponse.safeParse(body);
    if (!parsed.success) {
      throw new PermanentExternalError(`OpenAI returned an unexpected body: ${parsed.error.message}`);
    }
    const data = parsed.data;

    const inputTokens = data.usage.prompt_tokens;
    const outputTokens = data.usage.completion_tokens;
    const choice = data.choices[0];

    return {
      content: choice?.message.content ?? '',
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: data.usage.total_tokens,
        cost: costOf(options.model, inputTokens, outputTokens, { input: 0.001, output: 0.002 }),
      },
      model: options.model,
      finishReason: choice?.finish_reason === 'stop' ? 'stop' : 'length',
    };
  }

  private async completeAnthropic(
    messages: LLMMessage[],
    options: CompletionOptions & { model: string },
  ): Promise<CompletionResponse> {
    const systemMessage = messages.find((m) => m.role === 'system')?.content;
    const nonSystemMessages = messages.flatMap((m) =>
      m.role === 'system' ? [] : [{ role: m.role, content: m.content }],
    );

    const body = await this.post(
      '/v1/messages',
      { 'x-api-key': this.apiKey, 'anthropic-version': '2023-06-01' },
      {
        model: options.model,
        max_tokens: options.maxTokens || 4096,
        system: systemMessage,
        messages: nonSystemMessages,
        temperature: options.temperature ?? 0.7,
        stop_sequences: options.stopSequences,
      },
      'Anthropic',
    );

    const parsed = AnthropicResponse.safeParse(body);
    if (!parsed.success) {
      throw new PermanentExternalError(`Anthropic returned an unexpected body: ${parsed.error.message}`);
    }
    const data = parsed.data;

    const inputTokens = data.usage.input_tokens;
    const outputTokens = data.usage.output_tokens;

    return {
      content: data.content.find((c) => c.type === 'text')?.text ?? '',
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
        cost: costOf(options.model, inputTokens, outputTokens, { input: 0.003, output: 0.015 }),
      },
      model: options.model,
      finishReason: data.stop_reason === 'end_turn' ? 'stop' : 'length',
    };
  }
}
