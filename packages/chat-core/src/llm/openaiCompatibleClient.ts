import { z } from 'zod';

import { ChatCoreError } from '../errors.js';
import type { LLMClient, LLMRequest, LLMResponse, LLMUsage } from './types.js';

type FetchImpl = typeof globalThis.fetch;

export const DEFAULT_CHAT_BASE_URL = 'https://api.perplexity.ai';

export const DEFAULT_TIMEOUT_MS = 60_000;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
    })
    .optional()
    .catch(undefined),
});

const errorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
  message: z.string().optional(),
});

function resolveFetch(): FetchImpl {
  if (typeof globalThis.fetch === 'function') {
    return globalThis.fetch;
  }

  throw new Error(
    'Global fetch API is not available in this runtime. Provide fetchImpl when constructing OpenAICompatibleClient.',
  );
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractServerMessage(body: string): string {
  const parsed = errorBodySchema.safeParse(parseJson(body));
  if (parsed.success) {
    const { error, message } = parsed.data;
    if (typeof error === 'object') {
      return error.message;
    }
    if (typeof error === 'string' && error.trim()) {
      return error;
    }
    if (message?.trim()) {
      return message;
    }
  }
  return body.trim() || 'no details provided';
}

function errorForStatus(status: number, body: string): ChatCoreError {
  switch (status) {
    case 400:
      return new ChatCoreError('INVALID_ARGUMENT', `Request rejected by the chat endpoint: ${extractServerMessage(body)}`, {
        status,
        body,
      });
    case 401:
      return new ChatCoreError('AUTH_ERROR', 'The chat endpoint rejected the API key (401 Unauthorized)', {
        status,
        body,
      });
    case 429:
      return new ChatCoreError('RATE_LIMITED', 'Rate limit reached on the chat endpoint (429 Too Many Requests)', {
        status,
        body,
      });
    default:
      return new ChatCoreError('REMOTE_ERROR', `LLM request failed with status ${status}: ${body}`, {
        status,
        body,
      });
  }
}

export interface OpenAICompatibleClientOptions {
  fetchImpl?: FetchImpl;
  timeoutMs?: number;
}

export class OpenAICompatibleClient implements LLMClient {
  private readonly baseUrl: string;

  private readonly apiKey?: string;

  private readonly defaultModel?: string;

  private readonly fetchImpl: FetchImpl;

  private readonly timeoutMs: number;

  constructor(
    baseUrl: string,
    apiKey?: string,
    defaultModel?: string,
    options: OpenAICompatibleClientOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.apiKey = apiKey;
    this.defaultModel = defaultModel;
    this.fetchImpl = options.fetchImpl ?? resolveFetch();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async complete(req: LLMRequest): Promise<LLMResponse> {
    const model = req.model || this.defaultModel;

    if (!model) {
      throw new ChatCoreError(
        'INVALID_ARGUMENT',
        'LLM model name is required. Provide it in the request or configure a default model.',
      );
    }

    const messages = [] as Array<{ role: 'system' | 'user'; content: string }>;

    if (req.systemPrompt) {
      messages.push({ role: 'system', content: req.systemPrompt });
    }

    messages.push({ role: 'user', content: req.prompt });

    const payload: Record<string, unknown> = {
      model,
      messages,
    };

    if (typeof req.temperature === 'number') {
      payload.temperature = req.temperature;
    }

    if (typeof req.maxTokens === 'number') {
      payload.max_tokens = req.maxTokens;
    }

    const url = `${this.baseUrl}/chat/completions`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let ok: boolean;
    let bodyText: string;

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      bodyText = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ChatCoreError('NETWORK_TIMEOUT', `LLM request timed out after ${this.timeoutMs} ms`, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ChatCoreError('NETWORK_ERROR', `LLM request could not reach ${url}: ${reason}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!ok) {
      throw errorForStatus(status, bodyText);
    }

    const parsed = completionSchema.safeParse(parseJson(bodyText));

    if (!parsed.success) {
      throw new ChatCoreError('REMOTE_ERROR', 'LLM response did not include a message content string.', {
        status,
        body: bodyText,
      });
    }

    const { choices, usage } = parsed.data;
    const normalizedUsage: LLMUsage | undefined = usage
      ? { promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens }
      : undefined;

    return {
      text: choices[0].message.content,
      usage: normalizedUsage,
      raw: parsed.data,
    };
  }
}

export default OpenAICompatibleClient;
