import { z } from 'zod';
import type { HttpFetcher } from '../../adapters/http';
import type { LlmGenerateRequest, LlmGenerateResponse } from '../types';
import { BaseHttpLlmProvider, mergeConsecutiveMessages } from './base';

export interface ClaudeProviderOptions {
  model?: string;
  endpoint?: string;
  fetcher?: HttpFetcher;
  anthropicVersion?: string;
}

const messagesPayloadSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export class ClaudeLlmProvider extends BaseHttpLlmProvider {
  private readonly anthropicVersion: string;

  constructor(options: ClaudeProviderOptions = {}) {
    super({
      id: 'claude',
      model: options.model ?? 'claude-3-5-sonnet-latest',
      endpoint: options.endpoint ?? 'https://api.anthropic.com/v1/messages',
      fetcher: options.fetcher,
    });
    this.anthropicVersion = options.anthropicVersion ?? '2023-06-01';
  }

  protected buildRequestBody(request: LlmGenerateRequest): unknown {
    const messages = mergeConsecutiveMessages(request.messages);
    // The Messages API requires the conversation to open with a user message.
    if (messages[0]?.role !== 'user') {
      messages.unshift({ role: 'user', content: '(conversation resumed)' });
    }

    return {
      model: this.model,
      max_tokens: request.maxOutputTokens ?? 1024,
      temperature: request.temperature,
      system: request.systemPrompt,
      messages,
      ...(request.metadata?.user_id ? { metadata: { user_id: request.metadata.user_id } } : {}),
    };
  }

  protected buildHeaders(apiKey: string): Record<string, string> {
    return {
      'content-type': 'application/json',
      'x-api-key': apiKey,
      'anthropic-version': this.anthropicVersion,
    };
  }

  protected parseResponse(raw: unknown): LlmGenerateResponse {
    const parsed = messagesPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.invalidResponse(parsed.error.message);
    }

    const text = parsed.data.content
      .filter((item) => item.type === 'text' && typeof item.text === 'string')
      .map((item) => item.text)
      .join('\n');

    return {
      provider: 'claude',
      model: this.model,
      content: text,
      usage: {
        inputTokens: parsed.data.usage?.input_tokens,
        outputTokens: parsed.data.usage?.output_tokens,
      },
      raw,
    };
  }
}
