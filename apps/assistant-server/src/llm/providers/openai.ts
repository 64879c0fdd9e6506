import { z } from 'zod';
import type { HttpFetcher } from '../../adapters/http';
import type { LlmGenerateRequest, LlmGenerateResponse } from '../types';
import { BaseHttpLlmProvider, mergeConsecutiveMessages } from './base';

export interface OpenAiProviderOptions {
  model?: string;
  endpoint?: string;
  fetcher?: HttpFetcher;
}

const usageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  })
  .optional();

const responsesPayloadSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        type: z.string(),
        content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
      }),
    )
    .optional(),
  usage: usageSchema,
});

/** Responses API. `output_text` is preferred; otherwise the message parts are joined. */
export class OpenAiLlmProvider extends BaseHttpLlmProvider {
  constructor(options: OpenAiProviderOptions = {}) {
    super({
      id: 'openai',
      model: options.model ?? 'gpt-4.1-mini',
      endpoint: options.endpoint ?? 'https://api.openai.com/v1/responses',
      fetcher: options.fetcher,
    });
  }

  protected buildRequestBody(request: LlmGenerateRequest): unknown {
    return {
      model: this.model,
      input: [{ role: 'system', content: request.systemPrompt }, ...mergeConsecutiveMessages(request.messages)],
      temperature: request.temperature,
      max_output_tokens: request.maxOutputTokens,
      metadata: request.metadata,
      ...(request.jsonMode ? { text: { format: { type: 'json_object' } } } : {}),
    };
  }

  protected buildHeaders(apiKey: string): Record<string, string> {
    return {
      'content-type': 'application/json',
      authorization: `Bearer ${apiKey}`,
    };
  }

  protected parseResponse(raw: unknown): LlmGenerateResponse {
    const parsed = responsesPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.invalidResponse(parsed.error.message);
    }

    const payload = parsed.data;
    const content =
      payload.output_text ??
      (payload.output ?? [])
        .filter((item) => item.type === 'message')
        .flatMap((item) => item.content ?? [])
        .filter((part) => part.type === 'output_text')
        .map((part) => part.text ?? '')
        .join('');

    return {
      provider: 'openai',
      model: this.model,
      content,
      usage: {
        inputTokens: payload.usage?.input_tokens,
        outputTokens: payload.usage?.output_tokens,
      },
      raw,
    };
  }
}
