import OpenAI from 'openai';
import type { LLMProvider, LLMResult, RequestOptions, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { toJsonSchema } from './json-schema';
import { logPrompt, parseApiResponse, validateStructured, type DebugOptions } from './structured-output';
import { OPENAI_RESPONSE_SCHEMA } from '../schemas/api-schemas';
import { ProcessingError, ValidationError, handleUnknownError } from '../errors/index';
import { debug as logDebug } from '../output/logger';

export interface OpenAIConfig extends DebugOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o-mini',
  temperature: 0,
};

/*
 * Maps OpenAI SDK failures onto a ProcessingError. Aborts pass through
 * untouched so callers can tell a timeout or cancellation apart.
 */
export function describeOpenAIError(e: unknown): Error {
  if (e instanceof OpenAI.APIUserAbortError) {
    return e;
  }
  if (e instanceof OpenAI.RateLimitError) {
    return new ProcessingError(`OpenAI rate limit exceeded: ${e.message}`);
  }
  if (e instanceof OpenAI.AuthenticationError) {
    return new ProcessingError(`OpenAI authentication failed: ${e.message}`);
  }
  if (e instanceof OpenAI.APIError) {
    return new ProcessingError(`OpenAI API error (${e.status ?? 'no status'}): ${e.message}`);
  }
  const err = handleUnknownError(e, 'OpenAI API call');
  return new ProcessingError(`OpenAI API call failed: ${err.message}`);
}

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private debugOptions: DebugOptions;
  private builder: RequestBuilder;

  constructor(config: OpenAIConfig, builder?: RequestBuilder) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.model = config.model ?? OpenAIDefaultConfig.model;
    this.temperature = config.temperature ?? OpenAIDefaultConfig.temperature;
    this.debugOptions = config;
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  async runPromptStructured<T>(
    content: string,
    promptText: string,
    schema: StructuredSchema<T>,
    options: RequestOptions = {}
  ): Promise<LLMResult<T>> {
    const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);
    const print = (message: string): void => logDebug(this.debugOptions.debug, message);

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      temperature: this.temperature,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `Input:\n\n${content}` },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema.name,
          schema: toJsonSchema(schema.schema),
        },
      },
    };

    print(`Sending request to OpenAI: model=${this.model} temperature=${this.temperature}`);
    logPrompt(this.debugOptions, systemPrompt, content, print);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(
        params,
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (e: unknown) {
      throw describeOpenAIError(e);
    }

    const response = parseApiResponse(OPENAI_RESPONSE_SCHEMA, rawResponse, 'OpenAI');

    const firstChoice = response.choices[0];
    if (response.usage) {
      print(
        `LLM response meta: prompt_tokens=${response.usage.prompt_tokens} completion_tokens=${response.usage.completion_tokens} finish_reason=${firstChoice?.finish_reason ?? 'unknown'}`
      );
    }
    if (this.debugOptions.debugJson) {
      print('Full JSON response:');
      print(JSON.stringify(rawResponse, null, 2));
    }

    const responseText = firstChoice?.message.content?.trim();
    if (!responseText) {
      throw new ProcessingError('Empty response from OpenAI API (no content).');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'JSON parsing');
      const preview = responseText.slice(0, 200);
      throw new ValidationError(
        `Failed to parse structured JSON response: ${err.message}. Preview: ${preview}${responseText.length > 200 ? ' ...' : ''}`,
        e
      );
    }

    const data = validateStructured(schema, parsed);
    return {
      data,
      ...(response.usage && {
        usage: {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        },
      }),
    };
  }
}
