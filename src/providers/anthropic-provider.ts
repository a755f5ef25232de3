import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, LLMResult, RequestOptions, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { toJsonSchema } from './json-schema';
import { logPrompt, parseApiResponse, validateStructured, type DebugOptions } from './structured-output';
import {
  ANTHROPIC_MESSAGE_SCHEMA,
  type AnthropicMessage,
  type AnthropicToolUseBlock,
  isTextBlock,
  isToolUseBlock,
} from '../schemas/api-schemas';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { debug as logDebug } from '../output/logger';

export interface AnthropicConfig extends DebugOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-haiku-latest',
  maxTokens: 1024,
  temperature: 0,
};

export function describeAnthropicError(e: unknown): Error {
  if (e instanceof Anthropic.APIUserAbortError) {
    return e;
  }
  // Subclasses before the APIError base
  if (e instanceof Anthropic.RateLimitError) {
    return new ProcessingError(`Anthropic rate limit exceeded: ${e.message}`);
  }
  if (e instanceof Anthropic.AuthenticationError) {
    return new ProcessingError(`Anthropic authentication failed: ${e.message}`);
  }
  if (e instanceof Anthropic.BadRequestError) {
    return new ProcessingError(`Anthropic bad request: ${e.message}`);
  }
  if (e instanceof Anthropic.APIError) {
    return new ProcessingError(`Anthropic API error (${e.status ?? 'no status'}): ${e.message}`);
  }
  const err = handleUnknownError(e, 'Anthropic API call');
  return new ProcessingError(`Anthropic API call failed: ${err.message}`);
}

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private debugOptions: DebugOptions;
  private builder: RequestBuilder;

  constructor(config: AnthropicConfig, builder?: RequestBuilder) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.model = config.model ?? AnthropicDefaultConfig.model;
    this.maxTokens = config.maxTokens ?? AnthropicDefaultConfig.maxTokens;
    this.temperature = config.temperature ?? AnthropicDefaultConfig.temperature;
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

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      system: systemPrompt,
      messages: [{ role: 'user', content: `Input:\n\n${content}` }],
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      tools: [this.toTool(schema)],
      tool_choice: { type: 'tool', name: schema.name },
    };

    print(`Sending request to Anthropic: model=${this.model} maxTokens=${this.maxTokens} temperature=${this.temperature}`);
    logPrompt(this.debugOptions, systemPrompt, content, print);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(
        params,
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (e: unknown) {
      throw describeAnthropicError(e);
    }

    const response = parseApiResponse(ANTHROPIC_MESSAGE_SCHEMA, rawResponse, 'Anthropic');
    print(
      `LLM response meta: input_tokens=${response.usage.input_tokens} output_tokens=${response.usage.output_tokens} stop_reason=${response.stop_reason ?? 'none'}`
    );
    if (this.debugOptions.debugJson) {
      print('Full JSON response:');
      print(JSON.stringify(rawResponse, null, 2));
    }

    const input = this.extractToolInput(response, schema.name);
    return {
      data: validateStructured(schema, input),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private toTool<T>(schema: StructuredSchema<T>): Anthropic.Messages.Tool {
    return {
      name: schema.name,
      description: `Submit the ${schema.name} extraction result`,
      input_schema: {
        ...toJsonSchema(schema.schema),
        type: 'object',
      },
    };
  }

  private extractToolInput(response: AnthropicMessage, expectedToolName: string): unknown {
    const blocks = response.content;
    if (blocks.length === 0) {
      throw new ProcessingError('Empty response from Anthropic API (no content blocks).');
    }

    const toolBlock = blocks.find(
      (block): block is AnthropicToolUseBlock => isToolUseBlock(block) && block.name === expectedToolName
    );
    if (toolBlock) {
      return toolBlock.input;
    }

    const otherTools = blocks.filter(isToolUseBlock).map((block) => block.name);
    if (otherTools.length > 0) {
      throw new ProcessingError(`Expected tool call '${expectedToolName}' but received: ${otherTools.join(', ')}`);
    }

    const firstText = blocks.find(isTextBlock);
    if (firstText) {
      const preview = firstText.text.slice(0, 200);
      throw new ProcessingError(
        `No tool call received for ${expectedToolName}. Response contains text instead: ${preview}${firstText.text.length > 200 ? '...' : ''}`
      );
    }

    throw new ProcessingError(`No tool call received for ${expectedToolName}.`);
  }
}
