import OpenAI from 'openai';
import type { RequestOptions } from './llm-provider';
import { describeOpenAIError } from './openai-provider';
import { parseApiResponse } from './structured-output';
import { OPENAI_EMBEDDING_RESPONSE_SCHEMA } from '../schemas/api-schemas';
import { ProcessingError } from '../errors/index';

export interface EmbeddingProvider {
  embed(texts: string[], options?: RequestOptions): Promise<number[][]>;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
}

export const EmbeddingDefaultConfig = {
  model: 'text-embedding-3-small',
};

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIEmbeddingConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 2 });
    this.model = config.model ?? EmbeddingDefaultConfig.model;
  }

  async embed(texts: string[], options: RequestOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.embeddings.create(
        { model: this.model, input: texts },
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (e: unknown) {
      throw describeOpenAIError(e);
    }

    const response = parseApiResponse(OPENAI_EMBEDDING_RESPONSE_SCHEMA, rawResponse, 'OpenAI embeddings');
    if (response.data.length !== texts.length) {
      throw new ProcessingError(
        `Embedding count mismatch: sent ${texts.length} texts, received ${response.data.length} vectors`
      );
    }
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
