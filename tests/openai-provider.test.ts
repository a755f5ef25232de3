import { describe, it, expect, vi, beforeEach } from 'vitest';

// Hoist SDK doubles so the mock factory and the tests share identities
const SDK = vi.hoisted(() => {
  class APIError extends Error {
    readonly status: number | undefined;
    constructor(message: string, status?: number) {
      super(message);
      this.name = 'APIError';
      this.status = status;
    }
  }

  class APIUserAbortError extends APIError {
    constructor() {
      super('Request was aborted.');
      this.name = 'APIUserAbortError';
    }
  }

  class RateLimitError extends APIError {
    constructor(message: string) {
      super(message, 429);
      this.name = 'RateLimitError';
    }
  }

  class AuthenticationError extends APIError {
    constructor(message: string) {
      super(message, 401);
      this.name = 'AuthenticationError';
    }
  }

  const chatCreate = vi.fn();
  const embeddingsCreate = vi.fn();

  class OpenAI {
    static APIError = APIError;
    static APIUserAbortError = APIUserAbortError;
    static RateLimitError = RateLimitError;
    static AuthenticationError = AuthenticationError;

    readonly chat = { completions: { create: chatCreate } };
    readonly embeddings = { create: embeddingsCreate };
  }

  return { OpenAI, APIError, APIUserAbortError, RateLimitError, AuthenticationError, chatCreate, embeddingsCreate };
});

vi.mock('openai', () => ({ default: SDK.OpenAI }));

import { OpenAIProvider } from '../src/providers/openai-provider';
import { OpenAIEmbeddingProvider } from '../src/providers/embedding-provider';
import { DEFAULT_EXTRACTION_DIRECTIVE, DefaultRequestBuilder } from '../src/providers/request-builder';
import { BIRTH_RESPONSE_SCHEMA } from '../src/schemas/claim-schemas';
import { ProcessingError, ValidationError } from '../src/errors/index';
import { APIResponseError, SchemaValidationError } from '../src/errors/validation-errors';

const schema = { name: 'birth_year_extraction', schema: BIRTH_RESPONSE_SCHEMA };

function completion(content: string | null, withUsage = true): unknown {
  return {
    choices: [{ message: { content }, finish_reason: 'stop' }],
    ...(withUsage && { usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 } }),
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    SDK.chatCreate.mockReset();
    SDK.embeddingsCreate.mockReset();
  });

  describe('Structured Response Handling', () => {
    it('returns validated data and token usage', async () => {
      SDK.chatCreate.mockResolvedValue(
        completion('{"reasoning":"Infobox.","contains_birthdate":true,"birth_year":1950}')
      );
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      const result = await provider.runPromptStructured('chunk text', 'Find the birth year.', schema);

      expect(result).toEqual({
        data: { reasoning: 'Infobox.', contains_birthdate: true, birth_year: 1950 },
        usage: { inputTokens: 120, outputTokens: 30 },
      });
    });

    it('sends the directive, the chunk and the JSON schema', async () => {
      SDK.chatCreate.mockResolvedValue(completion('{"reasoning":"","contains_birthdate":false,"birth_year":null}'));
      const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-4o', temperature: 0.3 });

      await provider.runPromptStructured('chunk text', 'Find the birth year.', schema);

      expect(SDK.chatCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'gpt-4o',
          temperature: 0.3,
          messages: [
            { role: 'system', content: `Find the birth year.\n\n${DEFAULT_EXTRACTION_DIRECTIVE}` },
            { role: 'user', content: 'Input:\n\nchunk text' },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: expect.objectContaining({ name: 'birth_year_extraction' }),
          },
        }),
        undefined
      );
    });

    it('uses the injected request builder and forwards the signal', async () => {
      SDK.chatCreate.mockResolvedValue(completion('{"reasoning":"","contains_birthdate":false,"birth_year":null}'));
      const provider = new OpenAIProvider({ apiKey: 'test-key' }, new DefaultRequestBuilder('DIR'));
      const controller = new AbortController();

      await provider.runPromptStructured('c', 'P', schema, { signal: controller.signal });

      expect(SDK.chatCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          messages: [
            { role: 'system', content: 'P\n\nDIR' },
            { role: 'user', content: 'Input:\n\nc' },
          ],
        }),
        { signal: controller.signal }
      );
    });

    it('omits usage when the API reports none', async () => {
      SDK.chatCreate.mockResolvedValue(
        completion('{"reasoning":"","contains_birthdate":false,"birth_year":null}', false)
      );
      const result = await new OpenAIProvider({ apiKey: 'test-key' }).runPromptStructured('c', 'P', schema);

      expect(result.usage).toBeUndefined();
    });

    it('rejects empty content', async () => {
      SDK.chatCreate.mockResolvedValue(completion('  '));
      await expect(new OpenAIProvider({ apiKey: 'test-key' }).runPromptStructured('c', 'P', schema)).rejects.toThrow(
        new ProcessingError('Empty response from OpenAI API (no content).')
      );
    });

    it('rejects content that is not JSON', async () => {
      SDK.chatCreate.mockResolvedValue(completion('born in 1950'));
      const pending = new OpenAIProvider({ apiKey: 'test-key' }).runPromptStructured('c', 'P', schema);

      await expect(pending).rejects.toBeInstanceOf(ValidationError);
      await expect(pending).rejects.toThrow(/^Failed to parse structured JSON response: .*Preview: born in 1950$/);
    });

    it('rejects JSON that misses the schema', async () => {
      SDK.chatCreate.mockResolvedValue(completion('{"reasoning":"","contains_birthdate":"yes","birth_year":null}'));
      await expect(
        new OpenAIProvider({ apiKey: 'test-key' }).runPromptStructured('c', 'P', schema)
      ).rejects.toBeInstanceOf(SchemaValidationError);
    });

    it('rejects a malformed API payload', async () => {
      SDK.chatCreate.mockResolvedValue({ choices: [] });
      await expect(
        new OpenAIProvider({ apiKey: 'test-key' }).runPromptStructured('c', 'P', schema)
      ).rejects.toBeInstanceOf(APIResponseError);
    });
  });

  describe('Error Handling', () => {
    const provider = (): OpenAIProvider => new OpenAIProvider({ apiKey: 'test-key' });

    it('maps rate limits', async () => {
      SDK.chatCreate.mockRejectedValue(new SDK.RateLimitError('slow down'));
      await expect(provider().runPromptStructured('c', 'P', schema)).rejects.toThrow(
        'OpenAI rate limit exceeded: slow down'
      );
    });

    it('maps authentication failures', async () => {
      SDK.chatCreate.mockRejectedValue(new SDK.AuthenticationError('bad key'));
      await expect(provider().runPromptStructured('c', 'P', schema)).rejects.toThrow(
        'OpenAI authentication failed: bad key'
      );
    });

    it('maps other API errors with their status', async () => {
      SDK.chatCreate.mockRejectedValue(new SDK.APIError('boom', 500));
      await expect(provider().runPromptStructured('c', 'P', schema)).rejects.toThrow('OpenAI API error (500): boom');
    });

    it('passes aborts through unchanged', async () => {
      const abort = new SDK.APIUserAbortError();
      SDK.chatCreate.mockRejectedValue(abort);
      await expect(provider().runPromptStructured('c', 'P', schema)).rejects.toBe(abort);
    });

    it('wraps unknown failures', async () => {
      SDK.chatCreate.mockRejectedValue('socket closed');
      await expect(provider().runPromptStructured('c', 'P', schema)).rejects.toThrow(
        'OpenAI API call failed: OpenAI API call: socket closed'
      );
    });
  });
});

describe('OpenAIEmbeddingProvider', () => {
  beforeEach(() => {
    SDK.embeddingsCreate.mockReset();
  });

  it('returns vectors in input order', async () => {
    SDK.embeddingsCreate.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    const embeddings = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });

    await expect(embeddings.embed(['first', 'second'])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(SDK.embeddingsCreate).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: ['first', 'second'] },
      undefined
    );
  });

  it('skips the call for no texts', async () => {
    await expect(new OpenAIEmbeddingProvider({ apiKey: 'test-key' }).embed([])).resolves.toEqual([]);
    expect(SDK.embeddingsCreate).not.toHaveBeenCalled();
  });

  it('rejects a count mismatch', async () => {
    SDK.embeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });
    await expect(
      new OpenAIEmbeddingProvider({ apiKey: 'test-key', model: 'm' }).embed(['a', 'b'])
    ).rejects.toThrow('Embedding count mismatch: sent 2 texts, received 1 vectors');
  });
});
