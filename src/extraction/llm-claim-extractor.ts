import type { z } from 'zod';
import type { ClaimExtractor, ExtractionRequest } from '../corroboration/claim-extractor';
import type { AttributeExtractor } from '../corroboration/verify';
import { Attribute, type Claim } from '../corroboration/types';
import type { LLMProvider, StructuredSchema } from '../providers/llm-provider';
import type { PromptFile } from '../prompts/prompt-loader';
import { renderTemplate } from '../prompts/template-renderer';
import {
  BIRTH_RESPONSE_SCHEMA,
  LIFE_STATUS_RESPONSE_SCHEMA,
  NATIONALITY_RESPONSE_SCHEMA,
} from '../schemas/claim-schemas';
import { TokenUsageCounter } from '../types/token-usage';
import {
  interpretBirthResponse,
  interpretLifeStatusResponse,
  interpretNationalityResponse,
} from './claim-interpreters';

/*
 * Claim extractor backed by an LLM provider. The prompt body is rendered
 * with the person's name and sent as the system prompt; the chunk text is
 * the user content.
 */
export class LlmClaimExtractor<R, V> implements ClaimExtractor<V> {
  constructor(
    private readonly provider: LLMProvider,
    private readonly prompt: PromptFile,
    private readonly responseSchema: StructuredSchema<R>,
    private readonly interpret: (response: R) => Claim<V>,
    private readonly usage: TokenUsageCounter = new TokenUsageCounter()
  ) {}

  async extract(request: ExtractionRequest): Promise<Claim<V>> {
    const systemPrompt = renderTemplate(this.prompt.body, { person_name: request.personName });
    const result = await this.provider.runPromptStructured(
      request.text,
      systemPrompt,
      this.responseSchema,
      request.signal ? { signal: request.signal } : {}
    );
    this.usage.add(result.usage);
    return this.interpret(result.data);
  }
}

function structured<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): StructuredSchema<T> {
  return { name, schema };
}

/**
 * Builds the extractor for one attribute from its prompt file.
 * Token usage of every call is added to `usage`.
 */
export function createLlmExtractor(
  attribute: Attribute,
  provider: LLMProvider,
  prompt: PromptFile,
  usage: TokenUsageCounter = new TokenUsageCounter()
): AttributeExtractor {
  switch (attribute) {
    case Attribute.BirthYear:
      return {
        attribute,
        extractor: new LlmClaimExtractor(
          provider,
          prompt,
          structured('birth_year_extraction', BIRTH_RESPONSE_SCHEMA),
          interpretBirthResponse,
          usage
        ),
      };
    case Attribute.LifeStatus:
      return {
        attribute,
        extractor: new LlmClaimExtractor(
          provider,
          prompt,
          structured('life_status_extraction', LIFE_STATUS_RESPONSE_SCHEMA),
          interpretLifeStatusResponse,
          usage
        ),
      };
    case Attribute.Nationality:
      return {
        attribute,
        extractor: new LlmClaimExtractor(
          provider,
          prompt,
          structured('nationality_extraction', NATIONALITY_RESPONSE_SCHEMA),
          interpretNationalityResponse,
          usage
        ),
      };
  }
}
