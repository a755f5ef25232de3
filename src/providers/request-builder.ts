// Centralized request construction for provider-agnostic use

export const DEFAULT_EXTRACTION_DIRECTIVE =
  'Base every answer only on the excerpt in the input. Reply through the requested structured format, without extra commentary.';

export interface RequestBuilder {
  buildPromptBodyForStructured(originalBody: string): string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private directive: string;

  constructor(directive: string = DEFAULT_EXTRACTION_DIRECTIVE) {
    this.directive = directive.trim();
  }

  buildPromptBodyForStructured(originalBody: string): string {
    const directive = this.directive ? `\n\n${this.directive}` : '';
    return originalBody.trimEnd() + directive;
  }
}
