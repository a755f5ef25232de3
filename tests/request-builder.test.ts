import { describe, it, expect } from 'vitest';
import { DEFAULT_EXTRACTION_DIRECTIVE, DefaultRequestBuilder } from '../src/providers/request-builder';

describe('RequestBuilder', () => {
  it('appends the directive after the trimmed body', () => {
    const b = new DefaultRequestBuilder('  DIR  ');
    expect(b.buildPromptBodyForStructured('P\n\n')).toBe('P\n\nDIR');
  });

  it('uses the extraction directive by default', () => {
    const b = new DefaultRequestBuilder();
    expect(b.buildPromptBodyForStructured('Read it.')).toBe(`Read it.\n\n${DEFAULT_EXTRACTION_DIRECTIVE}`);
  });

  it('leaves the body alone when the directive is blank', () => {
    expect(new DefaultRequestBuilder('   ').buildPromptBodyForStructured('P ')).toBe('P');
  });
});
