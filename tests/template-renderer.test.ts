import { describe, it, expect } from 'vitest';
import { hasTemplateVariables, renderTemplate } from '../src/prompts/template-renderer';

describe('renderTemplate', () => {
  it('replaces every placeholder, tolerating inner spaces', () => {
    expect(renderTemplate('Who is {{person_name}}? Ask about {{ person_name }}.', { person_name: 'Ada Example' })).toBe(
      'Who is Ada Example? Ask about Ada Example.'
    );
  });

  it('stringifies numbers', () => {
    expect(renderTemplate('top {{n}}', { n: 3 })).toBe('top 3');
  });

  it('throws on an undefined variable', () => {
    expect(() => renderTemplate('{{missing}}', { person_name: 'Ada' })).toThrow(
      "Template variable 'missing' is not defined. Available variables: person_name"
    );
  });

  it('leaves text without placeholders untouched', () => {
    expect(renderTemplate('plain text', {})).toBe('plain text');
  });
});

describe('hasTemplateVariables', () => {
  it('detects placeholders', () => {
    expect(hasTemplateVariables('birth of {{person_name}}')).toBe(true);
    expect(hasTemplateVariables('birth information')).toBe(false);
  });
});
