/**
 * Mustache-style `{{variable}}` interpolation for extraction prompts and
 * retrieval queries.
 */

export type TemplateVariables = Record<string, string | number>;

const TEMPLATE_PATTERN = /\{\{(\s*[\w.]+\s*)\}\}/g;

/**
 * Replaces every `{{name}}` placeholder with its value.
 *
 * @throws Error if a placeholder names a variable that was not provided
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(TEMPLATE_PATTERN, (_match: string, variableName: string) => {
    const trimmedName = variableName.trim();
    const value = variables[trimmedName];
    if (value === undefined) {
      throw new Error(
        `Template variable '${trimmedName}' is not defined. Available variables: ${Object.keys(variables).join(', ')}`
      );
    }
    return String(value);
  });
}

export function hasTemplateVariables(template: string): boolean {
  return /\{\{(\s*[\w.]+\s*)\}\}/.test(template);
}
