/**
 * Template rendering for prompts.
 * Supports Mustache-style variable interpolation: {{variableName}}
 *
 * Arrays are joined with newlines.
 */

export type TemplateVariables = Record<string, string | string[] | number>;

const TEMPLATE_PATTERN = /\{\{(\s*[\w.]+\s*)\}\}/g;

/**
 * Replaces every {{variable}} placeholder with its value.
 *
 * @throws Error if a variable is referenced but not provided
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

    if (Array.isArray(value)) {
      return value.join('\n');
    }
    return String(value);
  });
}

/** Unique variable names referenced by a template. */
export function extractTemplateVariables(template: string): string[] {
  const variables = new Set<string>();
  for (const match of template.matchAll(TEMPLATE_PATTERN)) {
    if (match[1]) {
      variables.add(match[1].trim());
    }
  }
  return Array.from(variables);
}
