/**
 * Prompt Template Rendering
 *
 * `{{name}}` placeholders are substituted in a single pass, so text inserted
 * for one variable is never scanned for further placeholders. Unknown
 * placeholders are kept as written.
 */

import type { FewshotExample } from '../types';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Convert a variable value to prompt text.
 * Arrays render one item per line, objects as JSON, nullish values as ''.
 */
export function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(valueToString).join('\n');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function renderTemplate(template: string, variables: Record<string, unknown>): string {
  return template.replace(PLACEHOLDER, (fullMatch: string, name: string) =>
    Object.hasOwn(variables, name) ? valueToString(variables[name]) : fullMatch
  );
}

/**
 * Names of the placeholders a template uses, in order of first appearance.
 */
export function templateVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names];
}

/**
 * Render few-shot examples as the block substituted for `{{examples}}`.
 */
export function formatExamples(examples: readonly FewshotExample[]): string {
  if (examples.length === 0) {
    return '';
  }
  const body = examples
    .map((example) => `<example>\n${JSON.stringify(example, null, 2)}\n</example>`)
    .join('\n');
  return `<examples>\n${body}\n</examples>`;
}
