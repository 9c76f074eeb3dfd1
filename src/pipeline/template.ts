/**
 * Flat `{key}` substitution for titles and descriptions.
 *
 * Single pass, no recursion: substituted values are copied verbatim and never
 * rescanned. Unknown keys become ''. Any stray brace in the template (unclosed
 * placeholder, nested `{`, lone `}`) makes the whole result '' so template
 * syntax never reaches a published title.
 */
import type { TemplateContext } from '../types.js';

export type TemplateValues = Readonly<Partial<Record<string, string | number>>>;

export type TemplateRenderer = (template: string, context: TemplateValues) => string;

export const renderTemplate: TemplateRenderer = (template, context) => {
  if (!template) return '';

  let out = '';
  let i = 0;
  while (i < template.length) {
    const ch = template.charAt(i);
    if (ch === '}') return '';
    if (ch !== '{') {
      out += ch;
      i++;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) return '';
    const key = template.slice(i + 1, close);
    if (key.includes('{')) return '';

    const value = context[key];
    out += value === undefined ? '' : String(value);
    i = close + 1;
  }
  return out;
};

/** Narrow a TemplateContext to the renderer's value map. */
export function templateValues(context: TemplateContext): TemplateValues {
  return { ...context };
}
