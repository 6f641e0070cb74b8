// Placeholder extraction and rendering for stage templates
import type { ContextValue, ContextVariables, RenderedPayload, StageTemplate } from '@/pipeline/types';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const WHOLE_PLACEHOLDER = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

/** Placeholder names in order of first appearance, without duplicates. */
export function placeholdersOf(template: StageTemplate): string[] {
  const texts = typeof template === 'string' ? [template] : Object.values(template);
  const seen = new Set<string>();
  for (const text of texts) {
    for (const match of text.matchAll(PLACEHOLDER)) {
      seen.add(match[1]);
    }
  }
  return [...seen];
}

export function renderValue(value: ContextValue): string {
  if (typeof value === 'string') return value;
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value, null, 2);
}

export function renderText(text: string, variables: Readonly<ContextVariables>): string {
  return text.replace(PLACEHOLDER, (whole, name: string) => {
    const value = variables[name];
    return value === undefined ? whole : renderValue(value);
  });
}

/** Pure: the same template and variables always render the same payload. */
export function renderTemplate(template: StageTemplate, variables: Readonly<ContextVariables>): RenderedPayload {
  if (typeof template === 'string') return renderText(template, variables);

  const payload: { [key: string]: ContextValue } = {};
  for (const [arg, text] of Object.entries(template)) {
    const whole = WHOLE_PLACEHOLDER.exec(text);
    const raw = whole ? variables[whole[1]] : undefined;
    payload[arg] = raw !== undefined ? raw : renderText(text, variables);
  }
  return payload;
}
