/**
 * Shared JSON parse that strips markdown fences and falls back to quote normalisation.
 * Used by model capabilities before schema validation.
 */
import { logger } from '@/services/logger';

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

/** Parsed object or array, or `null` when the text holds no JSON structure. */
export function safeParseJson(raw: string, context: string): unknown {
  const txt = stripFences(raw);
  const attempts = [txt, txt.replace(/'/g, '"')];
  for (const candidate of attempts) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (typeof parsed === 'object' && parsed !== null) return parsed;
      logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
      return null;
    } catch {
      continue;
    }
  }
  logger.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return null;
}
