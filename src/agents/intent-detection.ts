// Keyword routing of a request to pipelines
import { DEFAULT_INTENT_RULES, type IntentRule } from '@/config/intent-rules';
import type { PipelineKind } from '@/pipeline/types';

export interface IntentDecision {
  kinds: Set<PipelineKind>;
  /** Rule terms found in the input. */
  matches: string[];
}

/**
 * Case-insensitive substring match. Blank input selects nothing; any other input
 * selects planning, plus every kind whose term appears. When signals are ambiguous
 * the result errs toward running more pipelines.
 */
export function detectIntent(userInput: string, rules: readonly IntentRule[] = DEFAULT_INTENT_RULES): IntentDecision {
  const text = userInput.trim().toLowerCase();
  if (!text) return { kinds: new Set(), matches: [] };

  const kinds = new Set<PipelineKind>(['planning']);
  const matches: string[] = [];
  for (const rule of rules) {
    if (text.includes(rule.term.toLowerCase())) {
      kinds.add(rule.kind);
      matches.push(rule.term);
    }
  }
  return { kinds, matches };
}

export function detectRelevantPipelines(
  userInput: string,
  rules: readonly IntentRule[] = DEFAULT_INTENT_RULES,
): Set<PipelineKind> {
  return detectIntent(userInput, rules).kinds;
}
