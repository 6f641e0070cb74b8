// Keyword table mapping request text to pipelines
import type { PipelineKind } from '@/pipeline/types';

export interface IntentRule {
  /** Lowercase substring to look for. */
  term: string;
  kind: PipelineKind;
}

const PROFILE_TERMS = [
  "i'm",
  'i am',
  'years old',
  'kg',
  'cm',
  'tall',
  'weight',
  'diabetic',
  'diabetes',
  'vegetarian',
  'vegan',
  'allergy',
  'allergic',
  'prefer',
  "don't like",
  'hate',
  'love',
];

/** Profile-signal terms. Planning needs no term: any non-blank request asks for a plan. */
export const DEFAULT_INTENT_RULES: readonly IntentRule[] = Object.freeze(
  PROFILE_TERMS.map((term) => ({ term, kind: 'profile' as const })),
);
