/**
 * In-process nutrition tool handlers. Return the standard envelope; store errors
 * never leak as raw exceptions.
 */
import { describeProfile } from '@/db/profile-memory';
import { formatHistoryForLlm } from '@/db/plan-repository';
import { envelopeErr, envelopeOk, toRetryable, type ToolEnvelope } from '@/mcp/envelope';
import type {
  RecallProfileInput,
  RecallProfileResult,
  RecentConversationInput,
  SavePlanInput,
  SavePlanResult,
  SavePreferenceInput,
  SavePreferenceResult,
  SaveProfileInput,
  SaveProfileResult,
} from '@/mcp/tool-contract';
import { logger } from '@/services/logger';
import type { PlanRepository, ProfileMemory } from '@/types/nutrition';

export interface NutritionToolDeps {
  memory: ProfileMemory;
  plans: PlanRepository;
}

export const NO_PROFILE_SUMMARY =
  'No stored profile for this user. Give general, balanced recommendations suitable for most adults.';

export const NO_CONVERSATION = 'No previous conversation in this session.';

function storeError<T>(tool: string, err: unknown): ToolEnvelope<T> {
  const msg = err instanceof Error ? err.message : String(err);
  logger.error('tools:store_error', { tool, error: msg });
  return envelopeErr<T>('STORE_UNAVAILABLE', msg, toRetryable(err));
}

export async function handleSaveProfile(
  deps: NutritionToolDeps,
  input: SaveProfileInput,
): Promise<ToolEnvelope<SaveProfileResult>> {
  try {
    const { memoryIds, savedAt } = await deps.memory.saveProfile(
      input.user_id,
      input.extracted_fields,
      input.computed_macros,
    );
    return envelopeOk({ saved: true, memory_ids: memoryIds, saved_at: savedAt });
  } catch (err) {
    return storeError('save_profile', err);
  }
}

export async function handleRecallProfile(
  deps: NutritionToolDeps,
  input: RecallProfileInput,
): Promise<ToolEnvelope<RecallProfileResult>> {
  try {
    const recalled = await deps.memory.recallProfile(input.user_id, input.context);
    if (!recalled) {
      return envelopeOk({ found: false, summary: NO_PROFILE_SUMMARY, profile: null, preferences: [] });
    }
    const lines: string[] = [];
    if (recalled.profile) {
      lines.push(`Stored profile (saved ${recalled.profile.savedAt}): ${describeProfile(recalled.profile.fields, recalled.profile.macros)}`);
    }
    for (const pref of recalled.preferences) {
      lines.push(`- [${pref.category}] ${pref.text}`);
    }
    return envelopeOk({
      found: true,
      summary: lines.join('\n'),
      profile: recalled.profile,
      preferences: recalled.preferences.map((p) => ({ category: p.category, text: p.text })),
    });
  } catch (err) {
    return storeError('recall_profile', err);
  }
}

export async function handleSavePreference(
  deps: NutritionToolDeps,
  input: SavePreferenceInput,
): Promise<ToolEnvelope<SavePreferenceResult>> {
  try {
    const id = await deps.memory.savePreference(input.user_id, input.text, input.category, input.medical_info);
    return envelopeOk({ memory_id: id });
  } catch (err) {
    return storeError('save_user_preference', err);
  }
}

/** Records the request, the plan and a short assistant reply in the session history. */
export async function handleSavePlan(
  deps: NutritionToolDeps,
  input: SavePlanInput,
): Promise<ToolEnvelope<SavePlanResult>> {
  if (input.meal_options.recipes.length === 0) {
    return envelopeErr('EMPTY_PLAN', 'meal plan has no recipes', false);
  }
  try {
    const { recipes, summary } = input.meal_options;
    const names = recipes.map((r) => r.name).join(', ');
    const saved = await deps.plans.recordPlan({
      userId: input.user_id,
      sessionId: input.session_id,
      requestText: input.request_text,
      recipes,
      reply: summary ? `${summary} (${names})` : `Suggested meals: ${names}`,
    });
    return envelopeOk({ plan_id: saved.planId, saved_at: saved.savedAt, recipe_count: saved.recipes.length });
  } catch (err) {
    return storeError('save_plan', err);
  }
}

export async function handleRecentConversation(
  deps: NutritionToolDeps,
  input: RecentConversationInput,
): Promise<ToolEnvelope<string>> {
  try {
    const history = await deps.plans.getSessionHistory(input.user_id, input.session_id, input.limit);
    const formatted = formatHistoryForLlm(history);
    return envelopeOk(formatted || NO_CONVERSATION);
  } catch (err) {
    return storeError('get_recent_conversation', err);
  }
}
