/**
 * Contract for the nutrition memory tools: input arguments (zod shapes shared by
 * pipeline stages and the MCP server) and normalized results.
 */
import { z } from 'zod';
import { extractedProfileSchema, macroTargetsSchema, mealOptionsSchema } from '@/types/nutrition';
import type { StoredProfile, StoredPreference } from '@/types/nutrition';

const userId = z.string().trim().min(1).describe('Stable user identifier');

export const saveProfileInputShape = {
  user_id: userId,
  extracted_fields: extractedProfileSchema.describe('Profile fields extracted from the user message'),
  computed_macros: macroTargetsSchema.describe('Daily nutrition targets'),
};
export const saveProfileInput = z.object(saveProfileInputShape);
export type SaveProfileInput = z.infer<typeof saveProfileInput>;

export const recallProfileInputShape = {
  user_id: userId,
  context: z.string().optional().describe('Current request, used to rank stored preferences'),
};
export const recallProfileInput = z.object(recallProfileInputShape);
export type RecallProfileInput = z.infer<typeof recallProfileInput>;

export const savePreferenceInputShape = {
  user_id: userId,
  text: z.string().trim().min(1).describe('Preference in plain words, e.g. "Allergic to peanuts"'),
  category: z
    .enum(['dietary_preference', 'allergy', 'medical_condition', 'dislike', 'general'])
    .default('general'),
  medical_info: z.boolean().default(false),
};
export const savePreferenceInput = z.object(savePreferenceInputShape);
export type SavePreferenceInput = z.infer<typeof savePreferenceInput>;

export const savePlanInputShape = {
  user_id: userId,
  session_id: z.string().trim().min(1),
  request_text: z.string(),
  meal_options: mealOptionsSchema,
};
export const savePlanInput = z.object(savePlanInputShape);
export type SavePlanInput = z.infer<typeof savePlanInput>;

export const recentConversationInputShape = {
  user_id: userId,
  session_id: z.string().trim().min(1),
  limit: z.number().int().positive().max(50).default(6),
};
export const recentConversationInput = z.object(recentConversationInputShape);
export type RecentConversationInput = z.infer<typeof recentConversationInput>;

export type SaveProfileResult = { saved: true; memory_ids: string[]; saved_at: string };

export type RecallProfileResult = {
  found: boolean;
  summary: string;
  profile: StoredProfile | null;
  preferences: Array<Pick<StoredPreference, 'category' | 'text'>>;
};

export type SavePlanResult = { plan_id: number; saved_at: string; recipe_count: number };

export type SavePreferenceResult = { memory_id: string };
