// Nutrition domain shapes and persistence contracts
import { z } from 'zod';

const stringList = z.array(z.string().min(1)).default([]);
const optionalNumber = z.number().nonnegative().nullable().optional();

export const extractedProfileSchema = z.object({
  age: z.number().int().positive().nullable().optional(),
  sex: z.string().nullable().optional(),
  weight_kg: optionalNumber,
  height_cm: optionalNumber,
  activity_level: z.string().nullable().optional(),
  goal: z.string().nullable().optional(),
  dietary_preferences: stringList,
  medical_conditions: stringList,
  allergies: stringList,
  dislikes: stringList,
  cuisine_preferences: stringList,
});

export type ExtractedProfile = z.infer<typeof extractedProfileSchema>;

export const macroTargetsSchema = z.object({
  calories_kcal: z.number().positive(),
  protein_g: z.number().nonnegative(),
  carbs_g: z.number().nonnegative(),
  fat_g: z.number().nonnegative(),
  fiber_g: z.number().nonnegative().optional(),
  notes: z.string().optional(),
});

export type MacroTargets = z.infer<typeof macroTargetsSchema>;

export const recipeNutritionSchema = z.object({
  calories_kcal: z.number().nonnegative(),
  protein_g: z.number().nonnegative(),
  carbs_g: z.number().nonnegative(),
  fat_g: z.number().nonnegative(),
});

export const recipeSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  meal_type: z.string().optional(),
  ingredients: z.array(z.string().min(1)).min(1),
  nutrition: recipeNutritionSchema,
  instructions: z.array(z.string().min(1)).default([]),
  time: z.string().min(1),
});

export type Recipe = z.infer<typeof recipeSchema>;

export const mealOptionsSchema = z.object({
  recipes: z.array(recipeSchema),
  summary: z.string().optional(),
});

export type MealOptions = z.infer<typeof mealOptionsSchema>;

/** Meal options that must contain at least `minRecipes` distinct options. */
export function mealOptionsSchemaFor(minRecipes: number) {
  return mealOptionsSchema
    .refine((v) => v.recipes.length >= minRecipes, {
      message: `expected at least ${minRecipes} recipes`,
      path: ['recipes'],
    })
    .refine((v) => new Set(v.recipes.map((r) => r.name.trim().toLowerCase())).size === v.recipes.length, {
      message: 'recipe names must be distinct',
      path: ['recipes'],
    });
}

export type PreferenceCategory =
  | 'nutrition_profile'
  | 'dietary_preference'
  | 'allergy'
  | 'medical_condition'
  | 'dislike'
  | 'general';

export type StoredPreference = {
  id: string;
  category: PreferenceCategory;
  text: string;
  medicalInfo: boolean;
  score?: number;
};

export type StoredProfile = {
  fields: ExtractedProfile;
  macros: MacroTargets;
  savedAt: string;
};

export type ProfileRecall = {
  profile: StoredProfile | null;
  preferences: StoredPreference[];
};

export interface ProfileMemory {
  saveProfile(userId: string, fields: ExtractedProfile, macros: MacroTargets): Promise<{ memoryIds: string[]; savedAt: string }>;
  /** `null` when nothing is stored for the user. */
  recallProfile(userId: string, context?: string): Promise<ProfileRecall | null>;
  savePreference(userId: string, text: string, category: PreferenceCategory, medicalInfo?: boolean): Promise<string>;
  deletePreference(userId: string, text: string): Promise<boolean>;
}

export type ChatRole = 'user' | 'assistant' | 'system';

export type ChatMessage = {
  id: number;
  userId: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  createdAt: string;
};

export type SavedPlan = {
  planId: number;
  userId: string;
  sessionId: string;
  requestText: string;
  recipes: Recipe[];
  savedAt: string;
};

/** One save_plan exchange: the request, the plan and the reply shown to the user. */
export type PlanRecord = {
  userId: string;
  sessionId: string;
  requestText: string;
  recipes: Recipe[];
  reply: string;
};

export interface PlanRepository {
  addMessage(userId: string, sessionId: string, role: ChatRole, content: string): Promise<number>;
  /** Last `limit` messages of the session, oldest first. */
  getSessionHistory(userId: string, sessionId: string, limit?: number): Promise<ChatMessage[]>;
  /** Writes the user message, the plan and the assistant reply together, or none of them. */
  recordPlan(record: PlanRecord): Promise<SavedPlan>;
  listPlans(userId: string, limit?: number): Promise<SavedPlan[]>;
}
