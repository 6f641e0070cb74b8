import { z } from 'zod';
import type { FieldError } from '@/utils/errorResponse';

const userId = z
  .string({ required_error: 'user_id is required' })
  .trim()
  .min(1, 'user_id cannot be empty')
  .max(128, 'user_id is too long')
  .regex(/^[A-Za-z0-9_.@-]+$/, 'user_id may only contain letters, digits and _ . @ -');

const numMeals = z.number().int().min(1).max(10).optional();

export const mealPlanRequestSchema = z.object({
  user_id: userId,
  user_input: z.string({ required_error: 'user_input is required' }).trim().min(1, 'user_input cannot be empty').max(4000),
  session_id: z.string().trim().min(1).max(200).optional(),
  num_meals: numMeals,
});

export const profileAndPlanRequestSchema = z.object({
  user_id: userId,
  profile_input: z.string().trim().min(1, 'profile_input cannot be empty').max(4000),
  meal_input: z.string().trim().min(1, 'meal_input cannot be empty').max(4000),
  num_meals: numMeals,
});

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: FieldError[] };

export function validateRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }
  return { success: true, data: result.data };
}
