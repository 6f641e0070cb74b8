// Extract profile, compute targets, persist
import {
  NUTRITION_CALCULATOR_SYSTEM,
  NUTRITION_CALCULATOR_TEMPLATE,
  USER_PROFILER_SYSTEM,
  USER_PROFILER_TEMPLATE,
} from '@/agents/prompt-templates';
import { handleSaveProfile } from '@/mcp/handlers';
import { saveProfileInput } from '@/mcp/tool-contract';
import { createPipeline } from '@/pipeline/pipeline';
import { defineStage } from '@/pipeline/stage';
import type { Pipeline } from '@/pipeline/types';
import { modelCapability, toolCapability } from '@/services/capabilities';
import type { LlmClient } from '@/services/model-router';
import { extractedProfileSchema, macroTargetsSchema } from '@/types/nutrition';

export const PROFILE_INITIAL_KEYS = ['user_id', 'user_input'] as const;

/** Failures are absorbable: a broken profile update must not block meal planning. */
export function createProfilingPipeline(llm: LlmClient): Pipeline {
  return createPipeline({
    kind: 'profile',
    name: 'profile_pipeline',
    initialContextKeys: PROFILE_INITIAL_KEYS,
    failurePolicy: 'absorbable',
    stages: [
      defineStage({
        name: 'UserProfiler',
        description: 'Extracts structured profile fields from free text',
        requiredInputs: ['user_id', 'user_input'],
        outputKey: 'extracted_profile_json',
        template: USER_PROFILER_TEMPLATE,
        capability: modelCapability(llm, {
          name: 'user_profiler',
          task: 'profile_extraction',
          system: USER_PROFILER_SYSTEM,
          output: extractedProfileSchema,
        }),
      }),
      defineStage({
        name: 'NutritionCalculator',
        description: 'Computes daily calorie and macro targets',
        requiredInputs: ['extracted_profile_json'],
        outputKey: 'calculated_macros',
        template: NUTRITION_CALCULATOR_TEMPLATE,
        capability: modelCapability(llm, {
          name: 'nutrition_calculator',
          task: 'nutrition_calculation',
          system: NUTRITION_CALCULATOR_SYSTEM,
          output: macroTargetsSchema,
        }),
      }),
      defineStage({
        name: 'ProfileUpdater',
        description: 'Persists the profile and its preferences to long-term memory',
        requiredInputs: ['user_id', 'extracted_profile_json', 'calculated_macros'],
        outputKey: null,
        template: {
          user_id: '{user_id}',
          extracted_fields: '{extracted_profile_json}',
          computed_macros: '{calculated_macros}',
        },
        capability: toolCapability({ name: 'save_profile', args: saveProfileInput, handler: handleSaveProfile }),
      }),
    ],
  });
}
