// Recall, research, generate and save meal options
import {
  MEAL_GENERATOR_SYSTEM,
  MEAL_GENERATOR_TEMPLATE,
  RECIPE_FINDER_SYSTEM,
  RECIPE_FINDER_TEMPLATE,
} from '@/agents/prompt-templates';
import { handleRecallProfile, handleRecentConversation, handleSavePlan } from '@/mcp/handlers';
import { recallProfileInput, recentConversationInput, savePlanInput } from '@/mcp/tool-contract';
import { createPipeline } from '@/pipeline/pipeline';
import { defineStage } from '@/pipeline/stage';
import type { Pipeline } from '@/pipeline/types';
import { modelCapability, toolCapability } from '@/services/capabilities';
import type { LlmClient } from '@/services/model-router';
import { mealOptionsSchemaFor } from '@/types/nutrition';

export const PLANNING_INITIAL_KEYS = [
  'user_id',
  'user_input',
  'request_text',
  'session_id',
  'current_time',
  'num_meals',
] as const;

export const MEAL_OPTIONS_KEY = 'meal_options';

/** Failures are fatal; the plan is saved by the last stage, so nothing is saved when generation fails. */
export function createMealPlanningPipeline(llm: LlmClient): Pipeline {
  return createPipeline({
    kind: 'planning',
    name: 'meal_planning_pipeline',
    initialContextKeys: PLANNING_INITIAL_KEYS,
    failurePolicy: 'fatal',
    stages: [
      defineStage({
        name: 'ProfileRecall',
        description: 'Loads the stored profile; a missing profile yields generic guidance',
        requiredInputs: ['user_id', 'request_text'],
        outputKey: 'user_profile',
        template: { user_id: '{user_id}', context: '{request_text}' },
        capability: toolCapability({ name: 'recall_profile', args: recallProfileInput, handler: handleRecallProfile }),
      }),
      defineStage({
        name: 'ConversationRecall',
        description: 'Loads the recent messages of this planning session',
        requiredInputs: ['user_id', 'session_id'],
        outputKey: 'recent_conversation',
        template: { user_id: '{user_id}', session_id: '{session_id}' },
        capability: toolCapability({
          name: 'get_recent_conversation',
          args: recentConversationInput,
          handler: handleRecentConversation,
        }),
      }),
      defineStage({
        name: 'RecipeFinder',
        description: 'Proposes candidate dishes that fit the profile',
        requiredInputs: ['user_input', 'user_profile', 'recent_conversation', 'current_time', 'num_meals'],
        outputKey: 'recipe_candidates',
        template: RECIPE_FINDER_TEMPLATE,
        capability: modelCapability(llm, {
          name: 'recipe_finder',
          task: 'recipe_search',
          system: RECIPE_FINDER_SYSTEM,
        }),
      }),
      defineStage({
        name: 'MealGenerator',
        description: 'Turns candidates into complete recipes',
        requiredInputs: ['user_input', 'user_profile', 'recipe_candidates', 'num_meals'],
        outputKey: MEAL_OPTIONS_KEY,
        template: MEAL_GENERATOR_TEMPLATE,
        capability: modelCapability(llm, {
          name: 'meal_generator',
          task: 'meal_generation',
          system: MEAL_GENERATOR_SYSTEM,
          output: (vars) => mealOptionsSchemaFor(typeof vars.num_meals === 'number' ? vars.num_meals : 1),
        }),
      }),
      defineStage({
        name: 'PlanSaver',
        description: 'Persists the generated options',
        requiredInputs: ['user_id', 'session_id', 'request_text', MEAL_OPTIONS_KEY],
        outputKey: null,
        template: {
          user_id: '{user_id}',
          session_id: '{session_id}',
          request_text: '{request_text}',
          meal_options: `{${MEAL_OPTIONS_KEY}}`,
        },
        capability: toolCapability({ name: 'save_plan', args: savePlanInput, handler: handleSavePlan }),
      }),
    ],
  });
}
