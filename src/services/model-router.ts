export type ModelName = 'small' | 'main';

export type LlmTask =
  | 'profile_extraction'
  | 'nutrition_calculation'
  | 'recipe_search'
  | 'meal_generation';

export interface LlmCallOptions {
  task: LlmTask;
  /** Overrides the default system prompt for the task. */
  system?: string;
  /** Ask the provider for a JSON object response. */
  json?: boolean;
  maxTokens?: number;
}

export interface LlmClient {
  call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string>;
}

const TASK_MODELS: Record<LlmTask, ModelName> = {
  profile_extraction: 'small',
  nutrition_calculation: 'small',
  recipe_search: 'main',
  meal_generation: 'main',
};

const TASK_MAX_TOKENS: Record<LlmTask, number> = {
  profile_extraction: 512,
  nutrition_calculation: 512,
  recipe_search: 1536,
  meal_generation: 4096,
};

export function modelForTask(task: LlmTask): ModelName {
  return TASK_MODELS[task];
}

export function maxTokensForTask(task: LlmTask): number {
  return TASK_MAX_TOKENS[task];
}
