// Low-level client implementing LlmClient for the pipelines

import OpenAI from 'openai';
import type { LlmClient, LlmCallOptions, LlmTask, ModelName } from '@/services/model-router';
import { maxTokensForTask } from '@/services/model-router';
import { retryWithBackoff, type RetryOptions } from '@/utils/retryWithBackoff';

/** HTTP statuses worth another attempt. */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 503, 504]);

export function isRetryableLlmError(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) return true;
  if (err instanceof OpenAI.APIError) {
    return typeof err.status === 'number' && RETRYABLE_STATUS_CODES.has(err.status);
  }
  return false;
}

const DEFAULT_SYSTEM: Record<LlmTask, string> = {
  profile_extraction: 'You extract structured nutrition profile data. Respond with JSON only.',
  nutrition_calculation: 'You are a registered dietitian computing daily nutrition targets. Respond with JSON only.',
  recipe_search: 'You are a culinary researcher who finds recipes matching dietary constraints.',
  meal_generation: 'You are a meal planner producing complete, safe recipes. Respond with JSON only.',
};

export interface ProviderLlmClientOptions {
  apiKey: string | undefined;
  models: Record<ModelName, string>;
  retry?: RetryOptions;
}

export class ProviderLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: ProviderLlmClientOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      const { apiKey } = this.options;
      if (!apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
      }
      // Retries are handled here, not by the SDK.
      this.client = new OpenAI({ apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string> {
    const task = options?.task ?? 'recipe_search';
    const system = options?.system ?? DEFAULT_SYSTEM[task];
    const client = this.getClient();

    const res = await retryWithBackoff(
      () =>
        client.chat.completions.create({
          model: this.options.models[model],
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: prompt },
          ],
          temperature: task === 'profile_extraction' || task === 'nutrition_calculation' ? 0 : 0.7,
          max_tokens: options?.maxTokens ?? maxTokensForTask(task),
          ...(options?.json ? { response_format: { type: 'json_object' as const } } : {}),
        }),
      { ...this.options.retry, shouldRetry: isRetryableLlmError, label: `llm:${task}` },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
