/**
 * Model and tool capabilities
 *
 * Model capabilities are driven by a scripted LLM; tool capabilities by the
 * real handlers over in-memory fakes.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CapabilityFailure } from '@/core/errors';
import { envelopeErr } from '@/mcp/envelope';
import { handleRecallProfile, handleSavePlan } from '@/mcp/handlers';
import { recallProfileInput, savePlanInput } from '@/mcp/tool-contract';
import { modelCapability, toolCapability } from '@/services/capabilities';
import { macroTargetsSchema, mealOptionsSchemaFor } from '@/types/nutrition';
import { capabilityContext, createTestServices, FakeLlmClient, MACROS_JSON, makeRecipe, mealOptionsJson } from './helpers/fakes';

function isFailure(reason: CapabilityFailure['reason'], message?: string) {
  return (err: unknown): boolean => {
    assert.ok(err instanceof CapabilityFailure);
    assert.equal(err.reason, reason);
    if (message !== undefined) assert.equal(err.message, message);
    return true;
  };
}

// ---------------------------------------------------------------------------
// modelCapability
// ---------------------------------------------------------------------------

describe('modelCapability', () => {
  const { services } = createTestServices();
  const ctx = capabilityContext(services);

  it('returns trimmed text when no output schema is set', async () => {
    const llm = new FakeLlmClient({ recipe_search: () => '  lentil soup, tofu bowl \n' });
    const capability = modelCapability(llm, { name: 'recipe_finder', task: 'recipe_search', system: 'find recipes' });

    assert.equal(await capability.invoke('find me lunch', ctx), 'lentil soup, tofu bowl');
    assert.deepEqual(llm.calls, [
      { model: 'main', prompt: 'find me lunch', options: { task: 'recipe_search', system: 'find recipes', json: false } },
    ]);
  });

  it('asks for JSON and appends the schema when output is structured', async () => {
    const llm = new FakeLlmClient({ nutrition_calculation: () => MACROS_JSON });
    const capability = modelCapability(llm, { name: 'calc', task: 'nutrition_calculation', output: macroTargetsSchema });

    const value = await capability.invoke('profile', ctx);

    assert.deepEqual(value, { calories_kcal: 2400, protein_g: 120, carbs_g: 250, fat_g: 80 });
    const [call] = llm.calls;
    assert.equal(call.model, 'small');
    assert.equal(call.options?.json, true);
    assert.ok(call.prompt.startsWith('profile\n\nRespond with a single JSON object that matches this JSON schema:\n'));
    assert.ok(call.prompt.includes('"calories_kcal"'));
  });

  it('accepts JSON wrapped in a markdown fence', async () => {
    const llm = new FakeLlmClient({ nutrition_calculation: () => '```json\n' + MACROS_JSON + '\n```' });
    const capability = modelCapability(llm, { name: 'calc', task: 'nutrition_calculation', output: macroTargetsSchema });

    assert.deepEqual(await capability.invoke('p', ctx), { calories_kcal: 2400, protein_g: 120, carbs_g: 250, fat_g: 80 });
  });

  it('reports an empty response as malformed output', async () => {
    const llm = new FakeLlmClient({ recipe_search: () => '   ' });
    const capability = modelCapability(llm, { name: 'finder', task: 'recipe_search' });

    await assert.rejects(capability.invoke('x', ctx), isFailure('malformed_output', 'finder: empty response'));
  });

  it('reports text that is not JSON as malformed output', async () => {
    const llm = new FakeLlmClient({ nutrition_calculation: () => 'about 2000 calories a day' });
    const capability = modelCapability(llm, { name: 'calc', task: 'nutrition_calculation', output: macroTargetsSchema });

    await assert.rejects(capability.invoke('x', ctx), isFailure('malformed_output', 'calc: response is not a JSON object'));
  });

  it('reports JSON that does not match the schema as malformed output', async () => {
    const llm = new FakeLlmClient({ nutrition_calculation: () => '{"calories_kcal": "lots"}' });
    const capability = modelCapability(llm, { name: 'calc', task: 'nutrition_calculation', output: macroTargetsSchema });

    await assert.rejects(capability.invoke('x', ctx), isFailure('malformed_output'));
  });

  it('derives the schema from the stage inputs', async () => {
    const llm = new FakeLlmClient({ meal_generation: () => mealOptionsJson(2) });
    const capability = modelCapability(llm, {
      name: 'meal_generator',
      task: 'meal_generation',
      output: (vars) => mealOptionsSchemaFor(typeof vars.num_meals === 'number' ? vars.num_meals : 1),
    });

    await assert.rejects(
      capability.invoke('x', capabilityContext(services, { variables: { num_meals: 3 } })),
      isFailure('malformed_output', 'meal_generator: recipes: expected at least 3 recipes'),
    );
    const value = await capability.invoke('x', capabilityContext(services, { variables: { num_meals: 2 } }));
    assert.deepEqual(value, JSON.parse(mealOptionsJson(2)));
  });

  it('rejects meal options that repeat a recipe', async () => {
    const recipes = [makeRecipe(1), { ...makeRecipe(2), name: ' recipe 1 ' }, makeRecipe(3)];
    const llm = new FakeLlmClient({ meal_generation: () => JSON.stringify({ recipes }) });
    const capability = modelCapability(llm, {
      name: 'meal_generator',
      task: 'meal_generation',
      output: (vars) => mealOptionsSchemaFor(typeof vars.num_meals === 'number' ? vars.num_meals : 1),
    });

    await assert.rejects(
      capability.invoke('x', capabilityContext(services, { variables: { num_meals: 3 } })),
      isFailure('malformed_output', 'meal_generator: recipes: recipe names must be distinct'),
    );
  });

  it('maps a provider error to external_error', async () => {
    const llm = new FakeLlmClient({
      recipe_search: () => {
        throw new Error('invalid api key');
      },
    });
    const capability = modelCapability(llm, { name: 'finder', task: 'recipe_search' });

    await assert.rejects(capability.invoke('x', ctx), (err: unknown) => {
      assert.ok(err instanceof CapabilityFailure);
      assert.equal(err.reason, 'external_error');
      assert.equal(err.retryable, false);
      assert.equal(err.message, 'finder: invalid api key');
      return true;
    });
  });
});

// ---------------------------------------------------------------------------
// toolCapability
// ---------------------------------------------------------------------------

describe('toolCapability', () => {
  const recall = toolCapability({ name: 'recall_profile', args: recallProfileInput, handler: handleRecallProfile });

  it('validates arguments and returns the envelope data', async () => {
    const { services } = createTestServices();
    const value = await recall.invoke({ user_id: 'nobody' }, capabilityContext(services));
    assert.equal(typeof value === 'object' && value !== null && !Array.isArray(value) ? value.found : undefined, false);
  });

  it('rejects text payloads and invalid arguments', async () => {
    const { services } = createTestServices();
    const ctx = capabilityContext(services);
    await assert.rejects(recall.invoke('user u1', ctx), isFailure('invalid_arguments'));
    await assert.rejects(recall.invoke({ user_id: '   ' }, ctx), isFailure('invalid_arguments'));
  });

  it('maps error envelopes to tool_error with the code', async () => {
    const { services } = createTestServices();
    const save = toolCapability({ name: 'save_plan', args: savePlanInput, handler: handleSavePlan });

    await assert.rejects(
      save.invoke(
        { user_id: 'u1', session_id: 's1', request_text: 'lunch', meal_options: { recipes: [] } },
        capabilityContext(services),
      ),
      isFailure('tool_error', 'save_plan: EMPTY_PLAN: meal plan has no recipes'),
    );
  });

  it('maps STORE_UNAVAILABLE to store_unavailable and keeps retryability', async () => {
    const { services } = createTestServices();
    const flaky = toolCapability({
      name: 'recall_profile',
      args: recallProfileInput,
      handler: async () => envelopeErr<string>('STORE_UNAVAILABLE', 'database is locked', true),
    });

    await assert.rejects(flaky.invoke({ user_id: 'u1' }, capabilityContext(services)), (err: unknown) => {
      assert.ok(err instanceof CapabilityFailure);
      assert.equal(err.reason, 'store_unavailable');
      assert.equal(err.retryable, true);
      assert.equal(err.message, 'recall_profile: STORE_UNAVAILABLE: database is locked');
      return true;
    });
  });
});
