/**
 * Nutrition tool handlers
 *
 * Handlers always answer with an envelope; store failures become
 * STORE_UNAVAILABLE instead of exceptions.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  handleRecallProfile,
  handleRecentConversation,
  handleSavePlan,
  handleSavePreference,
  handleSaveProfile,
  NO_CONVERSATION,
  NO_PROFILE_SUMMARY,
} from '@/mcp/handlers';
import { sql } from 'drizzle-orm';
import { createDatabase } from '@/db';
import { SqlPlanRepository } from '@/db/plan-repository';
import { toRetryable } from '@/mcp/envelope';
import {
  recallProfileInput,
  recentConversationInput,
  savePlanInput,
  savePreferenceInput,
  saveProfileInput,
} from '@/mcp/tool-contract';
import type { ProfileMemory } from '@/types/nutrition';
import { FakeProfileMemory, MACROS_JSON, makeRecipe, PROFILE_JSON, RecordingPlanRepository } from './helpers/fakes';

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function deps() {
  return { memory: new FakeProfileMemory(), plans: new RecordingPlanRepository() };
}

function lockedMemory(): ProfileMemory {
  const fail = async (): Promise<never> => {
    throw new Error('database is locked');
  };
  return { saveProfile: fail, recallProfile: fail, savePreference: fail, deletePreference: fail };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('profile tools', () => {
  it('answers a recall for an unknown user with generic guidance', async () => {
    const envelope = await handleRecallProfile(deps(), recallProfileInput.parse({ user_id: 'new-user' }));
    assert.deepEqual(envelope, {
      ok: true,
      data: { found: false, summary: NO_PROFILE_SUMMARY, profile: null, preferences: [] },
    });
  });

  it('recalls what was saved as a readable summary', async () => {
    const d = deps();
    const saved = await handleSaveProfile(
      d,
      saveProfileInput.parse({
        user_id: 'u1',
        extracted_fields: JSON.parse(PROFILE_JSON),
        computed_macros: JSON.parse(MACROS_JSON),
      }),
    );
    assert.deepEqual(saved, {
      ok: true,
      data: { saved: true, memory_ids: ['u1-profile'], saved_at: '2025-03-01T08:00:00.000Z' },
    });

    const recalled = await handleRecallProfile(d, recallProfileInput.parse({ user_id: 'u1', context: 'dinner' }));
    assert.ok(recalled.ok);
    assert.equal(recalled.data.found, true);
    assert.equal(
      recalled.data.summary,
      'Stored profile (saved 2025-03-01T08:00:00.000Z): age 30; male; 75 kg; 180 cm; activity: moderate; ' +
        'goal: maintain; diet: vegetarian; conditions: type 2 diabetes; ' +
        'daily targets 2400 kcal, protein 120 g, carbs 250 g, fat 80 g',
    );
  });

  it('stores single preferences with defaults', async () => {
    const input = savePreferenceInput.parse({ user_id: 'u1', text: 'Allergic to peanuts' });
    assert.equal(input.category, 'general');
    assert.equal(input.medical_info, false);
    assert.deepEqual(await handleSavePreference(deps(), input), { ok: true, data: { memory_id: 'u1-Allergic to peanuts' } });
  });

  it('turns store errors into retryable STORE_UNAVAILABLE envelopes', async () => {
    const envelope = await handleRecallProfile(
      { memory: lockedMemory(), plans: new RecordingPlanRepository() },
      recallProfileInput.parse({ user_id: 'u1' }),
    );
    assert.deepEqual(envelope, {
      ok: false,
      error: { code: 'STORE_UNAVAILABLE', message: 'database is locked', retryable: true },
    });
  });
});

describe('plan tools', () => {
  it('refuses to save a plan without recipes', async () => {
    const d = deps();
    const envelope = await handleSavePlan(
      d,
      savePlanInput.parse({ user_id: 'u1', session_id: 's1', request_text: 'lunch', meal_options: { recipes: [] } }),
    );
    assert.deepEqual(envelope, { ok: false, error: { code: 'EMPTY_PLAN', message: 'meal plan has no recipes', retryable: false } });
    assert.equal(d.plans.messages.length, 0);
  });

  it('records the request and a reply so the next request sees the conversation', async () => {
    const d = deps();
    const saved = await handleSavePlan(
      d,
      savePlanInput.parse({
        user_id: 'u1',
        session_id: 's1',
        request_text: 'quick lunches',
        meal_options: { recipes: [makeRecipe(1), makeRecipe(2)] },
      }),
    );
    assert.deepEqual(saved, { ok: true, data: { plan_id: 1, saved_at: '2025-03-01T08:00:00.000Z', recipe_count: 2 } });

    const conversation = await handleRecentConversation(d, recentConversationInput.parse({ user_id: 'u1', session_id: 's1' }));
    assert.deepEqual(conversation, { ok: true, data: 'User: quick lunches\nAI: Suggested meals: Recipe 1, Recipe 2' });
  });

  it('uses the plan summary in the reply when there is one', async () => {
    const d = deps();
    await handleSavePlan(
      d,
      savePlanInput.parse({
        user_id: 'u1',
        session_id: 's1',
        request_text: 'dinner',
        meal_options: { recipes: [makeRecipe(1)], summary: 'Light and warm' },
      }),
    );
    assert.equal(d.plans.messages[1].content, 'Light and warm (Recipe 1)');
  });

  it('leaves no half-recorded exchange when the reply cannot be written', async () => {
    const handle = createDatabase(':memory:');
    try {
      handle.db.run(
        sql`CREATE TRIGGER fail_reply BEFORE INSERT ON chat_history WHEN NEW.role = 'assistant' BEGIN SELECT RAISE(ABORT, 'disk I/O error'); END`,
      );
      const d = { memory: new FakeProfileMemory(), plans: new SqlPlanRepository(handle.db) };

      const envelope = await handleSavePlan(
        d,
        savePlanInput.parse({
          user_id: 'u1',
          session_id: 's1',
          request_text: 'lunch',
          meal_options: { recipes: [makeRecipe(1)] },
        }),
      );

      assert.deepEqual(envelope, { ok: false, error: { code: 'STORE_UNAVAILABLE', message: 'disk I/O error', retryable: false } });
      const conversation = await handleRecentConversation(d, recentConversationInput.parse({ user_id: 'u1', session_id: 's1' }));
      assert.deepEqual(conversation, { ok: true, data: NO_CONVERSATION });
      assert.deepEqual(await d.plans.listPlans('u1'), []);
    } finally {
      handle.close();
    }
  });

  it('reports an empty session explicitly', async () => {
    const conversation = await handleRecentConversation(deps(), recentConversationInput.parse({ user_id: 'u1', session_id: 'fresh' }));
    assert.deepEqual(conversation, { ok: true, data: NO_CONVERSATION });
  });
});

describe('toRetryable', () => {
  it('flags transient store and network errors', () => {
    assert.equal(toRetryable(new Error('SQLITE_BUSY: database is locked')), true);
    assert.equal(toRetryable(new Error('connect ECONNREFUSED 127.0.0.1:6379')), true);
    assert.equal(toRetryable(new Error('no such table: chat_history')), false);
    assert.equal(toRetryable('plain string'), false);
  });
});
