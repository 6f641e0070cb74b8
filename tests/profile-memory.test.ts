/**
 * Profile memory over a throwaway SQLite database
 *
 * A keyword embedder keeps similarity scores predictable: one axis per
 * keyword plus a small constant so no vector is zero.
 */
import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createDatabase, type DatabaseHandle } from '@/db';
import { describeProfile, memoryId, VectorProfileMemory } from '@/db/profile-memory';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { ExtractedProfile, MacroTargets } from '@/types/nutrition';

const keywordEmbedder: Embedder = {
  async embed(text: string) {
    const t = text.toLowerCase();
    return [t.includes('vegetarian') ? 1 : 0, t.includes('spicy') ? 1 : 0, 0.1];
  },
};

const FIELDS: ExtractedProfile = {
  age: 30,
  sex: 'female',
  weight_kg: 62,
  height_cm: 168,
  activity_level: 'moderate',
  goal: 'maintain',
  dietary_preferences: ['vegetarian'],
  medical_conditions: ['type 2 diabetes'],
  allergies: [],
  dislikes: ['spicy food'],
  cuisine_preferences: [],
};

const MACROS: MacroTargets = { calories_kcal: 2000, protein_g: 90, carbs_g: 220, fat_g: 70 };

const SAVED_AT = '2025-03-01T08:00:00.000Z';

describe('memoryId', () => {
  it('normalises case and surrounding whitespace', () => {
    assert.equal(memoryId('u1', '  Allergic to Peanuts '), memoryId('u1', 'allergic to peanuts'));
    assert.notEqual(memoryId('u1', 'allergic to peanuts'), memoryId('u2', 'allergic to peanuts'));
  });
});

describe('describeProfile', () => {
  it('lists known fields then the daily targets', () => {
    assert.equal(
      describeProfile(FIELDS, MACROS),
      'age 30; female; 62 kg; 168 cm; activity: moderate; goal: maintain; diet: vegetarian; ' +
        'conditions: type 2 diabetes; dislikes: spicy food; daily targets 2000 kcal, protein 90 g, carbs 220 g, fat 70 g',
    );
  });
});

describe('VectorProfileMemory', () => {
  let handle: DatabaseHandle;
  let memory: VectorProfileMemory;

  beforeEach(() => {
    handle = createDatabase(':memory:');
    memory = new VectorProfileMemory(handle.db, keywordEmbedder, { now: () => new Date(SAVED_AT) });
  });

  afterEach(() => {
    handle.close();
  });

  it('returns null for a user with nothing stored', async () => {
    assert.equal(await memory.recallProfile('ghost'), null);
  });

  it('stores the profile record plus one record per preference', async () => {
    const { memoryIds, savedAt } = await memory.saveProfile('u1', FIELDS, MACROS);
    assert.equal(memoryIds.length, 4);
    assert.equal(memoryIds[0], memoryId('u1', 'nutrition_profile'));
    assert.equal(savedAt, SAVED_AT);

    const recalled = await memory.recallProfile('u1');
    assert.ok(recalled);
    assert.deepEqual(recalled.profile, { fields: FIELDS, macros: MACROS, savedAt: SAVED_AT });
    assert.deepEqual(recalled.preferences.map((p) => p.text).sort(), [
      'Dietary preference: vegetarian',
      'Dislikes spicy food',
      'Medical condition: type 2 diabetes',
    ]);
  });

  it('upserts on a second save instead of duplicating', async () => {
    await memory.saveProfile('u1', FIELDS, MACROS);
    await memory.saveProfile('u1', FIELDS, { ...MACROS, calories_kcal: 1800 });

    const recalled = await memory.recallProfile('u1');
    assert.ok(recalled);
    assert.equal(recalled.preferences.length, 3);
    assert.equal(recalled.profile?.macros.calories_kcal, 1800);
  });

  it('ranks preferences against the context and always keeps medical ones', async () => {
    await memory.saveProfile('u1', FIELDS, MACROS);

    const recalled = await memory.recallProfile('u1', 'vegetarian dinner ideas');
    assert.ok(recalled);
    assert.deepEqual(
      recalled.preferences.map((p) => [p.category, p.text]),
      [
        ['dietary_preference', 'Dietary preference: vegetarian'],
        ['medical_condition', 'Medical condition: type 2 diabetes'],
      ],
    );
    assert.ok(Math.abs((recalled.preferences[0].score ?? 0) - 1) < 1e-9);
  });

  it('keeps users apart', async () => {
    await memory.saveProfile('u1', FIELDS, MACROS);
    assert.equal(await memory.recallProfile('u2', 'vegetarian'), null);
  });

  it('saves and deletes single preferences', async () => {
    const id = await memory.savePreference('u2', '  Loves mango  ', 'general');
    assert.equal(id, memoryId('u2', 'Loves mango'));

    const recalled = await memory.recallProfile('u2');
    assert.ok(recalled);
    assert.equal(recalled.profile, null);
    assert.deepEqual(recalled.preferences, [{ id, category: 'general', text: 'Loves mango', medicalInfo: false }]);

    assert.equal(await memory.deletePreference('u2', 'loves mango'), true);
    assert.equal(await memory.deletePreference('u2', 'loves mango'), false);
    assert.equal(await memory.recallProfile('u2'), null);
  });
});
