import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { detectIntent, detectRelevantPipelines } from '@/agents/intent-detection';
import type { IntentRule } from '@/config/intent-rules';

describe('detectIntent', () => {
  it('selects planning alone for a plain meal request', () => {
    const decision = detectIntent('I want healthy lunch recipes');
    assert.deepEqual([...decision.kinds], ['planning']);
    assert.deepEqual(decision.matches, []);
  });

  it('adds profiling when the request carries profile facts', () => {
    const decision = detectIntent("I'm a 30-year-old male, 75kg, vegetarian, diabetic, want dinner");
    assert.deepEqual([...decision.kinds].sort(), ['planning', 'profile']);
    assert.deepEqual(decision.matches, ["i'm", 'kg', 'diabetic', 'vegetarian']);
  });

  it('matches case-insensitively', () => {
    assert.deepEqual(detectIntent('I AM VEGAN').matches, ['i am', 'vegan']);
  });

  it('selects nothing for blank input', () => {
    assert.equal(detectIntent('   ').kinds.size, 0);
    assert.equal(detectIntent('').kinds.size, 0);
  });

  it('misses profile facts phrased without a listed term', () => {
    assert.deepEqual([...detectRelevantPipelines("I can't eat peanuts")], ['planning']);
  });

  it('uses the rule table it is given', () => {
    const rules: IntentRule[] = [{ term: 'peanut', kind: 'profile' }];
    assert.deepEqual([...detectRelevantPipelines("I can't eat peanuts", rules)].sort(), ['planning', 'profile']);
  });
});
