import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { placeholdersOf, renderTemplate, renderText, renderValue } from '@/pipeline/template';

describe('placeholdersOf', () => {
  it('lists placeholders once, in order of first appearance', () => {
    assert.deepEqual(placeholdersOf('Hi {name}, you are {age}. Bye {name}'), ['name', 'age']);
  });

  it('collects placeholders across structured template values', () => {
    assert.deepEqual(placeholdersOf({ a: '{user_id}', b: 'for {user_id} on {day}' }), ['user_id', 'day']);
  });

  it('ignores JSON-like braces and spaced names', () => {
    assert.deepEqual(placeholdersOf('Return {"name": "x"} or { spaced } or {1abc}'), []);
  });
});

describe('renderValue', () => {
  it('renders scalars and structures', () => {
    assert.equal(renderValue('text'), 'text');
    assert.equal(renderValue(5), '5');
    assert.equal(renderValue(false), 'false');
    assert.equal(renderValue(null), 'null');
    assert.equal(renderValue({ a: 1 }), '{\n  "a": 1\n}');
    assert.equal(renderValue([1, 2]), '[\n  1,\n  2\n]');
  });
});

describe('renderText', () => {
  it('substitutes every occurrence', () => {
    assert.equal(renderText('{n} meals for {user}; {n}!', { n: 3, user: 'u1' }), '3 meals for u1; 3!');
  });

  it('leaves unknown placeholders untouched', () => {
    assert.equal(renderText('hello {missing}', {}), 'hello {missing}');
  });
});

describe('renderTemplate', () => {
  it('passes whole-placeholder arguments through as raw values', () => {
    const payload = renderTemplate(
      { profile: '{profile}', label: 'user={user_id}', count: '{n}' },
      { profile: { age: 30, tags: ['vegan'] }, user_id: 'u1', n: 4 },
    );
    assert.deepEqual(payload, { profile: { age: 30, tags: ['vegan'] }, label: 'user=u1', count: 4 });
  });

  it('is pure: rendering twice gives equal payloads', () => {
    const vars = { user_input: 'lunch ideas' };
    assert.equal(renderTemplate('Request: {user_input}', vars), renderTemplate('Request: {user_input}', vars));
  });
});
