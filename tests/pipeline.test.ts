import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createMealPlanningPipeline } from '@/agents/meal-planning-pipeline';
import { createProfilingPipeline } from '@/agents/profiling-pipeline';
import { OrchestratorConfigurationError } from '@/core/errors';
import { createPipeline } from '@/pipeline/pipeline';
import { defineStage } from '@/pipeline/stage';
import type { Stage, StageCapability } from '@/pipeline/types';
import { FakeLlmClient } from './helpers/fakes';

const noop: StageCapability = { kind: 'tool', name: 'noop', invoke: async () => 'ok' };

function stage(name: string, requiredInputs: string[], outputKey: string | null): Stage {
  return defineStage({ name, requiredInputs, outputKey, template: '', capability: noop });
}

describe('createPipeline', () => {
  it('rejects a pipeline without stages', () => {
    assert.throws(
      () => createPipeline({ kind: 'profile', initialContextKeys: [], stages: [], failurePolicy: 'absorbable' }),
      { message: 'Pipeline "profile_pipeline" has no stages' },
    );
  });

  it('rejects duplicate stage names', () => {
    assert.throws(
      () =>
        createPipeline({
          kind: 'planning',
          initialContextKeys: [],
          stages: [stage('A', [], 'x'), stage('A', [], 'y')],
          failurePolicy: 'fatal',
        }),
      OrchestratorConfigurationError,
    );
  });

  it('rejects an input that only a later stage produces', () => {
    assert.throws(
      () =>
        createPipeline({
          kind: 'planning',
          name: 'forward',
          initialContextKeys: ['a'],
          stages: [stage('First', ['a', 'b'], 'c'), stage('Second', ['a'], 'b')],
          failurePolicy: 'fatal',
        }),
      {
        message: 'Pipeline "forward" stage 1 "First" requires "b" which no initial key or earlier stage provides',
      },
    );
  });

  it('accepts inputs satisfied by initial keys and earlier outputs', () => {
    const pipeline = createPipeline({
      kind: 'profile',
      initialContextKeys: ['a'],
      stages: [stage('First', ['a'], 'b'), stage('Second', ['a', 'b'], null)],
      failurePolicy: 'absorbable',
    });
    assert.equal(pipeline.name, 'profile_pipeline');
    assert.deepEqual(
      pipeline.stages.map((s) => s.name),
      ['First', 'Second'],
    );
  });
});

describe('built-in pipelines', () => {
  it('profiling extracts, calculates, then persists and absorbs failures', () => {
    const pipeline = createProfilingPipeline(new FakeLlmClient());
    assert.equal(pipeline.kind, 'profile');
    assert.equal(pipeline.failurePolicy, 'absorbable');
    assert.deepEqual(
      pipeline.stages.map((s) => [s.name, s.outputKey]),
      [
        ['UserProfiler', 'extracted_profile_json'],
        ['NutritionCalculator', 'calculated_macros'],
        ['ProfileUpdater', null],
      ],
    );
  });

  it('meal planning recalls, researches, generates and saves with a fatal policy', () => {
    const pipeline = createMealPlanningPipeline(new FakeLlmClient());
    assert.equal(pipeline.kind, 'planning');
    assert.equal(pipeline.failurePolicy, 'fatal');
    assert.deepEqual(
      pipeline.stages.map((s) => s.name),
      ['ProfileRecall', 'ConversationRecall', 'RecipeFinder', 'MealGenerator', 'PlanSaver'],
    );
    assert.deepEqual(
      pipeline.stages.map((s) => s.capability.kind),
      ['tool', 'tool', 'model', 'model', 'tool'],
    );
  });
});
