// Routes a request to the profiling and meal-planning pipelines
import { createMealPlanningPipeline, MEAL_OPTIONS_KEY } from '@/agents/meal-planning-pipeline';
import { createProfilingPipeline } from '@/agents/profiling-pipeline';
import { detectIntent, type IntentDecision } from '@/agents/intent-detection';
import { DEFAULT_INTENT_RULES, type IntentRule } from '@/config/intent-rules';
import { OrchestratorConfigurationError, StageFailure, WorkflowError } from '@/core/errors';
import { formatTimestamp, sessionIdFor } from '@/memory/session-keys';
import { PipelineRunner } from '@/pipeline/runner';
import type {
  ContextVariables,
  FailurePolicy,
  Pipeline,
  PipelineKind,
  PipelineServices,
  StageResult,
} from '@/pipeline/types';
import { logger } from '@/services/logger';
import type { LlmClient } from '@/services/model-router';
import { mealOptionsSchema, type MealOptions, type Recipe } from '@/types/nutrition';

export type WorkflowPhase = 'START' | 'DETECT' | 'PROFILE' | 'ENHANCE_INPUT' | 'PLAN' | 'ASSEMBLE' | 'END';

export type WorkflowStatus = 'success' | 'partial_failure';

export interface PipelineFailureReport {
  pipelineKind: PipelineKind;
  stageName: string;
  reason: string;
  message: string;
  partialResults: readonly StageResult[];
}

export interface OrchestratorResult {
  userId: string;
  status: WorkflowStatus;
  profileAttempted: boolean;
  profileUpdated: boolean;
  profileResponse?: StageResult[];
  /** Set when profiling ran and failed; the failure was absorbed. */
  profileFailure?: PipelineFailureReport;
  planningResponse: StageResult[];
  mealOptions: Recipe[];
  mealPlanSummary?: string;
  numMealsRequested: number;
  planningSessionId: string;
  intentMatches: string[];
  phases: WorkflowPhase[];
}

export interface OrchestratorDeps {
  services: PipelineServices;
  llm: LlmClient;
  /** Replaces the built-in pipeline of a kind. */
  pipelines?: Partial<Record<PipelineKind, Pipeline>>;
  intentRules?: readonly IntentRule[];
  now?: () => Date;
  stageTimeoutMs?: number;
  defaultNumMeals?: number;
}

export interface UnifiedWorkflowOptions {
  /** Overrides the per-day planning session id. */
  sessionId?: string;
}

type PipelineOutcome =
  | { status: 'completed'; results: StageResult[] }
  | { status: 'failed'; failure: StageFailure };

/** Fixed instruction block appended to every planning request. */
export function enhanceMealRequest(userInput: string, numMeals: number): string {
  return `${userInput.trim()}

Please provide at least ${numMeals} distinct meal options. For each option include:
- name and a short description
- ingredients with quantities
- nutrition per serving (calories, protein, carbohydrates, fat)
- step-by-step instructions
- total preparation time`;
}

export function reportFailure(failure: StageFailure): PipelineFailureReport {
  const cause = failure.failure;
  return {
    pipelineKind: failure.pipelineKind,
    stageName: failure.stageName,
    reason: 'reason' in cause ? cause.reason : 'missing_context_variable',
    message: cause.message,
    partialResults: failure.partialResults,
  };
}

/**
 * Owns one lazily created runner per pipeline kind. Pipelines are built in the
 * constructor so a malformed pipeline fails at startup, never on a request.
 * Safe for concurrent calls with distinct session ids; calls sharing a session id
 * race on last-write-wins context writes.
 */
export class NutritionOrchestrator {
  private readonly pipelines: Record<PipelineKind, Pipeline>;
  private readonly runners = new Map<PipelineKind, PipelineRunner>();
  private readonly intentRules: readonly IntentRule[];
  private readonly now: () => Date;
  private readonly stageTimeoutMs: number;
  readonly defaultNumMeals: number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.pipelines = {
      profile: deps.pipelines?.profile ?? createProfilingPipeline(deps.llm),
      planning: deps.pipelines?.planning ?? createMealPlanningPipeline(deps.llm),
    };
    for (const [kind, pipeline] of Object.entries(this.pipelines)) {
      if (pipeline.kind !== kind) {
        throw new OrchestratorConfigurationError(`Pipeline "${pipeline.name}" of kind "${pipeline.kind}" registered as "${kind}"`);
      }
    }
    if (this.pipelines.planning.failurePolicy !== 'fatal') {
      throw new OrchestratorConfigurationError('The planning pipeline must use the fatal failure policy');
    }
    this.intentRules = deps.intentRules ?? DEFAULT_INTENT_RULES;
    this.now = deps.now ?? (() => new Date());
    this.stageTimeoutMs = deps.stageTimeoutMs ?? 60_000;
    this.defaultNumMeals = deps.defaultNumMeals ?? 5;
  }

  getRunner(kind: PipelineKind): PipelineRunner {
    let runner = this.runners.get(kind);
    if (!runner) {
      runner = new PipelineRunner(this.pipelines[kind], this.deps.services, { stageTimeoutMs: this.stageTimeoutMs });
      this.runners.set(kind, runner);
      logger.info('orchestrator:runner_created', { kind, pipeline: runner.pipeline.name });
    }
    return runner;
  }

  initializedRunners(): PipelineKind[] {
    return [...this.runners.keys()];
  }

  detectIntent(userInput: string): IntentDecision {
    return detectIntent(userInput, this.intentRules);
  }

  detectRelevantPipelines(userInput: string): Set<PipelineKind> {
    return this.detectIntent(userInput).kinds;
  }

  sessionIdFor(kind: PipelineKind, userId: string): string {
    return sessionIdFor(kind, userId, this.now());
  }

  private async runPipeline(kind: PipelineKind, sessionId: string, context: ContextVariables): Promise<PipelineOutcome> {
    try {
      const results = await this.getRunner(kind).run(sessionId, context);
      return { status: 'completed', results };
    } catch (err) {
      if (err instanceof StageFailure) return { status: 'failed', failure: err };
      throw err;
    }
  }

  /**
   * Runs profiling and applies its failure policy: a fatal failure throws, an
   * absorbable one comes back as a report.
   */
  private async profile(
    userId: string,
    userInput: string,
    policy: FailurePolicy = this.pipelines.profile.failurePolicy,
  ): Promise<{ results: StageResult[] } | { failure: PipelineFailureReport }> {
    const outcome = await this.runPipeline('profile', this.sessionIdFor('profile', userId), {
      user_id: userId,
      user_input: userInput,
    });
    if (outcome.status === 'completed') return { results: outcome.results };

    const { failure } = outcome;
    if (policy === 'fatal') {
      logger.error('orchestrator:pipeline_failed', { kind: 'profile', stage: failure.stageName, error: failure.message });
      throw new WorkflowError('profile', failure);
    }
    logger.warn('orchestrator:pipeline_failure_absorbed', { kind: 'profile', stage: failure.stageName, error: failure.message });
    return { failure: reportFailure(failure) };
  }

  private async plan(userId: string, userInput: string, numMeals: number, sessionId: string): Promise<StageResult[]> {
    const outcome = await this.runPipeline('planning', sessionId, {
      user_id: userId,
      user_input: enhanceMealRequest(userInput, numMeals),
      request_text: userInput,
      session_id: sessionId,
      current_time: formatTimestamp(this.now()),
      num_meals: numMeals,
    });
    if (outcome.status === 'failed') {
      logger.error('orchestrator:pipeline_failed', { kind: 'planning', stage: outcome.failure.stageName, error: outcome.failure.message });
      throw new WorkflowError('planning', outcome.failure);
    }
    return outcome.results;
  }

  private extractMealOptions(results: readonly StageResult[]): MealOptions {
    const produced = results.find((r) => r.outputKey === MEAL_OPTIONS_KEY);
    const parsed = mealOptionsSchema.safeParse(produced?.value);
    return parsed.success ? parsed.data : { recipes: [] };
  }

  /**
   * START → DETECT → [PROFILE] → ENHANCE_INPUT → PLAN → ASSEMBLE → END.
   * Profiling runs only when the request carries profile signals and its failure
   * is absorbed; planning always runs and its failure throws WorkflowError.
   */
  async executeUnifiedWorkflow(
    userId: string,
    userInput: string,
    numMeals: number = this.defaultNumMeals,
    options: UnifiedWorkflowOptions = {},
  ): Promise<OrchestratorResult> {
    const phases: WorkflowPhase[] = ['START', 'DETECT'];
    const intent = this.detectIntent(userInput);
    logger.info('orchestrator:intent', { userId, kinds: [...intent.kinds], matches: intent.matches });

    let profileResponse: StageResult[] | undefined;
    let profileFailure: PipelineFailureReport | undefined;
    if (intent.kinds.has('profile')) {
      phases.push('PROFILE');
      const settled = await this.profile(userId, userInput);
      if ('results' in settled) profileResponse = settled.results;
      else profileFailure = settled.failure;
    }

    phases.push('ENHANCE_INPUT', 'PLAN');
    const planningSessionId = options.sessionId ?? this.sessionIdFor('planning', userId);
    const planningResponse = await this.plan(userId, userInput, numMeals, planningSessionId);

    phases.push('ASSEMBLE');
    const mealOptions = this.extractMealOptions(planningResponse);
    phases.push('END');

    return {
      userId,
      status: profileFailure ? 'partial_failure' : 'success',
      profileAttempted: intent.kinds.has('profile'),
      profileUpdated: profileResponse !== undefined && profileResponse.length > 0,
      profileResponse,
      profileFailure,
      planningResponse,
      mealOptions: mealOptions.recipes,
      mealPlanSummary: mealOptions.summary,
      numMealsRequested: numMeals,
      planningSessionId,
      intentMatches: intent.matches,
      phases,
    };
  }

  /** Profiling then planning with separate inputs; a profiling failure aborts the call. */
  async executeCompleteWorkflow(
    userId: string,
    profileInput: string,
    mealInput: string,
    numMeals: number = this.defaultNumMeals,
  ): Promise<OrchestratorResult> {
    const phases: WorkflowPhase[] = ['START', 'PROFILE'];
    const settled = await this.profile(userId, profileInput, 'fatal');
    const profileResponse = 'results' in settled ? settled.results : [];

    phases.push('ENHANCE_INPUT', 'PLAN');
    const planningSessionId = this.sessionIdFor('planning', userId);
    const planningResponse = await this.plan(userId, mealInput, numMeals, planningSessionId);

    phases.push('ASSEMBLE');
    const mealOptions = this.extractMealOptions(planningResponse);
    phases.push('END');

    return {
      userId,
      status: 'success',
      profileAttempted: true,
      profileUpdated: profileResponse.length > 0,
      profileResponse,
      planningResponse,
      mealOptions: mealOptions.recipes,
      mealPlanSummary: mealOptions.summary,
      numMealsRequested: numMeals,
      planningSessionId,
      intentMatches: [],
      phases,
    };
  }
}
