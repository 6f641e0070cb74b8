// HTTP adapter over the orchestrator workflows
import express, { type Request, type Response } from 'express';
import type { NutritionOrchestrator, OrchestratorResult } from '@/agents/orchestrator';
import { WorkflowError } from '@/core/errors';
import {
  mealPlanRequestSchema,
  profileAndPlanRequestSchema,
  validateRequest,
} from '@/routes/mealPlan.validation';
import { logger } from '@/services/logger';
import type { PlanRepository, Recipe } from '@/types/nutrition';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';

export interface MealPlanResponse {
  user_id: string;
  session_id: string;
  response: string;
  status: OrchestratorResult['status'];
  profile_updated: boolean;
  meal_options: Recipe[];
}

function describeRecipe(recipe: Recipe, index: number): string {
  const kcal = Math.round(recipe.nutrition.calories_kcal);
  const head = `${index + 1}. ${recipe.name} (${recipe.time}, ${kcal} kcal)`;
  return recipe.description ? `${head} - ${recipe.description}` : head;
}

/** Plain-text rendering of a workflow result for chat-style clients. */
export function formatMealPlanResponse(result: OrchestratorResult): string {
  const lines = [`Here are ${result.mealOptions.length} meal options for you:`];
  result.mealOptions.forEach((recipe, i) => lines.push(describeRecipe(recipe, i)));
  if (result.mealPlanSummary) lines.push('', result.mealPlanSummary);
  if (result.profileUpdated) lines.push('', 'Your nutrition profile was updated.');
  if (result.profileFailure) lines.push('', 'Your profile could not be updated this time; the plan uses what we already knew.');
  return lines.join('\n');
}

export function toMealPlanResponse(result: OrchestratorResult): MealPlanResponse {
  return {
    user_id: result.userId,
    session_id: result.planningSessionId,
    response: formatMealPlanResponse(result),
    status: result.status,
    profile_updated: result.profileUpdated,
    meal_options: result.mealOptions,
  };
}

function sendWorkflowError(req: Request, res: Response, userId: string, err: unknown): void {
  if (err instanceof WorkflowError) {
    logger.error('meal_plan:workflow_failed', {
      correlationId: req.correlationId,
      userId,
      pipeline: err.pipelineKind,
      stage: err.failure.stageName,
      error: err.failure.failure.message,
    });
    res.status(502).json({
      ...createErrorResponse(err.message, undefined, err.code, req.correlationId),
      user_id: userId,
      status: 'error',
      stage: err.failure.stageName,
    });
    return;
  }
  logger.error('meal_plan:unexpected_error', {
    correlationId: req.correlationId,
    userId,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json({
    ...createErrorResponse('Internal Server Error', undefined, 'INTERNAL_ERROR', req.correlationId),
    user_id: userId,
    status: 'error',
  });
}

export function createMealPlanRouter(orchestrator: NutritionOrchestrator, plans: PlanRepository): express.Router {
  const router = express.Router();

  router.post('/meal-plan', async (req: Request, res: Response) => {
    const validation = validateRequest(mealPlanRequestSchema, req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'VALIDATION_ERROR', req.correlationId));
      return;
    }
    const body = validation.data;
    try {
      const result = await orchestrator.executeUnifiedWorkflow(
        body.user_id,
        body.user_input,
        body.num_meals ?? orchestrator.defaultNumMeals,
        { sessionId: body.session_id },
      );
      res.json(toMealPlanResponse(result));
    } catch (err) {
      sendWorkflowError(req, res, body.user_id, err);
    }
  });

  router.post('/profile-and-plan', async (req: Request, res: Response) => {
    const validation = validateRequest(profileAndPlanRequestSchema, req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'VALIDATION_ERROR', req.correlationId));
      return;
    }
    const body = validation.data;
    try {
      const result = await orchestrator.executeCompleteWorkflow(
        body.user_id,
        body.profile_input,
        body.meal_input,
        body.num_meals ?? orchestrator.defaultNumMeals,
      );
      res.json(toMealPlanResponse(result));
    } catch (err) {
      sendWorkflowError(req, res, body.user_id, err);
    }
  });

  router.get('/users/:userId/meal-plans', async (req: Request, res: Response) => {
    const limit = Math.min(Math.max(Number.parseInt(String(req.query.limit ?? '10'), 10) || 10, 1), 50);
    try {
      const saved = await plans.listPlans(req.params.userId, limit);
      res.json(createSuccessResponse(saved));
    } catch (err) {
      sendWorkflowError(req, res, req.params.userId, err);
    }
  });

  return router;
}
