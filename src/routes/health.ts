import express, { type Request, type Response } from 'express';
import type { NutritionOrchestrator } from '@/agents/orchestrator';
import type { SessionContextStore } from '@/memory/SessionStore';

export const SERVICE_NAME = 'nutrition-pipeline-backend';

export function createHealthRouter(orchestrator: NutritionOrchestrator, sessions: SessionContextStore): express.Router {
  const router = express.Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      service: SERVICE_NAME,
      orchestrator: 'initialized',
      runners: orchestrator.initializedRunners(),
      sessionStore: sessions.isAvailable() ? 'available' : 'unavailable',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
