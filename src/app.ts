import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { NutritionOrchestrator } from '@/agents/orchestrator';
import type { AppConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import type { PipelineServices } from '@/pipeline/types';
import { createHealthRouter } from '@/routes/health';
import { createMealPlanRouter } from '@/routes/mealPlan';
import { logger } from '@/services/logger';

export function createApp(config: AppConfig, orchestrator: NutritionOrchestrator, services: PipelineServices): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  if (config.nodeEnv !== 'development') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: 60,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
    logger.info('http:rate_limiting_enabled');
  }

  app.use(attachCorrelationId);
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined'));

  const health = createHealthRouter(orchestrator, services.sessions);
  app.use('/', health);
  app.use('/api', health);
  app.use('/api', createMealPlanRouter(orchestrator, services.plans));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
