// Environment must be loaded before the config module reads it.
import 'dotenv/config';

import { NutritionOrchestrator } from '@/agents/orchestrator';
import { createApp } from '@/app';
import { appConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { createAppServices } from '@/services/pipeline-deps';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

async function main(): Promise<void> {
  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const { services, llm, close } = await createAppServices(appConfig);
  onShutdown(close);

  // Pipelines are checked here; a misconfigured pipeline stops startup.
  const orchestrator = new NutritionOrchestrator({
    services,
    llm,
    stageTimeoutMs: appConfig.pipeline.stageTimeoutMs,
    defaultNumMeals: appConfig.pipeline.defaultNumMeals,
  });

  const app = createApp(appConfig, orchestrator, services);
  const server = app.listen(appConfig.port, () => {
    logger.info('server:listening', { port: appConfig.port, env: appConfig.nodeEnv });
  });
  setServerInstance(server);
}

main().catch((err: unknown) => {
  logger.fatal('server:startup_failed', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
