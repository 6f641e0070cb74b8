// Executes one pipeline against a session
import { CapabilityFailure, MissingContextVariable, StageFailure, errorMessage } from '@/core/errors';
import { executeStage } from '@/pipeline/stage';
import { logger } from '@/services/logger';
import type { ContextVariables, Pipeline, PipelineServices, StageResult } from '@/pipeline/types';

export interface RunnerOptions {
  stageTimeoutMs: number;
}

/**
 * Binds a pipeline to its services. Holds no per-run state, so one instance can
 * serve concurrent runs for different sessions.
 */
export class PipelineRunner {
  constructor(
    readonly pipeline: Pipeline,
    private readonly services: PipelineServices,
    private readonly options: RunnerOptions,
  ) {}

  /**
   * Merges `initialContext` over whatever the session already holds, then runs the
   * stages in order. Throws StageFailure at the first failing stage. The session
   * stays pinned in the store until the run settles.
   */
  async run(sessionId: string, initialContext: ContextVariables): Promise<StageResult[]> {
    try {
      await this.services.sessions.acquire(sessionId);
    } catch (err) {
      throw this.storeFailure(err);
    }

    try {
      return await this.runStages(sessionId, initialContext);
    } finally {
      await this.release(sessionId);
    }
  }

  private storeFailure(err: unknown): StageFailure {
    const failure = new CapabilityFailure('session_store', 'store_unavailable', errorMessage(err), {
      retryable: true,
      cause: err,
    });
    return new StageFailure(this.pipeline.kind, this.pipeline.stages[0].name, failure, []);
  }

  /** A failed unpin leaves the session under its normal TTL; the run's outcome stands. */
  private async release(sessionId: string): Promise<void> {
    try {
      await this.services.sessions.release(sessionId);
    } catch (err) {
      logger.warn('runner:session_release_failed', { pipeline: this.pipeline.name, sessionId, error: errorMessage(err) });
    }
  }

  private async runStages(sessionId: string, initialContext: ContextVariables): Promise<StageResult[]> {
    const { pipeline, services } = this;
    const results: StageResult[] = [];

    try {
      await services.sessions.merge(sessionId, initialContext);
    } catch (err) {
      throw this.storeFailure(err);
    }

    logger.info('runner:start', { pipeline: pipeline.name, sessionId, stages: pipeline.stages.length });

    for (const stage of pipeline.stages) {
      try {
        const result = await executeStage(stage, {
          sessionId,
          pipelineKind: pipeline.kind,
          services,
          timeoutMs: this.options.stageTimeoutMs,
        });
        results.push(result);
        logger.debug('runner:stage_completed', {
          pipeline: pipeline.name,
          stage: stage.name,
          durationMs: result.durationMs,
        });
      } catch (err) {
        const cause = err instanceof MissingContextVariable ? err : CapabilityFailure.from(stage.capability.name, err);
        logger.warn('runner:stage_failed', {
          pipeline: pipeline.name,
          sessionId,
          stage: stage.name,
          error: cause.message,
          completed: results.length,
        });
        throw new StageFailure(pipeline.kind, stage.name, cause, [...results]);
      }
    }

    logger.info('runner:completed', { pipeline: pipeline.name, sessionId });
    return results;
  }
}
