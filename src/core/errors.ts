// Error taxonomy shared by stages, runners and the orchestrator
import type { PipelineKind, StageResult } from '@/pipeline/types';

export class AppException extends Error {
  readonly code: string;

  constructor(message: string, code = 'APP_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppException';
    this.code = code;
  }
}

/** A stage's required input is absent from the session context. */
export class MissingContextVariable extends AppException {
  readonly stageName: string;
  readonly key: string;

  constructor(stageName: string, key: string) {
    super(`Stage "${stageName}" requires context variable "${key}" which is not set`, 'MISSING_CONTEXT_VARIABLE');
    this.name = 'MissingContextVariable';
    this.stageName = stageName;
    this.key = key;
  }
}

export type CapabilityFailureReason =
  | 'timeout'
  | 'malformed_output'
  | 'invalid_arguments'
  | 'store_unavailable'
  | 'tool_error'
  | 'external_error';

export class CapabilityFailure extends AppException {
  readonly capability: string;
  readonly reason: CapabilityFailureReason;
  readonly retryable: boolean;

  constructor(
    capability: string,
    reason: CapabilityFailureReason,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(`${capability}: ${message}`, 'CAPABILITY_FAILURE', { cause: options.cause });
    this.name = 'CapabilityFailure';
    this.capability = capability;
    this.reason = reason;
    this.retryable = options.retryable ?? false;
  }

  static from(capability: string, err: unknown): CapabilityFailure {
    if (err instanceof CapabilityFailure) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new CapabilityFailure(capability, 'external_error', message, { cause: err });
  }
}

export type StageFailureCause = MissingContextVariable | CapabilityFailure;

/** Raised by a runner when a stage fails; carries the results of the stages that completed. */
export class StageFailure extends AppException {
  readonly pipelineKind: PipelineKind;
  readonly stageName: string;
  readonly failure: StageFailureCause;
  readonly partialResults: readonly StageResult[];

  constructor(
    pipelineKind: PipelineKind,
    stageName: string,
    failure: StageFailureCause,
    partialResults: readonly StageResult[],
  ) {
    super(`${pipelineKind} pipeline failed at stage "${stageName}": ${failure.message}`, 'STAGE_FAILURE', {
      cause: failure,
    });
    this.name = 'StageFailure';
    this.pipelineKind = pipelineKind;
    this.stageName = stageName;
    this.failure = failure;
    this.partialResults = partialResults;
  }
}

export class OrchestratorConfigurationError extends AppException {
  constructor(message: string) {
    super(message, 'ORCHESTRATOR_CONFIGURATION');
    this.name = 'OrchestratorConfigurationError';
  }
}

/** A pipeline whose failure policy is fatal did not complete. */
export class WorkflowError extends AppException {
  readonly pipelineKind: PipelineKind;
  readonly failure: StageFailure;

  constructor(pipelineKind: PipelineKind, failure: StageFailure) {
    super(`Workflow aborted: ${failure.message}`, 'WORKFLOW_FAILED', { cause: failure });
    this.name = 'WorkflowError';
    this.pipelineKind = pipelineKind;
    this.failure = failure;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
