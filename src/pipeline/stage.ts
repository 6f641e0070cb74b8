// Stage definition (static checks) and single-stage execution
import {
  CapabilityFailure,
  MissingContextVariable,
  OrchestratorConfigurationError,
  errorMessage,
} from '@/core/errors';
import { placeholdersOf, renderTemplate } from '@/pipeline/template';
import type {
  ContextValue,
  ContextVariables,
  PipelineKind,
  PipelineServices,
  Stage,
  StageCapability,
  StageResult,
  StageTemplate,
} from '@/pipeline/types';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface StageDefinition {
  name: string;
  description?: string;
  requiredInputs: readonly string[];
  outputKey: string | null;
  template: StageTemplate;
  capability: StageCapability;
  timeoutMs?: number;
}

export function defineStage(def: StageDefinition): Stage {
  if (!def.name.trim()) {
    throw new OrchestratorConfigurationError('Stage name must not be empty');
  }
  for (const key of [...def.requiredInputs, ...(def.outputKey ? [def.outputKey] : [])]) {
    if (!IDENTIFIER.test(key)) {
      throw new OrchestratorConfigurationError(`Stage "${def.name}": "${key}" is not a valid variable name`);
    }
  }
  if (new Set(def.requiredInputs).size !== def.requiredInputs.length) {
    throw new OrchestratorConfigurationError(`Stage "${def.name}" declares a required input twice`);
  }
  const undeclared = placeholdersOf(def.template).filter((p) => !def.requiredInputs.includes(p));
  if (undeclared.length > 0) {
    throw new OrchestratorConfigurationError(
      `Stage "${def.name}" template references undeclared inputs: ${undeclared.join(', ')}`,
    );
  }
  if (def.timeoutMs !== undefined && !(def.timeoutMs > 0)) {
    throw new OrchestratorConfigurationError(`Stage "${def.name}" timeout must be positive`);
  }

  return Object.freeze({
    name: def.name,
    description: def.description ?? '',
    requiredInputs: Object.freeze([...def.requiredInputs]),
    outputKey: def.outputKey,
    template: def.template,
    capability: def.capability,
    timeoutMs: def.timeoutMs,
  });
}

export interface StageEnvironment {
  sessionId: string;
  pipelineKind: PipelineKind;
  services: PipelineServices;
  timeoutMs: number;
}

export function resolveInputs(stage: Stage, variables: Readonly<ContextVariables>): ContextVariables {
  const resolved: ContextVariables = {};
  for (const key of stage.requiredInputs) {
    if (!Object.prototype.hasOwnProperty.call(variables, key)) {
      throw new MissingContextVariable(stage.name, key);
    }
    resolved[key] = variables[key];
  }
  return resolved;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolve, render, invoke, then record. The output key is written only after the
 * capability succeeded; a failing stage leaves the context untouched.
 */
export async function executeStage(stage: Stage, env: StageEnvironment): Promise<StageResult> {
  const startedAt = new Date();
  const { sessions } = env.services;
  const capabilityName = stage.capability.name;

  let snapshot: ContextVariables;
  try {
    snapshot = (await sessions.getOrCreate(env.sessionId)).variables;
  } catch (err) {
    throw new CapabilityFailure('session_store', 'store_unavailable', errorMessage(err), { retryable: true, cause: err });
  }

  const variables = resolveInputs(stage, snapshot);
  const payload = renderTemplate(stage.template, variables);
  const timeoutMs = stage.timeoutMs ?? env.timeoutMs;

  let value: ContextValue;
  try {
    value = await withTimeout(
      stage.capability.invoke(payload, {
        sessionId: env.sessionId,
        pipelineKind: env.pipelineKind,
        stageName: stage.name,
        variables,
        services: env.services,
      }),
      timeoutMs,
      () => new CapabilityFailure(capabilityName, 'timeout', `no response within ${timeoutMs}ms`, { retryable: true }),
    );
  } catch (err) {
    throw CapabilityFailure.from(capabilityName, err);
  }

  if (stage.outputKey !== null) {
    try {
      await sessions.set(env.sessionId, stage.outputKey, value);
    } catch (err) {
      throw new CapabilityFailure('session_store', 'store_unavailable', errorMessage(err), { retryable: true, cause: err });
    }
  }

  return {
    stageName: stage.name,
    outputKey: stage.outputKey,
    value,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
  };
}
