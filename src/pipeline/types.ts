// Shared pipeline types
import type { SessionContextStore } from '@/memory/SessionStore';
import type { PlanRepository, ProfileMemory } from '@/types/nutrition';

/** Any JSON value; everything stored in a session context is one. */
export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue | undefined };

export type ContextVariables = Record<string, ContextValue>;

export type PipelineKind = 'profile' | 'planning';

export type FailurePolicy = 'absorbable' | 'fatal';

/**
 * Text templates use `{name}` placeholders. Structured templates map argument
 * names to text templates; an argument that is exactly `{name}` receives the
 * raw context value instead of its rendering.
 */
export type StageTemplate = string | Readonly<Record<string, string>>;

export type RenderedPayload = string | { [key: string]: ContextValue };

/** Collaborators bound to a runner and handed to every capability call. */
export interface PipelineServices {
  sessions: SessionContextStore;
  memory: ProfileMemory;
  plans: PlanRepository;
}

export interface CapabilityContext {
  sessionId: string;
  pipelineKind: PipelineKind;
  stageName: string;
  /** Resolved required inputs of the stage. */
  variables: Readonly<ContextVariables>;
  services: PipelineServices;
}

export interface StageCapability {
  kind: 'model' | 'tool';
  name: string;
  invoke(payload: RenderedPayload, ctx: CapabilityContext): Promise<ContextValue>;
}

export interface Stage {
  readonly name: string;
  readonly description: string;
  readonly requiredInputs: readonly string[];
  /** `null` marks a terminal stage invoked for its side effect. */
  readonly outputKey: string | null;
  readonly template: StageTemplate;
  readonly capability: StageCapability;
  readonly timeoutMs?: number;
}

export interface StageResult {
  stageName: string;
  outputKey: string | null;
  value: ContextValue;
  startedAt: string;
  durationMs: number;
}

export interface Pipeline {
  readonly kind: PipelineKind;
  readonly name: string;
  readonly initialContextKeys: readonly string[];
  readonly stages: readonly Stage[];
  readonly failurePolicy: FailurePolicy;
}
