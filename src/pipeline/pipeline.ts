// Ordered stage list with a static well-formedness check
import { OrchestratorConfigurationError } from '@/core/errors';
import type { FailurePolicy, Pipeline, PipelineKind, Stage } from '@/pipeline/types';

export interface PipelineDefinition {
  kind: PipelineKind;
  name?: string;
  initialContextKeys: readonly string[];
  stages: readonly Stage[];
  failurePolicy: FailurePolicy;
}

/**
 * Every required input of stage i must be an initial key or the output key of a
 * stage before i. Checked here so a misconfigured pipeline never reaches a runner.
 */
export function createPipeline(def: PipelineDefinition): Pipeline {
  const name = def.name ?? `${def.kind}_pipeline`;
  if (def.stages.length === 0) {
    throw new OrchestratorConfigurationError(`Pipeline "${name}" has no stages`);
  }

  const stageNames = new Set<string>();
  const available = new Set(def.initialContextKeys);

  def.stages.forEach((stage, index) => {
    if (stageNames.has(stage.name)) {
      throw new OrchestratorConfigurationError(`Pipeline "${name}" has duplicate stage name "${stage.name}"`);
    }
    stageNames.add(stage.name);

    const unsatisfied = stage.requiredInputs.filter((key) => !available.has(key));
    if (unsatisfied.length > 0) {
      throw new OrchestratorConfigurationError(
        `Pipeline "${name}" stage ${index + 1} "${stage.name}" requires ${unsatisfied
          .map((k) => `"${k}"`)
          .join(', ')} which no initial key or earlier stage provides`,
      );
    }
    if (stage.outputKey !== null) available.add(stage.outputKey);
  });

  return Object.freeze({
    kind: def.kind,
    name,
    initialContextKeys: Object.freeze([...def.initialContextKeys]),
    stages: Object.freeze([...def.stages]),
    failurePolicy: def.failurePolicy,
  });
}
