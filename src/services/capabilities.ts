// Model and tool capabilities invoked by pipeline stages
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CapabilityFailure, errorMessage } from '@/core/errors';
import type { NutritionToolDeps } from '@/mcp/handlers';
import type { ToolEnvelope } from '@/mcp/envelope';
import type { ContextValue, ContextVariables, StageCapability } from '@/pipeline/types';
import { isRetryableLlmError } from '@/services/llm-client';
import { modelForTask, type LlmClient, type LlmTask } from '@/services/model-router';
import { safeParseJson } from '@/services/safe-parse-json';

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ModelCapabilityOptions<T extends ContextValue> {
  name: string;
  task: LlmTask;
  system?: string;
  /** Expected structured output; may depend on the stage's resolved inputs. */
  output?: OutputSchema<T> | ((variables: Readonly<ContextVariables>) => OutputSchema<T>);
}

function describeIssues(error: z.ZodError): string {
  return error.errors
    .slice(0, 5)
    .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    .join('; ');
}

export function modelCapability<T extends ContextValue>(
  llm: LlmClient,
  options: ModelCapabilityOptions<T>,
): StageCapability {
  const { name, task, system } = options;
  return {
    kind: 'model',
    name,
    async invoke(payload, ctx) {
      const schema = typeof options.output === 'function' ? options.output(ctx.variables) : options.output;
      let prompt = typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
      if (schema) {
        prompt +=
          '\n\nRespond with a single JSON object that matches this JSON schema:\n' +
          JSON.stringify(zodToJsonSchema(schema, { $refStrategy: 'none' }));
      }

      let raw: string;
      try {
        raw = await llm.call(modelForTask(task), prompt, { task, system, json: schema !== undefined });
      } catch (err) {
        throw new CapabilityFailure(name, 'external_error', errorMessage(err), {
          retryable: isRetryableLlmError(err),
          cause: err,
        });
      }

      const text = raw.trim();
      if (!text) {
        throw new CapabilityFailure(name, 'malformed_output', 'empty response');
      }
      if (!schema) return text;

      const parsed = safeParseJson(text, name);
      if (parsed === null) {
        throw new CapabilityFailure(name, 'malformed_output', 'response is not a JSON object');
      }
      const result = schema.safeParse(parsed);
      if (!result.success) {
        throw new CapabilityFailure(name, 'malformed_output', describeIssues(result.error));
      }
      return result.data;
    },
  };
}

export interface ToolCapabilityOptions<S extends z.ZodTypeAny, T extends ContextValue> {
  name: string;
  args: S;
  handler: (deps: NutritionToolDeps, input: z.output<S>) => Promise<ToolEnvelope<T>>;
}

export function toolCapability<S extends z.ZodTypeAny, T extends ContextValue>(
  options: ToolCapabilityOptions<S, T>,
): StageCapability {
  const { name, args, handler } = options;
  return {
    kind: 'tool',
    name,
    async invoke(payload, ctx) {
      if (typeof payload === 'string') {
        throw new CapabilityFailure(name, 'invalid_arguments', 'tool stages need a structured template');
      }
      const parsed = args.safeParse(payload);
      if (!parsed.success) {
        throw new CapabilityFailure(name, 'invalid_arguments', describeIssues(parsed.error));
      }
      const envelope = await handler(ctx.services, parsed.data);
      if (envelope.ok) return envelope.data;

      const { code, message, retryable } = envelope.error;
      const reason = code === 'STORE_UNAVAILABLE' ? 'store_unavailable' : 'tool_error';
      throw new CapabilityFailure(name, reason, `${code}: ${message}`, { retryable });
    },
  };
}
