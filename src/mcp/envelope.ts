/**
 * Standard tool response contract. Every nutrition tool returns this envelope,
 * whether called in-process by a pipeline stage or over MCP.
 */

export interface ToolError {
  code: string;
  message: string;
  retryable: boolean;
}

export type ToolEnvelope<T> = { ok: true; data: T } | { ok: false; error: ToolError };

export function envelopeOk<T>(data: T): ToolEnvelope<T> {
  return { ok: true, data };
}

export function envelopeErr<T = never>(code: string, message: string, retryable: boolean): ToolEnvelope<T> {
  return { ok: false, error: { code, message, retryable } };
}

/** Normalize a thrown value into a retryable vs non-retryable error. */
export function toRetryable(err: unknown): boolean {
  if (err instanceof Error) {
    const n = err.name.toLowerCase();
    const m = err.message.toLowerCase();
    if (n === 'aggregateerror') return true;
    if (m.includes('timeout') || m.includes('econnrefused') || m.includes('network')) return true;
    if (m.includes('econnreset') || m.includes('etimedout')) return true;
    if (m.includes('database is locked') || m.includes('sqlite_busy')) return true;
  }
  return false;
}
