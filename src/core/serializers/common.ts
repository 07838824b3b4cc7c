// Common serializers for MCP output

import type { SyncOutcome } from '../sync/sync-store.js';

export function serialize(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  // Errors with their own JSON shape (SyncError)
  if (
    value instanceof Error &&
    'toJSON' in value &&
    typeof value.toJSON === 'function'
  ) {
    return serialize(value.toJSON());
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (Array.isArray(value)) {
    return value.map(serialize);
  }

  if (typeof value === 'object') {
    const obj: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      obj[k] = serialize(v);
    }
    return obj;
  }

  return value;
}

export function formatOutput(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(serialize(value), null, 2);
}

export function formatOutcome(outcome: SyncOutcome): Record<string, unknown> {
  if (outcome.ok) {
    return { ok: true, applied: outcome.applied };
  }
  return {
    ok: false,
    error: { code: outcome.error.code, message: outcome.error.message },
  };
}

// Format for MCP content response
export function toMcpContent(value: unknown): Array<{ type: 'text'; text: string }> {
  return [{ type: 'text', text: formatOutput(value) }];
}

// Success response helper
export function successResponse(data: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return { content: toMcpContent(data) };
}

// Error response helper
export function errorResponse(error: unknown): { content: Array<{ type: 'text'; text: string }>; isError: true } {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}
