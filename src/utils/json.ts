// This utility module keeps JSON parse/stringify operations safe and explicit.

import type { JsonObject } from '../types/mcp.js';
import { MalformedRequestError } from './errors.js';

// This helper parses a raw request body and emits a controlled parse error on malformed content.
export function parseJsonBody(raw: string | Buffer): unknown {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  if (text.trim().length === 0) {
    throw new MalformedRequestError('parse_error', 'Request body is empty.');
  }

  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new MalformedRequestError('parse_error', 'Request body is not valid JSON.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
