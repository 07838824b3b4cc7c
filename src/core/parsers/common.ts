// Common parsers for tool arguments and gateway payloads

import { invalidParamsError } from '../errors/sync-error.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getArgs(args: unknown): JsonRecord {
  if (args === undefined) {
    return {};
  }
  if (!isRecord(args)) {
    throw invalidParamsError('Arguments must be an object');
  }
  return args;
}

// Primitive readers
export function readString(
  obj: JsonRecord,
  key: string,
  required: true
): string;
export function readString(
  obj: JsonRecord,
  key: string,
  required?: false
): string | undefined;
export function readString(
  obj: JsonRecord,
  key: string,
  required = false
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (required) {
      throw invalidParamsError(`Missing required parameter: ${key}`);
    }
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalidParamsError(`Parameter ${key} must be a string`);
  }
  return value;
}

export function readNumber(
  obj: JsonRecord,
  key: string,
  required: true
): number;
export function readNumber(
  obj: JsonRecord,
  key: string,
  required?: false
): number | undefined;
export function readNumber(
  obj: JsonRecord,
  key: string,
  required = false
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (required) {
      throw invalidParamsError(`Missing required parameter: ${key}`);
    }
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalidParamsError(`Parameter ${key} must be a finite number`);
  }
  return value;
}

export function readBoolean(
  obj: JsonRecord,
  key: string,
  required: true
): boolean;
export function readBoolean(
  obj: JsonRecord,
  key: string,
  required?: false
): boolean | undefined;
export function readBoolean(
  obj: JsonRecord,
  key: string,
  required = false
): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (required) {
      throw invalidParamsError(`Missing required parameter: ${key}`);
    }
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw invalidParamsError(`Parameter ${key} must be a boolean`);
  }
  return value;
}

export function readArray(
  obj: JsonRecord,
  key: string,
  required: true
): unknown[];
export function readArray(
  obj: JsonRecord,
  key: string,
  required?: false
): unknown[] | undefined;
export function readArray(
  obj: JsonRecord,
  key: string,
  required = false
): unknown[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (required) {
      throw invalidParamsError(`Missing required parameter: ${key}`);
    }
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalidParamsError(`Parameter ${key} must be an array`);
  }
  return value;
}

// ISO-8601 string or epoch milliseconds
export function readTimestamp(
  obj: JsonRecord,
  key: string,
  fallback?: number
): number {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (fallback === undefined) {
      throw invalidParamsError(`Missing required parameter: ${key}`);
    }
    return fallback;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw invalidParamsError(`Parameter ${key} must be an ISO-8601 date or epoch milliseconds`);
}

// Input size limits
const MAX_TEXT_LENGTH = 100_000;

export function readStringBounded(
  obj: JsonRecord,
  key: string,
  required: true,
  maxLength?: number
): string;
export function readStringBounded(
  obj: JsonRecord,
  key: string,
  required?: false,
  maxLength?: number
): string | undefined;
export function readStringBounded(
  obj: JsonRecord,
  key: string,
  required = false,
  maxLength = MAX_TEXT_LENGTH
): string | undefined {
  const value = required ? readString(obj, key, true) : readString(obj, key);
  if (value !== undefined && value.length > maxLength) {
    throw invalidParamsError(`Parameter ${key} exceeds maximum length of ${maxLength}`);
  }
  return value;
}
