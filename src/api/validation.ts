/**
 * Request body readers. Each returns the typed value or throws a
 * VALIDATION.SCHEMA LifecycleError naming the field.
 */

import { LifecycleError, validationError } from '../domain/errors';

function invalid(field: string, expected: string): never {
  throw new LifecycleError(validationError(`"${field}" must be ${expected}`, { field }));
}

export function bodyOf(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) invalid('body', 'a JSON object');
  return Object.fromEntries(Object.entries(value));
}

export function requiredString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) invalid(field, 'a non-empty string');
  return value;
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') invalid(field, 'a string');
  return value;
}

export function requiredBoolean(body: Record<string, unknown>, field: string): boolean {
  const value = body[field];
  if (typeof value !== 'boolean') invalid(field, 'a boolean');
  return value;
}

/** Parameter maps: every value becomes a string; nested objects are refused. */
export function stringRecord(body: Record<string, unknown>, field: string): Record<string, string> {
  const value = body[field];
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) invalid(field, 'an object');
  const result: Record<string, string> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') result[key] = raw;
    else if (typeof raw === 'number' || typeof raw === 'boolean') result[key] = String(raw);
    else invalid(`${field}.${key}`, 'a string, number or boolean');
  }
  return result;
}

export function optionalObject(
  body: Record<string, unknown>,
  field: string,
): Record<string, unknown> | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'object' || Array.isArray(value)) invalid(field, 'an object');
  return Object.fromEntries(Object.entries(value));
}

/** Parse a numeric query parameter. */
export function queryInt(value: unknown, field: string, fallback?: number): number | undefined {
  if (value === undefined || value === '') return fallback;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 0) invalid(field, 'a non-negative integer');
  return parsed;
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
