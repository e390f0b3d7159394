/**
 * Shared utilities for tool handlers: typed readers over backend-supplied input.
 * Every reader throws ToolArgumentError with a message the backend can act on.
 */

import { ToolArgumentError } from '../utils/errors.js';

/**
 * Read a required, non-empty string field.
 */
export function requireString(
  toolName: string,
  input: Record<string, unknown>,
  field: string
): string {
  const value = input[field];
  if (value === undefined || value === null) {
    throw new ToolArgumentError(toolName, `${field} is required.`);
  }
  if (typeof value !== 'string') {
    throw new ToolArgumentError(toolName, `${field} must be a string.`);
  }
  if (!value.trim()) {
    throw new ToolArgumentError(toolName, `${field} must be a non-empty string.`);
  }
  return value.trim();
}

function toInteger(toolName: string, field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ToolArgumentError(toolName, `${field} must be a number.`);
  }
  if (!Number.isInteger(value)) {
    throw new ToolArgumentError(toolName, `${field} must be an integer.`);
  }
  return value;
}

/**
 * Read a required integer field.
 */
export function requireInteger(
  toolName: string,
  input: Record<string, unknown>,
  field: string
): number {
  const value = input[field];
  if (value === undefined || value === null) {
    throw new ToolArgumentError(toolName, `${field} is required.`);
  }
  return toInteger(toolName, field, value);
}

/**
 * Read an optional integer field.
 */
export function optionalInteger(
  toolName: string,
  input: Record<string, unknown>,
  field: string,
  defaultValue: number
): number {
  const value = input[field];
  if (value === undefined || value === null) {
    return defaultValue;
  }
  return toInteger(toolName, field, value);
}

/**
 * Clamp a count into [1, max].
 */
export function clampCount(count: number, max: number): number {
  return Math.min(Math.max(count, 1), max);
}
