/**
 * Argument validation shared by the resilience primitives, the search
 * engine and the path resolver. Violations surface as ValidationError and
 * are never retried.
 */

import { z, type ZodType } from 'zod';
import { ValidationError } from '../errors';
import type { Logger } from '../monitoring/logger';

export const MAX_TIMEOUT_MS = 300_000;
export const MAX_RETRY_ATTEMPTS = 10;
export const MAX_RETRY_DELAY_MS = 10_000;

export const TimeoutMsSchema = z
  .number({ invalid_type_error: 'Timeout must be a number' })
  .positive('Timeout must be greater than 0')
  .max(MAX_TIMEOUT_MS, `Timeout must not exceed ${MAX_TIMEOUT_MS}ms (5 minutes)`);

export const MaxAttemptsSchema = z
  .number({ invalid_type_error: 'Retry count must be a number' })
  .int('Retry count must be an integer')
  .min(1, 'Retry count must be at least 1')
  .max(MAX_RETRY_ATTEMPTS, `Retry count must not exceed ${MAX_RETRY_ATTEMPTS}`);

export const DelayMsSchema = z
  .number({ invalid_type_error: 'Retry delay must be a number' })
  .min(0, 'Retry delay must be a non-negative value')
  .max(MAX_RETRY_DELAY_MS, `Retry delay must not exceed ${MAX_RETRY_DELAY_MS}ms`);

// Only "" is rejected; whitespace is a legitimate substring to search for.
const nonEmpty = (what: string) => z.string().min(1, `${what} cannot be empty`);

// Roles the provider commonly reports, compared case-insensitively.
const STANDARD_ROLES = new Set(
  [
    'application', 'button', 'checkbox', 'combobox', 'disclosureTriangle', 'group',
    'image', 'link', 'menu', 'menuBar', 'menuItem', 'popUpButton',
    'progressIndicator', 'radioButton', 'radioGroup', 'scrollArea', 'scrollBar',
    'slider', 'staticText', 'stepper', 'tab', 'tabGroup', 'table', 'text',
    'textArea', 'textField', 'toolbar', 'window',
  ].map((role) => role.toLowerCase()),
);

function check<T>(schema: ZodType<T>, argument: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'Invalid value';
    throw new ValidationError(argument, reason);
  }
  return result.data;
}

export function validateTimeout(ms: number, argument = 'timeout'): number {
  return check(TimeoutMsSchema, argument, ms);
}

export function validateRetryCount(attempts: number): number {
  return check(MaxAttemptsSchema, 'retryCount', attempts);
}

export function validateRetryDelay(ms: number): number {
  return check(DelayMsSchema, 'retryDelay', ms);
}

export function validateElementTitle(title: string): string {
  return check(nonEmpty('Element title'), 'title', title);
}

export function validateActionName(action: string): string {
  return check(nonEmpty('Action name'), 'action', action);
}

export function validatePathExpression(path: string): string {
  return check(nonEmpty('Path'), 'path', path);
}

/**
 * Roles outside the well-known list are allowed (providers add their own),
 * they are only noted at debug level.
 */
export function validateElementRole(role: string, logger?: Logger): string {
  const value = check(nonEmpty('Element role'), 'role', role);
  if (!isStandardRole(value)) {
    logger?.debug('non_standard_role', { role: value });
  }
  return value;
}

export function isStandardRole(role: string): boolean {
  const lower = role.toLowerCase();
  return STANDARD_ROLES.has(lower) || STANDARD_ROLES.has(lower.replace(/^ax/, ''));
}
