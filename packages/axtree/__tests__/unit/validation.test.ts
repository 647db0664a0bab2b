import { describe, expect, test } from 'vitest';
import {
  isStandardRole,
  validateActionName,
  validateElementRole,
  validateElementTitle,
  validatePathExpression,
  validateRetryCount,
  validateRetryDelay,
  validateTimeout,
} from '../../src/validation';
import { ValidationError } from '../../src/errors';

describe('validation', () => {
  test('timeouts must be within (0, 300000] ms', () => {
    expect(validateTimeout(1)).toBe(1);
    expect(validateTimeout(300_000)).toBe(300_000);
    expect(() => validateTimeout(0)).toThrow("Invalid argument 'timeout': Timeout must be greater than 0");
    expect(() => validateTimeout(300_001, 'searchTimeout')).toThrow("Invalid argument 'searchTimeout'");
  });

  test('retry counts must be whole numbers from 1 to 10', () => {
    expect(validateRetryCount(10)).toBe(10);
    expect(() => validateRetryCount(0)).toThrow('Retry count must be at least 1');
    expect(() => validateRetryCount(2.5)).toThrow(ValidationError);
  });

  test('retry delays must be between 0 and 10000 ms', () => {
    expect(validateRetryDelay(0)).toBe(0);
    expect(() => validateRetryDelay(10_001)).toThrow(ValidationError);
  });

  test('names and paths must not be empty', () => {
    expect(validateActionName('press')).toBe('press');
    expect(() => validateActionName('')).toThrow('Action name cannot be empty');
    expect(() => validatePathExpression('')).toThrow('Path cannot be empty');
    expect(validateElementTitle(' ')).toBe(' ');
    expect(() => validateElementRole('')).toThrow('Element role cannot be empty');
  });

  test('standard roles are recognised with or without the AX prefix', () => {
    expect(isStandardRole('button')).toBe(true);
    expect(isStandardRole('AXButton')).toBe(true);
    expect(isStandardRole('TextField')).toBe(true);
    expect(isStandardRole('AXCustomWidget')).toBe(false);
    expect(validateElementRole('AXCustomWidget')).toBe('AXCustomWidget');
  });
});
