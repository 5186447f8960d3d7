/**
 * Numeric constants and integer arithmetic.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

/** Approximate value of π. */
export const PI = 3.14159;

/**
 * Throw unless `value` is a safe integer.
 */
export function assertSafeInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_INTEGER,
      `Expected ${label} to be a safe integer, got ${value}`,
      { [label]: value }
    );
  }
}

/**
 * Sum two integers.
 * Inputs and result must stay within the safe integer range; anything else
 * throws rather than losing precision.
 */
export function add(a: number, b: number): number {
  assertSafeInteger(a, 'a');
  assertSafeInteger(b, 'b');

  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new ValidationError(
      ErrorCodes.INTEGER_OVERFLOW,
      `Integer overflow: ${a} + ${b} exceeds the safe integer range`,
      { a, b }
    );
  }
  return sum;
}
