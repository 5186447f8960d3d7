/**
 * Closed set of user status labels.
 */
import { z } from 'zod';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

export const Status = Object.freeze({
  ACTIVE: 'active',
  INACTIVE: 'inactive',
} as const);

export type Status = (typeof Status)[keyof typeof Status];

export type StatusName = keyof typeof Status;

/** Every status label, in declaration order. */
export const STATUSES: readonly Status[] = [Status.ACTIVE, Status.INACTIVE];

export const StatusSchema = z.enum([Status.ACTIVE, Status.INACTIVE]);

export function isStatus(value: unknown): value is Status {
  return StatusSchema.safeParse(value).success;
}

/**
 * Resolve a label to its Status, rejecting anything outside the closed set.
 */
export function parseStatus(label: string): Status {
  const result = StatusSchema.safeParse(label);
  if (!result.success) {
    throw new ValidationError(
      ErrorCodes.INVALID_STATUS,
      `Unknown status "${label}". Valid statuses: ${STATUSES.join(', ')}`,
      { label, valid: [...STATUSES] }
    );
  }
  return result.data;
}

/** Display label for a status. */
export function statusLabel(status: Status): string {
  return status;
}

/** Variant name (`ACTIVE`, `INACTIVE`) for a status. */
export function statusName(status: Status): StatusName {
  return status === Status.ACTIVE ? 'ACTIVE' : 'INACTIVE';
}
