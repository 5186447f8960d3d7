import { z } from 'zod';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/zod.js';
import { StatusSchema, type Status } from './status.js';

export const UserSchema = z.object({
  name: z.string(),
  status: StatusSchema,
});

export interface User {
  readonly name: string;
  readonly status: Status;
}

/**
 * Build a frozen User record. The name is taken as given; the status must
 * be one of the Status labels.
 */
export function createUser(name: string, status: Status): User {
  const result = UserSchema.safeParse({ name, status });
  if (!result.success) {
    throw new ValidationError(
      ErrorCodes.INVALID_USER,
      `Invalid user: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return Object.freeze({ name: result.data.name, status: result.data.status });
}
