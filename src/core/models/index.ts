export {
  Status,
  STATUSES,
  StatusSchema,
  isStatus,
  parseStatus,
  statusLabel,
  statusName,
  type StatusName,
} from './status.js';
export { UserSchema, createUser, type User } from './user.js';
