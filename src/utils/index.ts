export { logger } from './logger.js';
export { vcardTimestamp } from './time.js';
export {
  ContactNotFoundError,
  ValidationError,
  StoreError,
  ProviderError,
  SyncError,
  NotAuthenticatedError,
  AuthorizationError,
  StateMismatchError,
  AuthorizationCancelledError,
  isErrnoCode,
  toProviderError,
} from './errors.js';
