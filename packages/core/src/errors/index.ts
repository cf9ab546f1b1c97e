export {
  TransformError,
  ValidationError,
  NotFoundError,
  TransformationError,
  StoreUnavailableError,
  ConfigError,
  wrapError,
} from './transform-error.js';
export type { ErrorCode, TransformErrorDetails } from './transform-error.js';
