export type {
  AppError,
  AdapterFailedError,
  AdapterOperation,
  BookkeepingAnomalyError,
  ConfigIssue,
  ConfigInvalidError,
  MutationFailedError,
  NavigationRefusalReason,
  NavigationRefusedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
