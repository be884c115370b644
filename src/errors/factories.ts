import type {
  AdapterFailedError,
  AdapterOperation,
  AppError,
  BookkeepingAnomalyError,
  ConfigInvalidError,
  ConfigIssue,
  MutationFailedError,
  NavigationRefusalReason,
  NavigationRefusedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid burrow configuration',
  }),

  adapterFailed: (adapter: string, operation: AdapterOperation, message: string, url?: string): AdapterFailedError => ({
    _tag: 'AdapterFailed',
    adapter,
    operation,
    url,
    message,
  }),

  mutationFailed: (message: string): MutationFailedError => ({
    _tag: 'MutationFailed',
    message,
  }),

  navigationRefused: (reason: NavigationRefusalReason, message: string): NavigationRefusedError => ({
    _tag: 'NavigationRefused',
    reason,
    message,
  }),

  bookkeepingAnomaly: (message: string): BookkeepingAnomalyError => ({
    _tag: 'BookkeepingAnomaly',
    message,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
