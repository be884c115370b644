import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type AdapterOperation = 'list' | 'normalize' | 'read' | 'write' | 'action';

export type AdapterFailedError = Readonly<{
  readonly _tag: 'AdapterFailed';
  readonly adapter: string;
  readonly operation: AdapterOperation;
  readonly url?: string;
  readonly message: string;
}>;

export type MutationFailedError = Readonly<{
  readonly _tag: 'MutationFailed';
  readonly message: string;
}>;

export type NavigationRefusalReason = 'no_entry' | 'unsaved_directory' | 'preview_in_float';

export type NavigationRefusedError = Readonly<{
  readonly _tag: 'NavigationRefused';
  readonly reason: NavigationRefusalReason;
  readonly message: string;
}>;

export type BookkeepingAnomalyError = Readonly<{
  readonly _tag: 'BookkeepingAnomaly';
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError =
  | ConfigInvalidError
  | AdapterFailedError
  | MutationFailedError
  | NavigationRefusedError
  | BookkeepingAnomalyError
  | UnexpectedError;

/**
 * Branded wrapper for setup options that went through the config parser.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
