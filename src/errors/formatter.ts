import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * User-facing text for the notification channel.
 */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'AdapterFailed': {
      const where = error.url ? ` ${error.url}` : '';
      return `${error.adapter}: ${error.operation} failed${where}: ${error.message}`;
    }

    case 'MutationFailed':
      return `Error applying changes: ${error.message}`;

    case 'NavigationRefused':
    case 'BookkeepingAnomaly':
      return error.message;

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
