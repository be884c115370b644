import type { ResultAsync } from 'neverthrow';
import type { MutationFailedError } from '../errors/app-error.js';

/**
 * Port: the reconciliation engine.
 *
 * Diffs every modified directory buffer against backend state, applies the
 * resulting create/delete/move/copy actions, and resets the modified flag of
 * each buffer it wrote. Resolves once the changes are applied or rejected.
 *
 * `confirm`: true always asks, false never asks, undefined leaves it to the mutator.
 */
export interface MutatorPort {
  tryWriteChanges(confirm?: boolean): ResultAsync<void, MutationFailedError>;
}
