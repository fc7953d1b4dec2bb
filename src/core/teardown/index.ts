/**
 * Teardown Module
 */

export { destroyEnvironment, destroyConfirmation, isRetryableTeardownError } from './teardown.js';

export type {
  TeardownDependencies,
  TeardownCallbacks,
  TeardownOptions,
  TeardownResult,
} from './teardown.types.js';
