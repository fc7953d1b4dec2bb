/**
 * State Module
 */

export { StateStore, initialState, applyStepSuccess } from './stateStore.js';
export { FileStateStore, isProcessAlive } from './fileStateStore.js';
export type { FileStateStoreOptions } from './fileStateStore.js';

export type {
  DeploymentState,
  RunStatus,
  StepRecord,
  FailureRecord,
  LockInfo,
  LockHandle,
} from './state.types.js';
