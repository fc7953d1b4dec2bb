/**
 * Polling Domain Types
 */

import type { Clock } from '../../utils/helpers.js';
import type { ProbeOutcome } from '../results/index.js';

export interface ProbeContext {
  /** 1-based probe invocation count */
  attempt: number;
  signal?: AbortSignal;
}

export type Probe = (context: ProbeContext) => Promise<ProbeOutcome>;

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  clock?: Clock;
  /** Called after each pending probe, before sleeping */
  onPending?: (info: { attempt: number; elapsedMs: number; detail?: string }) => void;
}
