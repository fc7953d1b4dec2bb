/**
 * Polling Module
 */

export { poll, untilReady } from './poller.js';
export { systemClock } from '../../utils/helpers.js';

export type { Clock } from '../../utils/helpers.js';
export type { Probe, ProbeContext, PollOptions } from './polling.types.js';
