import dotenv from 'dotenv';
import {
  DEFAULT_ACCESS_TIMEOUT_MS,
  DEFAULT_CLUSTER_TIMEOUT_MS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_CONTROLLER_TIMEOUT_MS,
  DEFAULT_JOB_TIMEOUT_MS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_STEP_TIMEOUT_MS,
  DEFAULT_STATE_DIR,
  DEFAULT_SYNC_TIMEOUT_MS,
} from '../utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  // Files
  stateDir: DEFAULT_STATE_DIR,
  configFile: DEFAULT_CONFIG_FILE,

  // Polling
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  jobTimeoutMs: DEFAULT_JOB_TIMEOUT_MS,
  clusterTimeoutMs: DEFAULT_CLUSTER_TIMEOUT_MS,
  controllerTimeoutMs: DEFAULT_CONTROLLER_TIMEOUT_MS,
  syncTimeoutMs: DEFAULT_SYNC_TIMEOUT_MS,
  accessTimeoutMs: DEFAULT_ACCESS_TIMEOUT_MS,
  stepTimeoutMs: DEFAULT_STEP_TIMEOUT_MS,

  // Locking
  lockStaleMs: DEFAULT_LOCK_STALE_MS,

  debug: false,
} as const;

/**
 * Get configuration value from environment variable or default
 */
export function getEnvOrDefault(envKey: string, defaultValue: string): string;
export function getEnvOrDefault(envKey: string, defaultValue: number): number;
export function getEnvOrDefault(envKey: string, defaultValue: boolean): boolean;
export function getEnvOrDefault(
  envKey: string,
  defaultValue: string | number | boolean
): string | number | boolean {
  const envValue = process.env[envKey];

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  // Handle boolean values
  if (typeof defaultValue === 'boolean') {
    return envValue.toLowerCase() === 'true' || envValue === '1';
  }

  // Handle numeric values
  if (typeof defaultValue === 'number') {
    const parsed = Number(envValue);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  return envValue;
}

/**
 * Application configuration loaded from environment variables
 */
export const config = {
  stateDir: getEnvOrDefault('ORCHESTRATOR_STATE_DIR', DEFAULT_CONFIG.stateDir),
  configFile: getEnvOrDefault('ORCHESTRATOR_CONFIG', DEFAULT_CONFIG.configFile),

  pollIntervalMs: getEnvOrDefault('POLL_INTERVAL_MS', DEFAULT_CONFIG.pollIntervalMs),
  jobTimeoutMs: getEnvOrDefault('JOB_TIMEOUT_MS', DEFAULT_CONFIG.jobTimeoutMs),
  clusterTimeoutMs: getEnvOrDefault('CLUSTER_TIMEOUT_MS', DEFAULT_CONFIG.clusterTimeoutMs),
  controllerTimeoutMs: getEnvOrDefault('CONTROLLER_TIMEOUT_MS', DEFAULT_CONFIG.controllerTimeoutMs),
  syncTimeoutMs: getEnvOrDefault('SYNC_TIMEOUT_MS', DEFAULT_CONFIG.syncTimeoutMs),
  accessTimeoutMs: getEnvOrDefault('ACCESS_TIMEOUT_MS', DEFAULT_CONFIG.accessTimeoutMs),
  stepTimeoutMs: getEnvOrDefault('STEP_TIMEOUT_MS', DEFAULT_CONFIG.stepTimeoutMs),

  lockStaleMs: getEnvOrDefault('LOCK_STALE_MS', DEFAULT_CONFIG.lockStaleMs),

  awsProfile: process.env.AWS_PROFILE,
  debug: getEnvOrDefault('DEBUG', DEFAULT_CONFIG.debug),
} as const;

export type OrchestratorConfig = typeof config;
