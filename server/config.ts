import { DEFAULT_SERVICE_CODES_FILE } from './serviceCodes.js';

export interface ServerConfig {
  port: number;
  panoramaUrl: string;
  panoramaUsername: string;
  panoramaPassword: string;
  panoramaApiKey: string;
  deviceGroup: string;
  /** Serve the in-memory Panorama instead of a real appliance. */
  mockPanorama: boolean;
  serviceCodesFile: string;
  jobPollIntervalMs: number;
  maxJobPolls: number;
}

const DEFAULTS = {
  port: 3001,
  jobPollIntervalMs: 2000,
  maxJobPolls: 60,
};

function readInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readInteger(env.PORT, DEFAULTS.port, 'PORT'),
    panoramaUrl: env.PANORAMA_URL ?? '',
    panoramaUsername: env.PANORAMA_USERNAME ?? '',
    panoramaPassword: env.PANORAMA_PASSWORD ?? '',
    panoramaApiKey: env.PANORAMA_API_KEY ?? '',
    deviceGroup: env.PANORAMA_DEVICE_GROUP ?? '',
    mockPanorama: env.PANORAMA_MOCK === 'true',
    serviceCodesFile: env.SERVICE_CODES_FILE || DEFAULT_SERVICE_CODES_FILE,
    jobPollIntervalMs: readInteger(env.PANORAMA_JOB_POLL_INTERVAL_MS, DEFAULTS.jobPollIntervalMs, 'PANORAMA_JOB_POLL_INTERVAL_MS'),
    maxJobPolls: readInteger(env.PANORAMA_JOB_MAX_POLLS, DEFAULTS.maxJobPolls, 'PANORAMA_JOB_MAX_POLLS'),
  };
}
