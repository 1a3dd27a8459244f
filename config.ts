// Configuration for the SolarEdge monitoring client

import { getEnvironment } from './lib/env';

// API Configuration
export const SOLAREDGE_API_CONFIG = {
  baseUrl: 'https://monitoringapi.solaredge.com',
  timeout: 30000,                    // 30 seconds, applied by FetchTransport only
} as const;

// Polling Configuration
// Measurements are published roughly every 15 minutes; the grace margin covers
// the site being a little late. Neither value is documented by the vendor.
export const POLLING_CONFIG = {
  refreshIntervalMinutes: 15,
  graceSeconds: 10,
} as const;

// Usage limits documented for the energy and power endpoints
export const USAGE_LIMITS = {
  dailyEnergyMaxYears: 1,            // timeUnit=DAY
  intradayEnergyMaxMonths: 1,        // timeUnit=QUARTER_OF_AN_HOUR or HOUR
  powerMaxMonths: 1,
} as const;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Logging Configuration
export const LOGGING_CONFIG = {
  prefix: '[SolarEdge]',
  level: resolveLogLevel(process.env.SOLAREDGE_LOG_LEVEL),
} as const;

function resolveLogLevel(fromEnv: string | undefined): LogLevel {
  const normalized = fromEnv?.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  return getEnvironment() === 'test' ? 'silent' : 'info';
}

// Error Messages
export const ERROR_MESSAGES = {
  NETWORK_ERROR: 'Could not reach the SolarEdge monitoring API.',
  FORBIDDEN: 'Not allowed to access the API. Is the site id valid? Is the API key valid?',
  RATE_LIMITED: 'Request quota exhausted. Wait for the quota window to pass before polling again.',
  INVALID_RESPONSE: 'Could not parse the response of the SolarEdge monitoring API.',
} as const;
