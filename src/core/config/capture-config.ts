// src/core/config/capture-config.ts
import type { BrowserChannel } from '../types/index.js';
import {
  BROWSER_CHANNELS,
  DEFAULT_MAX_HEADING_LEVEL,
  DEFAULT_SCROLL_TIMEOUT,
  DEFAULT_SETTLE_DELAY,
  DEFAULT_TIMEOUT,
} from './constants.js';

export interface CaptureConfig {
  navigationTimeout: number;
  scrollTimeout: number;
  settleDelay: number;
  maxHeadingLevel: number;
  channel: BrowserChannel;
  headless: boolean;
  cdpEndpoint?: string;
  screenshot: boolean;
  cleanLiveDom: boolean;
  verbose: boolean;
}

export const DEFAULT_CAPTURE_CONFIG: CaptureConfig = {
  navigationTimeout: DEFAULT_TIMEOUT,
  scrollTimeout: DEFAULT_SCROLL_TIMEOUT,
  settleDelay: DEFAULT_SETTLE_DELAY,
  maxHeadingLevel: DEFAULT_MAX_HEADING_LEVEL,
  channel: 'chromium',
  headless: true,
  screenshot: true,
  cleanLiveDom: true,
  verbose: false,
};

/**
 * Layers defaults, then `PAGECAP_*` environment variables, then explicit
 * overrides (usually CLI flags).
 */
export function resolveCaptureConfig(
  overrides: Partial<CaptureConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): CaptureConfig {
  const fromEnv: Partial<CaptureConfig> = {};

  const navigationTimeout = readInteger(env, 'PAGECAP_NAV_TIMEOUT', 0);
  if (navigationTimeout !== undefined) fromEnv.navigationTimeout = navigationTimeout;

  const scrollTimeout = readInteger(env, 'PAGECAP_SCROLL_TIMEOUT', 0);
  if (scrollTimeout !== undefined) fromEnv.scrollTimeout = scrollTimeout;

  const settleDelay = readInteger(env, 'PAGECAP_SETTLE_DELAY', 0);
  if (settleDelay !== undefined) fromEnv.settleDelay = settleDelay;

  const maxHeadingLevel = readInteger(env, 'PAGECAP_MAX_HEADING_LEVEL', 1, 6);
  if (maxHeadingLevel !== undefined) fromEnv.maxHeadingLevel = maxHeadingLevel;

  const cdpEndpoint = env.PAGECAP_CDP_ENDPOINT?.trim();
  if (cdpEndpoint) fromEnv.cdpEndpoint = cdpEndpoint;

  const config: CaptureConfig = { ...DEFAULT_CAPTURE_CONFIG, ...fromEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  validateConfig(config);
  return config;
}

export function parseBrowserChannel(value: string): BrowserChannel {
  const channel = BROWSER_CHANNELS.find(candidate => candidate === value);
  if (!channel) {
    throw new Error(`Invalid browser: ${value}. Use ${BROWSER_CHANNELS.join(', ')}`);
  }
  return channel;
}

export function parseInteger(name: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${name}: "${raw}" (expected an integer between ${min} and ${max})`);
  }
  return value;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  min: number,
  max?: number
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return parseInteger(name, raw, min, max);
}

function validateConfig(config: CaptureConfig): void {
  if (config.maxHeadingLevel < 1 || config.maxHeadingLevel > 6) {
    throw new Error(`Invalid maxHeadingLevel: ${config.maxHeadingLevel} (expected 1-6)`);
  }
  for (const key of ['navigationTimeout', 'scrollTimeout', 'settleDelay'] as const) {
    if (!Number.isFinite(config[key]) || config[key] < 0) {
      throw new Error(`Invalid ${key}: ${config[key]}`);
    }
  }
}
