/**
 * Runtime settings
 *
 * Read from the environment (a .env file is picked up by dotenv) and
 * overridable from the CLI.
 */

import 'dotenv/config';

export interface Settings {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  geojsonPath: string | null;
  joinProperty: string;
}

export const DEFAULT_BASE_URL = 'https://forebears.io';
export const DEFAULT_USER_AGENT = 'forename-atlas/1.0';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_JOIN_PROPERTY = 'ISO_A3_EH';

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    baseUrl: (env.NAME_ATLAS_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    userAgent: env.NAME_ATLAS_USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: parsePositiveInt(env.NAME_ATLAS_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    geojsonPath: env.NAME_ATLAS_GEOJSON || null,
    joinProperty: env.NAME_ATLAS_JOIN_PROPERTY || DEFAULT_JOIN_PROPERTY,
  };
}
