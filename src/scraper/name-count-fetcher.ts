/**
 * forebears.io name count fetcher
 * Source: https://forebears.io/{country}/{surnames|forenames}
 *
 * One GET per call, no retry. Every transport failure is logged and turned
 * into null so that a single bad country never stops a run.
 */

import axios from 'axios';
import type { NameType } from '../types/name-stats.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config/settings.js';
import { isAllowedByRobots } from '../utils/robots.js';
import { parseNameCount } from './utils/count-parser.js';

/**
 * What the dataset builder depends on; swap in a stub to test without network
 */
export type NameCountFetcher = (countryKey: string, nameType: NameType) => Promise<number | null>;

export interface FetchOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Check robots.txt before each request (cached per host) */
  respectRobots?: boolean;
}

export function nameCountUrl(countryKey: string, nameType: NameType, baseUrl: string = DEFAULT_BASE_URL): string {
  return `${baseUrl}/${countryKey}/${nameType}`;
}

/**
 * Fetch HTML from a URL, null on any transport or HTTP error
 */
async function fetchHTML(url: string, userAgent: string, timeoutMs: number): Promise<string | null> {
  try {
    const response = await axios.get<string>(url, {
      headers: { 'User-Agent': userAgent },
      timeout: timeoutMs,
      responseType: 'text',
    });
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      console.error(`[fetch] ${url} answered HTTP ${error.response.status}`);
    } else {
      console.error(`[fetch] Failed to fetch ${url}:`, (error as Error).message);
    }
    return null;
  }
}

/**
 * Number of surnames or forenames recorded for a country
 *
 * @param countryKey - forebears.io URL segment (e.g. "south-korea")
 * @param nameType - "surnames" or "forenames"
 * @returns The count, or null if it could not be determined
 */
export async function fetchNameCount(
  countryKey: string,
  nameType: NameType,
  options: FetchOptions = {}
): Promise<number | null> {
  const {
    baseUrl = DEFAULT_BASE_URL,
    userAgent = DEFAULT_USER_AGENT,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    respectRobots = false,
  } = options;
  const url = nameCountUrl(countryKey, nameType, baseUrl);

  if (respectRobots && !(await isAllowedByRobots(url, userAgent))) {
    console.error(`[fetch] Blocked by robots.txt: ${url}`);
    return null;
  }

  const html = await fetchHTML(url, userAgent, timeoutMs);
  if (html === null) return null;

  return parseNameCount(html);
}

/**
 * Bind fetch options once for the whole run
 */
export function createNameCountFetcher(options: FetchOptions = {}): NameCountFetcher {
  return (countryKey, nameType) => fetchNameCount(countryKey, nameType, options);
}
