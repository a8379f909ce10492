/**
 * robots.txt check before scraping a page
 *
 * Parsers are cached per origin for an hour, so a full run asks each host
 * for its robots.txt once.
 */

import axios from 'axios';
import robotsParser from 'robots-parser';

type RobotsParser = ReturnType<typeof robotsParser>;

interface CachedRobots {
  parser: RobotsParser;
  fetchedAt: number;
}

const robotsCache = new Map<string, CachedRobots>();
const CACHE_TTL = 60 * 60 * 1000; // 1 hour

async function fetchRobotsTxt(origin: string, userAgent: string): Promise<RobotsParser> {
  const now = Date.now();
  const cached = robotsCache.get(origin);
  if (cached && now - cached.fetchedAt < CACHE_TTL) {
    return cached.parser;
  }

  const robotsUrl = `${origin}/robots.txt`;
  let parser: RobotsParser;

  try {
    const response = await axios.get<string>(robotsUrl, {
      headers: { 'User-Agent': userAgent },
      timeout: 5000,
      responseType: 'text',
      validateStatus: (status) => status === 200,
    });
    parser = robotsParser(robotsUrl, response.data);
  } catch (error) {
    // No robots.txt (or unreachable): everything is allowed
    console.warn(`[robots.txt] Could not fetch ${robotsUrl}:`, (error as Error).message);
    parser = robotsParser(robotsUrl, '');
  }

  robotsCache.set(origin, { parser, fetchedAt: now });
  return parser;
}

/**
 * Check whether robots.txt lets `userAgent` fetch `url`
 *
 * @example
 * if (await isAllowedByRobots('https://forebears.io/france/surnames', 'forename-atlas/1.0')) {
 *   // fetch the page
 * }
 */
export async function isAllowedByRobots(url: string, userAgent: string = 'forename-atlas'): Promise<boolean> {
  let target: URL;
  try {
    target = new URL(url);
  } catch (error) {
    console.error(`[robots.txt] Invalid URL ${url}:`, (error as Error).message);
    return true;
  }

  const parser = await fetchRobotsTxt(target.origin, userAgent);
  // robots-parser answers undefined for URLs outside the robots.txt origin
  const allowed = parser.isAllowed(url, userAgent) ?? true;

  if (!allowed) {
    console.warn(`[robots.txt] ${target.pathname} is disallowed for ${userAgent} on ${target.hostname}`);
  }

  return allowed;
}

/**
 * Forget all cached robots.txt parsers
 */
export function clearRobotsCache(): void {
  robotsCache.clear();
}
