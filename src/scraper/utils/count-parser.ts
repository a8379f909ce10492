/**
 * Name count extraction from forebears.io pages
 *
 * The surname/forename pages open with a paragraph along the lines of
 * "There are approximately 41,092 surnames in France ...". The count is the
 * first comma-grouped integer in the first <p> element.
 */

import * as cheerio from 'cheerio';

/** 1-3 leading digits, then any number of ",ddd" groups */
const GROUPED_INTEGER = /\d{1,3}(?:,\d{3})*/;

/**
 * Text of the first <p> element, or null if the page has none
 */
export function extractLeadParagraph(html: string): string | null {
  const $ = cheerio.load(html);
  const paragraph = $('p').first();
  if (paragraph.length === 0) return null;
  return paragraph.text();
}

/**
 * First integer written with comma thousands separators
 *
 * @example
 * parseGroupedInteger('1,234,567 people'); // 1234567
 * parseGroupedInteger('no figures here'); // null
 */
export function parseGroupedInteger(text: string): number | null {
  const match = text.match(GROUPED_INTEGER);
  if (!match) return null;

  const value = parseInt(match[0].replace(/,/g, ''), 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Count from a full HTML page, null when the lead paragraph has no number
 */
export function parseNameCount(html: string): number | null {
  const lead = extractLeadParagraph(html);
  return lead === null ? null : parseGroupedInteger(lead);
}
