/**
 * Availability Parser
 *
 * Turns a FrontDesk time-selection page into the list of dates that still
 * have open slots. The page carries no machine-readable availability, so
 * each date heading is paired with the first text that follows it and the
 * date counts as available unless that text says it is fully booked. A
 * booked date reported as open is acceptable; an open date missed is not.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { logger } from '../utils/logger.js';
import { isAfter, parseHeadingDate, type AppointmentDate } from './appointment-date.js';

const log = logger.parser;

// ============================================
// TYPES
// ============================================

/**
 * A date judged to have open slots
 */
export interface AvailabilityRecord {
  date: AppointmentDate;
  /** Trimmed text following the date heading */
  status: string;
}

/**
 * A heading that parsed as a date, before any filtering
 */
export interface HeadingDate {
  date: AppointmentDate;
  heading: string;
  /** Trimmed following text, null when the document has none */
  status: string | null;
}

// ============================================
// CONSTANTS
// ============================================

export const HEADING_SELECTOR = 'h2, h3, h4';

/** Phrase the page uses for a date without free slots (case-sensitive) */
export const FULLY_BOOKED_PHRASE = 'No more available time slots';

/**
 * Only headings mentioning a year of the 2020s are considered.
 * TODO: widen to any four-digit year before 2030 headings start appearing.
 */
export const YEAR_MARKER = '202';

const NON_CONTENT_TAGS = new Set(['script', 'style', 'template']);

// ============================================
// PREDICATES
// ============================================

export function isFullyBooked(status: string): boolean {
  return status.includes(FULLY_BOOKED_PHRASE);
}

export function mentionsYear(headingText: string): boolean {
  return headingText.includes(YEAR_MARKER);
}

// ============================================
// DOCUMENT WALKING
// ============================================

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * First non-blank text node inside `node` (or `node` itself), depth first
 */
function firstTextWithin(node: AnyNode): string | null {
  if (isText(node)) {
    return node.data.trim() ? node.data : null;
  }
  if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) {
    return null;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      const text = firstTextWithin(child);
      if (text !== null) {
        return text;
      }
    }
  }
  return null;
}

/**
 * Nearest text node after the end of `start` in document order. Blank
 * (whitespace-only) nodes between elements are passed over.
 */
function nextTextAfter(start: AnyNode): string | null {
  let node: AnyNode | null = start;
  while (node) {
    for (let sibling = node.nextSibling; sibling; sibling = sibling.nextSibling) {
      const text = firstTextWithin(sibling);
      if (text !== null) {
        return text;
      }
    }
    node = node.parent;
  }
  return null;
}

// ============================================
// PARSING
// ============================================

/**
 * Every heading that reads as a date, in document order, with the text
 * that follows it. No cutoff or availability filtering is applied.
 */
export function extractHeadingDates(html: string): HeadingDate[] {
  const $ = cheerio.load(html);
  const headings: HeadingDate[] = [];
  let skipped = 0;

  $(HEADING_SELECTOR).each((_, element) => {
    const heading = normalizeWhitespace($(element).text());
    if (!mentionsYear(heading)) {
      skipped++;
      return;
    }

    const date = parseHeadingDate(heading);
    if (date === null) {
      skipped++;
      return;
    }

    const following = nextTextAfter(element);
    headings.push({ date, heading, status: following === null ? null : following.trim() });
  });

  log.debug('Headings scanned', { dates: headings.length, skipped });
  return headings;
}

/**
 * Dates on or before `cutoff` that do not read as fully booked, in the
 * order their headings appear. Headings that resolve to the same date
 * each produce their own record.
 */
export function parseAvailableDates(html: string, cutoff: AppointmentDate): AvailabilityRecord[] {
  const records: AvailabilityRecord[] = [];

  for (const { date, status } of extractHeadingDates(html)) {
    if (isAfter(date, cutoff)) {
      continue;
    }
    if (!status) {
      continue;
    }
    if (isFullyBooked(status)) {
      continue;
    }
    records.push({ date, status });
  }

  return records;
}
