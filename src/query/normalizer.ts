/**
 * normalizer.ts - Turns time phrases, kind names, and status words into canonical tokens
 *
 * Everything here is pure and deterministic: the same text and the same
 * reference time always produce the same result. All calendar arithmetic is
 * done in UTC so results do not depend on the host's timezone.
 *
 * Unrecognized input returns null ("no constraint") rather than throwing.
 * Absence of a time filter is always a valid answer.
 */

import { SYNONYM_INDEX } from "./kinds";
import {
  RESOURCE_KINDS,
  type ResourceKind,
  type ResourceStatus,
  type TimeRange,
} from "./types";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

// ---------------------------------------------------------------------------
// Resource kinds
// ---------------------------------------------------------------------------

/**
 * Maps a single kind token to the closed kind enum.
 *
 * Accepts canonical names in any case ("Pod", "configmap"), plurals, and
 * kubectl short names ("svc", "pvc"). Whitespace inside multi-word phrases
 * is collapsed, so "Config  Maps" works too.
 */
export function normalizeResourceType(token: string): ResourceKind | null {
  const cleaned = token.trim().toLowerCase().replace(/\s+/g, " ");
  if (!cleaned) return null;

  // "namespace" is not a text synonym (it appears in "in namespace X"),
  // but as a lone token it can only mean the kind, which this catches.
  const canonical = RESOURCE_KINDS.find((kind) => kind.toLowerCase() === cleaned);
  if (canonical) return canonical;

  const match = SYNONYM_INDEX.find(([synonym]) => synonym === cleaned);
  return match ? match[1] : null;
}

/**
 * Finds the first kind mentioned anywhere in free text.
 *
 * When two synonyms start at the same position the longer one wins,
 * so "config maps" is read as ConfigMap rather than stopping at "config".
 */
export function findResourceType(
  text: string
): { kind: ResourceKind; phrase: string; index: number } | null {
  const lower = text.toLowerCase();
  let best: { kind: ResourceKind; phrase: string; index: number } | null = null;

  for (const [synonym, kind] of SYNONYM_INDEX) {
    const pattern = new RegExp(`\\b${escapeRegExp(synonym).replace(/ /g, "\\s+")}\\b`);
    const match = pattern.exec(lower);
    if (!match) continue;
    if (
      !best ||
      match.index < best.index ||
      (match.index === best.index && match[0].length > best.phrase.length)
    ) {
      best = { kind, phrase: match[0], index: match.index };
    }
  }

  return best;
}

// ---------------------------------------------------------------------------
// Status words
// ---------------------------------------------------------------------------

/**
 * Status words users type, mapped to the status enum.
 * Multi-word phrases come first; findStatus prefers the earliest match anyway.
 */
const STATUS_SYNONYMS: ReadonlyArray<[string, ResourceStatus]> = [
  ["not ready", "NotReady"],
  ["notready", "NotReady"],
  ["unready", "NotReady"],
  ["running", "Running"],
  ["pending", "Pending"],
  ["succeeded", "Succeeded"],
  ["successful", "Succeeded"],
  ["failed", "Failed"],
  ["failing", "Failed"],
  ["crashing", "Failed"],
  ["crashed", "Failed"],
  ["errored", "Failed"],
  ["error", "Failed"],
  ["unknown", "Unknown"],
  ["ready", "Ready"],
  ["active", "Active"],
  ["terminating", "Terminating"],
  ["unavailable", "Unavailable"],
  ["available", "Available"],
  ["completed", "Complete"],
  ["complete", "Complete"],
  ["bound", "Bound"],
  ["lost", "Lost"],
];

/**
 * Maps a single status token ("running", "Not Ready", "NotReady") to the enum.
 */
export function normalizeStatus(token: string): ResourceStatus | null {
  const cleaned = token.trim().toLowerCase().replace(/\s+/g, " ");
  if (!cleaned) return null;
  const match = STATUS_SYNONYMS.find(([word]) => word === cleaned);
  return match ? match[1] : null;
}

/**
 * Finds the first status word in free text.
 * "not ready" at position 5 beats "ready" at position 9.
 */
export function findStatus(text: string): ResourceStatus | null {
  const lower = text.toLowerCase();
  let best: { status: ResourceStatus; index: number; length: number } | null = null;

  for (const [word, status] of STATUS_SYNONYMS) {
    const pattern = new RegExp(`\\b${word.replace(/ /g, "\\s+")}\\b`);
    const match = pattern.exec(lower);
    if (!match) continue;
    if (
      !best ||
      match.index < best.index ||
      (match.index === best.index && match[0].length > best.length)
    ) {
      best = { status, index: match.index, length: match[0].length };
    }
  }

  return best ? best.status : null;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const MONTHS: Readonly<Record<string, number>> = {
  jan: 0, january: 0,
  feb: 1, february: 1,
  mar: 2, march: 2,
  apr: 3, april: 3,
  may: 4,
  jun: 5, june: 5,
  jul: 6, july: 6,
  aug: 7, august: 7,
  sep: 8, sept: 8, september: 8,
  oct: 9, october: 9,
  nov: 10, november: 10,
  dec: 11, december: 11,
};

const MONTH_NAME = Object.keys(MONTHS)
  .sort((a, b) => b.length - a.length)
  .join("|");

/**
 * The accepted absolute date formats, as one regex alternation:
 * - 2024-06-09T10:30:00Z (ISO-8601, UTC only)
 * - 2024-06-09
 * - 2024/06/09
 * - June 9, 2024 / Jun 9th 2024
 * - 9 June 2024 / 9th of June, 2024
 */
const DATE_SOURCE = [
  "\\d{4}-\\d{2}-\\d{2}t\\d{2}:\\d{2}(?::\\d{2}(?:\\.\\d+)?)?z",
  "\\d{4}-\\d{1,2}-\\d{1,2}",
  "\\d{4}/\\d{1,2}/\\d{1,2}",
  `(?:${MONTH_NAME})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}`,
  `\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?(?:${MONTH_NAME})\\.?,?\\s+\\d{4}`,
].join("|");

/** A parsed absolute date; hasTime is false when only a calendar day was given */
interface ParsedDate {
  date: Date;
  hasTime: boolean;
}

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month, day));
  // Date.UTC silently rolls 2024-02-31 over to March; reject that instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Parses one date token in any accepted format.
 * Returns null for anything else, including impossible dates like 2024-13-01.
 */
export function parseAbsoluteDate(token: string): ParsedDate | null {
  const text = token.trim().toLowerCase();

  if (/^\d{4}-\d{2}-\d{2}t/.test(text)) {
    const date = new Date(text.toUpperCase());
    return isNaN(date.getTime()) ? null : { date, hasTime: true };
  }

  let match = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/.exec(text);
  if (match) {
    const date = utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    return date ? { date, hasTime: false } : null;
  }

  match = new RegExp(
    `^(${MONTH_NAME})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})$`
  ).exec(text);
  if (match) {
    const date = utcDate(Number(match[3]), MONTHS[match[1]], Number(match[2]));
    return date ? { date, hasTime: false } : null;
  }

  match = new RegExp(
    `^(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?(${MONTH_NAME})\\.?,?\\s+(\\d{4})$`
  ).exec(text);
  if (match) {
    const date = utcDate(Number(match[3]), MONTHS[match[2]], Number(match[1]));
    return date ? { date, hasTime: false } : null;
  }

  return null;
}

// ---------------------------------------------------------------------------
// Time phrases
// ---------------------------------------------------------------------------

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

/** Last whole second of the UTC day: 23:59:59 */
export function endOfUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS - 1000);
}

function unitToMs(unit: string): number {
  if (unit.startsWith("w")) return WEEK_MS;
  if (unit.startsWith("d")) return DAY_MS;
  if (unit.startsWith("h")) return HOUR_MS;
  return MINUTE_MS;
}

/**
 * The instant `spanMs` before `from`, floored at the epoch. A huge count
 * ("last 999999999 days") would otherwise leave the range Date can hold.
 */
function msBefore(from: Date, spanMs: number): Date {
  return new Date(Math.max(0, from.getTime() - spanMs));
}

/** Orders a range so start <= end. */
export function orderRange(start: Date, end: Date): TimeRange {
  return start.getTime() <= end.getTime() ? { start, end } : { start: end, end: start };
}

const UNIT = "(minutes?|mins?|hours?|hrs?|days?|weeks?|[mhdw])";

type TimeMatcher = (text: string, now: Date) => TimeRange | null;

/** A calendar date covers its whole day; a timestamp is a single instant. */
function dayRange(parsed: ParsedDate): TimeRange {
  if (parsed.hasTime) return { start: parsed.date, end: parsed.date };
  return { start: startOfUtcDay(parsed.date), end: endOfUtcDay(parsed.date) };
}

/**
 * Time phrase matchers, tried in order. Explicit ranges come before
 * single dates so "between X and Y" is not read as "on X".
 */
const TIME_MATCHERS: readonly TimeMatcher[] = [
  // between <date> and <date>, in either order
  (text) => {
    const match = new RegExp(`\\bbetween\\s+(${DATE_SOURCE})\\s+and\\s+(${DATE_SOURCE})`).exec(text);
    if (!match) return null;
    const first = parseAbsoluteDate(match[1]);
    const second = parseAbsoluteDate(match[2]);
    if (!first || !second) return null;
    const [earlier, later] =
      first.date.getTime() <= second.date.getTime() ? [first, second] : [second, first];
    return { start: dayRange(earlier).start, end: dayRange(later).end };
  },
  // since|after yesterday, today, or N units ago
  (text, now) => {
    const match = new RegExp(
      `\\b(?:since|after)\\s+(?:(yesterday|today)|(\\d+)\\s*${UNIT}\\s+ago)\\b`
    ).exec(text);
    if (!match) return null;
    if (match[1] === "today") return { start: startOfUtcDay(now), end: now };
    if (match[1] === "yesterday") return { start: msBefore(startOfUtcDay(now), DAY_MS), end: now };
    const span = Number(match[2]) * unitToMs(match[3]);
    const start = span >= DAY_MS ? msBefore(startOfUtcDay(now), span) : msBefore(now, span);
    return { start, end: now };
  },
  // since|after|from <date>
  (text, now) => {
    const match = new RegExp(`\\b(?:since|after|from)\\s+(${DATE_SOURCE})`).exec(text);
    if (!match) return null;
    const parsed = parseAbsoluteDate(match[1]);
    return parsed ? { start: dayRange(parsed).start, end: now } : null;
  },
  // before|until <date>
  (text) => {
    const match = new RegExp(`\\b(?:before|until|prior\\s+to)\\s+(${DATE_SOURCE})`).exec(text);
    if (!match) return null;
    const parsed = parseAbsoluteDate(match[1]);
    if (!parsed) return null;
    const boundary = dayRange(parsed).start;
    const end = parsed.hasTime ? boundary : new Date(boundary.getTime() - 1000);
    return { start: new Date(0), end };
  },
  // on <date>, or a bare date anywhere
  (text) => {
    const match = new RegExp(`(?:^|[^\\w/-])(${DATE_SOURCE})(?![\\w/-])`).exec(text);
    if (!match) return null;
    const parsed = parseAbsoluteDate(match[1]);
    return parsed ? dayRange(parsed) : null;
  },
  // yesterday
  (text, now) => {
    if (!/\byesterday\b/.test(text)) return null;
    const yesterday = new Date(startOfUtcDay(now).getTime() - DAY_MS);
    return { start: yesterday, end: endOfUtcDay(yesterday) };
  },
  // today
  (text, now) => {
    if (!/\btoday\b/.test(text)) return null;
    return { start: startOfUtcDay(now), end: now };
  },
  // this week (ISO weeks start on Monday)
  (text, now) => {
    if (!/\bthis\s+week\b/.test(text)) return null;
    const daysSinceMonday = (now.getUTCDay() + 6) % 7;
    return {
      start: new Date(startOfUtcDay(now).getTime() - daysSinceMonday * DAY_MS),
      end: now,
    };
  },
  // older than N units
  (text, now) => {
    const match = new RegExp(`\\bolder\\s+than\\s+(\\d+)\\s*${UNIT}\\b`).exec(text);
    if (!match) return null;
    const span = Number(match[1]) * unitToMs(match[2]);
    return { start: new Date(0), end: msBefore(now, span) };
  },
  // last|past|previous [N] units, newer than N units
  (text, now) => {
    const match = new RegExp(
      `\\b(?:last|past|previous|newer\\s+than|younger\\s+than)\\s+(?:(\\d+)\\s*)?${UNIT}\\b`
    ).exec(text);
    if (!match) return null;
    const count = match[1] ? Number(match[1]) : 1;
    return { start: msBefore(now, count * unitToMs(match[2])), end: now };
  },
  // N units ago: days and weeks name a calendar day, shorter units a window
  (text, now) => {
    const match = new RegExp(`\\b(\\d+)\\s*${UNIT}\\s+ago\\b`).exec(text);
    if (!match) return null;
    const span = Number(match[1]) * unitToMs(match[2]);
    if (span >= DAY_MS) {
      const day = msBefore(startOfUtcDay(now), span);
      return { start: day, end: endOfUtcDay(day) };
    }
    return { start: msBefore(now, span), end: now };
  },
];

/**
 * Finds and normalizes the first recognizable time phrase in text.
 *
 * Examples (now = 2024-06-10T15:00:00Z):
 *   "created yesterday"  → 2024-06-09T00:00:00Z .. 2024-06-09T23:59:59Z
 *   "in the last 3 days" → 2024-06-07T15:00:00Z .. 2024-06-10T15:00:00Z
 *   "on 2024-06-01"      → 2024-06-01T00:00:00Z .. 2024-06-01T23:59:59Z
 *   "since yesterday"    → 2024-06-09T00:00:00Z .. 2024-06-10T15:00:00Z
 *   "sometime recently"  → null
 *
 * The returned range always has start <= end; an inverted phrase such as
 * "between June 5, 2024 and June 1, 2024" covers the same days as the
 * forward one. Bounds are never earlier than the epoch.
 */
export function normalizeTimePhrase(text: string, now: Date = new Date()): TimeRange | null {
  const lower = text.toLowerCase();
  for (const matcher of TIME_MATCHERS) {
    const range = matcher(lower, now);
    if (!range) continue;
    if (isNaN(range.start.getTime()) || isNaN(range.end.getTime())) return null;
    return orderRange(range.start, range.end);
  }
  return null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
