/**
 * normalizer.test.ts - Unit tests for time phrase, kind, and status normalization
 *
 * Every time test pins "now" so results are deterministic. All expected
 * values are UTC.
 */

import { describe, it, expect } from "vitest";
import {
  findResourceType,
  findStatus,
  normalizeResourceType,
  normalizeStatus,
  normalizeTimePhrase,
  parseAbsoluteDate,
} from "./normalizer";

/** Monday 2024-06-10, 15:00 UTC */
const NOW = new Date("2024-06-10T15:00:00Z");

function range(text: string, now: Date = NOW) {
  const result = normalizeTimePhrase(text, now);
  return result && { start: result.start.toISOString(), end: result.end.toISOString() };
}

// ---------------------------------------------------------------------------
// normalizeTimePhrase
// ---------------------------------------------------------------------------

describe("normalizeTimePhrase", () => {
  it("reads 'yesterday' as the whole previous calendar day", () => {
    expect(range("Show me pods created yesterday")).toEqual({
      start: "2024-06-09T00:00:00.000Z",
      end: "2024-06-09T23:59:59.000Z",
    });
  });

  it("reads 'today' as midnight until now", () => {
    expect(range("pods created today")).toEqual({
      start: "2024-06-10T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'last N days' as a window ending now", () => {
    expect(range("deployments from the last 3 days")).toEqual({
      start: "2024-06-07T15:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("treats 'last hour' as one hour", () => {
    expect(range("pods started in the last hour")).toEqual({
      start: "2024-06-10T14:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("accepts compact units like 'last 24h'", () => {
    expect(range("pods from the last 24h")).toEqual({
      start: "2024-06-09T15:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("accepts minutes", () => {
    expect(range("past 30 minutes")).toEqual({
      start: "2024-06-10T14:30:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'N days ago' as that whole calendar day", () => {
    expect(range("pods created 2 days ago")).toEqual({
      start: "2024-06-08T00:00:00.000Z",
      end: "2024-06-08T23:59:59.000Z",
    });
  });

  it("reads 'N hours ago' as a window ending now", () => {
    expect(range("created 3 hours ago")).toEqual({
      start: "2024-06-10T12:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("starts 'this week' on Monday", () => {
    const wednesday = new Date("2024-06-12T15:00:00Z");
    expect(range("jobs created this week", wednesday)).toEqual({
      start: "2024-06-10T00:00:00.000Z",
      end: "2024-06-12T15:00:00.000Z",
    });
  });

  it("reads 'older than N days' as everything up to N days before now", () => {
    expect(range("pods older than 7 days")).toEqual({
      start: "1970-01-01T00:00:00.000Z",
      end: "2024-06-03T15:00:00.000Z",
    });
  });

  it("reads 'on <date>' as the whole day", () => {
    expect(range("pods created on 2024-06-01")).toEqual({
      start: "2024-06-01T00:00:00.000Z",
      end: "2024-06-01T23:59:59.000Z",
    });
  });

  it("reads 'since <date>' as that day until now", () => {
    expect(range("services since 2024/06/01")).toEqual({
      start: "2024-06-01T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("keeps the time of an ISO timestamp", () => {
    expect(range("pods since 2024-06-09T10:30:00Z")).toEqual({
      start: "2024-06-09T10:30:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'before <date>' as ending one second before that day", () => {
    expect(range("pods created before June 5, 2024")).toEqual({
      start: "1970-01-01T00:00:00.000Z",
      end: "2024-06-04T23:59:59.000Z",
    });
  });

  it("reads 'between' as the first day's start to the last day's end", () => {
    expect(range("between 2024-06-01 and 2024-06-03")).toEqual({
      start: "2024-06-01T00:00:00.000Z",
      end: "2024-06-03T23:59:59.000Z",
    });
  });

  it("covers the same days when the 'between' dates are inverted", () => {
    expect(range("between 2024-06-05 and 2024-06-01")).toEqual({
      start: "2024-06-01T00:00:00.000Z",
      end: "2024-06-05T23:59:59.000Z",
    });
    expect(range("between 2024-06-05 and 2024-06-01")).toEqual(
      range("between 2024-06-01 and 2024-06-05")
    );
  });

  it("reads 'since yesterday' as yesterday's start until now", () => {
    expect(range("jobs named backup since yesterday")).toEqual({
      start: "2024-06-09T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'since today' as midnight until now", () => {
    expect(range("pods since today")).toEqual({
      start: "2024-06-10T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'after N days ago' from the start of that day", () => {
    expect(range("pods created after 2 days ago")).toEqual({
      start: "2024-06-08T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("reads 'since N hours ago' from that instant", () => {
    expect(range("pods since 3 hours ago")).toEqual({
      start: "2024-06-10T12:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
  });

  it("floors relative bounds too large for a Date at the epoch", () => {
    expect(range("pods created in the last 999999999 days")).toEqual({
      start: "1970-01-01T00:00:00.000Z",
      end: "2024-06-10T15:00:00.000Z",
    });
    expect(range("pods created 999999999 days ago")).toEqual({
      start: "1970-01-01T00:00:00.000Z",
      end: "1970-01-01T23:59:59.000Z",
    });
    expect(range("pods older than 999999999 weeks")).toEqual({
      start: "1970-01-01T00:00:00.000Z",
      end: "1970-01-01T00:00:00.000Z",
    });
  });

  it("accepts day-first month names", () => {
    expect(range("created 9th of June 2024")).toEqual({
      start: "2024-06-09T00:00:00.000Z",
      end: "2024-06-09T23:59:59.000Z",
    });
  });

  it("returns null for an impossible date", () => {
    expect(range("pods created on 2024-02-31")).toBeNull();
  });

  it("returns null when there is no time phrase", () => {
    expect(range("sometime recently")).toBeNull();
    expect(range("")).toBeNull();
  });

  it("is deterministic for the same text and reference time", () => {
    expect(range("last 5 days")).toEqual(range("last 5 days"));
  });
});

// ---------------------------------------------------------------------------
// parseAbsoluteDate
// ---------------------------------------------------------------------------

describe("parseAbsoluteDate", () => {
  it("marks calendar dates as having no time", () => {
    const parsed = parseAbsoluteDate("Jun 9, 2024");
    expect(parsed?.date.toISOString()).toBe("2024-06-09T00:00:00.000Z");
    expect(parsed?.hasTime).toBe(false);
  });

  it("rejects month 13", () => {
    expect(parseAbsoluteDate("2024-13-01")).toBeNull();
  });

  it("rejects text that is not a date", () => {
    expect(parseAbsoluteDate("tomorrow")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Resource kinds
// ---------------------------------------------------------------------------

describe("normalizeResourceType", () => {
  it("maps plurals and short names to the canonical kind", () => {
    expect(normalizeResourceType("pods")).toBe("Pod");
    expect(normalizeResourceType("Pod")).toBe("Pod");
    expect(normalizeResourceType("svc")).toBe("Service");
    expect(normalizeResourceType("PVC")).toBe("PersistentVolumeClaim");
    expect(normalizeResourceType("deploy")).toBe("Deployment");
  });

  it("collapses whitespace in multi-word kinds", () => {
    expect(normalizeResourceType("Config  Maps")).toBe("ConfigMap");
  });

  it("accepts the lone word 'namespace'", () => {
    expect(normalizeResourceType("namespace")).toBe("Namespace");
  });

  it("returns null for unsupported kinds", () => {
    expect(normalizeResourceType("widgets")).toBeNull();
    expect(normalizeResourceType("  ")).toBeNull();
  });
});

describe("findResourceType", () => {
  it("finds a multi-word kind inside a sentence", () => {
    expect(findResourceType("show me config maps in prod")).toEqual({
      kind: "ConfigMap",
      phrase: "config maps",
      index: 8,
    });
  });

  it("prefers the earliest mention", () => {
    expect(findResourceType("pods behind the web services")?.kind).toBe("Pod");
  });

  it("returns null when no kind is mentioned", () => {
    expect(findResourceType("what is broken")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Status words
// ---------------------------------------------------------------------------

describe("normalizeStatus", () => {
  it("maps synonyms to the status enum", () => {
    expect(normalizeStatus("running")).toBe("Running");
    expect(normalizeStatus("crashing")).toBe("Failed");
    expect(normalizeStatus("Not Ready")).toBe("NotReady");
    expect(normalizeStatus("completed")).toBe("Complete");
  });

  it("returns null for unknown words", () => {
    expect(normalizeStatus("sleepy")).toBeNull();
  });
});

describe("findStatus", () => {
  it("prefers 'not ready' over the 'ready' inside it", () => {
    expect(findStatus("nodes that are not ready")).toBe("NotReady");
  });

  it("does not match a status word inside a longer word", () => {
    expect(findStatus("pods with errors")).toBeNull();
  });
});
