/**
 * filter.test.ts - Unit tests for the filter predicate and result ordering
 */

import { describe, it, expect } from "vitest";
import { compareRecords, matchesFilter } from "./filter";
import { identityFilter } from "../query/filter-builder";
import { constrain, type FilterSpec, type ResourceStatus } from "../query/types";
import type { ResourceRecord } from "./types";

function record(overrides: Partial<ResourceRecord> = {}): ResourceRecord {
  return {
    clusterId: "prod",
    kind: "Pod",
    name: "checkout-api-5d8f",
    namespace: "shop",
    createdAt: new Date("2024-06-09T12:00:00Z"),
    labels: { app: "checkout", tier: "backend" },
    status: "Running",
    ...overrides,
  };
}

function spec(overrides: Partial<FilterSpec> = {}): FilterSpec {
  return { ...identityFilter("Pod"), ...overrides };
}

const june9 = constrain({
  start: new Date("2024-06-09T00:00:00Z"),
  end: new Date("2024-06-09T23:59:59Z"),
});

describe("matchesFilter", () => {
  it("matches everything under the identity filter", () => {
    expect(matchesFilter(record(), identityFilter("Pod"))).toBe(true);
    expect(matchesFilter(record({ createdAt: null, status: null }), identityFilter("Pod"))).toBe(true);
  });

  it("keeps records created inside the window, bounds included", () => {
    const filter = spec({ timeRange: june9 });
    expect(matchesFilter(record(), filter)).toBe(true);
    expect(matchesFilter(record({ createdAt: new Date("2024-06-09T00:00:00Z") }), filter)).toBe(true);
    expect(matchesFilter(record({ createdAt: new Date("2024-06-09T23:59:59Z") }), filter)).toBe(true);
    expect(matchesFilter(record({ createdAt: new Date("2024-06-10T00:00:00Z") }), filter)).toBe(false);
  });

  it("drops records without a creation time when time is constrained", () => {
    expect(matchesFilter(record({ createdAt: null }), spec({ timeRange: june9 }))).toBe(false);
  });

  it("matches the namespace exactly", () => {
    expect(matchesFilter(record(), spec({ namespace: constrain("shop") }))).toBe(true);
    expect(matchesFilter(record(), spec({ namespace: constrain("Shop") }))).toBe(false);
  });

  it("matches names by case-insensitive substring", () => {
    expect(matchesFilter(record(), spec({ nameFilter: constrain("CHECKOUT") }))).toBe(true);
    expect(matchesFilter(record(), spec({ nameFilter: constrain("payments") }))).toBe(false);
  });

  it("requires every label selector", () => {
    expect(matchesFilter(record(), spec({ labelSelectors: constrain({ app: "checkout" }) }))).toBe(true);
    expect(
      matchesFilter(record(), spec({ labelSelectors: constrain({ app: "checkout", tier: "frontend" }) }))
    ).toBe(false);
    expect(matchesFilter(record(), spec({ labelSelectors: constrain({ team: "payments" }) }))).toBe(false);
  });

  it("does not treat inherited properties as labels", () => {
    expect(
      matchesFilter(record({ labels: {} }), spec({ labelSelectors: constrain({ toString: "x" }) }))
    ).toBe(false);
  });

  it("matches status exactly and rejects records with none", () => {
    expect(matchesFilter(record(), spec({ statusFilter: constrain<ResourceStatus>("Running") }))).toBe(true);
    expect(matchesFilter(record(), spec({ statusFilter: constrain<ResourceStatus>("Failed") }))).toBe(false);
    expect(matchesFilter(record({ status: null }), spec({ statusFilter: constrain<ResourceStatus>("Running") }))).toBe(
      false
    );
  });

  it("combines constraints with AND", () => {
    const filter = spec({ namespace: constrain("shop"), statusFilter: constrain<ResourceStatus>("Failed") });
    expect(matchesFilter(record(), filter)).toBe(false);
  });
});

describe("compareRecords", () => {
  it("orders by cluster, newest first, then name and namespace", () => {
    const records = [
      record({ clusterId: "staging", name: "a" }),
      record({ name: "old", createdAt: new Date("2024-06-01T00:00:00Z") }),
      record({ name: "undated", createdAt: null }),
      record({ name: "b", namespace: "z" }),
      record({ name: "b", namespace: "a" }),
      record({ name: "new", createdAt: new Date("2024-06-10T00:00:00Z") }),
    ];

    expect(records.sort(compareRecords).map((r) => `${r.clusterId}/${r.namespace}/${r.name}`)).toEqual([
      "prod/shop/new",
      "prod/a/b",
      "prod/z/b",
      "prod/shop/old",
      "prod/shop/undated",
      "staging/shop/a",
    ]);
  });
});
