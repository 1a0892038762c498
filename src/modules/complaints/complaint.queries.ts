// src/modules/complaints/complaint.queries.ts
// Purpose: Authority-side filtering, sorting and insight counters over a loaded ledger.

import { z } from "zod";
import type { Complaint } from "./complaint.types";

export const SORT_OPTIONS = ["newest", "oldest", "priority"] as const;
export type SortOption = (typeof SORT_OPTIONS)[number];

/** "All" (or absent) disables a filter. */
const filterValue = z
  .string()
  .trim()
  .optional()
  .transform((v) =>
    v === undefined || v === "" || v === "All" ? undefined : v,
  );

export const ComplaintQuerySchema = z.object({
  city: filterValue,
  category: filterValue,
  status: filterValue,
  sort: z.enum(SORT_OPTIONS).default("newest"),
});

export type ComplaintQuery = z.infer<typeof ComplaintQuerySchema>;

export type ComplaintFacets = {
  cities: string[];
  categories: string[];
  statuses: string[];
};

export type DensityCell = {
  city: string;
  category: string;
  count: number;
};

export type ComplaintInsights = {
  total: number;
  critical: number;
  open: number;
  burstAlerts: number;
  density: DensityCell[];
};

export function filterComplaints(
  complaints: readonly Complaint[],
  query: Pick<ComplaintQuery, "city" | "category" | "status">,
): Complaint[] {
  return complaints.filter(
    (c) =>
      (query.city === undefined || c.city === query.city) &&
      (query.category === undefined || c.category === query.category) &&
      (query.status === undefined || c.status === query.status),
  );
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Stable: ties keep ledger order. */
export function sortComplaints(
  complaints: readonly Complaint[],
  sort: SortOption,
): Complaint[] {
  const indexed = complaints.map((c, i) => ({ c, i }));

  indexed.sort((a, b) => {
    let diff = 0;
    switch (sort) {
      case "newest":
        diff = compareText(b.c.timestamp, a.c.timestamp);
        break;
      case "oldest":
        diff = compareText(a.c.timestamp, b.c.timestamp);
        break;
      case "priority":
        diff = b.c.aiPriorityScore - a.c.aiPriorityScore;
        break;
    }
    return diff !== 0 ? diff : a.i - b.i;
  });

  return indexed.map(({ c }) => c);
}

export function queryComplaints(
  complaints: readonly Complaint[],
  query: ComplaintQuery,
): Complaint[] {
  return sortComplaints(filterComplaints(complaints, query), query.sort);
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function collectFacets(
  complaints: readonly Complaint[],
): ComplaintFacets {
  return {
    cities: distinctSorted(complaints.map((c) => c.city)),
    categories: distinctSorted(complaints.map((c) => c.category)),
    statuses: distinctSorted(complaints.map((c) => c.status)),
  };
}

export function computeInsights(
  complaints: readonly Complaint[],
): ComplaintInsights {
  const density = new Map<string, DensityCell>();

  for (const c of complaints) {
    const key = JSON.stringify([c.city, c.category]);
    const cell = density.get(key) ?? {
      city: c.city,
      category: c.category,
      count: 0,
    };
    cell.count += 1;
    density.set(key, cell);
  }

  return {
    total: complaints.length,
    critical: complaints.filter((c) => c.aiSeverity === "Critical").length,
    open: complaints.filter((c) => c.status === "Open").length,
    burstAlerts: complaints.filter((c) => c.clusterFlag).length,
    density: [...density.values()],
  };
}
