// src/modules/complaints/burstDetector.ts
// Purpose: Detect city+category bursts among active complaints and escalate their priority.

import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { isActiveStatus, type Complaint } from "./complaint.types";

export type BurstGroup = {
  city: string;
  category: string;
  count: number;
  trackingIds: string[];
};

export type BurstPassResult = {
  complaints: Complaint[];
  bursts: BurstGroup[];
  changed: boolean;
};

function groupKey(c: Pick<Complaint, "city" | "category">): string {
  return JSON.stringify([c.city, c.category]);
}

const ANNOTATION_PREFIX = ` [⚠ ${SYSTEM_CONSTANTS.BURST_MARKER}:`;

export function burstAnnotation(count: number, city: string): string {
  return `${ANNOTATION_PREFIX} ${count} reports in ${city}]`;
}

export function hasBurstAnnotation(reasoning: string): boolean {
  return reasoning.includes(ANNOTATION_PREFIX);
}

/**
 * Groups active complaints by (city, declared category).
 * Only groups at or above the threshold are returned.
 */
export function findBurstGroups(
  complaints: readonly Complaint[],
  threshold: number = SYSTEM_CONSTANTS.BURST_THRESHOLD,
): BurstGroup[] {
  const groups = new Map<string, BurstGroup>();

  for (const c of complaints) {
    if (!isActiveStatus(c.status)) continue;

    const key = groupKey(c);
    const group = groups.get(key) ?? {
      city: c.city,
      category: c.category,
      count: 0,
      trackingIds: [],
    };

    group.count += 1;
    group.trackingIds.push(c.trackingId);
    groups.set(key, group);
  }

  return [...groups.values()].filter((g) => g.count >= threshold);
}

function aiFieldsDiffer(a: Complaint, b: Complaint): boolean {
  return (
    a.aiSeverity !== b.aiSeverity ||
    a.aiPriorityScore !== b.aiPriorityScore ||
    a.aiReasoning !== b.aiReasoning ||
    a.clusterFlag !== b.clusterFlag
  );
}

/**
 * One escalation pass over the whole ledger.
 *
 * - clusterFlag is recomputed from scratch (false for everyone first)
 * - escalation is sticky: severity/score are never lowered here
 * - an existing burst annotation is never duplicated nor refreshed
 *
 * The input is not mutated. `changed` is an exact comparison of AI fields
 * against the input.
 */
export function detectBursts(
  complaints: readonly Complaint[],
  threshold: number = SYSTEM_CONSTANTS.BURST_THRESHOLD,
): BurstPassResult {
  const next: Complaint[] = complaints.map((c) => ({
    ...c,
    clusterFlag: false,
  }));

  const bursts = findBurstGroups(next, threshold);

  const burstByKey = new Map(bursts.map((g) => [groupKey(g), g]));

  for (const c of next) {
    if (!isActiveStatus(c.status)) continue;

    const group = burstByKey.get(groupKey(c));
    if (!group) continue;

    c.aiSeverity = "Critical";
    c.aiPriorityScore = SYSTEM_CONSTANTS.MAX_PRIORITY_SCORE;
    c.clusterFlag = true;

    if (!hasBurstAnnotation(c.aiReasoning)) {
      c.aiReasoning = c.aiReasoning + burstAnnotation(group.count, group.city);
    }
  }

  const changed = next.some((c, i) => aiFieldsDiffer(c, complaints[i]));

  return { complaints: next, bursts, changed };
}
