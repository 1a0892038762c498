// src/modules/complaints/classifier.service.ts
// Purpose: Rule-based complaint classification (category, severity, priority score).

import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import type { ClassificationResult } from "./complaint.types";
import {
  CATEGORY_TRIGGERS,
  CRITICAL_TRIGGERS,
  SEVERITY_SCORES,
} from "./classifier.rules";

function containsAny(text: string, triggers: readonly string[]): boolean {
  return triggers.some((t) => text.includes(t));
}

/**
 * First-match category inference. Falls back to the citizen's own category
 * when no trigger appears in the description.
 */
export function inferCategory(description: string, declared: string): string {
  const text = description.toLowerCase();

  for (const [category, triggers] of CATEGORY_TRIGGERS) {
    if (containsAny(text, triggers)) return category;
  }

  return declared;
}

export function hasCriticalTrigger(description: string): boolean {
  return containsAny(description.toLowerCase(), CRITICAL_TRIGGERS);
}

export function scoreSeverity(severity: string): number {
  return SEVERITY_SCORES[severity] ?? SYSTEM_CONSTANTS.DEFAULT_PRIORITY_SCORE;
}

/**
 * Never throws: unknown categories/severities pass through and score as
 * Medium.
 */
export function classifyComplaint(
  description: string,
  category: string,
  severity: string,
): ClassificationResult {
  const aiCategory = inferCategory(description, category);

  const isCritical = hasCriticalTrigger(description);
  const aiSeverity = isCritical ? "Critical" : severity;

  const priorityScore = isCritical
    ? SYSTEM_CONSTANTS.MAX_PRIORITY_SCORE
    : scoreSeverity(aiSeverity);

  return {
    aiCategory,
    aiSeverity,
    priorityScore,
    confidence: SYSTEM_CONSTANTS.CLASSIFIER_CONFIDENCE,
    reasoning: `Classified '${aiCategory}'. Severity '${aiSeverity}'.`,
  };
}
