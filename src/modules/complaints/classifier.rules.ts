// src/modules/complaints/classifier.rules.ts
// Purpose: Keyword tables consumed by the complaint classifier.

/**
 * Ordered category triggers. Order is significant: the classifier takes the
 * first category with any matching trigger, so "Water" outranks "Road".
 */
export const CATEGORY_TRIGGERS: ReadonlyArray<
  readonly [category: string, triggers: readonly string[]]
> = [
  ["Water", ["leak", "pipe", "dirty", "supply", "water"]],
  ["Road", ["pothole", "road", "street", "bump"]],
  ["Electricity", ["wire", "pole", "current", "light", "spark"]],
  ["Sanitation", ["garbage", "trash", "smell", "waste"]],
];

export const CRITICAL_TRIGGERS: readonly string[] = [
  "danger",
  "death",
  "fire",
  "sparking",
  "flood",
];

export const SEVERITY_SCORES: Readonly<Record<string, number>> = {
  Low: 2,
  Medium: 5,
  High: 8,
  Critical: 10,
};
