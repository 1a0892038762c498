// src/modules/complaints/complaint.types.ts
// Purpose: Canonical complaint record + classification vocabulary.

export const COMPLAINT_STATUSES = [
  "Open",
  "In Progress",
  "Resolved",
  "Rejected",
] as const;

export type ComplaintStatus = (typeof COMPLAINT_STATUSES)[number];

/** Back-filled for stored records whose status is missing or unrecognised. */
export const UNKNOWN_STATUS = "Unknown";

/** What a loaded record may carry. Authorities only ever set a ComplaintStatus. */
export type RecordedStatus = ComplaintStatus | typeof UNKNOWN_STATUS;

/**
 * Statuses that keep a complaint eligible for burst grouping.
 * Resolved / Rejected are terminal.
 */
export const ACTIVE_STATUSES: readonly ComplaintStatus[] = [
  "Open",
  "In Progress",
];

export const SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const DECLARED_CATEGORIES = [
  "Road",
  "Water",
  "Electricity",
  "Sanitation",
  "Traffic",
  "Safety",
  "Internet",
  "Other",
] as const;

/** Sentinel stored in `imageRef` when no evidence image was attached. */
export const NO_IMAGE = "None";

export interface Complaint {
  trackingId: string;
  timestamp: string;

  state: string;
  city: string;
  area: string;

  category: string;
  severityReported: string;
  description: string;
  imageRef: string;

  status: RecordedStatus;
  adminRemarks: string;

  aiCategory: string;
  aiSeverity: string;
  aiPriorityScore: number;
  aiConfidence: number;
  aiReasoning: string;

  clusterFlag: boolean;
}

export type ClassificationResult = {
  aiCategory: string;
  aiSeverity: string;
  priorityScore: number;
  confidence: number;
  reasoning: string;
};

export function isActiveStatus(status: string): boolean {
  return ACTIVE_STATUSES.some((s) => s === status);
}

export function isComplaintStatus(value: unknown): value is ComplaintStatus {
  return COMPLAINT_STATUSES.some((s) => s === value);
}
