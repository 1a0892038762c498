// src/modules/complaints/complaint.schema.ts
// Purpose: Stored-record contract for the complaint ledger (canonical fields, back-fill, versioned documents).

import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import {
  NO_IMAGE,
  UNKNOWN_STATUS,
  isComplaintStatus,
  type Complaint,
  type RecordedStatus,
} from "./complaint.types";

////////////////////////////////////////////////////////////////
// Canonical stored field set
////////////////////////////////////////////////////////////////

export const CANONICAL_FIELDS = [
  "tracking_id",
  "timestamp",
  "state",
  "city",
  "area",
  "category",
  "severity_reported",
  "description",
  "image_ref",
  "status",
  "admin_remarks",
  "ai_category",
  "ai_severity",
  "ai_priority_score",
  "ai_confidence",
  "ai_reasoning",
  "cluster_flag",
] as const;

export type StoredComplaint = {
  tracking_id: string;
  timestamp: string;
  state: string;
  city: string;
  area: string;
  category: string;
  severity_reported: string;
  description: string;
  image_ref: string;
  status: string;
  admin_remarks: string;
  ai_category: string;
  ai_severity: string;
  ai_priority_score: number;
  ai_confidence: number;
  ai_reasoning: string;
  cluster_flag: boolean;
};

export const PLACEHOLDER_TEXT = "Unknown";

////////////////////////////////////////////////////////////////
// Field healers
////////////////////////////////////////////////////////////////

const text = z
  .unknown()
  .transform((v) =>
    v === undefined || v === null ? PLACEHOLDER_TEXT : String(v),
  );

const priorityScore = z.unknown().transform((v) => {
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) return 0;
  return Math.min(
    SYSTEM_CONSTANTS.MAX_PRIORITY_SCORE,
    Math.max(0, Math.trunc(n)),
  );
});

const confidence = z.unknown().transform((v) => {
  const n = typeof v === "number" ? v : Number(v);
  if (v === undefined || v === null || !Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
});

const clusterFlag = z
  .unknown()
  .transform(
    (v) => v === true || (typeof v === "string" && v.toLowerCase() === "true"),
  );

const imageRef = z
  .unknown()
  .transform((v) =>
    typeof v === "string" && v.trim() !== "" ? v : NO_IMAGE,
  );

// "Unknown" is not an active status, so healed legacy rows never join a burst.
const status = z
  .unknown()
  .transform((v): RecordedStatus => (isComplaintStatus(v) ? v : UNKNOWN_STATUS));

/**
 * Lenient by construction: every field heals to a default instead of
 * failing, so a stored record is never rejected for a missing column.
 */
export const StoredComplaintSchema = z
  .object({
    tracking_id: text,
    timestamp: text,
    state: text,
    city: text,
    area: text,
    category: text,
    severity_reported: text,
    description: text,
    image_ref: imageRef,
    status,
    admin_remarks: text,
    ai_category: text,
    ai_severity: text,
    ai_priority_score: priorityScore,
    ai_confidence: confidence,
    ai_reasoning: text,
    cluster_flag: clusterFlag,
  })
  .transform(
    (r): Complaint => ({
      trackingId: r.tracking_id,
      timestamp: r.timestamp,
      state: r.state,
      city: r.city,
      area: r.area,
      category: r.category,
      severityReported: r.severity_reported,
      description: r.description,
      imageRef: r.image_ref,
      status: r.status,
      adminRemarks: r.admin_remarks,
      aiCategory: r.ai_category,
      aiSeverity: r.ai_severity,
      aiPriorityScore: r.ai_priority_score,
      aiConfidence: r.ai_confidence,
      aiReasoning: r.ai_reasoning,
      clusterFlag: r.cluster_flag,
    }),
  );

export function toStoredComplaint(c: Complaint): StoredComplaint {
  return {
    tracking_id: c.trackingId,
    timestamp: c.timestamp,
    state: c.state,
    city: c.city,
    area: c.area,
    category: c.category,
    severity_reported: c.severityReported,
    description: c.description,
    image_ref: c.imageRef,
    status: c.status,
    admin_remarks: c.adminRemarks,
    ai_category: c.aiCategory,
    ai_severity: c.aiSeverity,
    ai_priority_score: c.aiPriorityScore,
    ai_confidence: c.aiConfidence,
    ai_reasoning: c.aiReasoning,
    cluster_flag: c.clusterFlag,
  };
}

/**
 * Returns null for anything that is not a JSON object; those entries are
 * dropped from the ledger on load.
 */
export function fromStoredComplaint(raw: unknown): Complaint | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return null;
  }
  const parsed = StoredComplaintSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

////////////////////////////////////////////////////////////////
// Versioned ledger document
////////////////////////////////////////////////////////////////

export type LedgerDocument = {
  schemaVersion: number;
  savedAt: string;
  records: unknown[];
};

const LedgerDocumentSchema = z.object({
  schemaVersion: z.number().int().nonnegative(),
  savedAt: z.string().default(""),
  records: z.array(z.unknown()),
});

/**
 * One step per schema version. Step N upgrades a version-N document to N+1.
 * Version 0 is the legacy bare array of records.
 */
const MIGRATIONS: Record<number, (doc: LedgerDocument) => LedgerDocument> = {
  0: (doc) => ({ ...doc, schemaVersion: 1 }),
};

/**
 * Normalises any stored payload to the current document version.
 * Returns null when the payload is not a ledger at all (caller fails open).
 */
export function migrateLedgerDocument(raw: unknown): LedgerDocument | null {
  let doc: LedgerDocument;

  if (Array.isArray(raw)) {
    doc = { schemaVersion: 0, savedAt: "", records: raw };
  } else {
    const parsed = LedgerDocumentSchema.safeParse(raw);
    if (!parsed.success) return null;
    doc = parsed.data;
  }

  while (doc.schemaVersion < SYSTEM_CONSTANTS.LEDGER_SCHEMA_VERSION) {
    const step = MIGRATIONS[doc.schemaVersion];
    if (!step) return null;
    doc = step(doc);
  }

  if (doc.schemaVersion > SYSTEM_CONSTANTS.LEDGER_SCHEMA_VERSION) return null;

  return doc;
}

export function toLedgerDocument(complaints: readonly Complaint[]): LedgerDocument {
  return {
    schemaVersion: SYSTEM_CONSTANTS.LEDGER_SCHEMA_VERSION,
    savedAt: new Date().toISOString(),
    records: complaints.map(toStoredComplaint),
  };
}
