import {
  fromStoredComplaint,
  migrateLedgerDocument,
  toLedgerDocument,
} from "../complaints/complaint.schema";
import type { Complaint } from "../complaints/complaint.types";
import { log } from "@/lib/observability/logger";

/**
 * Decodes a serialized ledger. Fail-open: blank, unparseable or foreign
 * payloads decode to an empty ledger.
 */
export function decodeLedger(text: string, source: string): Complaint[] {
  if (!text.trim()) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    log("WARN", "LEDGER_MALFORMED", {
      source,
      reason: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  const doc = migrateLedgerDocument(raw);
  if (!doc) {
    log("WARN", "LEDGER_MALFORMED", {
      source,
      reason: "unrecognised ledger document",
    });
    return [];
  }

  const complaints: Complaint[] = [];
  for (const record of doc.records) {
    const complaint = fromStoredComplaint(record);
    if (complaint) complaints.push(complaint);
  }

  const dropped = doc.records.length - complaints.length;
  if (dropped > 0) {
    log("WARN", "LEDGER_RECORDS_DROPPED", { source, dropped });
  }

  return complaints;
}

export function encodeLedger(complaints: readonly Complaint[]): string {
  return JSON.stringify(toLedgerDocument(complaints), null, 2);
}
