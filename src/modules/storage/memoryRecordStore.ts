import type { Complaint } from "../complaints/complaint.types";
import type { RecordStore, RecordStoreHealth } from "./recordStore";
import { decodeLedger, encodeLedger } from "./ledgerCodec";

/**
 * Process-local ledger. Keeps the serialized form, so loads go through the
 * same decode/back-fill path as the file store and callers never share
 * object references with the stored copy.
 */
export class MemoryRecordStore implements RecordStore {
  private serialized = "";

  constructor(initial?: string) {
    if (initial !== undefined) this.serialized = initial;
  }

  public async load(): Promise<Complaint[]> {
    return decodeLedger(this.serialized, "memory");
  }

  public async save(complaints: readonly Complaint[]): Promise<void> {
    this.serialized = encodeLedger(complaints);
  }

  public async getStatus(): Promise<RecordStoreHealth> {
    const complaints = await this.load();
    return { ok: true, driver: "memory", recordCount: complaints.length };
  }
}
