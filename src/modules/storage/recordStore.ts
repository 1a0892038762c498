// src/modules/storage/recordStore.ts
// Purpose: Ledger persistence contract consumed by the complaint engine.

import type { Complaint } from "../complaints/complaint.types";

export type RecordStoreHealth = {
  ok: boolean;
  driver: string;
  recordCount: number;
  note?: string;
};

/**
 * Whole-ledger persistence. No locking or versioning: concurrent
 * load → modify → save cycles are last-writer-wins.
 */
export interface RecordStore {
  /**
   * Resolves to the full ordered ledger. Missing or malformed data resolves
   * to []. Rejects with StoreUnavailableError only when the medium itself
   * cannot be read.
   */
  load(): Promise<Complaint[]>;

  /** Overwrites the whole ledger. Rejects with StoreUnavailableError. */
  save(complaints: readonly Complaint[]): Promise<void>;

  getStatus(): Promise<RecordStoreHealth>;
}
