// src/modules/storage/objectStore.ts
// Purpose: Evidence-image storage contract.

export type StoredObject = {
  bytes: Buffer;
  contentType: string;
};

export type SignedReadResult =
  | { ok: true; object: StoredObject }
  | { ok: false; reason: "NOT_FOUND" | "EXPIRED" | "INVALID_SIGNATURE" };

export interface BinaryObjectStore {
  /** Stores bytes under `name` (overwriting). Resolves to the stored name. */
  put(bytes: Buffer, contentType: string, name: string): Promise<string>;

  /**
   * Time-limited, read-only URL; null when the name is blank, the "None"
   * sentinel, or not stored.
   */
  getTemporaryUrl(name: string): Promise<string | null>;
}
