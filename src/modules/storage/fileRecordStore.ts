// src/modules/storage/fileRecordStore.ts
// Purpose: JSON-file ledger (single document, whole-file overwrite via temp file + rename).

import fs from "fs/promises";
import path from "path";
import { StoreUnavailableError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import type { Complaint } from "../complaints/complaint.types";
import type { RecordStore, RecordStoreHealth } from "./recordStore";
import { decodeLedger, encodeLedger } from "./ledgerCodec";

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export class FileRecordStore implements RecordStore {
  constructor(private readonly filePath: string) {}

  public async load(): Promise<Complaint[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new StoreUnavailableError("load", err);
    }

    return decodeLedger(text, this.filePath);
  }

  public async save(complaints: readonly Complaint[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, encodeLedger(complaints), "utf8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) =>
        log("WARN", "LEDGER_TMP_CLEANUP_FAILED", {
          tmpPath,
          reason: String(cleanupErr),
        }),
      );
      throw new StoreUnavailableError("save", err);
    }
  }

  public async getStatus(): Promise<RecordStoreHealth> {
    try {
      const complaints = await this.load();
      return { ok: true, driver: "file", recordCount: complaints.length };
    } catch (err) {
      return {
        ok: false,
        driver: "file",
        recordCount: 0,
        note: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
