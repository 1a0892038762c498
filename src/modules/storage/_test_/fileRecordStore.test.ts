import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { makeComplaint } from "@/test/factories";
import { StoreUnavailableError } from "@/lib/errors/domain-error";
import { FileRecordStore } from "../fileRecordStore";

describe("FileRecordStore", () => {
  let dir: string;
  let ledgerPath: string;
  let store: FileRecordStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "citywatch-ledger-"));
    ledgerPath = path.join(dir, "nested", "complaints_master.json");
    store = new FileRecordStore(ledgerPath);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads an empty ledger when nothing was saved yet", async () => {
    await expect(store.load()).resolves.toEqual([]);
  });

  it("round-trips N records with identical field values", async () => {
    const ledger = [
      makeComplaint({ status: "In Progress", adminRemarks: "Crew assigned" }),
      makeComplaint({ clusterFlag: true, aiPriorityScore: 10 }),
      makeComplaint({ imageRef: "AB12CD34_photo.png", description: "" }),
    ];

    await store.save(ledger);

    await expect(store.load()).resolves.toEqual(ledger);
  });

  it("writes a versioned document and leaves no temp files behind", async () => {
    await store.save([makeComplaint()]);

    const doc = JSON.parse(await fs.readFile(ledgerPath, "utf8"));
    expect(doc.schemaVersion).toBe(1);
    expect(doc.records).toHaveLength(1);

    const entries = await fs.readdir(path.dirname(ledgerPath));
    expect(entries).toEqual(["complaints_master.json"]);
  });

  it("fails open on an unparseable ledger", async () => {
    await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
    await fs.writeFile(ledgerPath, "tracking_id,timestamp\n{{{", "utf8");

    await expect(store.load()).resolves.toEqual([]);
  });

  it("fails open on a blank ledger", async () => {
    await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
    await fs.writeFile(ledgerPath, "   \n", "utf8");

    await expect(store.load()).resolves.toEqual([]);
  });

  it("back-fills fields absent from a legacy bare-array ledger", async () => {
    await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
    await fs.writeFile(
      ledgerPath,
      JSON.stringify([
        { tracking_id: "LEGACY01", city: "Pune", category: "Road", status: "Open" },
      ]),
      "utf8",
    );

    const [record] = await store.load();

    expect(record.trackingId).toBe("LEGACY01");
    expect(record.aiPriorityScore).toBe(0);
    expect(record.clusterFlag).toBe(false);
    expect(record.imageRef).toBe("None");
    expect(record.aiReasoning).toBe("Unknown");
  });

  it("surfaces an unreadable medium as StoreUnavailableError", async () => {
    // a directory where the ledger file should be
    await fs.mkdir(ledgerPath, { recursive: true });

    await expect(store.load()).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.save([])).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it("reports ledger health", async () => {
    await store.save([makeComplaint(), makeComplaint()]);

    await expect(store.getStatus()).resolves.toEqual({
      ok: true,
      driver: "file",
      recordCount: 2,
    });
  });
});
