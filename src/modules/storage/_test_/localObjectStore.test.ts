import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LocalObjectStore, sanitizeObjectName } from "../localObjectStore";

const NOW = Date.parse("2026-03-01T10:00:00Z");
const HOUR = 60 * 60 * 1000;

function signedParts(url: string) {
  const parsed = new URL(url);
  return {
    pathname: parsed.pathname,
    expires: Number(parsed.searchParams.get("expires")),
    signature: parsed.searchParams.get("signature") ?? "",
  };
}

describe("LocalObjectStore", () => {
  let dir: string;
  let clock: number;
  let store: LocalObjectStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "citywatch-objects-"));
    clock = NOW;
    store = new LocalObjectStore({
      dir,
      baseUrl: "http://objects.test",
      secret: "test-secret",
      now: () => clock,
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("stores bytes and issues a one-hour signed URL", async () => {
    const name = await store.put(
      Buffer.from("png-bytes"),
      "image/png",
      "AB12CD34_pothole.png",
    );

    expect(name).toBe("AB12CD34_pothole.png");

    const url = await store.getTemporaryUrl(name);
    expect(url).not.toBeNull();

    const parts = signedParts(url ?? "");
    expect(parts.pathname).toBe("/api/objects/AB12CD34_pothole.png");
    expect(parts.expires).toBe(NOW + HOUR);
    expect(parts.signature).toMatch(/^[0-9a-f]{64}$/);

    const read = await store.readSigned(name, parts.expires, parts.signature);
    expect(read).toEqual({
      ok: true,
      object: { bytes: Buffer.from("png-bytes"), contentType: "image/png" },
    });
  });

  it("returns null for the none sentinel, blank and absent names", async () => {
    await expect(store.getTemporaryUrl("None")).resolves.toBeNull();
    await expect(store.getTemporaryUrl("  ")).resolves.toBeNull();
    await expect(store.getTemporaryUrl("missing.png")).resolves.toBeNull();
    await expect(store.getTemporaryUrl("../etc/passwd")).resolves.toBeNull();
  });

  it("rejects an expired URL", async () => {
    const name = await store.put(Buffer.from("x"), "image/jpeg", "a.jpg");
    const parts = signedParts((await store.getTemporaryUrl(name)) ?? "");

    clock = NOW + HOUR + 1;

    await expect(
      store.readSigned(name, parts.expires, parts.signature),
    ).resolves.toEqual({ ok: false, reason: "EXPIRED" });
  });

  it("rejects a tampered expiry or a different object name", async () => {
    const name = await store.put(Buffer.from("x"), "image/jpeg", "a.jpg");
    await store.put(Buffer.from("y"), "image/jpeg", "b.jpg");
    const parts = signedParts((await store.getTemporaryUrl(name)) ?? "");

    await expect(
      store.readSigned(name, parts.expires + HOUR, parts.signature),
    ).resolves.toEqual({ ok: false, reason: "INVALID_SIGNATURE" });

    await expect(
      store.readSigned("b.jpg", parts.expires, parts.signature),
    ).resolves.toEqual({ ok: false, reason: "INVALID_SIGNATURE" });
  });

  it("flattens names supplied by uploaders", () => {
    expect(sanitizeObjectName("../../evil name.png")).toBe("evil_name.png");
    expect(sanitizeObjectName(".hidden")).toBe("_hidden");
  });
});
