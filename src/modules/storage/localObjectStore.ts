// src/modules/storage/localObjectStore.ts
// Purpose: Directory-backed object store issuing HMAC-signed, expiring read URLs.

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { StoreUnavailableError } from "@/lib/errors/domain-error";
import { hmacSha256Hex, constantTimeEqual } from "@/utils/signature";
import { NO_IMAGE } from "../complaints/complaint.types";
import type {
  BinaryObjectStore,
  SignedReadResult,
  StoredObject,
} from "./objectStore";

const ObjectMetaSchema = z.object({
  contentType: z.string().min(1),
  storedAt: z.string(),
});

export type LocalObjectStoreOptions = {
  dir: string;
  baseUrl: string;
  secret: string;
  ttlMs?: number;
  now?: () => number;
};

/** Keeps names flat: no separators, no dot-segments. */
export function sanitizeObjectName(name: string): string {
  const base = path.basename(name).replace(/[^A-Za-z0-9._-]/g, "_");
  return base.replace(/^\.+/, "_");
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export class LocalObjectStore implements BinaryObjectStore {
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly options: LocalObjectStoreOptions) {
    this.ttlMs = options.ttlMs ?? SYSTEM_CONSTANTS.OBJECT_URL_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private objectPath(name: string) {
    return path.join(this.options.dir, name);
  }

  private metaPath(name: string) {
    return path.join(this.options.dir, `${name}.meta.json`);
  }

  private sign(name: string, expires: number): string {
    return hmacSha256Hex(this.options.secret, `${name}\n${expires}`);
  }

  public async put(
    bytes: Buffer,
    contentType: string,
    name: string,
  ): Promise<string> {
    const safeName = sanitizeObjectName(name);

    try {
      await fs.mkdir(this.options.dir, { recursive: true });
      await fs.writeFile(this.objectPath(safeName), bytes);
      await fs.writeFile(
        this.metaPath(safeName),
        JSON.stringify({ contentType, storedAt: new Date().toISOString() }),
        "utf8",
      );
    } catch (err) {
      throw new StoreUnavailableError("put", err);
    }

    return safeName;
  }

  public async getTemporaryUrl(name: string): Promise<string | null> {
    if (!name.trim() || name === NO_IMAGE) return null;
    if (sanitizeObjectName(name) !== name) return null;

    try {
      await fs.access(this.objectPath(name));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StoreUnavailableError("getTemporaryUrl", err);
    }

    const expires = this.now() + this.ttlMs;
    const url = new URL(
      `/api/objects/${encodeURIComponent(name)}`,
      this.options.baseUrl,
    );
    url.searchParams.set("expires", String(expires));
    url.searchParams.set("signature", this.sign(name, expires));

    return url.toString();
  }

  /** Resolves a signed read issued by getTemporaryUrl. */
  public async readSigned(
    name: string,
    expires: number,
    signature: string,
  ): Promise<SignedReadResult> {
    if (!constantTimeEqual(this.sign(name, expires), signature)) {
      return { ok: false, reason: "INVALID_SIGNATURE" };
    }

    if (expires < this.now()) {
      return { ok: false, reason: "EXPIRED" };
    }

    const object = await this.read(name);
    if (!object) return { ok: false, reason: "NOT_FOUND" };

    return { ok: true, object };
  }

  private async read(name: string): Promise<StoredObject | null> {
    if (sanitizeObjectName(name) !== name) return null;

    try {
      const [bytes, metaText] = await Promise.all([
        fs.readFile(this.objectPath(name)),
        fs.readFile(this.metaPath(name), "utf8"),
      ]);

      const meta = ObjectMetaSchema.safeParse(JSON.parse(metaText));
      return {
        bytes,
        contentType: meta.success
          ? meta.data.contentType
          : "application/octet-stream",
      };
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StoreUnavailableError("get", err);
    }
  }
}
