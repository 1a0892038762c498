import { randomInt } from "node:crypto";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";

const TRACKING_ID_RE = /^[A-Z0-9]{8}$/;

/**
 * Stateless: uniqueness against the ledger is NOT checked here.
 * 36^8 keeps collisions unlikely, not impossible.
 */
export function generateTrackingId(): string {
  const alphabet = SYSTEM_CONSTANTS.TRACKING_ID_ALPHABET;
  let id = "";
  for (let i = 0; i < SYSTEM_CONSTANTS.TRACKING_ID_LENGTH; i++) {
    id += alphabet[randomInt(alphabet.length)];
  }
  return id;
}

export function isTrackingId(value: unknown): value is string {
  return typeof value === "string" && TRACKING_ID_RE.test(value);
}

export function normalizeTrackingId(value: string): string {
  return value.trim().toUpperCase();
}
