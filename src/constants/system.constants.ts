// src/constants/system.constants.ts
// Purpose: Fixed engine constants shared by classification, escalation and storage.

export const SYSTEM_CONSTANTS = {
  TRACKING_ID_LENGTH: 8,
  TRACKING_ID_ALPHABET: "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",

  BURST_THRESHOLD: 3,
  BURST_MARKER: "AI BURST",

  CLASSIFIER_CONFIDENCE: 0.9,
  DEFAULT_PRIORITY_SCORE: 5,
  MAX_PRIORITY_SCORE: 10,

  LEDGER_SCHEMA_VERSION: 1,

  OBJECT_URL_TTL_MS: 60 * 60 * 1000,
} as const;
