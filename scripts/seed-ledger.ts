// scripts/seed-ledger.ts
/**
 * Populates the configured ledger with demo complaints through the real
 * submission path (classifier + load/save cycle), then runs one authority
 * pass so burst escalation is visible immediately.
 *
 * Usage: npm run seed -- [count]
 */

import { faker } from "@faker-js/faker";
import { getConfig } from "../src/config/env";
import { log } from "../src/lib/observability/logger";
import { ComplaintService } from "../src/modules/complaints/complaint.service";
import {
  DECLARED_CATEGORIES,
  SEVERITIES,
} from "../src/modules/complaints/complaint.types";
import { FileRecordStore } from "../src/modules/storage/fileRecordStore";
import { LocalObjectStore } from "../src/modules/storage/localObjectStore";

////////////////////////////////////////////////////////////////
// CONFIG
////////////////////////////////////////////////////////////////

const DEFAULT_COUNT = 25;

const LOCATIONS: ReadonlyArray<{ state: string; city: string }> = [
  { state: "Maharashtra", city: "Pune" },
  { state: "Maharashtra", city: "Mumbai" },
  { state: "Karnataka", city: "Bengaluru" },
  { state: "Gujarat", city: "Ahmedabad" },
];

const ISSUE_PHRASES = [
  "pothole on the main road",
  "water pipe leak near the market",
  "street light not working",
  "garbage not collected for days",
  "loose wire sparking near the school",
  "drain overflow causing flood",
  "broken footpath",
];

////////////////////////////////////////////////////////////////
// SEED
////////////////////////////////////////////////////////////////

async function main() {
  const config = getConfig();
  const count = Number(process.argv[2] ?? DEFAULT_COUNT);

  const service = new ComplaintService({
    records: new FileRecordStore(config.LEDGER_PATH),
    objects: new LocalObjectStore({
      dir: config.OBJECT_STORE_DIR,
      baseUrl: config.OBJECT_URL_BASE,
      secret: config.OBJECT_URL_SECRET,
    }),
  });

  for (let i = 0; i < count; i++) {
    const location = faker.helpers.arrayElement(LOCATIONS);

    await service.submitComplaint({
      state: location.state,
      city: location.city,
      area: faker.location.street(),
      category: faker.helpers.arrayElement(DECLARED_CATEGORIES),
      severity: faker.helpers.arrayElement(SEVERITIES),
      description: `${faker.helpers.arrayElement(ISSUE_PHRASES)}. ${faker.lorem.sentence()}`,
    });
  }

  const view = await service.loadAuthorityView();

  log("INFO", "LEDGER_SEEDED", {
    ledgerPath: config.LEDGER_PATH,
    submitted: count,
    total: view.complaints.length,
    burstGroups: view.bursts.length,
  });
}

main().catch((err: unknown) => {
  log("ERROR", "LEDGER_SEED_FAILED", {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
