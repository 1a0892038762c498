// src/server.ts
// Purpose: Application bootstrap (config → stores → HTTP server) + graceful shutdown.

import http from "http";
import { createApp } from "./app";
import { getConfig } from "./config/env";
import { log } from "./lib/observability/logger";
import { FileRecordStore } from "./modules/storage/fileRecordStore";
import { MemoryRecordStore } from "./modules/storage/memoryRecordStore";
import { LocalObjectStore } from "./modules/storage/localObjectStore";
import type { RecordStore } from "./modules/storage/recordStore";

const config = getConfig();

const records: RecordStore =
  config.LEDGER_DRIVER === "memory"
    ? new MemoryRecordStore()
    : new FileRecordStore(config.LEDGER_PATH);

const objects = new LocalObjectStore({
  dir: config.OBJECT_STORE_DIR,
  baseUrl: config.OBJECT_URL_BASE,
  secret: config.OBJECT_URL_SECRET,
});

const app = createApp({
  records,
  objects,
  adminToken: config.ADMIN_TOKEN,
  corsOrigin: config.CORS_ORIGIN,
});

const server = http.createServer(app);

server.listen(config.PORT, () => {
  log("INFO", "SERVER_STARTED", {
    port: config.PORT,
    mode: config.NODE_ENV,
    ledgerDriver: config.LEDGER_DRIVER,
  });
});

////////////////////////////////////////////////////////////////
// GRACEFUL SHUTDOWN
////////////////////////////////////////////////////////////////

function shutdown(signal: string) {
  log("INFO", "SERVER_STOPPING", { signal });
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
