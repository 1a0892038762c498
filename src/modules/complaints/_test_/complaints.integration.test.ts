// HTTP surface over an in-memory ledger and a temp-dir object store

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import request from "supertest";
import { describe, it, beforeAll, afterAll, expect } from "vitest";
import type { Express } from "express";
import { createApp } from "@/app";
import { MemoryRecordStore } from "@/modules/storage/memoryRecordStore";
import { LocalObjectStore } from "@/modules/storage/localObjectStore";
import { ComplaintService } from "../complaint.service";

const ADMIN_TOKEN = "test-admin-token";

describe("Complaint HTTP workflow", () => {
  let dir: string;
  let app: Express;
  const ids = ["PUNE0001", "PUNE0002", "PUNE0003"];

  const form = {
    state: "Maharashtra",
    city: "Pune",
    area: "FC Road",
    category: "Road",
    severity: "Low",
    description: "Pothole causing bike accidents",
  };

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "citywatch-http-"));

    const records = new MemoryRecordStore();
    const objects = new LocalObjectStore({
      dir,
      baseUrl: "http://127.0.0.1",
      secret: "test-secret",
    });

    const service = new ComplaintService({
      records,
      objects,
      clock: () => new Date(2026, 1, 1, 12, 0, 0),
      generateId: () => ids.shift() ?? "PUNE9999",
    });

    app = createApp({
      records,
      objects,
      adminToken: ADMIN_TOKEN,
      corsOrigin: "http://localhost:3000",
      service,
    });
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should register a complaint and return its tracking id", async () => {
    const res = await request(app)
      .post("/api/complaints")
      .send({
        ...form,
        image: {
          filename: "pothole.png",
          contentType: "image/png",
          dataBase64: Buffer.from("fake-png").toString("base64"),
        },
      });

    expect(res.status).toBe(201);
    expect(res.body.ok).toBe(true);
    expect(res.body.trackingId).toBe("PUNE0001");
    expect(res.body.complaint.aiCategory).toBe("Road");
    expect(res.body.complaint.aiPriorityScore).toBe(2);
    expect(res.body.complaint.imageRef).toBe("PUNE0001_pothole.png");
  });

  it("should reject an incomplete form with field errors", async () => {
    const res = await request(app)
      .post("/api/complaints")
      .send({ ...form, area: "" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      ok: false,
      error: "Invalid complaint input",
      code: "COMPLAINT_VALIDATION_FAILED",
      details: { area: ["area is required"] },
    });
  });

  it("should track a complaint and serve its evidence through the signed URL", async () => {
    const res = await request(app).get("/api/complaints/track/pune0001");

    expect(res.status).toBe(200);
    expect(res.body.complaint.status).toBe("Open");
    expect(res.body.complaint.adminRemarks).toBe("Pending Review");

    const imageUrl = new URL(res.body.complaint.imageUrl);
    const image = await request(app).get(imageUrl.pathname + imageUrl.search);

    expect(image.status).toBe(200);
    expect(image.headers["content-type"]).toBe("image/png");
    expect(Buffer.from(image.body).toString()).toBe("fake-png");

    const tampered = await request(app).get(
      `${imageUrl.pathname}?expires=${imageUrl.searchParams.get("expires")}&signature=${"0".repeat(64)}`,
    );
    expect(tampered.status).toBe(403);
  });

  it("should answer 404 for an unknown tracking id", async () => {
    const res = await request(app).get("/api/complaints/track/ZZZZ0000");

    expect(res.status).toBe(404);
    expect(res.body.ok).toBe(false);
  });

  it("should refuse authority routes without the admin token", async () => {
    const res = await request(app).get("/api/authority/complaints");

    expect(res.status).toBe(401);
    expect(res.body.code).toBe("UNAUTHORIZED");

    const wrong = await request(app)
      .get("/api/authority/complaints")
      .set("X-Admin-Token", "nope");
    expect(wrong.status).toBe(401);
  });

  it("should escalate a burst on the authority load", async () => {
    await request(app).post("/api/complaints").send(form);
    await request(app).post("/api/complaints").send(form);

    const res = await request(app)
      .get("/api/authority/complaints")
      .query({ sort: "priority" })
      .set("X-Admin-Token", ADMIN_TOKEN);

    expect(res.status).toBe(200);
    expect(res.body.burstAlert).toBe(true);
    expect(res.body.complaints).toHaveLength(3);
    for (const c of res.body.complaints) {
      expect(c.aiSeverity).toBe("Critical");
      expect(c.aiPriorityScore).toBe(10);
      expect(c.clusterFlag).toBe(true);
      expect(c.aiReasoning).toBe(
        "Classified 'Road'. Severity 'Low'. [⚠ AI BURST: 3 reports in Pune]",
      );
    }

    const bursts = await request(app)
      .get("/api/authority/bursts")
      .set("X-Admin-Token", ADMIN_TOKEN);
    expect(bursts.body.bursts).toHaveLength(3);
  });

  it("should update status and remarks", async () => {
    const res = await request(app)
      .patch("/api/authority/complaints/PUNE0002")
      .set("X-Admin-Token", ADMIN_TOKEN)
      .send({ status: "In Progress", adminRemarks: "Crew dispatched" });

    expect(res.status).toBe(200);
    expect(res.body.complaint.status).toBe("In Progress");

    const tracked = await request(app).get("/api/complaints/track/PUNE0002");
    expect(tracked.body.complaint.adminRemarks).toBe("Crew dispatched");
  });

  it("should answer 404 when updating an unknown complaint", async () => {
    const res = await request(app)
      .patch("/api/authority/complaints/ZZZZ0000")
      .set("X-Admin-Token", ADMIN_TOKEN)
      .send({ status: "Resolved" });

    expect(res.status).toBe(404);
    expect(res.body.code).toBe("COMPLAINT_NOT_FOUND");
  });

  it("should report insight counters", async () => {
    const res = await request(app)
      .get("/api/authority/insights")
      .set("X-Admin-Token", ADMIN_TOKEN);

    expect(res.status).toBe(200);
    expect(res.body.insights).toEqual({
      total: 3,
      critical: 3,
      open: 2,
      burstAlerts: 3,
      density: [{ city: "Pune", category: "Road", count: 3 }],
    });
  });

  it("should report ledger health", async () => {
    const res = await request(app).get("/api/health/ledger");

    expect(res.status).toBe(200);
    expect(res.body.recordCount).toBe(3);
    expect(res.body.driver).toBe("memory");
  });
});
