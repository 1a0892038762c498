// src/modules/complaints/complaint.service.ts
// Purpose: Load → modify → save orchestration for citizen submissions and authority actions.

import type { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { log } from "@/lib/observability/logger";
import {
  generateTrackingId,
  isTrackingId,
  normalizeTrackingId,
} from "@/utils/trackingId";
import type { RecordStore } from "../storage/recordStore";
import type { BinaryObjectStore } from "../storage/objectStore";
import { classifyComplaint } from "./classifier.service";
import { detectBursts, type BurstGroup } from "./burstDetector";
import { transitionComplaintStatus } from "./transitionComplaintStatus";
import {
  ComplaintNotFoundError,
  ComplaintValidationError,
} from "./complaint.errors";
import {
  SubmitComplaintSchema,
  UpdateComplaintSchema,
} from "./complaint.validation";
import {
  ComplaintQuerySchema,
  collectFacets,
  computeInsights,
  queryComplaints,
  type ComplaintFacets,
  type ComplaintInsights,
} from "./complaint.queries";
import { NO_IMAGE, type Complaint } from "./complaint.types";

export type TrackedComplaint = {
  trackingId: string;
  status: string;
  area: string;
  city: string;
  adminRemarks: string;
  imageUrl: string | null;
};

export type AuthorityView = {
  complaints: Complaint[];
  bursts: BurstGroup[];
  /** True when this load escalated something and the ledger was re-saved. */
  burstAlert: boolean;
};

export type ComplaintListing = {
  complaints: Complaint[];
  facets: ComplaintFacets;
  burstAlert: boolean;
};

export type BurstEvent = Pick<
  Complaint,
  "trackingId" | "city" | "category" | "description" | "aiReasoning"
>;

export type ComplaintServiceDeps = {
  records: RecordStore;
  objects: BinaryObjectStore;
  clock?: () => Date;
  generateId?: () => string;
};

const PENDING_REMARKS = "Pending Review";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:mm:ss`, local time. Lexicographic order = time order. */
export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ComplaintValidationError(parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

export class ComplaintService {
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly deps: ComplaintServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? generateTrackingId;
  }

  ////////////////////////////////////////////////////////////////
  // Citizen side
  ////////////////////////////////////////////////////////////////

  public async submitComplaint(input: unknown): Promise<Complaint> {
    const form = parseOrThrow(SubmitComplaintSchema, input);
    const trackingId = this.generateId();

    let imageRef = NO_IMAGE;
    if (form.image) {
      imageRef = await this.deps.objects.put(
        Buffer.from(form.image.dataBase64, "base64"),
        form.image.contentType,
        `${trackingId}_${form.image.filename}`,
      );
    }

    const ai = classifyComplaint(
      form.description,
      form.category,
      form.severity,
    );

    const complaint: Complaint = {
      trackingId,
      timestamp: formatTimestamp(this.clock()),
      state: form.state,
      city: form.city,
      area: form.area,
      category: form.category,
      severityReported: form.severity,
      description: form.description,
      imageRef,
      status: "Open",
      adminRemarks: "",
      aiCategory: ai.aiCategory,
      aiSeverity: ai.aiSeverity,
      aiPriorityScore: ai.priorityScore,
      aiConfidence: ai.confidence,
      aiReasoning: ai.reasoning,
      clusterFlag: false,
    };

    const ledger = await this.deps.records.load();
    await this.deps.records.save([...ledger, complaint]);

    log("INFO", "COMPLAINT_SUBMITTED", {
      trackingId,
      city: complaint.city,
      category: complaint.category,
      aiCategory: complaint.aiCategory,
      aiPriorityScore: complaint.aiPriorityScore,
    });

    return complaint;
  }

  /** Null means "no matching record", which is not an error. */
  public async trackComplaint(
    trackingId: string,
  ): Promise<TrackedComplaint | null> {
    const id = normalizeTrackingId(trackingId);
    if (!isTrackingId(id)) return null;

    const ledger = await this.deps.records.load();
    const found = ledger.find((c) => c.trackingId === id);
    if (!found) return null;

    const imageUrl =
      found.imageRef !== NO_IMAGE
        ? await this.deps.objects.getTemporaryUrl(found.imageRef)
        : null;

    return {
      trackingId: found.trackingId,
      status: found.status,
      area: found.area,
      city: found.city,
      adminRemarks: found.adminRemarks.trim()
        ? found.adminRemarks
        : PENDING_REMARKS,
      imageUrl,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Authority side
  ////////////////////////////////////////////////////////////////

  /**
   * Every authority load runs one escalation pass; the ledger is written
   * back only when the pass changed AI fields.
   */
  public async loadAuthorityView(): Promise<AuthorityView> {
    const ledger = await this.deps.records.load();
    const pass = detectBursts(ledger, SYSTEM_CONSTANTS.BURST_THRESHOLD);

    if (pass.changed) {
      await this.deps.records.save(pass.complaints);
      log("WARN", "BURST_ESCALATION_APPLIED", {
        groups: pass.bursts.map((g) => ({
          city: g.city,
          category: g.category,
          count: g.count,
        })),
      });
    }

    return {
      complaints: pass.complaints,
      bursts: pass.bursts,
      burstAlert: pass.changed,
    };
  }

  public async listComplaints(query: unknown): Promise<ComplaintListing> {
    const q = parseOrThrow(ComplaintQuerySchema, query);
    const view = await this.loadAuthorityView();

    return {
      complaints: queryComplaints(view.complaints, q),
      facets: collectFacets(view.complaints),
      burstAlert: view.burstAlert,
    };
  }

  public async getInsights(): Promise<ComplaintInsights> {
    const view = await this.loadAuthorityView();
    return computeInsights(view.complaints);
  }

  public async getBurstEvents(): Promise<BurstEvent[]> {
    const view = await this.loadAuthorityView();
    return view.complaints
      .filter((c) => c.clusterFlag)
      .map((c) => ({
        trackingId: c.trackingId,
        city: c.city,
        category: c.category,
        description: c.description,
        aiReasoning: c.aiReasoning,
      }));
  }

  public async updateComplaint(
    trackingId: string,
    input: unknown,
  ): Promise<Complaint> {
    const action = parseOrThrow(UpdateComplaintSchema, input);
    const id = normalizeTrackingId(trackingId);

    const ledger = await this.deps.records.load();
    const index = ledger.findIndex((c) => c.trackingId === id);
    if (index === -1) throw new ComplaintNotFoundError(id);

    const previous = ledger[index];
    const updated = transitionComplaintStatus(previous, action);

    const next = [...ledger];
    next[index] = updated;
    await this.deps.records.save(next);

    log("INFO", "COMPLAINT_UPDATED", {
      trackingId: id,
      from: previous.status,
      to: updated.status,
      remarksChanged: previous.adminRemarks !== updated.adminRemarks,
    });

    return updated;
  }
}
