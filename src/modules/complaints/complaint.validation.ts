// src/modules/complaints/complaint.validation.ts
// Purpose: Request-boundary schemas for citizen submissions and authority actions.

import { z } from "zod";
import { COMPLAINT_STATUSES } from "./complaint.types";

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((v) => v.trim().length > 0, { message: `${field} is required` });

export const ALLOWED_IMAGE_TYPES = ["image/png", "image/jpeg"] as const;

export const EvidenceImageSchema = z.object({
  filename: z.string().trim().min(1).max(200),
  contentType: z.enum(ALLOWED_IMAGE_TYPES),
  dataBase64: z
    .string()
    .regex(/^[A-Za-z0-9+/]+={0,2}$/, { message: "dataBase64 must be base64" }),
});

/**
 * Category and severity are free strings on purpose: unrecognised values
 * pass through the classifier untouched.
 */
export const SubmitComplaintSchema = z.object({
  state: requiredText("state"),
  city: requiredText("city"),
  area: requiredText("area"),
  category: requiredText("category"),
  severity: requiredText("severity"),
  description: requiredText("description"),
  image: EvidenceImageSchema.optional(),
});

export type SubmitComplaintInput = z.infer<typeof SubmitComplaintSchema>;

export const UpdateComplaintSchema = z.object({
  status: z.enum(COMPLAINT_STATUSES),
  adminRemarks: z.string().max(2000).optional(),
});

export type UpdateComplaintInput = z.infer<typeof UpdateComplaintSchema>;
