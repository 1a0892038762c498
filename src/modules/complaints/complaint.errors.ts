// src/modules/complaints/complaint.errors.ts
// Canonical error surface for the complaint domain

import { DomainError } from "@/lib/errors/domain-error";

export class ComplaintNotFoundError extends DomainError {
  constructor(public readonly trackingId: string) {
    super(`Complaint ${trackingId} not found`, 404, "COMPLAINT_NOT_FOUND");
    this.name = "ComplaintNotFoundError";
  }
}

export class ComplaintValidationError extends DomainError {
  constructor(details: Record<string, string[] | undefined>) {
    super(
      "Invalid complaint input",
      400,
      "COMPLAINT_VALIDATION_FAILED",
      details,
    );
    this.name = "ComplaintValidationError";
  }
}

export class UnauthorizedAuthorityError extends DomainError {
  constructor() {
    super("Authority credentials missing or invalid", 401, "UNAUTHORIZED");
    this.name = "UnauthorizedAuthorityError";
  }
}
