// src/lib/errors/domain-error.ts

export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
    public readonly details?: Record<string, string[] | undefined>,
  ) {
    super(message);
  }
}

export class StoreUnavailableError extends DomainError {
  constructor(
    public readonly operation: string,
    cause?: unknown,
  ) {
    super(
      `Storage operation "${operation}" failed${
        cause instanceof Error ? `: ${cause.message}` : ""
      }`,
      503,
      "STORE_UNAVAILABLE",
    );
    this.name = "StoreUnavailableError";
    this.cause = cause;
  }
}
