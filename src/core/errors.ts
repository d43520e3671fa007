import type { CrawlReport, ErrorKind } from "../types.js";

/**
 * Failure raised by a portal interaction. The kind is what ends up in
 * `ShopRecord.error.kind` when retries run out.
 */
export class PortalError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = "PortalError";
  }
}

export class ElementNotFoundError extends PortalError {
  constructor(public readonly selector: string) {
    super("ElementNotFound", `Element not found: ${selector}`);
    this.name = "ElementNotFoundError";
  }
}

export class TimeoutFailureError extends PortalError {
  constructor(
    public readonly condition: string,
    public readonly timeoutMs: number,
    kind: ErrorKind = "TimeoutFailure"
  ) {
    super(kind, `Timed out after ${timeoutMs}ms waiting for ${condition}`);
    this.name = "TimeoutFailureError";
  }
}

/** The transaction dialog opened but never received its content. */
export class ExtractionTimeoutError extends TimeoutFailureError {
  constructor(condition: string, timeoutMs: number) {
    super(condition, timeoutMs, "ExtractionTimeout");
    this.name = "ExtractionTimeoutError";
  }
}

export class SessionLostError extends PortalError {
  constructor(message = "Browser session is no longer usable") {
    super("SessionLost", message);
    this.name = "SessionLostError";
  }
}

/** The session factory could not produce a browser session at all. */
export class SessionUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionUnavailableError";
  }
}

/** Run-level fatal condition. Carries whatever was collected before it. */
export class RunAbortedError extends Error {
  constructor(
    message: string,
    public readonly report: CrawlReport,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RunAbortedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
