export type GatewayErrorPayload = {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
};

/**
 * Base class for every error the gateway surfaces on purpose.
 * `status` is the HTTP status used when the error is answered directly.
 */
export abstract class GatewayError extends Error {
  abstract readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(message: string, status: number, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }

  toPayload(): GatewayErrorPayload {
    const error: GatewayErrorPayload["error"] = { code: this.code, message: this.message };
    if (this.details !== undefined) error.details = this.details;
    return { ok: false, error };
  }
}

/** Missing or malformed composite key. Raised before any upstream call. */
export class CredentialError extends GatewayError {
  readonly code = "credential_error" as const;

  constructor(message: string) {
    super(message, 400);
    this.name = "CredentialError";
  }
}

/**
 * Upstream answered non-2xx (or with a body we could not read).
 * The provider's status and body are passed through as-is.
 */
export class UpstreamProviderError extends GatewayError {
  readonly code = "upstream_provider_error" as const;
  readonly body: string;
  readonly contentType: string | null;

  constructor(status: number, body: string, contentType: string | null) {
    super(`Upstream responded with status ${status}`, status);
    this.name = "UpstreamProviderError";
    this.body = body;
    this.contentType = contentType;
  }
}

export type PolicyViolation = {
  ruleId: string;
  message: string;
  /** Trace addresses the violation points at, e.g. "messages.2.content:5-9". */
  ranges?: string[];
};

/** A guardrail policy blocked the interaction. */
export class GuardrailViolation extends GatewayError {
  readonly code = "guardrail_violation" as const;
  readonly violations: PolicyViolation[];

  constructor(violations: PolicyViolation[], phase: "pre" | "post") {
    super(
      phase === "pre"
        ? "[tracegate] The request did not pass the guardrails"
        : "[tracegate] The response did not pass the guardrails",
      400,
      { phase, violations }
    );
    this.name = "GuardrailViolation";
    this.violations = violations;
  }
}

/**
 * MCP framing or session mismatch, or a tool call whose completed argument
 * buffer does not parse. Fatal to the session.
 */
export class TransportError extends GatewayError {
  readonly code = "transport_error" as const;

  constructor(message: string, status: number = 400, details?: unknown) {
    super(message, status, details);
    this.name = "TransportError";
  }
}

/** Trace push failure. Logged and retried; never answered to a client. */
export class TraceError extends GatewayError {
  readonly code = "trace_error" as const;

  constructor(message: string, details?: unknown) {
    super(message, 502, details);
    this.name = "TraceError";
  }
}

export class UpstreamTimeoutError extends GatewayError {
  readonly code = "upstream_timeout" as const;

  constructor(phase: "connect" | "read", ms: number) {
    super(`Upstream ${phase} timed out after ${ms}ms`, 504, { phase, timeoutMs: ms });
    this.name = "UpstreamTimeoutError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
