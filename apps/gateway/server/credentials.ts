import { CredentialError } from "./errors.js";

/**
 * Separator between the upstream key and the gateway token inside a single
 * header value: `<upstream_key>|invariant-auth: <gateway_token>`.
 *
 * This is a fixed protocol constant: case-sensitive, first occurrence wins.
 */
export const GATEWAY_AUTH_MARKER = "|invariant-auth:";

/** Dedicated header for clients that can send a second header. */
export const GATEWAY_AUTHORIZATION_HEADER = "invariant-authorization";

export type Credential = {
  upstreamKey: string;
  /** Absent means: pass-through proxying only, no tracing and no guardrails. */
  gatewayToken?: string;
};

/**
 * Split a composite header value into the upstream provider key and the
 * optional gateway token. Pure.
 */
export function extractCredential(headerValue: string | null | undefined): Credential {
  if (typeof headerValue !== "string" || !headerValue.trim()) {
    throw new CredentialError("Missing authorization header");
  }

  const at = headerValue.indexOf(GATEWAY_AUTH_MARKER);
  if (at < 0) return { upstreamKey: headerValue.trim() };

  const upstreamKey = headerValue.slice(0, at).trim();
  const gatewayToken = headerValue.slice(at + GATEWAY_AUTH_MARKER.length).trim();

  if (!upstreamKey) throw new CredentialError("Missing upstream API key before the gateway token");

  return gatewayToken ? { upstreamKey, gatewayToken } : { upstreamKey };
}

/**
 * Read the gateway token from `invariant-authorization: Bearer <token>`.
 * Returns undefined when the header is absent or blank.
 */
export function tokenFromAuthorizationHeader(value: string | null | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const s = stripBearer(value).trim();
  return s || undefined;
}

export function stripBearer(value: string): string {
  return value.trim().replace(/^bearer(?:\s+|$)/i, "");
}

/**
 * Credential resolution for an inbound request: the composite value of the
 * provider's own auth header, with the dedicated gateway header taking
 * precedence for the token.
 */
export function resolveCredential(args: {
  providerHeaderValue: string | null | undefined;
  gatewayHeaderValue?: string | null;
  /** OpenAI-style `Authorization: Bearer ...` headers carry a prefix to drop first. */
  bearer?: boolean;
}): Credential {
  const raw = args.providerHeaderValue;
  const value = args.bearer && typeof raw === "string" ? stripBearer(raw) : raw;
  const credential = extractCredential(value);

  const headerToken = tokenFromAuthorizationHeader(args.gatewayHeaderValue);
  if (headerToken) return { upstreamKey: credential.upstreamKey, gatewayToken: headerToken };
  return credential;
}

/** Alternate MCP header: a bare gateway token or the composite form. */
export const GATEWAY_API_KEY_HEADER = "x-gateway-api-key";

/**
 * Gateway token for routes without a provider key (MCP). The dedicated
 * authorization header wins over x-gateway-api-key.
 */
export function gatewayTokenFromHeaders(headers: Record<string, string | undefined>): string | undefined {
  const fromAuth = tokenFromAuthorizationHeader(headers[GATEWAY_AUTHORIZATION_HEADER]);
  if (fromAuth) return fromAuth;

  const raw = headers[GATEWAY_API_KEY_HEADER];
  if (typeof raw !== "string" || !raw.trim()) return undefined;
  if (!raw.includes(GATEWAY_AUTH_MARKER)) return stripBearer(raw) || undefined;
  return extractCredential(raw).gatewayToken;
}
