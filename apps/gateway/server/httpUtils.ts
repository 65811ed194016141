import http from "node:http";

import { GatewayError, UpstreamProviderError, errorMessage } from "./errors.js";

/**
 * Write a JSON response.
 */
export function json(res: http.ServerResponse, status: number, obj: unknown) {
  const body = JSON.stringify(obj, null, 2);
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(body);
}

/**
 * Answer a gateway error on a response that has not started yet.
 * Upstream provider errors keep the provider's own status and body.
 */
export function sendGatewayError(res: http.ServerResponse, err: unknown) {
  if (res.headersSent) {
    if (!res.writableEnded) res.end();
    return;
  }

  if (err instanceof UpstreamProviderError) {
    res.writeHead(err.status, { "Content-Type": err.contentType ?? "application/json; charset=utf-8" });
    res.end(err.body);
    return;
  }

  if (err instanceof GatewayError) return json(res, err.status, err.toPayload());

  console.error("[gateway] unexpected error:", err);
  return json(res, 500, { ok: false, error: { code: "internal_error", message: errorMessage(err) } });
}

export async function readBody(req: http.IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  return Buffer.concat(chunks);
}

/**
 * Parse a request body as JSON.
 *
 * Returns undefined for an empty or malformed body so the caller decides
 * whether that is an error (MCP) or just an opaque payload (provider routes).
 */
export function parseJsonBody(body: Buffer): unknown {
  const raw = body.toString("utf-8");
  if (!raw.trim()) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
}

export function safeDecodeSegment(seg: string): string | null {
  try {
    return decodeURIComponent(seg);
  } catch {
    return null;
  }
}

/** Flatten Node's header map into plain string pairs for fetch(). */
export function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (v === undefined) continue;
    out[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  }
  return out;
}
