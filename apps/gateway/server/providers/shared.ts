import type { ContentPart } from "../canonical/types.js";
import { GATEWAY_AUTHORIZATION_HEADER } from "../credentials.js";
import { TransportError } from "../errors.js";

/** Headers never forwarded upstream (hop-by-hop, proxy and gateway headers). */
export const IGNORED_HEADERS: ReadonlySet<string> = new Set([
  "accept-encoding",
  "host",
  "connection",
  "content-length",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  GATEWAY_AUTHORIZATION_HEADER,
  "x-forwarded-for",
  "x-forwarded-host",
  "x-forwarded-port",
  "x-forwarded-proto",
  "x-forwarded-server",
  "x-real-ip"
]);

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? Math.trunc(v) : undefined;
}

/**
 * Copy the inbound headers minus the ignored ones and the provider's own
 * auth headers, which the adapter rewrites.
 */
export function forwardHeaders(inbound: Record<string, string>, drop: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  const dropSet = new Set(drop.map((h) => h.toLowerCase()));
  for (const [k, v] of Object.entries(inbound)) {
    const key = k.toLowerCase();
    if (IGNORED_HEADERS.has(key) || dropSet.has(key)) continue;
    out[key] = v;
  }
  out["accept-encoding"] = "identity";
  return out;
}

/** Parse the JSON payload of one stream unit. */
export function parseDataJson(data: string, provider: string): unknown {
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    throw new TransportError(`Malformed ${provider} stream unit`, 502, { data: data.slice(0, 200) });
  }
}

export function jsonArgs(v: unknown): string {
  if (typeof v === "string") return v.trim() ? v : "{}";
  if (v === undefined || v === null) return "{}";
  return JSON.stringify(v);
}

/** OpenAI-style message content (string or part list) as canonical parts. */
export function partsFromContent(content: unknown): ContentPart[] {
  if (typeof content === "string") return content ? [{ type: "text", text: content }] : [];
  const out: ContentPart[] = [];
  for (const p of asArray(content)) {
    if (typeof p === "string") {
      out.push({ type: "text", text: p });
      continue;
    }
    if (!isRecord(p)) continue;
    const text = asString(p.text);
    if ((p.type === "text" || p.type === "input_text") && text !== undefined) {
      out.push({ type: "text", text });
      continue;
    }
    if (p.type === "image_url" && isRecord(p.image_url)) {
      const url = asString(p.image_url.url) ?? "";
      out.push(binaryFromUrl(url));
      continue;
    }
    if (p.type === "image" && isRecord(p.source)) {
      const mime = asString(p.source.media_type) ?? "application/octet-stream";
      const blob = asString(p.source.data) ?? asString(p.source.url) ?? "";
      out.push({ type: "binary_ref", mime, blob });
    }
  }
  return out;
}

function binaryFromUrl(url: string): ContentPart {
  const m = /^data:([^;,]+)[;,]/.exec(url);
  if (m) return { type: "binary_ref", mime: m[1], blob: url };
  return { type: "binary_ref", mime: "application/octet-stream", blob: url };
}
