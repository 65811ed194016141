import type { GatewayConfig } from "./types.js";
import { DEFAULT_GATEWAY_CONFIG } from "./types.js";

export type RawConfig = Record<string, unknown>;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function clampPort(v: unknown, fallback: number): number {
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v) : NaN;
  if (!Number.isFinite(n)) return fallback;
  const i = Math.trunc(n);
  if (i < 1 || i > 65535) return fallback;
  return i;
}

function coerceString(v: unknown, fallback: string): string {
  if (typeof v !== "string") return fallback;
  const s = v.trim();
  return s.length ? s : fallback;
}

export function coerceOptionalString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s.length ? s : undefined;
}

export function coerceBool(v: unknown, fallback: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "1" || s === "true" || s === "yes" || s === "on") return true;
    if (s === "0" || s === "false" || s === "no" || s === "off") return false;
  }
  return fallback;
}

function coerceTimeoutMs(v: unknown, fallback: number): number {
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v) : NaN;
  if (!Number.isFinite(n)) return fallback;
  const i = Math.trunc(n);
  // Keep timers sane: at least 100ms, at most one hour.
  if (i < 100) return fallback;
  return Math.min(i, 60 * 60_000);
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
  const out: RawConfig = { ...a };
  for (const [k, v] of Object.entries(b)) {
    const prev = out[k];
    if (isRecord(v) && isRecord(prev)) out[k] = deepMerge(prev, v);
    else out[k] = v;
  }
  return out;
}

function section(raw: RawConfig, key: string): RawConfig {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

export function coerceConfig(raw: RawConfig): GatewayConfig {
  const base = DEFAULT_GATEWAY_CONFIG;

  const serverRaw = section(raw, "server");
  const providersRaw = section(raw, "providers");
  const upstreamRaw = section(raw, "upstream");
  const traceRaw = section(raw, "trace_store");
  const guardRaw = section(raw, "guardrails");

  const providerUrl = (id: keyof GatewayConfig["providers"]) =>
    stripTrailingSlash(coerceString(section(providersRaw, id).base_url, base.providers[id].base_url));

  const apiUrl = coerceOptionalString(guardRaw.api_url);

  return {
    server: {
      host: coerceString(serverRaw.host, base.server.host),
      port: clampPort(serverRaw.port, base.server.port),
      dev: coerceBool(serverRaw.dev, base.server.dev)
    },
    providers: {
      openai: { base_url: providerUrl("openai") },
      anthropic: { base_url: providerUrl("anthropic") },
      gemini: { base_url: providerUrl("gemini") }
    },
    upstream: {
      connect_timeout_ms: coerceTimeoutMs(upstreamRaw.connect_timeout_ms, base.upstream.connect_timeout_ms),
      read_timeout_ms: coerceTimeoutMs(upstreamRaw.read_timeout_ms, base.upstream.read_timeout_ms)
    },
    trace_store: {
      base_url: stripTrailingSlash(coerceString(traceRaw.base_url, base.trace_store.base_url)),
      api_key: coerceOptionalString(traceRaw.api_key)
    },
    guardrails: {
      file_path: coerceOptionalString(guardRaw.file_path),
      api_url: apiUrl ? stripTrailingSlash(apiUrl) : undefined,
      fail_closed: coerceBool(guardRaw.fail_closed, base.guardrails.fail_closed)
    }
  };
}
