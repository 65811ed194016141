import { joinUrl } from "@tracegate/config";

import type { CanonicalMessage } from "../canonical/types.js";
import type { PolicyViolation } from "../errors.js";

type FetchLike = typeof fetch;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseArgs(s: string): unknown {
  try {
    const v: unknown = JSON.parse(s);
    return v;
  } catch {
    return s;
  }
}

/** Chat-completions shaped messages, the format the guardrails service checks. */
export function toServiceMessages(prefix: readonly CanonicalMessage[]): Record<string, unknown>[] {
  const out: Record<string, unknown>[] = [];
  for (const m of prefix) {
    const text = m.content.flatMap((p) => (p.type === "text" ? [p.text] : [])).join("");
    const calls = m.content.flatMap((p) => (p.type === "tool_call" ? [p.call] : []));
    const results = m.content.flatMap((p) => (p.type === "tool_result" ? [p] : []));

    if (results.length) {
      for (const r of results) {
        out.push({
          role: "tool",
          tool_call_id: r.callId,
          content: typeof r.payload === "string" ? r.payload : JSON.stringify(r.payload)
        });
      }
      continue;
    }

    const msg: Record<string, unknown> = { role: m.role, content: text };
    if (calls.length) {
      msg.tool_calls = calls.map((c) => ({
        id: c.id,
        type: "function",
        function: { name: c.name, arguments: parseArgs(c.arguments) }
      }));
    }
    out.push(msg);
  }
  return out;
}

/**
 * Client for the remote guardrails service:
 * - POST /api/v1/policy/load   { policy }            warm the service's policy cache
 * - POST /api/v1/policy/check  { messages, policy }  -> { errors: [{ args, ranges }] }
 */
export class GuardrailsServiceClient {
  private baseUrl: string;
  private fetchImpl: FetchLike;
  private preloaded = new Map<string, Promise<void>>();

  constructor(baseUrl: string, fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl;
    this.fetchImpl = fetchImpl;
  }

  private post(p: string, token: string, body: unknown): Promise<Response> {
    return this.fetchImpl(joinUrl(this.baseUrl, p), {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${token}`,
        "Accept": "application/json",
        "Content-Type": "application/json"
      },
      body: JSON.stringify(body)
    });
  }

  /** Preload a policy once per policy text. Failures are logged and retried on the next call. */
  preload(policy: string, token: string): Promise<void> {
    const hit = this.preloaded.get(policy);
    if (hit) return hit;

    const p = this.post("/api/v1/policy/load", token, { policy }).then((resp) => {
      if (!resp.ok) throw new Error(`policy load failed: ${resp.status}`);
    });
    const settled = p.catch((e: unknown) => {
      this.preloaded.delete(policy);
      console.warn(`[guardrails] preload failed: ${e instanceof Error ? e.message : String(e)}`);
    });
    this.preloaded.set(policy, settled);
    return settled;
  }

  async check(prefix: readonly CanonicalMessage[], policy: string, token: string, ruleId: string): Promise<PolicyViolation[]> {
    const resp = await this.post("/api/v1/policy/check", token, { messages: toServiceMessages(prefix), policy });
    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new Error(`policy check failed: ${resp.status}${text ? ` ${text.slice(0, 200)}` : ""}`);
    }

    const body: unknown = await resp.json();
    if (!isRecord(body)) throw new Error("policy check returned a non-object body");
    if (typeof body.error === "string") throw new Error(`policy check failed: ${body.error}`);

    const errors = Array.isArray(body.errors) ? body.errors : [];
    return errors.filter(isRecord).map((e) => {
      const args = Array.isArray(e.args) ? e.args : [];
      const ranges = Array.isArray(e.ranges) ? e.ranges.filter((r): r is string => typeof r === "string") : [];
      const v: PolicyViolation = { ruleId, message: typeof args[0] === "string" ? args[0] : "policy violation" };
      if (ranges.length) v.ranges = ranges;
      return v;
    });
  }
}
