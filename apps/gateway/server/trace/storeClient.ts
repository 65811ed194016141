import { joinUrl } from "@tracegate/config";

import { TraceError } from "../errors.js";
import type { AppendMessagesArgs, ProjectPolicy, PushTraceArgs, TraceStore } from "./types.js";

type FetchLike = typeof fetch;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

async function failure(what: string, resp: Response): Promise<TraceError> {
  const text = await resp.text().catch(() => "");
  return new TraceError(`${what} failed: ${resp.status}${text ? ` ${text.slice(0, 200)}` : ""}`, {
    status: resp.status
  });
}

/**
 * HTTP client for the trace store.
 *
 * Endpoints:
 * - POST /api/v1/push/trace                 create a trace (and the dataset if absent)
 * - POST /api/v1/trace/{id}/messages        append messages to an existing trace
 * - GET  /api/v1/user/info                  resolve the token's user
 * - GET  /api/v1/dataset/byuser/{user}/{dataset}/policy
 */
export class HttpTraceStore implements TraceStore {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(baseUrl: string, fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl;
    this.fetchImpl = fetchImpl;
  }

  private async call(p: string, token: string, init: { method: string; body?: unknown }): Promise<Response> {
    try {
      return await this.fetchImpl(joinUrl(this.baseUrl, p), {
        method: init.method,
        headers: {
          "Authorization": `Bearer ${token}`,
          "Accept": "application/json",
          ...(init.body !== undefined ? { "Content-Type": "application/json" } : {})
        },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined
      });
    } catch (e) {
      throw new TraceError(`Trace store unreachable: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  async pushTrace(args: PushTraceArgs): Promise<{ traceId: string }> {
    const resp = await this.call("/api/v1/push/trace", args.token, {
      method: "POST",
      body: {
        messages: [args.messages],
        annotations: [args.annotations],
        metadata: [args.metadata],
        dataset: args.dataset
      }
    });
    if (!resp.ok) throw await failure("push trace", resp);

    const body: unknown = await resp.json().catch(() => null);
    const ids = isRecord(body) && Array.isArray(body.id) ? body.id : [];
    const traceId = ids[0];
    if (typeof traceId !== "string" || !traceId) throw new TraceError("push trace returned no trace id");
    return { traceId };
  }

  async appendMessages(args: AppendMessagesArgs): Promise<void> {
    const resp = await this.call(`/api/v1/trace/${encodeURIComponent(args.traceId)}/messages`, args.token, {
      method: "POST",
      body: { messages: args.messages, annotations: args.annotations }
    });
    if (!resp.ok) throw await failure("append messages", resp);
  }

  async fetchProjectPolicies(project: string, token: string): Promise<ProjectPolicy[]> {
    const userResp = await this.call("/api/v1/user/info", token, { method: "GET" });
    if (!userResp.ok) throw await failure("user info", userResp);
    const user: unknown = await userResp.json();
    const username = isRecord(user) && typeof user.username === "string" ? user.username : "";
    if (!username) throw new TraceError("user info returned no username");

    const p = `/api/v1/dataset/byuser/${encodeURIComponent(username)}/${encodeURIComponent(project)}/policy`;
    const resp = await this.call(p, token, { method: "GET" });
    if (resp.status === 404) return [];
    if (!resp.ok) throw await failure("project policies", resp);

    const body: unknown = await resp.json();
    const raw = isRecord(body) && Array.isArray(body.policies) ? body.policies : [];

    const out: ProjectPolicy[] = [];
    for (const g of raw) {
      if (!isRecord(g) || g.enabled !== true) continue;
      if (g.action !== "block" && g.action !== "log") {
        console.warn(`[guardrails] skipping policy with unknown action: ${String(g.action)}`);
        continue;
      }
      out.push({
        id: String(g.id ?? ""),
        name: typeof g.name === "string" ? g.name : "",
        content: typeof g.content === "string" ? g.content : "",
        action: g.action
      });
    }
    return out;
  }
}
