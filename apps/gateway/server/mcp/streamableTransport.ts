import http from "node:http";

import { joinUrl } from "@tracegate/config";

import { TransportError, UpstreamProviderError, errorMessage } from "../errors.js";
import { SseDecoder } from "../framing.js";
import { flattenHeaders, json, parseJsonBody, readBody, sendGatewayError } from "../httpUtils.js";
import { downstreamHeaders } from "../proxy/orchestrator.js";
import { NodeResponseSink } from "../proxy/sink.js";
import { isEventStream, sseEvent } from "../sse.js";
import type { McpBridge } from "./bridge.js";
import {
  MCP_SESSION_ID_HEADER,
  createBridge,
  forwardMcpHeaders,
  mcpRequestInfo,
  type McpDeps,
  type McpRequestInfo
} from "./context.js";
import { isRequest, messagesOf, parseJsonRpcLine } from "./jsonrpc.js";

export const MCP_STREAMABLE_PATH = "/api/v1/gateway/mcp/streamable";

type StreamableSession = {
  bridge: McpBridge;
  baseUrl: string;
};

/** Bridge used for one request, plus how to release it. */
type BridgeLease = {
  bridge: McpBridge;
  sessionId?: string;
  /** Registry id of a bridge that is not (yet) tied to an upstream session. */
  ephemeralId?: string;
};

function isInitialize(payload: unknown): boolean {
  return messagesOf(payload).some((m) => isRequest(m) && m.method === "initialize");
}

/**
 * Relay an upstream event stream, recording JSON-RPC messages as they pass.
 * Aborting `signal` cancels the pending read.
 */
async function pipeEventStream(
  body: ReadableStream<Uint8Array>,
  sink: NodeResponseSink,
  bridge: McpBridge | undefined,
  signal: AbortSignal
): Promise<void> {
  const decoder = new SseDecoder();
  const reader = body.getReader();
  const onAbort = () => void reader.cancel().catch(() => undefined);
  if (signal.aborted) onAbort();
  else signal.addEventListener("abort", onAbort, { once: true });
  try {
    while (sink.writable) {
      const r = await reader.read();
      const units = r.done ? decoder.flush() : decoder.push(r.value);
      for (const unit of units) {
        if (bridge && unit.data !== null && (unit.event === undefined || unit.event === "message")) {
          const payload = parseJsonRpcLine(unit.data);
          if (payload !== undefined) bridge.handleServer(payload);
        }
        if (unit.raw.length) await sink.write(unit.raw);
      }
      if (r.done) break;
    }
  } finally {
    signal.removeEventListener("abort", onAbort);
    await reader.cancel().catch(() => undefined);
  }
}

/**
 * Streamable HTTP MCP transport. One endpoint; each POST carries client
 * messages and is answered with JSON or an event stream. A server that
 * hands out `mcp-session-id` is stateful and every later request must carry
 * the id; other servers get a fresh trace per request.
 */
export class McpStreamableTransport {
  private deps: McpDeps;
  private sessions = new Map<string, StreamableSession>();
  /** Base URLs of servers seen issuing session ids. */
  private statefulServers = new Set<string>();

  constructor(deps: McpDeps) {
    this.deps = deps;
  }

  async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      if (req.method === "POST") return await this.handlePost(req, res);
      if (req.method === "GET") return await this.handleGet(req, res);
      if (req.method === "DELETE") return await this.handleDelete(req, res);
      json(res, 405, { ok: false, error: "method_not_allowed" });
    } catch (e) {
      sendGatewayError(res, e);
    }
  }

  private async fetchUpstream(info: McpRequestInfo, init: RequestInit): Promise<Response> {
    const fetchImpl = this.deps.fetchImpl ?? fetch;
    return fetchImpl(joinUrl(info.baseUrl, "mcp"), init).catch((e: unknown) => {
      throw new TransportError(`MCP server unreachable: ${errorMessage(e)}`, 502);
    });
  }

  private knownSession(headers: Record<string, string>): StreamableSession | undefined {
    const sid = headers[MCP_SESSION_ID_HEADER];
    if (!sid) return undefined;
    const session = this.sessions.get(sid);
    if (!session) throw new TransportError(`Unknown MCP session: ${sid}`, 404);
    return session;
  }

  private lease(headers: Record<string, string>, info: McpRequestInfo, payload: unknown): BridgeLease {
    const sid = headers[MCP_SESSION_ID_HEADER];
    const existing = this.knownSession(headers);
    if (existing && sid) return { bridge: existing.bridge, sessionId: sid };

    if (this.statefulServers.has(info.baseUrl) && !isInitialize(payload)) {
      throw new TransportError(`Missing ${MCP_SESSION_ID_HEADER} header`, 400);
    }

    const { registry } = this.deps;
    const ephemeral = registry.create("mcp_streamable");
    registry.open(ephemeral.id);
    const bridge = createBridge(this.deps, info, "streamable", `streamable:${ephemeral.id.slice(0, 8)}`, true);
    const lease: BridgeLease = { bridge, ephemeralId: ephemeral.id };
    registry.onClose(ephemeral.id, async () => {
      if (!lease.sessionId) await bridge.close();
    });
    return lease;
  }

  /** Tie a fresh bridge to the session id the server just issued. */
  private adopt(lease: BridgeLease, sessionId: string, info: McpRequestInfo) {
    const { registry } = this.deps;
    lease.sessionId = sessionId;
    this.statefulServers.add(info.baseUrl);
    this.sessions.set(sessionId, { bridge: lease.bridge, baseUrl: info.baseUrl });
    lease.bridge.assembler.setMetadata({ is_stateless: false });

    registry.create("mcp_streamable", sessionId);
    registry.open(sessionId);
    registry.onClose(sessionId, async () => {
      this.sessions.delete(sessionId);
      await lease.bridge.close();
    });
  }

  private async handlePost(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const headers = flattenHeaders(req.headers);
    const info = mcpRequestInfo(headers);
    const raw = await readBody(req);
    const payload = parseJsonBody(raw);
    if (payload === undefined) throw new TransportError("Request body is not JSON", 400);

    const lease = this.lease(headers, info, payload);
    const controller = new AbortController();
    res.on("close", () => controller.abort());
    try {
      const verdict = await lease.bridge.handleClient(payload);
      const replyBody = (extra: unknown[] = []): string => {
        const all = [...extra, ...verdict.replies];
        return JSON.stringify(Array.isArray(payload) || all.length > 1 ? all : all[0]);
      };

      if (verdict.forward === null) {
        const out: Record<string, string> = { "content-type": "application/json" };
        if (lease.sessionId) out[MCP_SESSION_ID_HEADER] = lease.sessionId;
        res.writeHead(200, out);
        res.end(replyBody());
        return;
      }

      const upstream = await this.fetchUpstream(info, {
        method: "POST",
        headers: {
          accept: "application/json, text/event-stream",
          ...forwardMcpHeaders(headers),
          "content-type": "application/json"
        },
        body: verdict.replies.length ? JSON.stringify(verdict.forward) : raw,
        signal: controller.signal
      });

      const issued = upstream.headers.get(MCP_SESSION_ID_HEADER);
      if (issued && !lease.sessionId) this.adopt(lease, issued, info);

      const contentType = upstream.headers.get("content-type");
      if (upstream.ok && upstream.body && isEventStream(contentType)) {
        const sink = new NodeResponseSink(res);
        sink.start(upstream.status, downstreamHeaders(upstream.headers));
        for (const reply of verdict.replies) await sink.write(sseEvent("message", JSON.stringify(reply)));
        try {
          await pipeEventStream(upstream.body, sink, lease.bridge, controller.signal);
        } catch (e) {
          if (!controller.signal.aborted) throw e;
        } finally {
          sink.end();
        }
        return;
      }

      const text = await upstream.text();
      const parsed = text.trim() ? parseJsonRpcLine(text) : undefined;
      if (upstream.ok && parsed !== undefined) lease.bridge.handleServer(parsed);

      const out = downstreamHeaders(upstream.headers);
      if (!verdict.replies.length) {
        res.writeHead(upstream.status, out);
        res.end(text);
        return;
      }
      // Gateway replies travel in the same JSON body as the server's.
      const merged: unknown[] = parsed === undefined ? [] : messagesOf(parsed);
      res.writeHead(upstream.ok ? 200 : upstream.status, { ...out, "content-type": "application/json" });
      res.end(replyBody(merged));
    } finally {
      if (lease.ephemeralId) await this.deps.registry.close(lease.ephemeralId);
    }
  }

  /** Server-initiated messages on a standalone event stream. */
  private async handleGet(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const headers = flattenHeaders(req.headers);
    const info = mcpRequestInfo(headers);
    const session = this.knownSession(headers);

    const controller = new AbortController();
    res.on("close", () => controller.abort());

    const upstream = await this.fetchUpstream(info, {
      method: "GET",
      headers: { accept: "text/event-stream", ...forwardMcpHeaders(headers) },
      signal: controller.signal
    });
    if (!upstream.ok || !upstream.body) {
      const text = await upstream.text().catch(() => "");
      throw new UpstreamProviderError(upstream.status, text, upstream.headers.get("content-type"));
    }

    const sink = new NodeResponseSink(res);
    sink.start(upstream.status, downstreamHeaders(upstream.headers));
    try {
      await pipeEventStream(upstream.body, sink, session?.bridge, controller.signal);
    } catch (e) {
      if (!controller.signal.aborted) console.warn(`[mcp] streamable event stream ended: ${errorMessage(e)}`);
    } finally {
      sink.end();
    }
  }

  /** Ends the upstream session and flushes its trace. */
  private async handleDelete(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const headers = flattenHeaders(req.headers);
    const info = mcpRequestInfo(headers);
    const sid = headers[MCP_SESSION_ID_HEADER];
    if (!sid) throw new TransportError(`Missing ${MCP_SESSION_ID_HEADER} header`, 400);
    this.knownSession(headers);

    const upstream = await this.fetchUpstream(info, { method: "DELETE", headers: forwardMcpHeaders(headers) });
    const text = await upstream.text();
    await this.deps.registry.close(sid);

    res.writeHead(upstream.status, downstreamHeaders(upstream.headers));
    res.end(text);
  }
}
