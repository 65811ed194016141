import http from "node:http";

import { joinUrl } from "@tracegate/config";

import { TransportError, UpstreamProviderError, errorMessage } from "../errors.js";
import { SseDecoder } from "../framing.js";
import { flattenHeaders, parseJsonBody, readBody, sendGatewayError } from "../httpUtils.js";
import { downstreamHeaders } from "../proxy/orchestrator.js";
import { NodeResponseSink } from "../proxy/sink.js";
import { sseEvent, sseHeaders, startSseKeepAlive } from "../sse.js";
import type { McpBridge } from "./bridge.js";
import { createBridge, forwardMcpHeaders, mcpRequestInfo, type McpDeps, type McpRequestInfo } from "./context.js";
import { parseJsonRpcLine } from "./jsonrpc.js";

export const MCP_SSE_PATH = "/api/v1/gateway/mcp/sse";
export const MCP_SSE_MESSAGES_PATH = "/api/v1/gateway/mcp/sse/messages/";

type SseSession = {
  bridge: McpBridge;
  baseUrl: string;
  /** Write a JSON-RPC message onto the client's event stream. */
  emit: (payload: unknown) => Promise<void>;
};

const SESSION_ID_RE = /session_id=([^&\s]+)/;

/**
 * Legacy MCP SSE transport. The client holds a GET event stream open and
 * POSTs its messages to the endpoint announced on that stream; server
 * replies arrive as `message` events.
 */
export class McpSseTransport {
  private deps: McpDeps;
  private sessions = new Map<string, SseSession>();

  constructor(deps: McpDeps) {
    this.deps = deps;
  }

  /** GET /api/v1/gateway/mcp/sse */
  async handleStream(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const fetchImpl = this.deps.fetchImpl ?? fetch;
    const headers = flattenHeaders(req.headers);

    const controller = new AbortController();
    res.on("close", () => controller.abort());

    let info: McpRequestInfo;
    let upstream: Response;
    let stream: ReadableStream<Uint8Array>;
    try {
      info = mcpRequestInfo(headers);
      upstream = await fetchImpl(joinUrl(info.baseUrl, "sse"), {
        method: "GET",
        headers: { ...forwardMcpHeaders(headers), accept: "text/event-stream" },
        signal: controller.signal
      }).catch((e: unknown) => {
        throw new TransportError(`MCP server unreachable: ${errorMessage(e)}`, 502);
      });
      if (!upstream.ok || !upstream.body) {
        const text = await upstream.text().catch(() => "");
        throw new UpstreamProviderError(upstream.status, text, upstream.headers.get("content-type"));
      }
      stream = upstream.body;
    } catch (e) {
      return sendGatewayError(res, e);
    }

    const sink = new NodeResponseSink(res);
    sink.start(200, { ...downstreamHeaders(upstream.headers), ...lowerKeys(sseHeaders()) });
    startSseKeepAlive(res);

    const decoder = new SseDecoder();
    const reader = stream.getReader();
    let sessionId: string | null = null;

    try {
      while (true) {
        const r = await reader.read();
        const units = r.done ? decoder.flush() : decoder.push(r.value);

        for (const unit of units) {
          if (unit.event === "endpoint" && unit.data !== null) {
            const m = SESSION_ID_RE.exec(unit.data);
            if (m && !sessionId) {
              sessionId = decodeURIComponent(m[1]);
              this.register(sessionId, info, sink);
              await sink.write(sseEvent("endpoint", `${MCP_SSE_MESSAGES_PATH}?session_id=${encodeURIComponent(sessionId)}`));
              continue;
            }
          }

          if (sessionId && unit.data !== null && (unit.event === undefined || unit.event === "message")) {
            const payload = parseJsonRpcLine(unit.data);
            if (payload !== undefined) this.sessions.get(sessionId)?.bridge.handleServer(payload);
          }
          if (unit.raw.length) await sink.write(unit.raw);
        }

        if (r.done || !sink.writable) break;
      }
    } catch (e) {
      if (!controller.signal.aborted) console.warn(`[mcp] sse stream ended: ${errorMessage(e)}`);
    } finally {
      await reader.cancel().catch(() => undefined);
      if (sessionId) await this.deps.registry.close(sessionId);
      sink.end();
    }
  }

  private register(sessionId: string, info: McpRequestInfo, sink: NodeResponseSink) {
    const { registry } = this.deps;
    registry.create("mcp_sse", sessionId);
    registry.open(sessionId);

    const bridge = createBridge(this.deps, info, "sse", `sse:${sessionId.slice(0, 8)}`);
    this.sessions.set(sessionId, {
      bridge,
      baseUrl: info.baseUrl,
      emit: (payload) => sink.write(sseEvent("message", JSON.stringify(payload)))
    });
    registry.onClose(sessionId, async () => {
      this.sessions.delete(sessionId);
      await bridge.close();
    });
  }

  /** POST /api/v1/gateway/mcp/sse/messages/?session_id=... */
  async handleMessage(req: http.IncomingMessage, res: http.ServerResponse, url: URL): Promise<void> {
    const fetchImpl = this.deps.fetchImpl ?? fetch;
    try {
      const sessionId = url.searchParams.get("session_id");
      if (!sessionId) throw new TransportError("Missing session_id query parameter", 400);
      const session = this.sessions.get(sessionId);
      if (!session) throw new TransportError(`Unknown MCP session: ${sessionId}`, 404);

      const headers = flattenHeaders(req.headers);
      const raw = await readBody(req);
      const payload = parseJsonBody(raw);
      if (payload === undefined) throw new TransportError("Request body is not JSON", 400);

      const verdict = await session.bridge.handleClient(payload);
      for (const reply of verdict.replies) await session.emit(reply);

      if (verdict.forward === null) {
        res.writeHead(202, { "Content-Type": "text/plain; charset=utf-8" });
        res.end("Accepted");
        return;
      }

      const body = verdict.replies.length ? JSON.stringify(verdict.forward) : raw;
      const upstream = await fetchImpl(
        `${joinUrl(session.baseUrl, "messages/")}?session_id=${encodeURIComponent(sessionId)}`,
        {
          method: "POST",
          headers: { ...forwardMcpHeaders(headers), "content-type": "application/json" },
          body
        }
      ).catch((e: unknown) => {
        throw new TransportError(`MCP server unreachable: ${errorMessage(e)}`, 502);
      });

      const text = await upstream.text();
      res.writeHead(upstream.status, downstreamHeaders(upstream.headers));
      res.end(text);
    } catch (e) {
      sendGatewayError(res, e);
    }
  }
}

function lowerKeys(h: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(h)) out[k.toLowerCase()] = v;
  return out;
}
