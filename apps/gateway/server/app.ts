import http from "node:http";

import { guardrailsApiUrl, preflightListen, type GatewayConfig, type LoadedGatewayConfig } from "@tracegate/config";

import { GuardrailsEngine } from "./guardrails/engine.js";
import { GuardrailsServiceClient } from "./guardrails/serviceClient.js";
import { json, sendGatewayError } from "./httpUtils.js";
import { McpSseTransport, MCP_SSE_MESSAGES_PATH, MCP_SSE_PATH } from "./mcp/sseTransport.js";
import { McpStreamableTransport, MCP_STREAMABLE_PATH } from "./mcp/streamableTransport.js";
import type { ProxyDeps } from "./proxy/orchestrator.js";
import { GATEWAY_PREFIX, handleProviderRoute } from "./routes/gateway.js";
import { SessionRegistry } from "./sessions.js";
import { HttpTraceStore } from "./trace/storeClient.js";
import type { TraceStore } from "./trace/types.js";

export type GatewayDeps = ProxyDeps;

export type GatewayServer = {
  server: http.Server;
  deps: GatewayDeps;
  /** Stop accepting connections and flush every open session's trace. */
  close(): Promise<void>;
};

/**
 * Wire the trace store, guardrails and session registry from config.
 * Tests pass `fetchImpl` (and optionally a `store`) to stay in process.
 */
export function buildGatewayDeps(
  config: GatewayConfig,
  opts: { rootDir?: string; fetchImpl?: typeof fetch; store?: TraceStore } = {}
): GatewayDeps {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const store = opts.store ?? new HttpTraceStore(config.trace_store.base_url, fetchImpl);
  const guardrails = new GuardrailsEngine({
    store,
    service: new GuardrailsServiceClient(guardrailsApiUrl(config), fetchImpl),
    filePath: config.guardrails.file_path,
    rootDir: opts.rootDir,
    failClosed: config.guardrails.fail_closed
  });
  return { config, registry: new SessionRegistry(), store, guardrails, fetchImpl };
}

export function createGatewayServer(deps: GatewayDeps): GatewayServer {
  const sse = new McpSseTransport(deps);
  const streamable = new McpStreamableTransport(deps);
  const dev = deps.config.server.dev;

  const server = http.createServer(async (req, res) => {
    const u = new URL(req.url ?? "/", "http://localhost");
    const pathname = u.pathname;
    const started = Date.now();
    if (dev || pathname !== "/api/health") {
      res.on("finish", () =>
        console.log(`[gateway] ${req.method} ${pathname} -> ${res.statusCode} (${Date.now() - started}ms)`)
      );
    }

    try {
      if (pathname === "/api/health" && req.method === "GET") {
        return json(res, 200, { ok: true, sessions: deps.registry.size });
      }

      if (pathname === MCP_SSE_PATH && req.method === "GET") return await sse.handleStream(req, res);
      if (pathname === MCP_SSE_MESSAGES_PATH && req.method === "POST") return await sse.handleMessage(req, res, u);
      if (pathname === MCP_STREAMABLE_PATH) return await streamable.handle(req, res);

      if (pathname.startsWith(GATEWAY_PREFIX)) return await handleProviderRoute(req, res, deps, u);

      json(res, 404, { ok: false, error: { code: "not_found", message: `No route for ${pathname}` } });
    } catch (e) {
      sendGatewayError(res, e);
    }
  });

  return {
    server,
    deps,
    async close() {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
      await deps.registry.closeAll();
    }
  };
}

export async function listen(gw: GatewayServer, host: string, port: number): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    gw.server.once("error", reject);
    gw.server.listen(port, host, () => {
      gw.server.off("error", reject);
      resolve();
    });
  });
  const addr = gw.server.address();
  return typeof addr === "object" && addr ? addr.port : port;
}

/** Preflight the port, wire dependencies and start listening. */
export async function startGateway(loaded: LoadedGatewayConfig): Promise<GatewayServer> {
  const { config, rootDir } = loaded;
  const { host, port } = config.server;

  const pre = await preflightListen(host, port);
  if (!pre.ok) throw new Error(pre.hint ?? pre.error);

  const gw = createGatewayServer(buildGatewayDeps(config, { rootDir }));
  const bound = await listen(gw, host, port);

  console.log(`[gateway] listening on http://${host}:${bound}`);
  console.log(`[gateway] trace store: ${config.trace_store.base_url}`);
  console.log(`[gateway] guardrails: ${guardrailsApiUrl(config)}${config.guardrails.file_path ? ` (file: ${config.guardrails.file_path})` : ""}`);
  return gw;
}
