import type { GatewayConfig } from "@tracegate/config";

import { GATEWAY_API_KEY_HEADER, GATEWAY_AUTHORIZATION_HEADER, gatewayTokenFromHeaders } from "../credentials.js";
import { TransportError } from "../errors.js";
import type { GuardrailsEngine } from "../guardrails/engine.js";
import { forwardHeaders } from "../providers/shared.js";
import type { SessionRegistry } from "../sessions.js";
import type { TraceStore } from "../trace/types.js";
import { McpBridge, type McpTransportKind } from "./bridge.js";

export const MCP_SERVER_BASE_URL_HEADER = "mcp-server-base-url";
export const MCP_SESSION_ID_HEADER = "mcp-session-id";
export const PROJECT_NAME_HEADER = "x-project-name";
export const PUSH_EXPLORER_HEADER = "x-push-explorer";

const GATEWAY_ONLY_HEADERS = [
  MCP_SERVER_BASE_URL_HEADER,
  PROJECT_NAME_HEADER,
  PUSH_EXPLORER_HEADER,
  GATEWAY_AUTHORIZATION_HEADER,
  GATEWAY_API_KEY_HEADER
] as const;

export type McpDeps = {
  config: GatewayConfig;
  registry: SessionRegistry;
  store: TraceStore;
  guardrails: GuardrailsEngine;
  fetchImpl?: typeof fetch;
};

export type McpRequestInfo = {
  baseUrl: string;
  projectName?: string;
  pushExplorer: boolean;
  token?: string;
};

function truthy(v: string | undefined): boolean {
  if (!v) return false;
  const s = v.trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

/** Which MCP server to reach and how to trace, from the gateway's own headers. */
export function mcpRequestInfo(headers: Record<string, string>): McpRequestInfo {
  const raw = headers[MCP_SERVER_BASE_URL_HEADER]?.trim();
  if (!raw) throw new TransportError(`Missing ${MCP_SERVER_BASE_URL_HEADER} header`, 400);

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new TransportError(`Invalid ${MCP_SERVER_BASE_URL_HEADER} header`, 400);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new TransportError(`Unsupported ${MCP_SERVER_BASE_URL_HEADER} scheme: ${parsed.protocol}`, 400);
  }

  const projectName = headers[PROJECT_NAME_HEADER]?.trim() || undefined;
  return {
    baseUrl: raw.replace(/\/+$/, ""),
    projectName,
    pushExplorer: truthy(headers[PUSH_EXPLORER_HEADER]),
    token: gatewayTokenFromHeaders(headers)
  };
}

/** Client headers safe to relay to the MCP server. */
export function forwardMcpHeaders(headers: Record<string, string>): Record<string, string> {
  return forwardHeaders(headers, GATEWAY_ONLY_HEADERS);
}

export function createBridge(
  deps: McpDeps,
  info: McpRequestInfo,
  transport: McpTransportKind,
  label: string,
  stateless = false
): McpBridge {
  return new McpBridge({
    store: deps.store,
    guardrails: deps.guardrails,
    projectName: info.projectName,
    pushExplorer: info.pushExplorer,
    token: info.token,
    transport,
    stateless,
    label
  });
}
