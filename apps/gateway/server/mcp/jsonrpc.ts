export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcNotification = {
  jsonrpc: "2.0";
  method: string;
  params?: unknown;
};

export type JsonRpcError = { code: number; message: string; data?: unknown };

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError;
};

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

/** Error code used when the gateway refuses to relay a request. */
export const BLOCKED_ERROR_CODE = -32600;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isId(v: unknown): v is JsonRpcId {
  return typeof v === "string" || typeof v === "number";
}

export function isRequest(v: unknown): v is JsonRpcRequest {
  return isRecord(v) && typeof v.method === "string" && isId(v.id);
}

export function isNotification(v: unknown): v is JsonRpcNotification {
  return isRecord(v) && typeof v.method === "string" && v.id === undefined;
}

export function isResponse(v: unknown): v is JsonRpcResponse {
  return isRecord(v) && v.method === undefined && (isId(v.id) || v.id === null) && ("result" in v || "error" in v);
}

/** A single message or a batch, as it appears on the wire. */
export function messagesOf(payload: unknown): unknown[] {
  return Array.isArray(payload) ? payload : [payload];
}

export function errorResponse(id: JsonRpcId | null, error: JsonRpcError): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error };
}

export function parseJsonRpcLine(line: string): unknown {
  try {
    const v: unknown = JSON.parse(line);
    return v;
  } catch {
    return undefined;
  }
}
