import type { MessageDraft } from "../canonical/types.js";
import type { PolicyViolation } from "../errors.js";
import type { GuardrailScope, GuardrailsEngine } from "../guardrails/engine.js";
import { TraceAssembler } from "../trace/assembler.js";
import type { TraceStore } from "../trace/types.js";
import {
  BLOCKED_ERROR_CODE,
  errorResponse,
  isRecord,
  isRequest,
  isResponse,
  messagesOf,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse
} from "./jsonrpc.js";

export type McpTransportKind = "sse" | "streamable" | "stdio";

export type McpBridgeOptions = {
  store: TraceStore;
  guardrails: GuardrailsEngine;
  /** Project whose policies apply and where the trace goes. */
  projectName?: string;
  /** Push the trace to the store. Guardrails apply either way. */
  pushExplorer: boolean;
  token?: string;
  transport: McpTransportKind;
  stateless?: boolean;
  label: string;
};

/**
 * What to do with a client message: `forward` is the payload to relay
 * upstream (null when nothing is left), `replies` are answered by the
 * gateway itself.
 */
export type ClientVerdict = {
  forward: unknown;
  replies: JsonRpcResponse[];
};

export function toolCallId(id: JsonRpcId): string {
  return `call_${id}`;
}

/** A tools/list result as a tool message payload. */
function toolsPayload(msg: JsonRpcResponse): { content: string; tools: unknown[] } {
  const result = isRecord(msg.result) ? msg.result : {};
  const tools = Array.isArray(result.tools) ? result.tools : [];
  return { content: JSON.stringify(tools), tools };
}

export function blockedMessage(violations: readonly PolicyViolation[]): string {
  const reasons = violations.map((v) => v.message).join("; ");
  return `[tracegate] Request blocked by guardrails${reasons ? `: ${reasons}` : ""}`;
}

/**
 * Transport-agnostic MCP core. Maps `tools/call` and `tools/list` requests
 * to assistant tool_call messages and their responses to tool messages, so
 * MCP traffic lands in the same trace model as LLM traffic.
 *
 * A tool call is pre-checked before it is relayed. Tool results are
 * post-checked concurrently; a block there refuses every later relay.
 */
export class McpBridge {
  readonly assembler: TraceAssembler;
  private guardrails: GuardrailsEngine;
  private scope: GuardrailScope;
  private label: string;
  private pendingCalls = new Map<string, JsonRpcId>();
  private pendingMethods = new Map<string, string>();
  private postChecks = new Set<Promise<void>>();
  private blockedBy: PolicyViolation[] | null = null;

  constructor(opts: McpBridgeOptions) {
    this.guardrails = opts.guardrails;
    this.scope = { projectName: opts.projectName, token: opts.token };
    this.label = opts.label;
    this.assembler = new TraceAssembler({
      store: opts.store,
      projectRef: opts.pushExplorer ? opts.projectName : undefined,
      token: opts.token,
      label: opts.label,
      metadata: { source: "mcp", transport: opts.transport, is_stateless: opts.stateless ?? false }
    });
  }

  get blocked(): boolean {
    return this.blockedBy !== null;
  }

  async handleClient(payload: unknown): Promise<ClientVerdict> {
    const kept: unknown[] = [];
    const replies: JsonRpcResponse[] = [];

    for (const msg of messagesOf(payload)) {
      if (!isRequest(msg)) {
        kept.push(msg);
        continue;
      }
      const key = String(msg.id);

      if (msg.method === "initialize") {
        const params = isRecord(msg.params) ? msg.params : {};
        const info = isRecord(params.clientInfo) ? params.clientInfo : {};
        if (typeof info.name === "string") this.assembler.setMetadata({ mcp_client: info.name });
        this.pendingMethods.set(key, msg.method);
      } else if (msg.method === "tools/list") {
        const refusal = await this.checkToolCall(msg, msg.method, {});
        if (refusal) {
          replies.push(refusal);
          continue;
        }
        this.pendingMethods.set(key, msg.method);
        this.pendingCalls.set(key, msg.id);
      } else if (msg.method === "tools/call") {
        const params = isRecord(msg.params) ? msg.params : {};
        const name = typeof params.name === "string" ? params.name : "";
        const refusal = await this.checkToolCall(msg, name, params.arguments ?? {});
        if (refusal) {
          replies.push(refusal);
          continue;
        }
        this.pendingCalls.set(key, msg.id);
      }
      kept.push(msg);
    }

    const forward = Array.isArray(payload) ? (kept.length ? kept : null) : (kept[0] ?? null);
    return { forward, replies };
  }

  /** Trace `req` as a tool call and pre-check it. Returns the refusal on block. */
  private async checkToolCall(req: JsonRpcRequest, name: string, args: unknown): Promise<JsonRpcResponse | null> {
    if (this.blockedBy) {
      return errorResponse(req.id, {
        code: BLOCKED_ERROR_CODE,
        message: blockedMessage(this.blockedBy),
        data: { violations: this.blockedBy }
      });
    }

    const draft: MessageDraft = {
      role: "assistant",
      content: [{ type: "tool_call", call: { id: toolCallId(req.id), name, arguments: JSON.stringify(args) } }]
    };
    const [entry] = this.assembler.append([draft]);

    const pre = await this.guardrails.check(this.assembler.entries, this.scope);
    if (pre.logged?.length) this.assembler.annotate(pre.logged, "log", entry.index);
    if (pre.decision !== "block") return null;

    this.assembler.annotate(pre.violations, "block", entry.index);
    console.warn(`[mcp] ${this.label}: blocked ${req.method} ${String(req.id)}`);
    return errorResponse(req.id, {
      code: BLOCKED_ERROR_CODE,
      message: blockedMessage(pre.violations),
      data: { violations: pre.violations }
    });
  }

  /** Record server messages. Never changes what is relayed. */
  handleServer(payload: unknown) {
    for (const msg of messagesOf(payload)) {
      if (!isResponse(msg) || msg.id === null) continue;
      const key = String(msg.id);

      const method = this.pendingMethods.get(key);
      if (method) {
        this.pendingMethods.delete(key);
        this.recordMethodResult(method, msg);
      }

      const callId = this.pendingCalls.get(key);
      if (callId === undefined) continue;
      this.pendingCalls.delete(key);

      const result = msg.error ? { error: msg.error } : method === "tools/list" ? toolsPayload(msg) : (msg.result ?? null);
      const [entry] = this.assembler.append([
        { role: "tool", content: [{ type: "tool_result", callId: toolCallId(callId), payload: result }] }
      ]);
      this.startPostCheck(entry.index);
    }
  }

  private recordMethodResult(method: string, msg: JsonRpcResponse) {
    const result = isRecord(msg.result) ? msg.result : {};
    if (method === "initialize") {
      const info = isRecord(result.serverInfo) ? result.serverInfo : {};
      if (typeof info.name === "string") this.assembler.setMetadata({ mcp_server: info.name });
    } else if (method === "tools/list" && Array.isArray(result.tools)) {
      this.assembler.setMetadata({ tools: result.tools });
    }
  }

  private startPostCheck(index: number) {
    const prefix = [...this.assembler.entries];
    const p = this.guardrails
      .check(prefix, this.scope)
      .then((post) => {
        if (post.logged?.length) this.assembler.annotate(post.logged, "log", index);
        if (post.decision !== "block") return;
        this.blockedBy = post.violations;
        this.assembler.annotate(post.violations, "block", index);
        console.warn(`[mcp] ${this.label}: tool result blocked, refusing further tool calls`);
      })
      .catch((e: unknown) => {
        console.warn(`[mcp] ${this.label}: post-check failed: ${e instanceof Error ? e.message : String(e)}`);
      });
    this.postChecks.add(p);
    void p.finally(() => this.postChecks.delete(p));
  }

  /** Resolves when every post-check started so far has settled. */
  async settle(): Promise<void> {
    await Promise.all([...this.postChecks]);
  }

  async close(): Promise<void> {
    await this.settle();
    await this.assembler.close();
  }
}
