import { describe, expect, it, vi } from "vitest";

import type { PolicyViolation } from "../../errors.js";
import { memoryStore, scriptedGuardrails } from "../../__tests__/fakes.js";
import { McpBridge, blockedMessage } from "../bridge.js";
import { BLOCKED_ERROR_CODE } from "../jsonrpc.js";

const call = (id: number, name: string, args: Record<string, unknown> = {}) => ({
  jsonrpc: "2.0",
  id,
  method: "tools/call",
  params: { name, arguments: args }
});

function bridgeWith(results: Parameters<typeof scriptedGuardrails>[1] = [], pushExplorer = true) {
  const store = memoryStore();
  const { engine, check } = scriptedGuardrails(store, results);
  const bridge = new McpBridge({
    store,
    guardrails: engine,
    projectName: "demo",
    pushExplorer,
    token: "test-token",
    transport: "stdio",
    label: "test"
  });
  return { store, check, bridge };
}

describe("McpBridge", () => {
  it("refuses a blocked tool call with a JSON-RPC error and annotates the call", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const violations: PolicyViolation[] = [{ ruleId: "no-delete", message: "destructive tool" }];
    const { store, bridge } = bridgeWith([{ decision: "block", violations }]);

    const verdict = await bridge.handleClient(call(7, "delete_all", { force: true }));
    await bridge.close();

    expect(verdict).toEqual({
      forward: null,
      replies: [
        {
          jsonrpc: "2.0",
          id: 7,
          error: {
            code: BLOCKED_ERROR_CODE,
            message: "[tracegate] Request blocked by guardrails: destructive tool",
            data: { violations }
          }
        }
      ]
    });
    expect(bridge.assembler.entries).toEqual([
      {
        role: "assistant",
        content: [{ type: "tool_call", call: { id: "call_7", name: "delete_all", arguments: '{"force":true}' } }],
        index: 0
      }
    ]);
    const annotations = [...store.pushes.flatMap((p) => p.annotations), ...store.appends.flatMap((a) => a.annotations)];
    expect(annotations.map((a) => a.address)).toEqual(["messages.0"]);
  });

  it("traces an allowed call and its result as a tool message", async () => {
    const { store, check, bridge } = bridgeWith();
    const req = call(3, "get_weather", { city: "Oslo" });

    const verdict = await bridge.handleClient(req);
    expect(verdict).toEqual({ forward: req, replies: [] });

    bridge.handleServer({ jsonrpc: "2.0", id: 3, result: { content: [{ type: "text", text: "sunny" }] } });
    await bridge.close();

    expect(bridge.assembler.entries[1]).toEqual({
      role: "tool",
      content: [{ type: "tool_result", callId: "call_3", payload: { content: [{ type: "text", text: "sunny" }] } }],
      index: 1
    });
    // Pre-check on the call, post-check on the result.
    expect(check).toHaveBeenCalledTimes(2);
    expect(check.mock.calls[1][0]).toHaveLength(2);
    expect(store.pushes[0]).toMatchObject({ dataset: "demo", metadata: { source: "mcp", transport: "stdio" } });
  });

  it("refuses later calls once a tool result is blocked", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const violations: PolicyViolation[] = [{ ruleId: "leak", message: "secret in output" }];
    const { check, bridge } = bridgeWith([
      { decision: "allow", violations: [] },
      { decision: "block", violations }
    ]);

    await bridge.handleClient(call(1, "read_file"));
    bridge.handleServer({ jsonrpc: "2.0", id: 1, result: { content: [] } });
    await bridge.settle();
    expect(bridge.blocked).toBe(true);

    const verdict = await bridge.handleClient(call(2, "read_file"));
    expect(verdict.forward).toBeNull();
    expect(verdict.replies[0].error?.message).toBe(blockedMessage(violations));
    expect(check).toHaveBeenCalledTimes(2);
  });

  it("forwards the unblocked rest of a batch", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { check, bridge } = bridgeWith();
    check.mockImplementation(async (prefix) => {
      const last = prefix[prefix.length - 1]?.content[0];
      return last?.type === "tool_call" && last.call.name === "rm"
        ? { decision: "block", violations: [{ ruleId: "r", message: "no" }] }
        : { decision: "allow", violations: [] };
    });
    const note = { jsonrpc: "2.0", method: "notifications/initialized" };
    const list = { jsonrpc: "2.0", id: 5, method: "tools/list" };

    const verdict = await bridge.handleClient([note, call(4, "rm"), list]);

    expect(verdict.forward).toEqual([note, list]);
    expect(verdict.replies.map((r) => r.id)).toEqual([4]);
  });

  it("records server info and the tool list as trace metadata", async () => {
    const { store, bridge } = bridgeWith();

    await bridge.handleClient({ jsonrpc: "2.0", id: 1, method: "initialize", params: { clientInfo: { name: "test-client" } } });
    bridge.handleServer({ jsonrpc: "2.0", id: 1, result: { serverInfo: { name: "test-server" } } });
    await bridge.handleClient({ jsonrpc: "2.0", id: 2, method: "tools/list" });
    bridge.handleServer({ jsonrpc: "2.0", id: 2, result: { tools: [{ name: "echo" }] } });
    await bridge.handleClient(call(3, "echo"));
    await bridge.close();

    expect(store.pushes[0].metadata).toEqual({
      source: "mcp",
      transport: "stdio",
      is_stateless: false,
      mcp_client: "test-client",
      mcp_server: "test-server"
    });
  });

  it("traces tools/list as a checked tool call and result", async () => {
    const { check, bridge } = bridgeWith();
    const list = { jsonrpc: "2.0", id: 2, method: "tools/list" };

    expect(await bridge.handleClient(list)).toEqual({ forward: list, replies: [] });
    bridge.handleServer({ jsonrpc: "2.0", id: 2, result: { tools: [{ name: "echo" }] } });
    await bridge.close();

    expect(bridge.assembler.entries).toEqual([
      {
        role: "assistant",
        content: [{ type: "tool_call", call: { id: "call_2", name: "tools/list", arguments: "{}" } }],
        index: 0
      },
      {
        role: "tool",
        content: [
          { type: "tool_result", callId: "call_2", payload: { content: '[{"name":"echo"}]', tools: [{ name: "echo" }] } }
        ],
        index: 1
      }
    ]);
    expect(check).toHaveBeenCalledTimes(2);
    expect(check.mock.calls[1][0]).toHaveLength(2);
  });

  it("refuses a blocked tools/list", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const violations: PolicyViolation[] = [{ ruleId: "no-list", message: "listing disabled" }];
    const { store, bridge } = bridgeWith([{ decision: "block", violations }]);

    const verdict = await bridge.handleClient({ jsonrpc: "2.0", id: 4, method: "tools/list" });
    await bridge.close();

    expect(verdict).toEqual({
      forward: null,
      replies: [
        {
          jsonrpc: "2.0",
          id: 4,
          error: {
            code: BLOCKED_ERROR_CODE,
            message: "[tracegate] Request blocked by guardrails: listing disabled",
            data: { violations }
          }
        }
      ]
    });
    const annotations = [...store.pushes.flatMap((p) => p.annotations), ...store.appends.flatMap((a) => a.annotations)];
    expect(annotations.map((a) => a.address)).toEqual(["messages.0"]);
  });

  it("checks guardrails without pushing when explorer push is off", async () => {
    const { store, check, bridge } = bridgeWith([], false);
    await bridge.handleClient(call(1, "echo"));
    await bridge.close();
    expect(check).toHaveBeenCalledTimes(1);
    expect(store.pushTrace).not.toHaveBeenCalled();
  });
});
