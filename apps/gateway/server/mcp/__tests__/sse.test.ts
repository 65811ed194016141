import { afterEach, describe, expect, it, vi } from "vitest";

import { createGatewayServer, listen, type GatewayServer } from "../../app.js";
import { makeDeps, memoryStore, scriptedGuardrails } from "../../__tests__/fakes.js";
import { sseEvent } from "../../sse.js";
import { MCP_SSE_MESSAGES_PATH, MCP_SSE_PATH } from "../sseTransport.js";

const MCP_HEADERS = {
  "mcp-server-base-url": "http://mcp.test",
  "x-project-name": "demo",
  "invariant-authorization": "Bearer test-token"
};

let gw: GatewayServer | undefined;

afterEach(async () => {
  await gw?.close();
  gw = undefined;
});

/** Upstream event stream that stays open until the request is aborted. */
function upstreamSse(first: string, signal: AbortSignal | null | undefined): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(first));
      signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
    }
  });
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

async function readUntil(reader: ReadableStreamDefaultReader<Uint8Array>, seen: { text: string }, needle: string) {
  const decoder = new TextDecoder();
  while (!seen.text.includes(needle)) {
    const r = await reader.read();
    if (r.done) break;
    seen.text += decoder.decode(r.value, { stream: true });
  }
}

describe("SSE MCP transport", () => {
  it("rewrites the endpoint and answers blocked calls on the event stream", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = memoryStore();
    const violations = [{ ruleId: "r", message: "nope" }];
    const { engine } = scriptedGuardrails(store, [{ decision: "block", violations }]);
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) =>
      upstreamSse("event: endpoint\ndata: /messages/?session_id=abc\n\n", init?.signal)
    );
    const deps = makeDeps({ store, guardrails: engine, fetchImpl });
    gw = createGatewayServer(deps);
    const base = `http://127.0.0.1:${await listen(gw, "127.0.0.1", 0)}`;

    const client = new AbortController();
    const stream = await fetch(`${base}${MCP_SSE_PATH}`, { headers: MCP_HEADERS, signal: client.signal });
    expect(stream.status).toBe(200);
    expect(fetchImpl.mock.calls[0][0]).toBe("http://mcp.test/sse");

    const body = stream.body;
    if (!body) throw new Error("no body");
    const reader = body.getReader();
    const seen = { text: "" };
    await readUntil(reader, seen, "session_id=abc\n\n");
    expect(seen.text).toBe(sseEvent("endpoint", `${MCP_SSE_MESSAGES_PATH}?session_id=abc`));
    expect(deps.registry.has("abc")).toBe(true);

    const post = await fetch(`${base}${MCP_SSE_MESSAGES_PATH}?session_id=abc`, {
      method: "POST",
      headers: { ...MCP_HEADERS, "content-type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 9, method: "tools/call", params: { name: "rm" } })
    });
    expect(post.status).toBe(202);
    expect(await post.text()).toBe("Accepted");
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const refusal = {
      jsonrpc: "2.0",
      id: 9,
      error: { code: -32600, message: "[tracegate] Request blocked by guardrails: nope", data: { violations } }
    };
    await readUntil(reader, seen, '"id":9');
    expect(seen.text.endsWith(sseEvent("message", JSON.stringify(refusal)))).toBe(true);

    const unknown = await fetch(`${base}${MCP_SSE_MESSAGES_PATH}?session_id=other`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{}"
    });
    expect(unknown.status).toBe(404);
    await unknown.text();

    client.abort();
    await vi.waitFor(() => expect(deps.registry.size).toBe(0));
  });
});
