import { vi } from "vitest";

import { DEFAULT_GATEWAY_CONFIG, type GatewayConfig } from "@tracegate/config";

import { GuardrailsEngine } from "../guardrails/engine.js";
import { GuardrailsServiceClient } from "../guardrails/serviceClient.js";
import { allow, type PolicyResult } from "../guardrails/types.js";
import type { DownstreamSink } from "../proxy/sink.js";
import { SessionRegistry } from "../sessions.js";
import type { AppendMessagesArgs, ProjectPolicy, PushTraceArgs, TraceStore } from "../trace/types.js";

/** In-memory downstream. `disconnect()` simulates the client going away. */
export class FakeSink implements DownstreamSink {
  status?: number;
  headers: Record<string, string> = {};
  chunks: Buffer[] = [];
  ended = false;
  /** Called after each accepted write with the number of writes so far. */
  onWrite?: (count: number) => void;
  private gone = false;
  private cbs: Array<() => void> = [];

  get started(): boolean {
    return this.status !== undefined;
  }

  get writable(): boolean {
    return !this.ended && !this.gone;
  }

  start(status: number, headers: Record<string, string>) {
    if (this.started) return;
    this.status = status;
    this.headers = headers;
  }

  async write(chunk: Buffer | string): Promise<void> {
    if (!this.writable) return;
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
    this.onWrite?.(this.chunks.length);
  }

  end() {
    this.ended = true;
  }

  onDisconnect(cb: () => void) {
    this.cbs.push(cb);
  }

  disconnect() {
    this.gone = true;
    for (const cb of this.cbs.splice(0)) cb();
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }
}

/** Trace store that records calls; each method is a vi.fn. */
export function memoryStore(policies: ProjectPolicy[] = []) {
  const pushes: PushTraceArgs[] = [];
  const appends: AppendMessagesArgs[] = [];
  let next = 0;
  const store = {
    pushes,
    appends,
    pushTrace: vi.fn(async (args: PushTraceArgs) => {
      pushes.push({ ...args, messages: [...args.messages], annotations: [...args.annotations] });
      next += 1;
      return { traceId: `trace-${next}` };
    }),
    appendMessages: vi.fn(async (args: AppendMessagesArgs) => {
      appends.push({ ...args, messages: [...args.messages], annotations: [...args.annotations] });
    }),
    fetchProjectPolicies: vi.fn(async (_project: string, _token: string) => policies)
  } satisfies TraceStore & { pushes: PushTraceArgs[]; appends: AppendMessagesArgs[] };
  return store;
}

export function testConfig(patch: Partial<GatewayConfig["upstream"]> = {}): GatewayConfig {
  return {
    ...DEFAULT_GATEWAY_CONFIG,
    providers: {
      openai: { base_url: "https://openai.test/v1" },
      anthropic: { base_url: "https://anthropic.test" },
      gemini: { base_url: "https://gemini.test" }
    },
    upstream: { ...DEFAULT_GATEWAY_CONFIG.upstream, ...patch },
    trace_store: { base_url: "http://store.test" }
  };
}

/** Engine whose check() is replaced by the given decisions, in order (last one repeats). */
export function scriptedGuardrails(store: TraceStore, results: PolicyResult[] = []) {
  const engine = new GuardrailsEngine({ store, service: new GuardrailsServiceClient("http://guard.test", vi.fn()) });
  let i = 0;
  const check = vi.spyOn(engine, "check").mockImplementation(async () => {
    const r = results[Math.min(i, results.length - 1)] ?? allow();
    i += 1;
    return r;
  });
  return { engine, check };
}

export function makeDeps(opts: { store?: TraceStore; guardrails?: GuardrailsEngine; fetchImpl: typeof fetch; config?: GatewayConfig }) {
  const store = opts.store ?? memoryStore();
  return {
    config: opts.config ?? testConfig(),
    registry: new SessionRegistry(),
    store,
    guardrails: opts.guardrails ?? scriptedGuardrails(store).engine,
    fetchImpl: opts.fetchImpl
  };
}

export function streamOf(parts: string[], opts: { onCancel?: () => void; keepOpen?: boolean } = {}): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const p of parts) controller.enqueue(encoder.encode(p));
      if (!opts.keepOpen) controller.close();
    },
    cancel() {
      opts.onCancel?.();
    }
  });
}

export function sseResponse(body: ReadableStream<Uint8Array> | string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/event-stream" } });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json", ...headers } });
}
