import type { GatewayConfig } from "@tracegate/config";

import { MessageAccumulator } from "../canonical/accumulator.js";
import type { CanonicalMessage, MessageDraft } from "../canonical/types.js";
import type { Credential } from "../credentials.js";
import {
  GatewayError,
  GuardrailViolation,
  TransportError,
  UpstreamProviderError,
  UpstreamTimeoutError,
  errorMessage,
  type PolicyViolation
} from "../errors.js";
import { decoderForContentType, type FramedUnit, type UnitDecoder } from "../framing.js";
import type { GuardrailScope, GuardrailsEngine } from "../guardrails/engine.js";
import { parseJsonBody } from "../httpUtils.js";
import type { InboundRequest, ProviderAdapter, StreamParser } from "../providers/types.js";
import type { SessionRegistry } from "../sessions.js";
import { isEventStream, sseEvent } from "../sse.js";
import { TraceAssembler } from "../trace/assembler.js";
import type { TraceStore } from "../trace/types.js";
import type { DownstreamSink } from "./sink.js";

export type ProxyDeps = {
  config: GatewayConfig;
  registry: SessionRegistry;
  guardrails: GuardrailsEngine;
  store: TraceStore;
  fetchImpl?: typeof fetch;
};

export type ProxyRequest = {
  adapter: ProviderAdapter;
  inbound: InboundRequest;
  /** Dataset for the trace. Without it the exchange is proxied but not pushed. */
  projectName?: string;
  baseUrl: string;
};

/** Upstream response headers that must not be copied to the client. */
const DROPPED_RESPONSE_HEADERS = new Set([
  "connection",
  "content-encoding",
  "content-length",
  "keep-alive",
  "transfer-encoding"
]);

export function downstreamHeaders(upstream: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  upstream.forEach((value, key) => {
    if (!DROPPED_RESPONSE_HEADERS.has(key.toLowerCase())) out[key.toLowerCase()] = value;
  });
  return out;
}

/** Answer an error on a sink that has not started; a started one just ends. */
export async function respondError(sink: DownstreamSink, err: unknown): Promise<void> {
  if (sink.started) {
    sink.end();
    return;
  }
  if (err instanceof UpstreamProviderError) {
    sink.start(err.status, { "content-type": err.contentType ?? "application/json; charset=utf-8" });
    await sink.write(err.body);
    sink.end();
    return;
  }
  const gatewayErr = err instanceof GatewayError ? err : null;
  if (!gatewayErr) console.error("[gateway] unexpected error:", err);
  const status = gatewayErr ? gatewayErr.status : 500;
  const payload = gatewayErr
    ? gatewayErr.toPayload()
    : { ok: false, error: { code: "internal_error", message: errorMessage(err) } };
  sink.start(status, { "content-type": "application/json; charset=utf-8" });
  await sink.write(JSON.stringify(payload, null, 2));
  sink.end();
}

const READ_TIMEOUT = Symbol("read-timeout");

async function readWithTimeout<T>(read: () => Promise<T>, ms: number): Promise<T | typeof READ_TIMEOUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof READ_TIMEOUT>((resolve) => {
    timer = setTimeout(() => resolve(READ_TIMEOUT), ms);
  });
  try {
    return await Promise.race([read(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Per-response parsing state. Feeds framed units to the adapter and hands
 * each completed message to `onMessage`. A unit that cannot be parsed, or a
 * message that cannot be completed, is kept in `error` and ends the session.
 */
class ResponseTracer {
  private adapter: ProviderAdapter;
  private decoderMode: UnitDecoder["mode"];
  private parser: StreamParser;
  private acc = new MessageAccumulator();
  private completed = false;
  private onMessage: (m: MessageDraft) => void;

  error: TransportError | null = null;

  constructor(adapter: ProviderAdapter, decoder: UnitDecoder, onMessage: (m: MessageDraft) => void) {
    this.adapter = adapter;
    this.decoderMode = decoder.mode;
    this.parser = adapter.createStreamParser();
    this.onMessage = onMessage;
  }

  feed(unit: FramedUnit) {
    if (this.error || this.completed || unit.data === null) return;
    try {
      if (this.decoderMode === "body") {
        this.acc.apply(this.adapter.parseResponseBody(JSON.parse(unit.data)));
        this.complete();
        return;
      }
      this.acc.apply(this.parser.parseStreamChunk(unit));
      if (this.parser.isMessageComplete()) this.complete();
    } catch (e) {
      this.fail(e);
    }
  }

  /** A stream that ends without a completion signal is finalized here. */
  end() {
    if (this.error || this.completed || this.acc.isEmpty) return;
    try {
      this.complete();
    } catch (e) {
      this.fail(e);
    }
  }

  private fail(e: unknown) {
    this.error =
      e instanceof TransportError
        ? e
        : new TransportError(`Unparseable ${this.adapter.id} response: ${errorMessage(e)}`, 502);
  }

  private complete() {
    this.completed = true;
    this.onMessage(this.acc.finish());
  }
}

/**
 * Drive one LLM exchange: credential, pre-check, upstream call, then
 * forward every upstream unit before parsing it. Completed messages are
 * appended to the trace and post-checked concurrently; pending post-checks
 * are awaited before the response ends.
 */
export async function runProxySession(deps: ProxyDeps, req: ProxyRequest, sink: DownstreamSink): Promise<void> {
  const { adapter, inbound } = req;
  const fetchImpl = deps.fetchImpl ?? fetch;
  const { connect_timeout_ms: connectTimeoutMs, read_timeout_ms: readTimeoutMs } = deps.config.upstream;

  let credential: Credential;
  try {
    credential = adapter.credentialFrom(inbound);
  } catch (e) {
    await respondError(sink, e);
    return;
  }

  const session = deps.registry.create("llm");
  const label = `${adapter.id}:${session.id.slice(0, 8)}`;
  const scope: GuardrailScope = { projectName: req.projectName, token: credential.gatewayToken };
  const tracing = Boolean(credential.gatewayToken);
  const assembler = new TraceAssembler({
    store: deps.store,
    projectRef: req.projectName,
    token: credential.gatewayToken,
    label
  });
  deps.registry.onClose(session.id, () => assembler.close());

  const controller = new AbortController();
  // Written from callbacks (client close, post-checks), read by the loop.
  const live: { disconnected: boolean; blocked: PolicyViolation[] | null } = { disconnected: false, blocked: null };
  sink.onDisconnect(() => {
    live.disconnected = true;
    controller.abort();
  });

  try {
    const body = parseJsonBody(inbound.body);
    const streaming = adapter.isStreaming(inbound, body);

    if (tracing) {
      const requestEntries = assembler.append(adapter.requestMessages(body));
      const pre = await deps.guardrails.check(assembler.entries, scope);
      if (pre.logged?.length) assembler.annotate(pre.logged, "log");
      if (pre.decision === "block") {
        assembler.annotate(pre.violations, "block", requestEntries.at(-1)?.index);
        throw new GuardrailViolation(pre.violations, "pre");
      }
    }

    deps.registry.open(session.id);
    const upstreamReq = adapter.buildUpstreamRequest(inbound, credential, req.baseUrl);
    if (deps.config.server.dev) console.log(`[gateway] ${label} -> ${upstreamReq.method} ${upstreamReq.url}`);

    let connectTimedOut = false;
    const connectTimer = setTimeout(() => {
      connectTimedOut = true;
      controller.abort();
    }, connectTimeoutMs);

    let upstream: Response;
    try {
      upstream = await fetchImpl(upstreamReq.url, {
        method: upstreamReq.method,
        headers: upstreamReq.headers,
        body: upstreamReq.body,
        signal: controller.signal
      });
    } catch (e) {
      if (connectTimedOut) throw new UpstreamTimeoutError("connect", connectTimeoutMs);
      if (live.disconnected) return;
      throw new TransportError(`Upstream unreachable: ${errorMessage(e)}`, 502);
    } finally {
      clearTimeout(connectTimer);
    }

    const contentType = upstream.headers.get("content-type");
    if (!upstream.ok || !upstream.body) {
      const text = await upstream.text().catch(() => "");
      throw new UpstreamProviderError(upstream.status, text, contentType);
    }

    const decoder = decoderForContentType(contentType, streaming);
    const eventStream = isEventStream(contentType);

    const postChecks: Promise<void>[] = [];

    const tracer = new ResponseTracer(adapter, decoder, (draft) => {
      if (!tracing) return;
      const [entry] = assembler.append([draft]);
      const prefix: readonly CanonicalMessage[] = [...assembler.entries];
      postChecks.push(
        deps.guardrails.check(prefix, scope).then((post) => {
          if (post.logged?.length) assembler.annotate(post.logged, "log", entry.index);
          if (post.decision !== "block") return;
          live.blocked = post.violations;
          assembler.annotate(post.violations, "block", entry.index);
        })
      );
    });

    sink.start(upstream.status, downstreamHeaders(upstream.headers));

    const reader = upstream.body.getReader();
    const forward = async (units: FramedUnit[]) => {
      for (const unit of units) {
        if (live.disconnected || live.blocked) return;
        if (unit.raw.length) await sink.write(unit.raw);
        if (!tracing) continue;
        tracer.feed(unit);
        if (tracer.error) return;
      }
    };

    let terminal: GatewayError | null = null;
    try {
      while (true) {
        if (live.disconnected || live.blocked || tracer.error) break;
        const r = await readWithTimeout(() => reader.read(), readTimeoutMs);
        if (r === READ_TIMEOUT) {
          terminal = new UpstreamTimeoutError("read", readTimeoutMs);
          break;
        }
        if (r.done) {
          await forward(decoder.flush());
          tracer.end();
          break;
        }
        await forward(decoder.push(r.value));
      }
    } catch (e) {
      if (!live.disconnected) terminal = new TransportError(`Upstream stream failed: ${errorMessage(e)}`, 502);
    }
    if (!terminal && !live.disconnected && tracer.error) terminal = tracer.error;

    if (live.disconnected || terminal || live.blocked) {
      controller.abort();
      await reader.cancel().catch((e: unknown) => {
        if (deps.config.server.dev) console.log(`[gateway] ${label} reader cancel: ${errorMessage(e)}`);
      });
    }

    await Promise.all(postChecks);
    if (!terminal && live.blocked && streaming) terminal = new GuardrailViolation(live.blocked, "post");

    if (terminal) {
      console.warn(`[gateway] ${label}: ${terminal.message}`);
      if (eventStream && sink.writable) await sink.write(sseEvent("error", JSON.stringify(terminal.toPayload())));
    }
    sink.end();
  } catch (e) {
    if (!live.disconnected) await respondError(sink, e);
  } finally {
    await deps.registry.close(session.id);
  }
}
