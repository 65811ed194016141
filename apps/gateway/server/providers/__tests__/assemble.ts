import { MessageAccumulator } from "../../canonical/accumulator.js";
import type { MessageDraft } from "../../canonical/types.js";
import type { UnitDecoder } from "../../framing.js";
import type { InboundRequest, ProviderAdapter } from "../types.js";

/** Feed a streamed body through decoder and parser in fixed-size chunks. */
export function assembleStream(adapter: ProviderAdapter, decoder: UnitDecoder, body: string, chunkSize: number): MessageDraft {
  const parser = adapter.createStreamParser();
  const acc = new MessageAccumulator();
  const bytes = Buffer.from(body, "utf-8");

  const feed = (units: ReturnType<UnitDecoder["push"]>) => {
    for (const unit of units) {
      if (parser.isMessageComplete()) return;
      acc.apply(parser.parseStreamChunk(unit));
    }
  };
  for (let i = 0; i < bytes.length; i += chunkSize) feed(decoder.push(bytes.subarray(i, i + chunkSize)));
  feed(decoder.flush());
  return acc.finish();
}

export function assembleBody(adapter: ProviderAdapter, body: unknown): MessageDraft {
  const acc = new MessageAccumulator();
  acc.apply(adapter.parseResponseBody(body));
  return acc.finish();
}

export function sse(events: unknown[], done?: string): string {
  const blocks = events.map((e) => `data: ${JSON.stringify(e)}\n\n`);
  if (done) blocks.push(`data: ${done}\n\n`);
  return blocks.join("");
}

export function inbound(overrides: Partial<InboundRequest> = {}): InboundRequest {
  return {
    method: "POST",
    path: "/",
    query: new URLSearchParams(),
    headers: {},
    body: Buffer.alloc(0),
    ...overrides
  };
}
