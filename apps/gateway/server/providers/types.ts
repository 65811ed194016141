import type { ContentDelta, MessageDraft } from "../canonical/types.js";
import type { Credential } from "../credentials.js";
import type { FramedUnit } from "../framing.js";

export type ProviderId = "openai" | "anthropic" | "gemini";

export const PROVIDER_IDS: readonly ProviderId[] = ["openai", "anthropic", "gemini"];

export function isProviderId(v: string): v is ProviderId {
  return PROVIDER_IDS.some((p) => p === v);
}

/** The client's request as the route saw it. `path` is everything after the provider segment. */
export type InboundRequest = {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string>;
  body: Buffer;
};

export type UpstreamRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: Buffer;
};

export interface StreamParser {
  /** Deltas carried by one framed unit. Units without payload yield none. */
  parseStreamChunk(unit: FramedUnit): ContentDelta[];
  /** True once the provider has signalled the end of the traced message. */
  isMessageComplete(): boolean;
}

/**
 * Capability interface implemented once per provider family.
 *
 * Adapters are plain objects; everything provider specific (auth header,
 * wire format, completion signal) lives behind these methods.
 */
export interface ProviderAdapter {
  readonly id: ProviderId;
  /** Read the composite credential from the provider's own auth header(s). */
  credentialFrom(inbound: InboundRequest): Credential;
  buildUpstreamRequest(inbound: InboundRequest, credential: Credential, baseUrl: string): UpstreamRequest;
  /** The inbound conversation in canonical form. */
  requestMessages(body: unknown): MessageDraft[];
  isStreaming(inbound: InboundRequest, body: unknown): boolean;
  createStreamParser(): StreamParser;
  /** A non-streaming response is one complete chunk. */
  parseResponseBody(body: unknown): ContentDelta[];
}
