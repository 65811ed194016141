import { joinUrl } from "@tracegate/config";

import type { ContentDelta, ContentPart, MessageDraft } from "../canonical/types.js";
import { GATEWAY_AUTHORIZATION_HEADER, resolveCredential } from "../credentials.js";
import type { FramedUnit } from "../framing.js";
import { asArray, asInt, asString, forwardHeaders, isRecord, parseDataJson, partsFromContent } from "./shared.js";
import type { ProviderAdapter, StreamParser } from "./types.js";

/** Anthropic content blocks map to slots by their block index. */
function blockDeltas(block: Record<string, unknown>, slot: number, whole: boolean): ContentDelta[] {
  if (block.type === "text") {
    const text = asString(block.text);
    return text ? [{ kind: "text", slot, text }] : [];
  }
  if (block.type === "tool_use") {
    // Streamed tool_use blocks start with an empty input; arguments arrive as input_json_delta.
    const args = whole && block.input !== undefined ? JSON.stringify(block.input) : undefined;
    return [
      {
        kind: "tool_call",
        slot,
        id: asString(block.id) || undefined,
        name: asString(block.name) || undefined,
        argumentsFragment: args
      }
    ];
  }
  return [];
}

class AnthropicStreamParser implements StreamParser {
  private complete = false;

  parseStreamChunk(unit: FramedUnit): ContentDelta[] {
    if (unit.data === null) return [];
    const ev = parseDataJson(unit.data, "anthropic");
    if (!isRecord(ev)) return [];

    switch (ev.type) {
      case "message_start": {
        const msg = isRecord(ev.message) ? ev.message : {};
        return msg.role === "assistant" || msg.role === "user" ? [{ kind: "role", role: msg.role }] : [];
      }
      case "content_block_start": {
        const index = asInt(ev.index) ?? 0;
        return isRecord(ev.content_block) ? blockDeltas(ev.content_block, index, false) : [];
      }
      case "content_block_delta": {
        const index = asInt(ev.index) ?? 0;
        const delta = isRecord(ev.delta) ? ev.delta : {};
        if (delta.type === "text_delta") {
          const text = asString(delta.text);
          return text ? [{ kind: "text", slot: index, text }] : [];
        }
        if (delta.type === "input_json_delta") {
          const frag = asString(delta.partial_json);
          return frag ? [{ kind: "tool_call", slot: index, argumentsFragment: frag }] : [];
        }
        return [];
      }
      case "message_stop":
        this.complete = true;
        return [];
      default:
        return [];
    }
  }

  isMessageComplete(): boolean {
    return this.complete;
  }
}

function systemMessage(system: unknown): MessageDraft | null {
  if (typeof system === "string") return system ? { role: "system", content: [{ type: "text", text: system }] } : null;
  const content = partsFromContent(system);
  return content.length ? { role: "system", content } : null;
}

/**
 * One Anthropic message may expand into several canonical ones: each
 * tool_result block becomes its own tool message.
 */
function anthropicMessages(m: Record<string, unknown>): MessageDraft[] {
  const role = m.role === "assistant" ? "assistant" : "user";
  if (typeof m.content === "string") return [{ role, content: partsFromContent(m.content) }];

  const out: MessageDraft[] = [];
  let current: ContentPart[] = [];
  const flush = () => {
    if (current.length) out.push({ role, content: current });
    current = [];
  };

  for (const block of asArray(m.content)) {
    if (!isRecord(block)) continue;
    if (block.type === "tool_result") {
      flush();
      out.push({
        role: "tool",
        content: [{ type: "tool_result", callId: asString(block.tool_use_id) ?? "", payload: block.content ?? null }]
      });
      continue;
    }
    if (block.type === "tool_use") {
      current.push({
        type: "tool_call",
        call: {
          id: asString(block.id) ?? "",
          name: asString(block.name) ?? "",
          arguments: JSON.stringify(block.input ?? {})
        }
      });
      continue;
    }
    current.push(...partsFromContent([block]));
  }
  flush();
  return out;
}

export const anthropicAdapter: ProviderAdapter = {
  id: "anthropic",

  credentialFrom(inbound) {
    return resolveCredential({
      providerHeaderValue: inbound.headers["x-api-key"],
      gatewayHeaderValue: inbound.headers[GATEWAY_AUTHORIZATION_HEADER]
    });
  },

  buildUpstreamRequest(inbound, credential, baseUrl) {
    const headers = forwardHeaders(inbound.headers, ["x-api-key"]);
    headers["x-api-key"] = credential.upstreamKey;
    const qs = inbound.query.toString();
    const url = joinUrl(baseUrl, inbound.path) + (qs ? `?${qs}` : "");
    const hasBody = inbound.method !== "GET" && inbound.method !== "HEAD";
    return { url, method: inbound.method, headers, body: hasBody ? inbound.body : undefined };
  },

  requestMessages(body) {
    if (!isRecord(body)) return [];
    const out: MessageDraft[] = [];
    const system = systemMessage(body.system);
    if (system) out.push(system);
    for (const m of asArray(body.messages)) if (isRecord(m)) out.push(...anthropicMessages(m));
    return out;
  },

  isStreaming(_inbound, body) {
    return isRecord(body) && body.stream === true;
  },

  createStreamParser() {
    return new AnthropicStreamParser();
  },

  parseResponseBody(body) {
    if (!isRecord(body)) return [];
    const out: ContentDelta[] = [{ kind: "role", role: body.role === "user" ? "user" : "assistant" }];
    asArray(body.content).forEach((block, index) => {
      if (isRecord(block)) out.push(...blockDeltas(block, index, true));
    });
    return out;
  }
};
