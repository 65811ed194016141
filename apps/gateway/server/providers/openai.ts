import { joinUrl } from "@tracegate/config";

import type { ContentDelta, ContentPart, MessageDraft, Role } from "../canonical/types.js";
import { GATEWAY_AUTHORIZATION_HEADER, resolveCredential } from "../credentials.js";
import type { FramedUnit } from "../framing.js";
import { asArray, asInt, asString, forwardHeaders, isRecord, jsonArgs, parseDataJson, partsFromContent } from "./shared.js";
import type { ProviderAdapter, StreamParser } from "./types.js";

// Text lives in slot 0; tool call i in slot 1 + i.
const TEXT_SLOT = 0;
const toolSlot = (index: number) => 1 + index;

function roleOf(v: unknown): Role {
  if (v === "system" || v === "developer") return "system";
  if (v === "assistant" || v === "tool") return v;
  return "user";
}

function firstChoice(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body)) return undefined;
  const choice = asArray(body.choices).find((c) => isRecord(c) && (asInt(c.index) ?? 0) === 0);
  return isRecord(choice) ? choice : undefined;
}

function toolCallDeltas(toolCalls: unknown, whole: boolean): ContentDelta[] {
  const out: ContentDelta[] = [];
  asArray(toolCalls).forEach((tc, position) => {
    if (!isRecord(tc)) return;
    const index = asInt(tc.index) ?? position;
    const fn = isRecord(tc.function) ? tc.function : {};
    const args = whole ? jsonArgs(fn.arguments) : asString(fn.arguments);
    out.push({
      kind: "tool_call",
      slot: toolSlot(index),
      id: asString(tc.id) || undefined,
      name: asString(fn.name) || undefined,
      argumentsFragment: args || undefined
    });
  });
  return out;
}

class OpenAIStreamParser implements StreamParser {
  private complete = false;

  parseStreamChunk(unit: FramedUnit): ContentDelta[] {
    if (unit.data === null) return [];
    if (unit.data.trim() === "[DONE]") {
      this.complete = true;
      return [];
    }

    const choice = firstChoice(parseDataJson(unit.data, "openai"));
    if (!choice) return [];

    const out: ContentDelta[] = [];
    const delta = isRecord(choice.delta) ? choice.delta : {};
    if (typeof delta.role === "string") out.push({ kind: "role", role: roleOf(delta.role) });

    const text = asString(delta.content);
    if (text) out.push({ kind: "text", slot: TEXT_SLOT, text });

    out.push(...toolCallDeltas(delta.tool_calls, false));

    if (typeof choice.finish_reason === "string" && choice.finish_reason) this.complete = true;
    return out;
  }

  isMessageComplete(): boolean {
    return this.complete;
  }
}

function openaiMessage(m: Record<string, unknown>): MessageDraft {
  const role = roleOf(m.role);

  if (role === "tool") {
    return {
      role,
      content: [{ type: "tool_result", callId: asString(m.tool_call_id) ?? "", payload: m.content ?? null }]
    };
  }

  const content: ContentPart[] = partsFromContent(m.content);
  for (const tc of asArray(m.tool_calls)) {
    if (!isRecord(tc)) continue;
    const fn = isRecord(tc.function) ? tc.function : {};
    content.push({
      type: "tool_call",
      call: { id: asString(tc.id) ?? "", name: asString(fn.name) ?? "", arguments: jsonArgs(fn.arguments) }
    });
  }
  return { role, content };
}

export const openaiAdapter: ProviderAdapter = {
  id: "openai",

  credentialFrom(inbound) {
    return resolveCredential({
      providerHeaderValue: inbound.headers["authorization"],
      gatewayHeaderValue: inbound.headers[GATEWAY_AUTHORIZATION_HEADER],
      bearer: true
    });
  },

  buildUpstreamRequest(inbound, credential, baseUrl) {
    const headers = forwardHeaders(inbound.headers, ["authorization"]);
    headers["authorization"] = `Bearer ${credential.upstreamKey}`;
    const qs = inbound.query.toString();
    const url = joinUrl(baseUrl, inbound.path) + (qs ? `?${qs}` : "");
    const hasBody = inbound.method !== "GET" && inbound.method !== "HEAD";
    return { url, method: inbound.method, headers, body: hasBody ? inbound.body : undefined };
  },

  requestMessages(body) {
    if (!isRecord(body)) return [];
    return asArray(body.messages).filter(isRecord).map(openaiMessage);
  },

  isStreaming(_inbound, body) {
    return isRecord(body) && body.stream === true;
  },

  createStreamParser() {
    return new OpenAIStreamParser();
  },

  parseResponseBody(body) {
    const choice = firstChoice(body);
    if (!choice || !isRecord(choice.message)) return [];
    const msg = choice.message;
    const out: ContentDelta[] = [{ kind: "role", role: roleOf(msg.role ?? "assistant") }];
    const text = asString(msg.content);
    if (text) out.push({ kind: "text", slot: TEXT_SLOT, text });
    out.push(...toolCallDeltas(msg.tool_calls, true));
    return out;
  }
};
