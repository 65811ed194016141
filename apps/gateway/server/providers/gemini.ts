import { joinUrl } from "@tracegate/config";

import type { ContentDelta, ContentPart, MessageDraft } from "../canonical/types.js";
import { GATEWAY_AUTHORIZATION_HEADER, resolveCredential } from "../credentials.js";
import type { FramedUnit } from "../framing.js";
import { asArray, asString, forwardHeaders, isRecord, parseDataJson } from "./shared.js";
import type { InboundRequest, ProviderAdapter, StreamParser } from "./types.js";

const API_KEY_HEADER = "x-goog-api-key";

function firstCandidate(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body)) return undefined;
  const c = asArray(body.candidates).find((x) => isRecord(x) && (x.index === undefined || x.index === 0));
  return isRecord(c) ? c : undefined;
}

/**
 * Gemini parts carry no index: slots follow part order across the whole
 * response, and consecutive text parts share one slot.
 */
class GeminiPartSlots {
  private nextSlot = 0;
  private openTextSlot: number | null = null;

  deltas(parts: unknown): ContentDelta[] {
    const out: ContentDelta[] = [];
    for (const part of asArray(parts)) {
      if (!isRecord(part) || part.thought === true) continue;

      const text = asString(part.text);
      if (text !== undefined) {
        if (this.openTextSlot === null) this.openTextSlot = this.nextSlot++;
        if (text) out.push({ kind: "text", slot: this.openTextSlot, text });
        continue;
      }

      this.openTextSlot = null;
      const slot = this.nextSlot++;

      if (isRecord(part.functionCall)) {
        const fc = part.functionCall;
        out.push({
          kind: "tool_call",
          slot,
          id: asString(fc.id) || undefined,
          name: asString(fc.name) || undefined,
          argumentsFragment: JSON.stringify(fc.args ?? {})
        });
        continue;
      }

      if (isRecord(part.inlineData)) {
        const mime = asString(part.inlineData.mimeType) ?? asString(part.inlineData.mime_type) ?? "application/octet-stream";
        out.push({ kind: "binary", slot, mime, blob: asString(part.inlineData.data) ?? "" });
      }
    }
    return out;
  }
}

function candidateDeltas(slots: GeminiPartSlots, candidate: Record<string, unknown>): ContentDelta[] {
  const content = isRecord(candidate.content) ? candidate.content : {};
  return [{ kind: "role", role: "assistant" }, ...slots.deltas(content.parts)];
}

class GeminiStreamParser implements StreamParser {
  private slots = new GeminiPartSlots();
  private complete = false;

  parseStreamChunk(unit: FramedUnit): ContentDelta[] {
    if (unit.data === null) return [];
    const candidate = firstCandidate(parseDataJson(unit.data, "gemini"));
    if (!candidate) return [];
    const out = candidateDeltas(this.slots, candidate);
    if (typeof candidate.finishReason === "string" && candidate.finishReason) this.complete = true;
    return out;
  }

  isMessageComplete(): boolean {
    return this.complete;
  }
}

function textOf(parts: unknown): string {
  return asArray(parts)
    .map((p) => (isRecord(p) ? asString(p.text) ?? "" : ""))
    .join(" ");
}

function geminiMessages(c: Record<string, unknown>): MessageDraft[] {
  const role = c.role === "model" ? "assistant" : "user";
  const out: MessageDraft[] = [];
  let current: ContentPart[] = [];
  const flush = () => {
    if (current.length) out.push({ role, content: current });
    current = [];
  };

  for (const part of asArray(c.parts)) {
    if (!isRecord(part)) continue;
    const text = asString(part.text);
    if (text !== undefined) {
      current.push({ type: "text", text });
    } else if (isRecord(part.functionCall)) {
      const fc = part.functionCall;
      const name = asString(fc.name) ?? "";
      current.push({
        type: "tool_call",
        call: { id: asString(fc.id) ?? name, name, arguments: JSON.stringify(fc.args ?? {}) }
      });
    } else if (isRecord(part.functionResponse)) {
      const fr = part.functionResponse;
      flush();
      out.push({
        role: "tool",
        content: [{ type: "tool_result", callId: asString(fr.id) ?? asString(fr.name) ?? "", payload: fr.response ?? null }]
      });
    } else if (isRecord(part.inlineData)) {
      const mime = asString(part.inlineData.mimeType) ?? asString(part.inlineData.mime_type) ?? "application/octet-stream";
      current.push({ type: "binary_ref", mime, blob: asString(part.inlineData.data) ?? "" });
    }
  }
  flush();
  return out;
}

/** Gemini accepts the key as a header or as `?key=`; the composite value may sit in either. */
function keyLocation(inbound: InboundRequest): "header" | "query" {
  return inbound.headers[API_KEY_HEADER] ? "header" : inbound.query.has("key") ? "query" : "header";
}

export const geminiAdapter: ProviderAdapter = {
  id: "gemini",

  credentialFrom(inbound) {
    const value = keyLocation(inbound) === "query" ? inbound.query.get("key") : inbound.headers[API_KEY_HEADER];
    return resolveCredential({
      providerHeaderValue: value,
      gatewayHeaderValue: inbound.headers[GATEWAY_AUTHORIZATION_HEADER]
    });
  },

  buildUpstreamRequest(inbound, credential, baseUrl) {
    const headers = forwardHeaders(inbound.headers, [API_KEY_HEADER]);
    const query = new URLSearchParams(inbound.query);
    if (keyLocation(inbound) === "query") query.set("key", credential.upstreamKey);
    else headers[API_KEY_HEADER] = credential.upstreamKey;

    const qs = query.toString();
    const url = joinUrl(baseUrl, inbound.path) + (qs ? `?${qs}` : "");
    const hasBody = inbound.method !== "GET" && inbound.method !== "HEAD";
    return { url, method: inbound.method, headers, body: hasBody ? inbound.body : undefined };
  },

  requestMessages(body) {
    if (!isRecord(body)) return [];
    const out: MessageDraft[] = [];
    if (isRecord(body.systemInstruction)) {
      const text = textOf(body.systemInstruction.parts);
      if (text) out.push({ role: "system", content: [{ type: "text", text }] });
    }
    for (const c of asArray(body.contents)) if (isRecord(c)) out.push(...geminiMessages(c));
    return out;
  },

  isStreaming(inbound) {
    return inbound.path.includes(":streamGenerateContent");
  },

  createStreamParser() {
    return new GeminiStreamParser();
  },

  parseResponseBody(body) {
    const candidate = firstCandidate(body);
    if (!candidate) return [];
    return candidateDeltas(new GeminiPartSlots(), candidate);
  }
};
