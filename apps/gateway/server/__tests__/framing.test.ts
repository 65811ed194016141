import { describe, expect, it } from "vitest";

import {
  JsonArrayDecoder,
  NdjsonDecoder,
  SseDecoder,
  WholeBodyDecoder,
  decoderForContentType,
  type FramedUnit,
  type UnitDecoder
} from "../framing.js";

function decodeInChunks(decoder: UnitDecoder, input: string, size: number): FramedUnit[] {
  const bytes = Buffer.from(input, "utf-8");
  const out: FramedUnit[] = [];
  for (let i = 0; i < bytes.length; i += size) out.push(...decoder.push(bytes.subarray(i, i + size)));
  out.push(...decoder.flush());
  return out;
}

function rawOf(units: FramedUnit[]): string {
  return Buffer.concat(units.map((u) => u.raw)).toString("utf-8");
}

describe("SseDecoder", () => {
  const input = "data: a\n\ndata: b\r\n\r\n: keepalive\n\nevent: endpoint\ndata: /messages/?session_id=s1\n\n";

  it("splits events and keeps every byte", () => {
    for (const size of [1, 5, input.length]) {
      const units = decodeInChunks(new SseDecoder(), input, size);
      expect(rawOf(units)).toBe(input);
      expect(units.map((u) => u.data)).toEqual(["a", "b", null, "/messages/?session_id=s1"]);
      expect(units[3].event).toBe("endpoint");
    }
  });

  it("joins multi-line data", () => {
    const [unit] = new SseDecoder().push(Buffer.from("data: {\ndata: }\n\n"));
    expect(unit.data).toBe("{\n}");
  });
});

describe("NdjsonDecoder", () => {
  it("yields one unit per line and flushes a trailing partial line", () => {
    const input = '{"a":1}\n\n{"b":2}';
    const units = decodeInChunks(new NdjsonDecoder(), input, 3);
    expect(rawOf(units)).toBe(input);
    expect(units.map((u) => u.data)).toEqual(['{"a":1}', null, '{"b":2}']);
  });
});

describe("JsonArrayDecoder", () => {
  it("yields top-level elements, including braces inside strings", () => {
    const input = '[{"a":1},\n{"b":"}"}]';
    for (const size of [1, 4, input.length]) {
      const units = decodeInChunks(new JsonArrayDecoder(), input, size);
      expect(rawOf(units)).toBe(input);
      expect(units.map((u) => u.data)).toEqual(['{"a":1}', '{"b":"}"}', null]);
    }
  });
});

describe("WholeBodyDecoder", () => {
  it("passes bytes through and parses once at the end", () => {
    const d = new WholeBodyDecoder();
    expect(d.push(Buffer.from('{"ok"')).map((u) => u.data)).toEqual([null]);
    expect(d.push(Buffer.from(":true}")).map((u) => u.data)).toEqual([null]);
    const [last] = d.flush();
    expect(last.raw.length).toBe(0);
    expect(last.data).toBe('{"ok":true}');
  });
});

describe("decoderForContentType", () => {
  it("picks the decoder from the content type", () => {
    expect(decoderForContentType("text/event-stream; charset=utf-8")).toBeInstanceOf(SseDecoder);
    expect(decoderForContentType("application/x-ndjson")).toBeInstanceOf(NdjsonDecoder);
    expect(decoderForContentType("application/json", true)).toBeInstanceOf(JsonArrayDecoder);
    expect(decoderForContentType("application/json")).toBeInstanceOf(WholeBodyDecoder);
    expect(decoderForContentType(null)).toBeInstanceOf(WholeBodyDecoder);
  });
});
