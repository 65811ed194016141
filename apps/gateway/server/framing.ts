/**
 * Upstream framing: split a byte stream into protocol units without changing
 * a single byte. Concatenating `raw` of every emitted unit (push + flush)
 * reproduces the input exactly, so the proxy can forward units verbatim.
 */
export type FramedUnit = {
  raw: Buffer;
  /** Parsed payload text; null for comments, separators and pass-through bytes. */
  data: string | null;
  /** SSE event name, when the unit carried one. */
  event?: string;
};

export interface UnitDecoder {
  /** "stream" units are fed to a stream parser; "body" yields one unit with the whole body. */
  readonly mode: "stream" | "body";
  push(chunk: Uint8Array): FramedUnit[];
  flush(): FramedUnit[];
}

const LF = 0x0a;

function findSseBoundary(buf: Buffer): { at: number; len: number } | null {
  let best: { at: number; len: number } | null = null;
  for (const sep of ["\r\n\r\n", "\n\n", "\r\r"]) {
    const at = buf.indexOf(sep);
    if (at >= 0 && (!best || at < best.at)) best = { at, len: sep.length };
  }
  return best;
}

export function parseSseEvent(block: string): { event?: string; data: string | null } {
  const lines = block.split(/\r\n|\r|\n/);
  const dataLines: string[] = [];
  let event: string | undefined;
  for (const line of lines) {
    if (!line || line.startsWith(":")) continue;
    const colon = line.indexOf(":");
    const field = colon < 0 ? line : line.slice(0, colon);
    let value = colon < 0 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);
    if (field === "data") dataLines.push(value);
    else if (field === "event") event = value;
  }
  const data = dataLines.length ? dataLines.join("\n") : null;
  return event === undefined ? { data } : { event, data };
}

export class SseDecoder implements UnitDecoder {
  readonly mode = "stream" as const;
  private buf: Buffer = Buffer.alloc(0);

  push(chunk: Uint8Array): FramedUnit[] {
    this.buf = Buffer.concat([this.buf, chunk]);
    const out: FramedUnit[] = [];
    while (true) {
      const b = findSseBoundary(this.buf);
      if (!b) break;
      const end = b.at + b.len;
      const raw = this.buf.subarray(0, end);
      this.buf = this.buf.subarray(end);
      out.push({ raw, ...parseSseEvent(raw.subarray(0, b.at).toString("utf-8")) });
    }
    return out;
  }

  flush(): FramedUnit[] {
    if (!this.buf.length) return [];
    const raw = this.buf;
    this.buf = Buffer.alloc(0);
    return [{ raw, ...parseSseEvent(raw.toString("utf-8")) }];
  }
}

export class NdjsonDecoder implements UnitDecoder {
  readonly mode = "stream" as const;
  private buf: Buffer = Buffer.alloc(0);

  push(chunk: Uint8Array): FramedUnit[] {
    this.buf = Buffer.concat([this.buf, chunk]);
    const out: FramedUnit[] = [];
    let nl = this.buf.indexOf(LF);
    while (nl >= 0) {
      const raw = this.buf.subarray(0, nl + 1);
      this.buf = this.buf.subarray(nl + 1);
      out.push(this.unit(raw));
      nl = this.buf.indexOf(LF);
    }
    return out;
  }

  flush(): FramedUnit[] {
    if (!this.buf.length) return [];
    const raw = this.buf;
    this.buf = Buffer.alloc(0);
    return [this.unit(raw)];
  }

  private unit(raw: Buffer): FramedUnit {
    const text = raw.toString("utf-8").trim();
    return { raw, data: text ? text : null };
  }
}

/**
 * Streamed JSON array (`[{...},\n{...}]`): one unit per top-level element.
 * Separators and brackets ride along in `raw` of the neighbouring unit.
 */
export class JsonArrayDecoder implements UnitDecoder {
  readonly mode = "stream" as const;
  private buf: Buffer = Buffer.alloc(0);
  private scanned = 0;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private elementStart = -1;

  push(chunk: Uint8Array): FramedUnit[] {
    this.buf = Buffer.concat([this.buf, chunk]);
    const out: FramedUnit[] = [];

    for (let i = this.scanned; i < this.buf.length; i++) {
      const c = this.buf[i];
      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (c === 0x5c) this.escaped = true;
        else if (c === 0x22) this.inString = false;
        continue;
      }
      if (c === 0x22) {
        this.inString = true;
        continue;
      }
      if (c === 0x7b || c === 0x5b) {
        // The outer "[" opens the array itself; elements start one level down.
        if (this.depth === 1 && this.elementStart < 0) this.elementStart = i;
        this.depth++;
        continue;
      }
      if (c === 0x7d || c === 0x5d) {
        this.depth--;
        if (this.depth === 1 && this.elementStart >= 0) {
          const raw = this.buf.subarray(0, i + 1);
          const data = this.buf.subarray(this.elementStart, i + 1).toString("utf-8");
          out.push({ raw, data });
          this.buf = this.buf.subarray(i + 1);
          this.elementStart = -1;
          i = -1;
        }
      }
    }
    this.scanned = this.buf.length;
    return out;
  }

  flush(): FramedUnit[] {
    if (!this.buf.length) return [];
    const raw = this.buf;
    this.buf = Buffer.alloc(0);
    this.scanned = 0;
    return [{ raw, data: null }];
  }
}

/** Non-streaming body: bytes pass through as they arrive, parsed once at the end. */
export class WholeBodyDecoder implements UnitDecoder {
  readonly mode = "body" as const;
  private chunks: Buffer[] = [];

  push(chunk: Uint8Array): FramedUnit[] {
    const raw = Buffer.from(chunk);
    this.chunks.push(raw);
    return [{ raw, data: null }];
  }

  flush(): FramedUnit[] {
    const text = Buffer.concat(this.chunks).toString("utf-8");
    this.chunks = [];
    return [{ raw: Buffer.alloc(0), data: text.trim() ? text : null }];
  }
}

/**
 * Pick a decoder from the upstream response content type. A streaming
 * request answered with plain JSON is a streamed array (Gemini without alt=sse).
 */
export function decoderForContentType(contentType: string | null, streaming: boolean = false): UnitDecoder {
  const ct = (contentType ?? "").toLowerCase();
  if (ct.includes("text/event-stream")) return new SseDecoder();
  if (ct.includes("application/x-ndjson") || ct.includes("application/jsonl")) return new NdjsonDecoder();
  if (streaming && ct.includes("json")) return new JsonArrayDecoder();
  return new WholeBodyDecoder();
}
