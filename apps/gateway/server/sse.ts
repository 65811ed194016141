import http from "node:http";

export function sseHeaders(): Record<string, string> {
  return {
    "Content-Type": "text/event-stream; charset=utf-8",
    "Cache-Control": "no-cache, no-transform",
    "Connection": "keep-alive",

    // Reduce the chance that proxies buffer SSE.
    // (Some reverse proxies like nginx honor this header.)
    "X-Accel-Buffering": "no"
  };
}

export function isEventStream(contentType: string | null | undefined): boolean {
  return typeof contentType === "string" && contentType.toLowerCase().includes("text/event-stream");
}

export function initSse(res: http.ServerResponse) {
  // Push headers immediately.
  res.flushHeaders();
  // Reduce packet coalescing (Nagle) for more responsive streaming.
  res.socket?.setNoDelay(true);
}

/** One SSE event block. Multi-line data is split across data: lines. */
export function sseEvent(event: string | undefined, data: string): string {
  const lines = data.split(/\r\n|\r|\n/).map((l) => `data: ${l}\n`);
  return `${event ? `event: ${event}\n` : ""}${lines.join("")}\n`;
}

export function startSseKeepAlive(res: http.ServerResponse, intervalMs: number = 15_000) {
  const t = setInterval(() => {
    if (res.writableEnded || res.destroyed) return;
    // SSE comment line to keep proxies/clients from timing out idle connections.
    res.write(`:keepalive ${Date.now()}\n\n`);
  }, intervalMs);

  // Don't keep the Node process alive just because of keepalives.
  t.unref();

  const stop = () => clearInterval(t);

  res.on("close", stop);
  res.on("finish", stop);
  return stop;
}
