import http from "node:http";

import { initSse, isEventStream } from "../sse.js";

/**
 * The client side of a proxied exchange. Writes resolve once the chunk has
 * been accepted (after `drain` when the socket buffer is full), so a slow
 * client throttles upstream reads.
 */
export interface DownstreamSink {
  readonly started: boolean;
  /** False once the client went away or the response ended. */
  readonly writable: boolean;
  start(status: number, headers: Record<string, string>): void;
  write(chunk: Buffer | string): Promise<void>;
  end(): void;
  /** Called when the client disconnects before end(). */
  onDisconnect(cb: () => void): void;
}

export class NodeResponseSink implements DownstreamSink {
  private res: http.ServerResponse;
  private disconnectCbs: Array<() => void> = [];
  private ended = false;

  constructor(res: http.ServerResponse) {
    this.res = res;
    res.on("close", () => {
      if (this.ended) return;
      for (const cb of this.disconnectCbs.splice(0)) cb();
    });
  }

  get started(): boolean {
    return this.res.headersSent;
  }

  get writable(): boolean {
    return !this.ended && !this.res.destroyed && !this.res.writableEnded;
  }

  start(status: number, headers: Record<string, string>) {
    if (this.res.headersSent) return;
    this.res.writeHead(status, headers);
    if (isEventStream(headers["content-type"] ?? headers["Content-Type"])) initSse(this.res);
  }

  write(chunk: Buffer | string): Promise<void> {
    if (!this.writable) return Promise.resolve();
    if (this.res.write(chunk)) return Promise.resolve();

    return new Promise<void>((resolve) => {
      const done = () => {
        this.res.off("drain", done);
        this.res.off("close", done);
        resolve();
      };
      this.res.on("drain", done);
      this.res.on("close", done);
    });
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    if (!this.res.writableEnded) this.res.end();
  }

  onDisconnect(cb: () => void) {
    this.disconnectCbs.push(cb);
  }
}
