import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";

import type { McpBridge } from "./bridge.js";
import { parseJsonRpcLine } from "./jsonrpc.js";

export type StdioBridgeOptions = {
  command: string;
  argv: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  bridge: McpBridge;
  label?: string;
  /** Client side; defaults to the parent's stdin/stdout. */
  input?: Readable;
  output?: Writable;
};

/**
 * Wraps an MCP server that speaks newline-delimited JSON-RPC on stdio.
 * The parent's stdin/stdout become the client side; the child's stderr is
 * passed through to ours, which is also where the gateway logs go.
 */
export class McpStdioBridge {
  private child: ChildProcessWithoutNullStreams;
  private bridge: McpBridge;
  private label: string;
  private output: Writable;
  // Client lines are handled one at a time so relay order is kept.
  private tail: Promise<void> = Promise.resolve();
  private exitPromise: Promise<number>;

  private constructor(child: ChildProcessWithoutNullStreams, opts: StdioBridgeOptions) {
    this.child = child;
    this.bridge = opts.bridge;
    this.label = opts.label ?? opts.command;
    this.output = opts.output ?? process.stdout;

    const fromServer = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    fromServer.on("line", (line) => this.onServerLine(line));

    child.stderr.on("data", (buf: Buffer) => process.stderr.write(buf));

    const fromClient = readline.createInterface({ input: opts.input ?? process.stdin, crlfDelay: Infinity });
    fromClient.on("line", (line) => {
      this.tail = this.tail
        .then(() => this.onClientLine(line))
        .catch((e: unknown) => console.warn(`[mcp] ${this.label}: client message dropped:`, e));
    });
    fromClient.on("close", () => {
      void this.tail.then(() => child.stdin.end());
    });

    this.exitPromise = new Promise<number>((resolve) => {
      let settled = false;
      const finish = (code: number, why: string) => {
        if (settled) return;
        settled = true;
        fromClient.close();
        console.warn(`[mcp] ${this.label} exited (${why})`);
        void this.tail
          .then(() => this.bridge.close())
          .catch((e: unknown) => console.warn(`[mcp] ${this.label}: trace flush failed:`, e))
          .then(() => resolve(code));
      };
      // "close" fires after stdout is drained, so every server line has been relayed.
      child.on("close", (code, signal) => finish(code ?? 1, `code=${code} signal=${signal ?? ""}`));
      child.on("error", (e) => finish(1, e.message));
    });
  }

  static spawn(opts: StdioBridgeOptions): McpStdioBridge {
    const child = spawn(opts.command, opts.argv, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: ["pipe", "pipe", "pipe"]
    });
    return new McpStdioBridge(child, opts);
  }

  /** Resolves with the child's exit code once the trace has been flushed. */
  get exited(): Promise<number> {
    return this.exitPromise;
  }

  private writeClient(line: string) {
    this.output.write(line + "\n");
  }

  private writeServer(line: string) {
    if (this.child.stdin.writable) this.child.stdin.write(line + "\n");
  }

  private onServerLine(line: string) {
    const payload = parseJsonRpcLine(line);
    if (payload !== undefined) this.bridge.handleServer(payload);
    this.writeClient(line);
  }

  private async onClientLine(line: string): Promise<void> {
    const payload = parseJsonRpcLine(line);
    if (payload === undefined) {
      this.writeServer(line);
      return;
    }

    const verdict = await this.bridge.handleClient(payload);
    for (const reply of verdict.replies) this.writeClient(JSON.stringify(reply));
    if (verdict.forward === null) return;
    // Messages must stay on one line; JSON.stringify without spacing does that.
    this.writeServer(verdict.replies.length ? JSON.stringify(verdict.forward) : line);
  }

  kill(signal: NodeJS.Signals = "SIGTERM") {
    this.child.kill(signal);
  }
}
