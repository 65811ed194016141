import crypto from "node:crypto";

export type SessionKind = "llm" | "mcp_sse" | "mcp_streamable" | "mcp_stdio";

export type SessionState = "negotiating" | "open" | "closing" | "closed";

export type Session = {
  id: string;
  kind: SessionKind;
  createdAt: number;
  state: SessionState;
};

const NEXT_STATE: Record<SessionState, readonly SessionState[]> = {
  negotiating: ["open", "closing", "closed"],
  open: ["closing", "closed"],
  closing: ["closed"],
  closed: []
};

type CloseHook = (s: Session) => void | Promise<void>;

/**
 * Arena of live sessions keyed by id.
 *
 * A session is removed as soon as it reaches `closed`; closing twice is a
 * no-op, so transports and the orchestrator may both call close().
 */
export class SessionRegistry {
  private sessions = new Map<string, Session>();
  private closeHooks = new Map<string, CloseHook[]>();
  private closing = new Map<string, Promise<void>>();

  get size(): number {
    return this.sessions.size;
  }

  create(kind: SessionKind, id: string = crypto.randomUUID()): Session {
    const existing = this.sessions.get(id);
    if (existing) return existing;
    const s: Session = { id, kind, createdAt: Date.now(), state: "negotiating" };
    this.sessions.set(id, s);
    return s;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  transition(id: string, to: SessionState): boolean {
    const s = this.sessions.get(id);
    if (!s) return false;
    if (s.state === to) return true;
    if (!NEXT_STATE[s.state].includes(to)) return false;
    s.state = to;
    return true;
  }

  open(id: string): boolean {
    return this.transition(id, "open");
  }

  /** Register work to run once when the session closes (trace flush, upstream teardown). */
  onClose(id: string, hook: CloseHook) {
    const hooks = this.closeHooks.get(id) ?? [];
    hooks.push(hook);
    this.closeHooks.set(id, hooks);
  }

  /**
   * Run the session's close hooks in `closing`, then mark it `closed` and
   * drop it from the arena. Unknown or already closed ids resolve
   * immediately; a close already in progress is shared.
   */
  close(id: string): Promise<void> {
    const inflight = this.closing.get(id);
    if (inflight) return inflight;
    const s = this.sessions.get(id);
    if (!s || s.state === "closed") return Promise.resolve();

    const p = this.runClose(s).finally(() => this.closing.delete(id));
    this.closing.set(id, p);
    return p;
  }

  private async runClose(s: Session): Promise<void> {
    s.state = "closing";
    const hooks = this.closeHooks.get(s.id) ?? [];
    this.closeHooks.delete(s.id);

    for (const hook of hooks) {
      try {
        await hook(s);
      } catch (e) {
        console.warn(`[gateway] session ${s.id} close hook failed:`, e);
      }
    }

    s.state = "closed";
    this.sessions.delete(s.id);
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.close(id)));
  }
}
