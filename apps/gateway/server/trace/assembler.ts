import { freezeMessage, type CanonicalMessage, type MessageDraft } from "../canonical/types.js";
import { errorMessage, type PolicyViolation } from "../errors.js";
import { annotationsFromViolations, dedupeAnnotations } from "./annotations.js";
import type { Trace, TraceAnnotation, TraceStore } from "./types.js";

export type TraceAssemblerOptions = {
  store: TraceStore;
  /** Dataset the trace is pushed to. Without it (or a token) nothing leaves the process. */
  projectRef?: string;
  token?: string;
  metadata?: Record<string, unknown>;
  /** Label used in log lines. */
  label?: string;
};

/**
 * Per-session trace. Appends complete messages only and pushes them in
 * append order, one push in flight at a time. The first push creates the
 * trace; later ones append the entries the store has not seen yet.
 *
 * Push failures never reach the caller: the trace is marked `failed`,
 * pushing is suspended, and close() retries once with everything unstored.
 */
export class TraceAssembler {
  readonly trace: Trace;

  private store: TraceStore;
  private token?: string;
  private label: string;
  private metadata: Record<string, unknown>;
  private traceId?: string;
  private storedCount = 0;
  private pendingAnnotations: TraceAnnotation[] = [];
  private seenAnnotations = new Set<string>();
  private tail: Promise<void> = Promise.resolve();
  private suspended = false;
  private closed = false;

  constructor(opts: TraceAssemblerOptions) {
    this.store = opts.store;
    this.token = opts.token;
    this.label = opts.label ?? "trace";
    this.metadata = { ...(opts.metadata ?? {}) };
    this.trace = { projectRef: opts.projectRef ?? "", entries: [], pushState: "pending" };
  }

  /** True when entries are pushed to the store. */
  get pushing(): boolean {
    return Boolean(this.trace.projectRef && this.token);
  }

  get entries(): readonly CanonicalMessage[] {
    return this.trace.entries;
  }

  get id(): string | undefined {
    return this.traceId;
  }

  /** Merge into the metadata sent with the first push. */
  setMetadata(patch: Record<string, unknown>) {
    Object.assign(this.metadata, patch);
  }

  /**
   * Append complete messages as one batch and schedule a push.
   * Returns the indexed, frozen entries.
   */
  append(drafts: readonly MessageDraft[]): CanonicalMessage[] {
    const added: CanonicalMessage[] = [];
    for (const d of drafts) {
      const m = freezeMessage({ role: d.role, content: [...d.content], index: this.trace.entries.length });
      this.trace.entries.push(m);
      added.push(m);
    }
    if (added.length) this.schedulePush();
    return added;
  }

  /**
   * Attach guardrail violations to the next push. Without explicit ranges
   * they point at the given entry (default: the last one).
   */
  annotate(violations: readonly PolicyViolation[], action: "block" | "log", atIndex?: number) {
    if (!violations.length) return;
    const index = atIndex ?? Math.max(0, this.trace.entries.length - 1);
    const fresh = dedupeAnnotations(this.seenAnnotations, annotationsFromViolations(violations, action, `messages.${index}`));
    if (!fresh.length) return;
    this.pendingAnnotations.push(...fresh);
    this.schedulePush();
  }

  /** Resolves once every scheduled push has settled. */
  flush(): Promise<void> {
    return this.tail;
  }

  /** Final flush. A failed trace gets exactly one more attempt. */
  async close(): Promise<void> {
    if (this.closed) return this.tail;
    this.closed = true;
    await this.tail;
    if (this.trace.pushState !== "failed") return;

    this.suspended = false;
    this.tail = this.tail.then(() => this.pushUnstored(true));
    await this.tail;
  }

  private schedulePush() {
    if (!this.pushing || this.suspended) return;
    this.tail = this.tail.then(() => this.pushUnstored(false));
  }

  private async pushUnstored(finalAttempt: boolean): Promise<void> {
    const token = this.token;
    if (!this.pushing || this.suspended || !token) return;

    const messages = this.trace.entries.slice(this.storedCount);
    const annotations = this.pendingAnnotations;
    if (!messages.length && !annotations.length) return;
    // Annotations on a trace that does not exist yet wait for its first message.
    if (!this.traceId && !messages.length) return;

    this.pendingAnnotations = [];
    try {
      if (!this.traceId) {
        const { traceId } = await this.store.pushTrace({
          token,
          dataset: this.trace.projectRef,
          messages,
          annotations,
          metadata: { ...this.metadata }
        });
        this.traceId = traceId;
      } else {
        await this.store.appendMessages({ token, traceId: this.traceId, messages, annotations });
      }
      this.storedCount += messages.length;
      this.trace.pushState = this.storedCount === this.trace.entries.length ? "pushed" : "partially_pushed";
    } catch (e) {
      this.pendingAnnotations = [...annotations, ...this.pendingAnnotations];
      this.trace.pushState = "failed";
      this.suspended = true;
      console.warn(
        `[trace] ${this.label}: push ${finalAttempt ? "retry failed, giving up" : "failed, retrying at close"}: ${errorMessage(e)}`
      );
    }
  }
}
