import { TransportError } from "../errors.js";
import type { ContentDelta, ContentPart, MessageDraft, Role } from "./types.js";

type SlotState =
  | { type: "text"; text: string }
  | { type: "tool_call"; id: string; name: string; fragments: string[] }
  | { type: "binary"; mime: string; blob: string };

/**
 * Folds provider deltas into one message.
 *
 * Tool call argument fragments are appended to the call that owns the slot,
 * whatever order the slots interleave in; parts come out ordered by slot.
 */
export class MessageAccumulator {
  private role: Role;
  private slots = new Map<number, SlotState>();

  constructor(role: Role = "assistant") {
    this.role = role;
  }

  get isEmpty(): boolean {
    return this.slots.size === 0;
  }

  apply(deltas: Iterable<ContentDelta>) {
    for (const d of deltas) this.applyOne(d);
  }

  private applyOne(d: ContentDelta) {
    if (d.kind === "role") {
      this.role = d.role;
      return;
    }

    const prev = this.slots.get(d.slot);

    if (d.kind === "text") {
      if (!prev) this.slots.set(d.slot, { type: "text", text: d.text });
      else if (prev.type === "text") prev.text += d.text;
      else throw new TransportError(`Content slot ${d.slot} changed type mid-message`, 502);
      return;
    }

    if (d.kind === "binary") {
      if (prev) throw new TransportError(`Content slot ${d.slot} was already filled`, 502);
      this.slots.set(d.slot, { type: "binary", mime: d.mime, blob: d.blob });
      return;
    }

    if (!prev) {
      this.slots.set(d.slot, {
        type: "tool_call",
        id: d.id ?? "",
        name: d.name ?? "",
        fragments: d.argumentsFragment ? [d.argumentsFragment] : []
      });
      return;
    }
    if (prev.type !== "tool_call") throw new TransportError(`Content slot ${d.slot} changed type mid-message`, 502);

    if (d.id && !prev.id) prev.id = d.id;
    if (d.name && !prev.name) prev.name = d.name;
    if (d.argumentsFragment) prev.fragments.push(d.argumentsFragment);
  }

  /**
   * Produce the complete message. Tool call arguments must parse as JSON
   * and are stored compact; an empty argument buffer completes as "{}".
   */
  finish(): MessageDraft {
    const content: ContentPart[] = [];
    const ordered = [...this.slots.entries()].sort((a, b) => a[0] - b[0]);

    for (const [slot, s] of ordered) {
      if (s.type === "text") {
        if (s.text) content.push({ type: "text", text: s.text });
        continue;
      }
      if (s.type === "binary") {
        content.push({ type: "binary_ref", mime: s.mime, blob: s.blob });
        continue;
      }

      const joined = s.fragments.join("");
      let args = "{}";
      try {
        // Re-serialized so streamed and whole-body arguments compare equal.
        if (joined.trim()) args = JSON.stringify(JSON.parse(joined));
      } catch {
        throw new TransportError(`Tool call '${s.name || slot}' completed with invalid JSON arguments`, 502, {
          callId: s.id || undefined,
          arguments: joined
        });
      }
      content.push({ type: "tool_call", call: { id: s.id || `call_${slot}`, name: s.name, arguments: args } });
    }

    return { role: this.role, content };
  }
}
