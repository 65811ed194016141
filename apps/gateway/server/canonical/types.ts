export type Role = "user" | "assistant" | "system" | "tool";

export type ToolCall = {
  id: string;
  name: string;
  /** Complete JSON text. "{}" when the provider streamed no argument bytes. */
  arguments: string;
};

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "tool_call"; call: ToolCall }
  | { type: "tool_result"; callId: string; payload: unknown }
  | { type: "binary_ref"; mime: string; blob: string };

/** A complete message before the trace assigns its position. */
export type MessageDraft = {
  role: Role;
  content: ContentPart[];
};

export type CanonicalMessage = MessageDraft & {
  /** Position in the trace. Strictly increasing within a session. */
  index: number;
};

/**
 * One incremental update produced by a provider stream parser.
 *
 * `slot` orders content parts inside the message. Each provider decides how
 * it maps its own indexes to slots; the accumulator only sorts by them.
 */
export type ContentDelta =
  | { kind: "role"; role: Role }
  | { kind: "text"; slot: number; text: string }
  | { kind: "tool_call"; slot: number; id?: string; name?: string; argumentsFragment?: string }
  | { kind: "binary"; slot: number; mime: string; blob: string };

export function freezeMessage<T extends MessageDraft>(m: T): Readonly<T> {
  for (const part of m.content) Object.freeze(part);
  Object.freeze(m.content);
  return Object.freeze(m);
}

/** Concatenated text parts of a message. */
export function messageText(m: MessageDraft): string {
  let out = "";
  for (const p of m.content) if (p.type === "text") out += p.text;
  return out;
}
