import { describe, expect, it } from "vitest";

import { TransportError } from "../../errors.js";
import { MessageAccumulator } from "../accumulator.js";
import { freezeMessage, messageText } from "../types.js";

describe("MessageAccumulator", () => {
  it("assembles interleaved tool call fragments by slot", () => {
    const acc = new MessageAccumulator();
    acc.apply([
      { kind: "tool_call", slot: 2, id: "call_b", name: "lookup", argumentsFragment: '{"q":' },
      { kind: "tool_call", slot: 1, id: "call_a", name: "weather", argumentsFragment: '{"city"' },
      { kind: "tool_call", slot: 2, argumentsFragment: ' "x" }' },
      { kind: "tool_call", slot: 1, argumentsFragment: ':"Oslo"}' },
      { kind: "text", slot: 0, text: "Checking" }
    ]);

    expect(acc.finish()).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Checking" },
        { type: "tool_call", call: { id: "call_a", name: "weather", arguments: '{"city":"Oslo"}' } },
        { type: "tool_call", call: { id: "call_b", name: "lookup", arguments: '{"q":"x"}' } }
      ]
    });
  });

  it("completes a call with no argument bytes as an empty object", () => {
    const acc = new MessageAccumulator();
    acc.apply([{ kind: "tool_call", slot: 0, name: "ping" }]);
    expect(acc.finish().content).toEqual([{ type: "tool_call", call: { id: "call_0", name: "ping", arguments: "{}" } }]);
  });

  it("rejects arguments that are not JSON once complete", () => {
    const acc = new MessageAccumulator();
    acc.apply([{ kind: "tool_call", slot: 0, id: "call_x", name: "broken", argumentsFragment: '{"a":' }]);
    expect(() => acc.finish()).toThrow(TransportError);
  });

  it("rejects a slot that changes type", () => {
    const acc = new MessageAccumulator();
    acc.apply([{ kind: "text", slot: 0, text: "hi" }]);
    expect(() => acc.apply([{ kind: "tool_call", slot: 0, name: "x" }])).toThrow(TransportError);
  });

  it("takes the role from a role delta and skips empty text", () => {
    const acc = new MessageAccumulator();
    acc.apply([
      { kind: "role", role: "tool" },
      { kind: "text", slot: 0, text: "" }
    ]);
    expect(acc.isEmpty).toBe(false);
    expect(acc.finish()).toEqual({ role: "tool", content: [] });
  });
});

describe("canonical helpers", () => {
  it("freezes messages deeply enough to stop edits", () => {
    const m = freezeMessage({ role: "user", content: [{ type: "text", text: "a" }], index: 0 });
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.content)).toBe(true);
    expect(Object.isFrozen(m.content[0])).toBe(true);
  });

  it("concatenates text parts", () => {
    expect(
      messageText({
        role: "assistant",
        content: [
          { type: "text", text: "a" },
          { type: "tool_call", call: { id: "c", name: "n", arguments: "{}" } },
          { type: "text", text: "b" }
        ]
      })
    ).toBe("ab");
  });
});
