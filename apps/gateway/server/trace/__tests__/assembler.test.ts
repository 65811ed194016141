import { describe, expect, it, vi } from "vitest";

import { memoryStore } from "../../__tests__/fakes.js";
import { annotationsFromViolations, dedupeAnnotations, mostSpecificRanges } from "../annotations.js";
import { TraceAssembler } from "../assembler.js";

const user = (text: string) => ({ role: "user" as const, content: [{ type: "text" as const, text }] });

describe("TraceAssembler", () => {
  it("indexes entries and pushes them in order, creating the trace once", async () => {
    const store = memoryStore();
    const asm = new TraceAssembler({ store, projectRef: "demo", token: "test-token", metadata: { source: "test" } });

    asm.append([user("a"), user("b")]);
    asm.append([user("c")]);
    await asm.close();

    expect(asm.entries.map((m) => m.index)).toEqual([0, 1, 2]);
    expect(store.pushTrace).toHaveBeenCalledTimes(1);
    expect(store.pushes[0]).toMatchObject({ dataset: "demo", token: "test-token", metadata: { source: "test" } });

    const all = [...store.pushes.flatMap((p) => p.messages), ...store.appends.flatMap((a) => a.messages)];
    expect(all.map((m) => m.index)).toEqual([0, 1, 2]);
    expect(store.appends.every((a) => a.traceId === "trace-1")).toBe(true);
    expect(asm.trace.pushState).toBe("pushed");
    expect(asm.id).toBe("trace-1");
  });

  it("freezes appended entries", () => {
    const asm = new TraceAssembler({ store: memoryStore() });
    const [m] = asm.append([user("a")]);
    expect(Object.isFrozen(m)).toBe(true);
  });

  it("keeps everything local without a project or token", async () => {
    const store = memoryStore();
    const asm = new TraceAssembler({ store, token: "test-token" });
    asm.append([user("a")]);
    await asm.close();
    expect(asm.pushing).toBe(false);
    expect(store.pushTrace).not.toHaveBeenCalled();
  });

  it("suspends after a failure and retries once at close", async () => {
    const store = memoryStore();
    store.pushTrace.mockRejectedValueOnce(new Error("store down"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const asm = new TraceAssembler({ store, projectRef: "demo", token: "test-token" });

    asm.append([user("a")]);
    await asm.flush();
    expect(asm.trace.pushState).toBe("failed");

    asm.append([user("b")]);
    await asm.flush();
    expect(store.pushTrace).toHaveBeenCalledTimes(1);

    await asm.close();
    expect(store.pushTrace).toHaveBeenCalledTimes(2);
    expect(store.pushes.map((p) => p.messages.map((m) => m.index))).toEqual([[0, 1]]);
    expect(asm.trace.pushState).toBe("pushed");
  });

  it("attaches each annotation once", async () => {
    const store = memoryStore();
    const asm = new TraceAssembler({ store, projectRef: "demo", token: "test-token" });
    asm.append([user("a")]);
    await asm.flush();

    const v = [{ ruleId: "r1", message: "flagged" }];
    asm.annotate(v, "log", 0);
    asm.annotate(v, "log", 0);
    await asm.close();

    expect(store.appends).toEqual([
      {
        token: "test-token",
        traceId: "trace-1",
        messages: [],
        annotations: [
          {
            content: "flagged",
            address: "messages.0",
            extra_metadata: { source: "guardrails-error", "guardrail-action": "log", "rule-id": "r1" }
          }
        ]
      }
    ]);
  });
});

describe("annotations", () => {
  it("keeps the most specific ranges", () => {
    expect(mostSpecificRanges(["messages.1", "messages.1.content:0-4", "messages.12"])).toEqual([
      "messages.12",
      "messages.1.content:0-4"
    ]);
  });

  it("falls back to the given address and dedupes", () => {
    const seen = new Set<string>();
    const anns = annotationsFromViolations(
      [
        { ruleId: "r1", message: "m" },
        { ruleId: "r1", message: "m" }
      ],
      "block",
      "messages.3"
    );
    expect(dedupeAnnotations(seen, anns)).toHaveLength(1);
    expect(dedupeAnnotations(seen, anns)).toHaveLength(0);
  });
});
