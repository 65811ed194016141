import type { PolicyViolation } from "../errors.js";
import type { TraceAnnotation } from "./types.js";

/**
 * Keep only the most specific addresses: ["messages.2", "messages.2.content:5-9"]
 * becomes ["messages.2.content:5-9"].
 */
export function mostSpecificRanges(ranges: readonly string[]): string[] {
  const sorted = [...new Set(ranges)].sort((a, b) => a.length - b.length);
  const refines = (t: string, r: string) => t.length > r.length && t.startsWith(r) && (t[r.length] === "." || t[r.length] === ":");
  return sorted.filter((r, i) => !sorted.slice(i + 1).some((t) => refines(t, r)));
}

export function annotationsFromViolations(
  violations: readonly PolicyViolation[],
  action: "block" | "log",
  fallbackAddress: string
): TraceAnnotation[] {
  const out: TraceAnnotation[] = [];
  for (const v of violations) {
    const ranges = v.ranges?.length ? mostSpecificRanges(v.ranges) : [fallbackAddress];
    for (const address of ranges) {
      out.push({
        content: v.message,
        address,
        extra_metadata: { source: "guardrails-error", "guardrail-action": action, "rule-id": v.ruleId }
      });
    }
  }
  return out;
}

function annotationKey(a: TraceAnnotation): string {
  return `${a.address}\u0000${a.content}\u0000${String(a.extra_metadata["guardrail-action"])}`;
}

/** Drop annotations already present in `seen`; records the new ones. */
export function dedupeAnnotations(seen: Set<string>, annotations: readonly TraceAnnotation[]): TraceAnnotation[] {
  const out: TraceAnnotation[] = [];
  for (const a of annotations) {
    const key = annotationKey(a);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(a);
  }
  return out;
}
