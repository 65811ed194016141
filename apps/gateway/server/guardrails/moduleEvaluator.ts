import { pathToFileURL } from "node:url";

import type { CanonicalMessage } from "../canonical/types.js";
import type { PolicyViolation } from "../errors.js";
import type { PolicyEvaluator, PolicyResult } from "./types.js";

export const MODULE_POLICY_EXTENSIONS = [".js", ".mjs", ".cjs"] as const;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function coerceViolation(v: unknown, i: number): PolicyViolation {
  if (typeof v === "string") return { ruleId: `rule-${i}`, message: v };
  if (!isRecord(v)) return { ruleId: `rule-${i}`, message: String(v) };
  const out: PolicyViolation = {
    ruleId: typeof v.ruleId === "string" ? v.ruleId : `rule-${i}`,
    message: typeof v.message === "string" ? v.message : "policy violation"
  };
  if (Array.isArray(v.ranges)) out.ranges = v.ranges.filter((r): r is string => typeof r === "string");
  return out;
}

/** Validate what a policy module returned. */
export function coercePolicyResult(v: unknown): PolicyResult {
  if (!isRecord(v) || (v.decision !== "allow" && v.decision !== "block")) {
    throw new Error("policy module returned an invalid result (expected { decision, violations })");
  }
  const violations = Array.isArray(v.violations) ? v.violations.map(coerceViolation) : [];
  return { decision: v.decision, violations };
}

type EvaluateFn = (prefix: readonly CanonicalMessage[]) => unknown;

function isEvaluateFn(v: unknown): v is EvaluateFn {
  return typeof v === "function";
}

/**
 * Load a policy module exporting `evaluate(prefix)`. The function may be
 * sync or async; the default export is checked too.
 */
export async function loadModuleEvaluator(absPath: string): Promise<PolicyEvaluator> {
  const mod: unknown = await import(pathToFileURL(absPath).href);
  const candidates = isRecord(mod) ? [mod.evaluate, isRecord(mod.default) ? mod.default.evaluate : undefined] : [];
  const fn = candidates.find(isEvaluateFn);
  if (!fn) throw new Error(`policy module ${absPath} does not export evaluate(prefix)`);

  return {
    async evaluate(prefix) {
      return coercePolicyResult(await fn(prefix));
    }
  };
}
