import type { CanonicalMessage } from "../canonical/types.js";
import type { PolicyViolation } from "../errors.js";

export type PolicyDecision = "allow" | "block";

export type PolicyResult = {
  decision: PolicyDecision;
  violations: PolicyViolation[];
  /** Matches of log-only policies: recorded on the trace, never blocking. */
  logged?: PolicyViolation[];
};

export type EvaluationContext = {
  /** Gateway token of the request, for evaluators that call the guardrails service. */
  token?: string;
};

/** Opaque compiled policy. Evaluated over the trace prefix at each checkpoint. */
export interface PolicyEvaluator {
  evaluate(prefix: readonly CanonicalMessage[], ctx?: EvaluationContext): Promise<PolicyResult>;
}

export type PolicySource = { filePath: string } | { projectName: string };

export type GuardrailPolicy = {
  source: PolicySource;
  compiled: PolicyEvaluator;
  /** Number of rules behind the evaluator; a project with none falls back to the file. */
  ruleCount: number;
};

export function allow(): PolicyResult {
  return { decision: "allow", violations: [] };
}

export function mergeResults(results: readonly PolicyResult[]): PolicyResult {
  const violations: PolicyViolation[] = [];
  const logged: PolicyViolation[] = [];
  let decision: PolicyDecision = "allow";
  for (const r of results) {
    if (r.decision === "block") decision = "block";
    violations.push(...r.violations);
    if (r.logged) logged.push(...r.logged);
  }
  return logged.length ? { decision, violations, logged } : { decision, violations };
}
