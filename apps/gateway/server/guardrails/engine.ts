import crypto from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";

import type { CanonicalMessage } from "../canonical/types.js";
import { errorMessage } from "../errors.js";
import type { ProjectPolicy, TraceStore } from "../trace/types.js";
import { MODULE_POLICY_EXTENSIONS, loadModuleEvaluator } from "./moduleEvaluator.js";
import { PolicyCache } from "./policyCache.js";
import type { GuardrailsServiceClient } from "./serviceClient.js";
import { allow, mergeResults, type GuardrailPolicy, type PolicyEvaluator, type PolicyResult } from "./types.js";

export type GuardrailScope = {
  projectName?: string;
  token?: string;
};

export type GuardrailsEngineOptions = {
  store: TraceStore;
  service: GuardrailsServiceClient;
  /** Local policy file, absolute or relative to rootDir. */
  filePath?: string;
  rootDir?: string;
  /** Evaluation errors block instead of allow. */
  failClosed?: boolean;
  cache?: PolicyCache;
};

type RemoteRule = Pick<ProjectPolicy, "id" | "content" | "action">;

export function tokenFingerprint(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex").slice(0, 16);
}

/**
 * Policy text checked by the guardrails service. Block rules decide;
 * log rules only add trace annotations.
 */
export function remoteEvaluator(service: GuardrailsServiceClient, rules: readonly RemoteRule[]): PolicyEvaluator {
  return {
    async evaluate(prefix, ctx) {
      const token = ctx?.token;
      if (!token || !rules.length) return allow();

      const results = await Promise.all(
        rules.map(async (r): Promise<PolicyResult> => {
          await service.preload(r.content, token);
          const found = await service.check(prefix, r.content, token, r.id);
          if (r.action === "log") return { decision: "allow", violations: [], logged: found };
          return { decision: found.length ? "block" : "allow", violations: found };
        })
      );
      return mergeResults(results);
    }
  };
}

/**
 * Resolves the policy for a request and evaluates it over trace prefixes.
 *
 * Project policies stored with the trace store win over the local file.
 * No token, or no configured source, means allow.
 */
export class GuardrailsEngine {
  readonly cache: PolicyCache;
  private store: TraceStore;
  private service: GuardrailsServiceClient;
  private filePath?: string;
  private failClosed: boolean;

  constructor(opts: GuardrailsEngineOptions) {
    this.store = opts.store;
    this.service = opts.service;
    this.cache = opts.cache ?? new PolicyCache();
    this.failClosed = opts.failClosed ?? false;
    this.filePath = opts.filePath ? path.resolve(opts.rootDir ?? process.cwd(), opts.filePath) : undefined;
  }

  private compileFile(absPath: string): Promise<GuardrailPolicy> {
    return this.cache.getOrCompile(`file:${absPath}`, async () => {
      const ext = path.extname(absPath).toLowerCase();
      if (MODULE_POLICY_EXTENSIONS.some((e) => e === ext)) {
        return { source: { filePath: absPath }, compiled: await loadModuleEvaluator(absPath), ruleCount: 1 };
      }
      const text = await fsp.readFile(absPath, "utf-8");
      const rules: RemoteRule[] = text.trim() ? [{ id: path.basename(absPath), content: text, action: "block" }] : [];
      return { source: { filePath: absPath }, compiled: remoteEvaluator(this.service, rules), ruleCount: rules.length };
    });
  }

  private compileProject(projectName: string, token: string): Promise<GuardrailPolicy> {
    return this.cache.getOrCompile(`project:${projectName}:${tokenFingerprint(token)}`, async () => {
      const policies = await this.store.fetchProjectPolicies(projectName, token);
      return {
        source: { projectName },
        compiled: remoteEvaluator(this.service, policies),
        ruleCount: policies.length
      };
    });
  }

  /** The policy in force for this scope, or null when guardrails are off. */
  async resolvePolicy(scope: GuardrailScope): Promise<GuardrailPolicy | null> {
    if (!scope.token) return null;
    if (scope.projectName) {
      const project = await this.compileProject(scope.projectName, scope.token);
      if (project.ruleCount > 0) return project;
    }
    if (this.filePath) return await this.compileFile(this.filePath);
    return null;
  }

  /**
   * Evaluate the prefix. Errors while resolving or evaluating follow
   * `failClosed`: allow and log by default.
   */
  async check(prefix: readonly CanonicalMessage[], scope: GuardrailScope): Promise<PolicyResult> {
    try {
      const policy = await this.resolvePolicy(scope);
      if (!policy) return allow();
      return await policy.compiled.evaluate(prefix, { token: scope.token });
    } catch (e) {
      const message = errorMessage(e);
      console.warn(`[guardrails] evaluation failed (${this.failClosed ? "blocking" : "allowing"}): ${message}`);
      if (!this.failClosed) return allow();
      return { decision: "block", violations: [{ ruleId: "guardrails-unavailable", message }] };
    }
  }
}
