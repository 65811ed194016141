import type { RawConfig } from "./coerce.js";

type EnvBinding = {
  name: string;
  section: string;
  key: string;
};

/**
 * Environment variables that override TOML values. They are applied after the
 * local overrides file, so container deployments can run without any TOML.
 */
export const ENV_BINDINGS: readonly EnvBinding[] = [
  { name: "PORT", section: "server", key: "port" },
  { name: "GATEWAY_HOST", section: "server", key: "host" },
  { name: "GATEWAY_DEV_MODE", section: "server", key: "dev" },
  { name: "TRACE_STORE_URL", section: "trace_store", key: "base_url" },
  { name: "TRACE_STORE_API_KEY", section: "trace_store", key: "api_key" },
  { name: "GUARDRAILS_FILE_PATH", section: "guardrails", key: "file_path" },
  { name: "GUARDRAILS_API_URL", section: "guardrails", key: "api_url" }
];

export function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const out: Record<string, Record<string, string>> = {};
  for (const b of ENV_BINDINGS) {
    const v = env[b.name];
    if (typeof v !== "string" || !v.trim()) continue;
    (out[b.section] ??= {})[b.key] = v.trim();
  }
  return out;
}
