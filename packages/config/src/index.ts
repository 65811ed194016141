export * from "./types.js";
export { clampPort, coerceBool, coerceConfig, coerceOptionalString, deepMerge, isRecord, type RawConfig } from "./coerce.js";
export { ENV_BINDINGS, envOverrides } from "./env.js";
export { CONFIG_FILE_NAME, LOCAL_CONFIG_FILE_NAME, findProjectRoot } from "./root.js";
export { ensureLocalConfig, guardrailsApiUrl, loadGatewayConfig, type LoadedGatewayConfig } from "./store.js";
export { preflightListen, type PreflightResult } from "./preflight.js";

/**
 * Join a base URL and a path without doubling or dropping slashes.
 */
export function joinUrl(baseUrl: string, p: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  const suffix = p.replace(/^\/+/, "");
  return suffix ? `${base}/${suffix}` : base;
}
