import fs from "node:fs";
import path from "node:path";
import * as TOML from "@iarna/toml";

import { coerceConfig, deepMerge, isRecord, type RawConfig } from "./coerce.js";
import { envOverrides } from "./env.js";
import { CONFIG_FILE_NAME, LOCAL_CONFIG_FILE_NAME, findProjectRoot } from "./root.js";
import type { GatewayConfig } from "./types.js";

function tryReadToml(filePath: string): RawConfig {
  try {
    if (!fs.existsSync(filePath)) return {};
    const txt = fs.readFileSync(filePath, "utf-8");
    const parsed: unknown = TOML.parse(txt);
    return isRecord(parsed) ? parsed : {};
  } catch (e) {
    console.warn(`[config] ignoring unreadable ${path.basename(filePath)}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

/**
 * Ensure tracegate.config.local.toml exists.
 * Best-effort: failures should not crash startup.
 */
export function ensureLocalConfig(rootDir: string = findProjectRoot(process.cwd())): {
  rootDir: string;
  localPath: string;
  created: boolean;
} {
  const localPath = path.join(rootDir, LOCAL_CONFIG_FILE_NAME);
  if (fs.existsSync(localPath)) return { rootDir, localPath, created: false };

  try {
    // "wx" = write only if not exists (prevents clobbering)
    fs.writeFileSync(localPath, "# tracegate local overrides (gitignored)\n", { encoding: "utf-8", flag: "wx" });
    return { rootDir, localPath, created: true };
  } catch {
    return { rootDir, localPath, created: false };
  }
}

export type LoadedGatewayConfig = {
  rootDir: string;
  configPath: string;
  localPath: string;
  config: GatewayConfig;
  raw: RawConfig;
};

export function loadGatewayConfig(
  startDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): LoadedGatewayConfig {
  const rootDir = findProjectRoot(startDir);
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  const localPath = path.join(rootDir, LOCAL_CONFIG_FILE_NAME);

  const base = tryReadToml(configPath);
  const local = tryReadToml(localPath);

  const merged = deepMerge(deepMerge(base, local), envOverrides(env));
  const config = coerceConfig(merged);

  return { rootDir, configPath, localPath, config, raw: merged };
}

/** Guardrails service URL, falling back to the trace store. */
export function guardrailsApiUrl(config: GatewayConfig): string {
  return config.guardrails.api_url ?? config.trace_store.base_url;
}
