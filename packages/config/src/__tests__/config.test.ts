import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { coerceBool, coerceConfig, deepMerge } from "../coerce.js";
import { envOverrides } from "../env.js";
import { joinUrl } from "../index.js";
import { ensureLocalConfig, guardrailsApiUrl, loadGatewayConfig } from "../store.js";
import { DEFAULT_GATEWAY_CONFIG } from "../types.js";

describe("coerceConfig", () => {
  it("fills every field from defaults for an empty table", () => {
    expect(coerceConfig({})).toEqual({
      ...DEFAULT_GATEWAY_CONFIG,
      trace_store: { base_url: "http://localhost:8000", api_key: undefined },
      guardrails: { file_path: undefined, api_url: undefined, fail_closed: false }
    });
  });

  it("rejects out-of-range ports and tiny timeouts", () => {
    const cfg = coerceConfig({
      server: { port: 70000 },
      upstream: { connect_timeout_ms: 5, read_timeout_ms: "2500" }
    });
    expect(cfg.server.port).toBe(8005);
    expect(cfg.upstream.connect_timeout_ms).toBe(10_000);
    expect(cfg.upstream.read_timeout_ms).toBe(2500);
  });

  it("strips trailing slashes from URLs", () => {
    const cfg = coerceConfig({
      providers: { openai: { base_url: "http://llm.local/v1///" } },
      guardrails: { api_url: "http://guard.local/" }
    });
    expect(cfg.providers.openai.base_url).toBe("http://llm.local/v1");
    expect(cfg.guardrails.api_url).toBe("http://guard.local");
  });
});

describe("coerceBool", () => {
  it("reads common spellings and falls back otherwise", () => {
    expect(coerceBool("yes", false)).toBe(true);
    expect(coerceBool("OFF", true)).toBe(false);
    expect(coerceBool(0, true)).toBe(false);
    expect(coerceBool("maybe", true)).toBe(true);
  });
});

describe("deepMerge", () => {
  it("merges nested tables and lets the right side win", () => {
    expect(deepMerge({ server: { host: "a", port: 1 } }, { server: { port: 2 } })).toEqual({
      server: { host: "a", port: 2 }
    });
  });
});

describe("envOverrides", () => {
  it("maps set variables onto their sections and skips blanks", () => {
    expect(envOverrides({ PORT: " 9000 ", TRACE_STORE_URL: "http://store.local", GUARDRAILS_API_URL: "  " })).toEqual({
      server: { port: "9000" },
      trace_store: { base_url: "http://store.local" }
    });
  });
});

describe("loadGatewayConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("layers committed file, local file and environment", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tracegate-config-"));
    fs.writeFileSync(
      path.join(dir, "tracegate.config.toml"),
      '[server]\nport = 8100\nhost = "0.0.0.0"\n\n[trace_store]\nbase_url = "http://store.local"\n'
    );
    fs.writeFileSync(path.join(dir, "tracegate.config.local.toml"), "[server]\nport = 8200\n");

    const { rootDir, config } = loadGatewayConfig(dir, { GATEWAY_DEV_MODE: "true" });

    expect(rootDir).toBe(path.resolve(dir));
    expect(config.server).toEqual({ host: "0.0.0.0", port: 8200, dev: true });
    expect(config.trace_store.base_url).toBe("http://store.local");
    expect(guardrailsApiUrl(config)).toBe("http://store.local");
  });

  it("creates the local overrides file once", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tracegate-config-"));
    fs.writeFileSync(path.join(dir, "tracegate.config.toml"), "");

    expect(ensureLocalConfig(dir).created).toBe(true);
    expect(ensureLocalConfig(dir).created).toBe(false);
  });
});

describe("joinUrl", () => {
  it("joins without doubling slashes", () => {
    expect(joinUrl("http://a/v1/", "/chat/completions")).toBe("http://a/v1/chat/completions");
    expect(joinUrl("http://a/", "")).toBe("http://a");
  });
});
