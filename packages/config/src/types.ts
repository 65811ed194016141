/**
 * Canonical config schema.
 * - tracegate.config.toml: committed defaults (no secrets)
 * - tracegate.config.local.toml: machine-specific overrides (gitignored, may contain secrets)
 * - environment variables: deployment overrides, applied last (see env.ts)
 *
 * Config only affects wiring (where to listen, which upstreams, where traces go);
 * request handling never branches on anything beyond these values.
 */
export type GatewayConfig = {
  server: {
    host: string;
    port: number;
    /** Verbose per-session logging. */
    dev: boolean;
  };

  /**
   * Native endpoints per provider family. The gateway appends the
   * `{upstream_path}` of the inbound route to these.
   */
  providers: {
    openai: { base_url: string };
    anthropic: { base_url: string };
    gemini: { base_url: string };
  };

  upstream: {
    /** Time allowed until upstream response headers arrive. */
    connect_timeout_ms: number;
    /** Time allowed between two upstream reads once streaming. */
    read_timeout_ms: number;
  };

  trace_store: {
    base_url: string;
    /** Used by the stdio MCP wrapper when no per-request token exists. */
    api_key?: string;
  };

  guardrails: {
    /**
     * Local policy file. A .js/.mjs/.cjs module exporting `evaluate(prefix)`,
     * or policy text checked by the remote guardrails service.
     */
    file_path?: string;
    /** Remote guardrails service; defaults to trace_store.base_url. */
    api_url?: string;
    /** When true, an evaluator failure blocks instead of allowing. */
    fail_closed: boolean;
  };
};

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  server: { host: "127.0.0.1", port: 8005, dev: false },
  providers: {
    openai: { base_url: "https://api.openai.com/v1" },
    anthropic: { base_url: "https://api.anthropic.com" },
    gemini: { base_url: "https://generativelanguage.googleapis.com" }
  },
  upstream: { connect_timeout_ms: 10_000, read_timeout_ms: 60_000 },
  trace_store: { base_url: "http://localhost:8000" },
  guardrails: { fail_closed: false }
};
