#!/usr/bin/env tsx
import { ensureLocalConfig, findProjectRoot, guardrailsApiUrl, loadGatewayConfig, preflightListen } from "@tracegate/config";
import { buildGatewayDeps, startGateway } from "@tracegate/gateway/app";
import { McpBridge } from "@tracegate/gateway/mcp/bridge";
import { McpStdioBridge } from "@tracegate/gateway/mcp/stdioBridge";

import { UsageError, parseMcpArgs } from "./args.js";

function printHelp(): void {
  // stderr: under `mcp`, stdout belongs to the protocol.
  console.error(`
tracegate CLI

Usage:
  tracegate serve                 Start the gateway
  tracegate mcp --project-name <name> [--push-explorer] --exec <cmd> [args...]
                                  Wrap a stdio MCP server (token from GATEWAY_API_KEY)
  tracegate config init           Create tracegate.config.local.toml if missing
  tracegate doctor                Basic environment/config checks
  tracegate -h | --help           Show help
`.trim());
}

async function serve() {
  const loaded = loadGatewayConfig(process.cwd());
  ensureLocalConfig(loaded.rootDir);
  const gw = await startGateway(loaded);

  const stop = () => {
    void gw.close().then(() => process.exit(0));
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

async function mcp(argv: string[]): Promise<number> {
  const args = parseMcpArgs(argv);
  const { config, rootDir } = loadGatewayConfig(process.cwd());
  const deps = buildGatewayDeps(config, { rootDir });
  const token = process.env.GATEWAY_API_KEY?.trim() || config.trace_store.api_key;
  if (!token) console.warn("[mcp] GATEWAY_API_KEY is not set: no tracing, no guardrails");

  const bridge = new McpBridge({
    store: deps.store,
    guardrails: deps.guardrails,
    projectName: args.projectName,
    pushExplorer: args.pushExplorer,
    token,
    transport: "stdio",
    label: `stdio:${args.command}`
  });

  const child = McpStdioBridge.spawn({
    command: args.command,
    argv: args.argv,
    env: process.env,
    bridge,
    label: args.command
  });
  const forward = (signal: NodeJS.Signals) => child.kill(signal);
  process.on("SIGINT", forward);
  process.on("SIGTERM", forward);

  return await child.exited;
}

async function doctor() {
  const { rootDir, configPath, config } = loadGatewayConfig(findProjectRoot(process.cwd()));
  const { host, port } = config.server;

  console.log(`rootDir:      ${rootDir}`);
  console.log(`config:       ${configPath}`);
  console.log(`gateway:      ${host}:${port}`);
  for (const [id, p] of Object.entries(config.providers)) console.log(`${`${id}:`.padEnd(14)}${p.base_url}`);
  console.log(`trace store:  ${config.trace_store.base_url}`);
  console.log(`guardrails:   ${guardrailsApiUrl(config)}${config.guardrails.fail_closed ? " (fail closed)" : ""}`);
  console.log(`policy file:  ${config.guardrails.file_path ?? "(none)"}`);
  console.log(`GATEWAY_API_KEY: ${process.env.GATEWAY_API_KEY ? "set" : "missing"}`);

  const pre = await preflightListen(host, port);
  console.log(`port:         ${pre.ok ? "available" : (pre.hint ?? pre.error)}`);
}

async function main(argv: string[]): Promise<number> {
  if (argv.length === 0 || argv[0] === "-h" || argv[0] === "--help") {
    printHelp();
    return 0;
  }

  const cmd = argv[0];
  switch (cmd) {
    case "serve":
      await serve();
      return 0;

    case "mcp":
      // The client's stdin may still hold the event loop open.
      process.exit(await mcp(argv.slice(1)));

    case "config": {
      if (argv[1] === "init") {
        const { localPath, created } = ensureLocalConfig(findProjectRoot(process.cwd()));
        console.log(`ok: ${localPath} ${created ? "created" : "already exists"}`);
        return 0;
      }
      printHelp();
      return 1;
    }

    case "doctor":
      await doctor();
      return 0;

    default:
      console.error(`Unknown command: ${cmd}`);
      printHelp();
      return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (e: unknown) => {
    if (e instanceof UsageError) {
      console.error(`error: ${e.message}`);
      printHelp();
    } else {
      console.error("[tracegate] fatal:", e);
    }
    process.exitCode = 1;
  }
);
