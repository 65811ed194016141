import { ensureLocalConfig, loadGatewayConfig } from "@tracegate/config";

import { startGateway } from "./app.js";

async function main() {
  const loaded = loadGatewayConfig(process.cwd());
  ensureLocalConfig(loaded.rootDir);

  const gw = await startGateway(loaded);

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[gateway] ${signal}: flushing ${gw.deps.registry.size} open session(s)`);
    gw.close().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[gateway] shutdown failed:", e);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

main().catch((e) => {
  console.error("[gateway] fatal:", e);
  process.exit(1);
});
