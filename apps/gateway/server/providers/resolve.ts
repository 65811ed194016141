import type { GatewayConfig } from "@tracegate/config";

import { anthropicAdapter } from "./anthropic.js";
import { geminiAdapter } from "./gemini.js";
import { openaiAdapter } from "./openai.js";
import type { ProviderAdapter, ProviderId } from "./types.js";

const ADAPTERS: Record<ProviderId, ProviderAdapter> = {
  openai: openaiAdapter,
  anthropic: anthropicAdapter,
  gemini: geminiAdapter
};

export function adapterFor(id: ProviderId): ProviderAdapter {
  return ADAPTERS[id];
}

export function providerBaseUrl(config: GatewayConfig, id: ProviderId): string {
  return config.providers[id].base_url;
}
