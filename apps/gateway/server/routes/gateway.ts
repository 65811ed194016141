import http from "node:http";

import { flattenHeaders, json, readBody, safeDecodeSegment } from "../httpUtils.js";
import { runProxySession, type ProxyDeps } from "../proxy/orchestrator.js";
import { NodeResponseSink } from "../proxy/sink.js";
import { adapterFor, providerBaseUrl } from "../providers/resolve.js";
import { isProviderId, type ProviderId } from "../providers/types.js";

export const GATEWAY_PREFIX = "/api/v1/gateway/";

export type ProviderRoute = {
  projectName?: string;
  provider: ProviderId;
  /** Upstream path, always starting with "/". */
  path: string;
};

/**
 * `/api/v1/gateway/{project}/{provider}/{path...}` or, without a project,
 * `/api/v1/gateway/{provider}/{path...}`. A first segment naming a provider
 * is always read as the provider.
 */
export function parseProviderRoute(pathname: string): ProviderRoute | null {
  if (!pathname.startsWith(GATEWAY_PREFIX)) return null;
  const segs = pathname.slice(GATEWAY_PREFIX.length).split("/");

  const first = safeDecodeSegment(segs[0] ?? "");
  if (!first) return null;
  if (isProviderId(first)) return { provider: first, path: "/" + segs.slice(1).join("/") };

  const second = safeDecodeSegment(segs[1] ?? "");
  if (!second || !isProviderId(second)) return null;
  return { projectName: first, provider: second, path: "/" + segs.slice(2).join("/") };
}

export async function handleProviderRoute(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: ProxyDeps,
  url: URL
) {
  const route = parseProviderRoute(url.pathname);
  if (!route) return json(res, 404, { ok: false, error: { code: "unknown_provider", message: "Unknown provider route" } });

  const body = await readBody(req);
  const sink = new NodeResponseSink(res);
  await runProxySession(
    deps,
    {
      adapter: adapterFor(route.provider),
      projectName: route.projectName,
      baseUrl: providerBaseUrl(deps.config, route.provider),
      inbound: {
        method: req.method ?? "GET",
        path: route.path,
        query: url.searchParams,
        headers: flattenHeaders(req.headers),
        body
      }
    },
    sink
  );
}
