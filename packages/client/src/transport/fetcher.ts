import { fetch, ProxyAgent, type RequestInit, type Response } from "undici";
import type { ProxyConfig } from "../types.js";

export type { RequestInit, Response };

export type Fetcher = (url: string, init: RequestInit) => Promise<Response>;

function withScheme(proxy: string): string {
  return /^https?:\/\//.test(proxy) ? proxy : `http://${proxy}`;
}

export function resolveProxyUrl(proxy: ProxyConfig | undefined, targetUrl: string): string | undefined {
  if (!proxy) return undefined;
  if (typeof proxy === "string") return withScheme(proxy);

  const selected = new URL(targetUrl).protocol === "https:" ? proxy.https ?? proxy.http : proxy.http;
  return selected ? withScheme(selected) : undefined;
}

/** Plain undici fetch, routed through a `ProxyAgent` per proxy URL when a proxy is configured. */
export function createFetcher(proxy?: ProxyConfig): Fetcher {
  const agents = new Map<string, ProxyAgent>();

  return (url, init) => {
    const proxyUrl = resolveProxyUrl(proxy, url);
    if (!proxyUrl) {
      return fetch(url, init);
    }

    let agent = agents.get(proxyUrl);
    if (!agent) {
      agent = new ProxyAgent(proxyUrl);
      agents.set(proxyUrl, agent);
    }
    return fetch(url, { ...init, dispatcher: agent });
  };
}
