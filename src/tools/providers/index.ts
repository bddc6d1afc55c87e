/**
 * Provider registry
 * Builds the enabled providers from config; a provider without an API key
 * is skipped with a warning rather than failing every run.
 */

import type { Config, ProviderId } from "../../core/config.js";
import { logger } from "../../core/logger.js";
import { CachedProvider } from "./cached.js";
import { FirecrawlProvider } from "./firecrawl.js";
import { NewsDataProvider } from "./newsdata.js";
import { TavilyProvider } from "./tavily.js";
import type { EvidenceProvider } from "./types.js";

export type { EvidenceProvider, ProviderResult } from "./types.js";
export { CachedProvider } from "./cached.js";
export { FirecrawlProvider } from "./firecrawl.js";
export { NewsDataProvider } from "./newsdata.js";
export { TavilyProvider } from "./tavily.js";
export { classifyStatus } from "./http.js";

const FACTORIES: Record<ProviderId, (apiKey: string) => EvidenceProvider> = {
  firecrawl: (apiKey) => new FirecrawlProvider({ apiKey }),
  newsdata: (apiKey) => new NewsDataProvider({ apiKey }),
  tavily: (apiKey) => new TavilyProvider({ apiKey }),
};

export function createProviders(config: Config): EvidenceProvider[] {
  const providers: EvidenceProvider[] = [];

  for (const id of config.providers.enabled) {
    const apiKey = config.providers.keys[id];
    if (!apiKey) {
      logger.warn(`Provider ${id} enabled but no API key configured - skipping`, { provider: id });
      continue;
    }
    providers.push(new CachedProvider(FACTORIES[id](apiKey), config.providers.cache));
  }

  return providers;
}
