/**
 * Firecrawl web provider
 * Search + scrape; pages shorter than a paragraph are dropped
 */

import { z } from "zod";
import type { EvidenceDocument } from "../../schemas/evidence.js";
import { requestJson } from "./http.js";
import type { EvidenceProvider, ProviderResult } from "./types.js";

const FIRECRAWL_URL = "https://api.firecrawl.dev/v1/search";
const MIN_CONTENT_LENGTH = 100;
const MAX_CONTENT_LENGTH = 2000;

const FirecrawlResponseSchema = z.object({
  success: z.boolean().optional(),
  data: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        markdown: z.string().nullish(),
      })
    )
    .default([]),
});

export interface FirecrawlOptions {
  apiKey: string;
  limit?: number;
}

export class FirecrawlProvider implements EvidenceProvider {
  readonly id = "firecrawl";
  readonly kind = "web" as const;

  constructor(private readonly options: FirecrawlOptions) {}

  async fetch(query: string, domain: string, signal: AbortSignal): Promise<ProviderResult> {
    const response = await requestJson(this.id, FIRECRAWL_URL, FirecrawlResponseSchema, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        query: `${query} ${domain} market analysis trends`,
        limit: this.options.limit ?? 8,
        scrapeOptions: { formats: ["markdown"] },
      },
      signal,
    });

    const documents: EvidenceDocument[] = [];
    for (const item of response.data) {
      const content = item.markdown ?? item.description ?? "";
      if (content.length < MIN_CONTENT_LENGTH) continue;
      documents.push({
        title: item.title ?? item.url,
        url: item.url,
        snippet: content.slice(0, MAX_CONTENT_LENGTH),
      });
    }

    return { documents, reliability: 0.7 };
  }
}
