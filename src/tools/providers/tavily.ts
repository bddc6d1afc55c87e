/**
 * Tavily search provider
 */

import { z } from "zod";
import { requestJson } from "./http.js";
import type { EvidenceProvider, ProviderResult } from "./types.js";

const TAVILY_URL = "https://api.tavily.com/search";

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
        content: z.string().default(""),
        score: z.number().optional(),
        published_date: z.string().optional(),
      })
    )
    .default([]),
});

export interface TavilyOptions {
  apiKey: string;
  maxResults?: number;
}

export class TavilyProvider implements EvidenceProvider {
  readonly id = "tavily";
  readonly kind = "search" as const;

  constructor(private readonly options: TavilyOptions) {}

  async fetch(query: string, domain: string, signal: AbortSignal): Promise<ProviderResult> {
    const response = await requestJson(this.id, TAVILY_URL, TavilyResponseSchema, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        query: `${query} ${domain} news trends competitors`,
        search_depth: "advanced",
        include_answer: false,
        max_results: this.options.maxResults ?? 10,
      },
      signal,
    });

    const documents = response.results.map((r) => ({
      title: r.title || r.url,
      url: r.url,
      snippet: r.content.slice(0, 2000),
      publishedAt: r.published_date,
    }));

    // Tavily scores each hit; the mean is the best reliability signal we get
    const scores = response.results.flatMap((r) => (r.score === undefined ? [] : [r.score]));
    const reliability =
      scores.length > 0 ? Math.min(1, Math.max(0, scores.reduce((a, b) => a + b, 0) / scores.length)) : 0.6;

    return { documents, reliability };
  }
}
