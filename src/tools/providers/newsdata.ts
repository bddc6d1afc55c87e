/**
 * NewsData.io news provider
 *
 * Falls back through progressively broader queries when the combined one
 * finds nothing: "<query> <domain>" → "<query>" → "<domain>".
 */

import { z } from "zod";
import type { EvidenceDocument } from "../../schemas/evidence.js";
import { requestJson } from "./http.js";
import type { EvidenceProvider, ProviderResult } from "./types.js";

const NEWSDATA_URL = "https://newsdata.io/api/1/latest";

const NewsArticleSchema = z.object({
  article_id: z.string().optional(),
  title: z.string().nullish(),
  link: z.string().nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  pubDate: z.string().nullish(),
  source_id: z.string().nullish(),
});

const NewsDataResponseSchema = z.object({
  status: z.string(),
  results: z.array(NewsArticleSchema).nullish(),
});

type NewsArticle = z.infer<typeof NewsArticleSchema>;

export interface NewsDataOptions {
  apiKey: string;
  language?: string;
}

export class NewsDataProvider implements EvidenceProvider {
  readonly id = "newsdata";
  readonly kind = "news" as const;

  constructor(private readonly options: NewsDataOptions) {}

  async fetch(query: string, domain: string, signal: AbortSignal): Promise<ProviderResult> {
    const attempts = [`${query} ${domain}`, query, domain].filter(
      (q, i, all) => all.indexOf(q) === i
    );

    for (const q of attempts) {
      const articles = await this.latest(q, signal);
      const documents = articles.flatMap((a) => toDocument(a));
      if (documents.length > 0) {
        return { documents, reliability: 0.8 };
      }
    }

    return { documents: [], reliability: 0.8 };
  }

  private async latest(q: string, signal: AbortSignal): Promise<NewsArticle[]> {
    const params = new URLSearchParams({
      apikey: this.options.apiKey,
      q: q.slice(0, 100),
      language: this.options.language ?? "en",
    });

    const response = await requestJson(this.id, `${NEWSDATA_URL}?${params}`, NewsDataResponseSchema, {
      signal,
    });

    return response.results ?? [];
  }
}

function toDocument(article: NewsArticle): EvidenceDocument[] {
  const title = article.title?.trim() ?? "";
  const description = article.description?.trim() ?? "";
  if (!title && !description) return [];

  return [
    {
      title: title || description.slice(0, 80),
      url: article.link ?? "",
      snippet: (article.content?.trim() || description).slice(0, 2000),
      publishedAt: article.pubDate ?? undefined,
    },
  ];
}
