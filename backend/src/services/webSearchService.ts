import { z } from "zod";
import { createLogger } from "../logger.js";

const log = createLogger("WebSearch");

const SEARCH_ENDPOINT = "https://api.duckduckgo.com/";

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
};

export type FetchLike = (input: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<Response>;

type RelatedTopic = {
  Text?: string;
  FirstURL?: string;
  Topics?: RelatedTopic[];
};

const relatedTopicSchema: z.ZodType<RelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(relatedTopicSchema).optional()
  })
);

const instantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  Results: z.array(relatedTopicSchema).optional(),
  RelatedTopics: z.array(relatedTopicSchema).optional()
});

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&apos;": "'",
  "&nbsp;": " "
};

export function stripHtml(html: string): string {
  return html
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[\s\S]*?<\/style>/gi, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

function titleFromTopic(text: string): string {
  const separator = text.indexOf(" - ");
  return separator > 0 ? text.slice(0, separator) : text;
}

function flattenTopics(topics: RelatedTopic[]): RelatedTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

export class WebSearchService {
  constructor(private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)) {}

  async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const url = `${SEARCH_ENDPOINT}?q=${encodeURIComponent(query)}&format=json&no_html=1&skip_disambig=1`;
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      throw new Error(`Web search request failed: ${response.status}`);
    }

    const body = instantAnswerSchema.parse(await response.json());
    const results: SearchResult[] = [];

    if (body.AbstractText && body.AbstractURL) {
      results.push({
        title: body.Heading || query,
        url: body.AbstractURL,
        snippet: body.AbstractText
      });
    }

    for (const topic of flattenTopics([...(body.Results || []), ...(body.RelatedTopics || [])])) {
      if (!topic.Text || !topic.FirstURL) {
        continue;
      }
      results.push({ title: titleFromTopic(topic.Text), url: topic.FirstURL, snippet: topic.Text });
    }

    log.debug(`Search "${query}" returned ${results.length} results`);
    return results;
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(url, { signal, headers: { Accept: "text/html, text/plain, */*" } });
    if (!response.ok) {
      throw new Error(`Request to ${url} failed: ${response.status}`);
    }
    return response.text();
  }
}
