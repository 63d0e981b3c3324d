/**
 * Web search through the DuckDuckGo Instant Answer API.
 */
import { createTool } from '@inngest/agent-kit';
import { z } from 'zod';
import { fetchJson } from './http';

const DUCKDUCKGO_URL = 'https://api.duckduckgo.com/';

interface RelatedTopic {
  Text?: string;
  FirstURL?: string;
  Topics?: RelatedTopic[];
}

const relatedTopicSchema: z.ZodType<RelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(relatedTopicSchema).optional(),
  })
);

const instantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  Answer: z.union([z.string(), z.number()]).optional(),
  RelatedTopics: z.array(relatedTopicSchema).default([]),
});

export interface SearchHit {
  title: string;
  url: string;
}

function flattenTopics(topics: RelatedTopic[]): SearchHit[] {
  return topics.flatMap((topic) => {
    if (topic.Topics) return flattenTopics(topic.Topics);
    return topic.Text && topic.FirstURL ? [{ title: topic.Text, url: topic.FirstURL }] : [];
  });
}

export function createDuckDuckGoSearchTool(maxResults: number) {
  return createTool({
    name: 'duckduckgo_search',
    description: 'Search the web with DuckDuckGo. Returns a summary answer when one exists and related links.',
    parameters: z.object({
      query: z.string().describe('Search query'),
    }),
    handler: async ({ query }) => {
      const params = new URLSearchParams({ q: query, format: 'json', no_html: '1', skip_disambig: '1' });
      const result = await fetchJson(`${DUCKDUCKGO_URL}?${params.toString()}`, instantAnswerSchema);
      if (!result.ok) {
        return { error: result.error, query };
      }

      const { data } = result;
      return {
        query,
        heading: data.Heading ?? null,
        answer: data.Answer !== undefined ? String(data.Answer) : null,
        abstract: data.AbstractText || null,
        source: data.AbstractURL || null,
        results: flattenTopics(data.RelatedTopics).slice(0, maxResults),
      };
    },
  });
}
