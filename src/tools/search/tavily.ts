import { DynamicStructuredTool } from '@langchain/core/tools';
import { TavilySearch } from '@langchain/tavily';
import { z } from 'zod';
import { declareTool, type ToolDeclaration } from '../types.js';

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().optional(),
      url: z.string(),
      content: z.string().optional(),
    })
  ).default([]),
});

const WebSearchResultSchema = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      snippet: z.string(),
    })
  ),
});

const WebSearchInputSchema = z.object({
  query: z.string().min(1).describe('The search query to look up on the web'),
  maxResults: z.number().int().min(1).max(10).default(5).describe('How many results to return'),
});

export function createWebSearchTool(): ToolDeclaration {
  const tool = new DynamicStructuredTool({
    name: 'web_search',
    description:
      'Search the web for current information such as library documentation or error messages. Returns titles, URLs and content snippets.',
    schema: WebSearchInputSchema,
    func: async (input, _runManager, config) => {
      const client = new TavilySearch({ maxResults: input.maxResults });
      const raw: unknown = await client.invoke({ query: input.query }, { signal: config?.signal });
      const parsed = TavilyResponseSchema.parse(typeof raw === 'string' ? JSON.parse(raw) : raw);
      return {
        results: parsed.results.map(result => ({
          title: result.title ?? '',
          url: result.url,
          snippet: result.content ?? '',
        })),
      };
    },
  });
  return declareTool(tool, { resultSchema: WebSearchResultSchema, timeoutMs: 20_000 });
}
