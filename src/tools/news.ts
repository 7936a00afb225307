import { z } from 'zod';
import { defineFunction, type Tool } from '../types';
import { getJson, parseResponse, type QueryParams } from './http';
import { hasParams, limitParam, nullable, omitNull, twoLetterCode } from './params';

const NEWS_API_BASE = 'https://newsapi.org';

export const NEWS_CATEGORIES = [
  'business',
  'entertainment',
  'general',
  'health',
  'science',
  'sports',
  'technology',
] as const;

export interface NewsToolOptions {
  apiKey: string;
  baseUrl?: string;
}

export type Article = {
  title: string;
  description: string | null;
  source: string | null;
  author: string | null;
  url: string;
  imageUrl: string | null;
  publishedAt: string | null;
};

export type NewsResults = {
  query: string | null;
  category: string | null;
  totalResults: number;
  returnedCount: number;
  articles: Article[];
};

const ArticlesSchema = z.object({
  totalResults: z.number().default(0),
  articles: z.array(
    z.object({
      source: nullable(z.object({ name: nullable(z.string()) })),
      author: nullable(z.string()),
      title: z.string(),
      description: nullable(z.string()),
      url: z.string(),
      urlToImage: nullable(z.string()),
      publishedAt: nullable(z.string()),
    })
  ),
});

/** NewsAPI 对已删除的文章返回标题为 "[Removed]" 的占位条目 */
const REMOVED_MARKER = '[Removed]';

function toResults(body: unknown, limit: number, query: string | null, category: string | null): NewsResults {
  const data = parseResponse('news', ArticlesSchema, body);
  const articles = data.articles
    .filter((article) => article.title !== REMOVED_MARKER)
    .slice(0, limit)
    .map((article) => ({
      title: article.title,
      description: article.description,
      source: article.source?.name ?? null,
      author: article.author,
      url: article.url,
      imageUrl: article.urlToImage,
      publishedAt: article.publishedAt,
    }));
  return { query, category, totalResults: data.totalResults, returnedCount: articles.length, articles };
}

export function summarizeNews({ articles }: NewsResults): string {
  if (articles.length === 0) return 'No articles found.';
  return articles
    .slice(0, 5)
    .flatMap((article) => {
      const lines = [
        `- **${article.title}**`,
        `  Source: ${article.source ?? 'Unknown'} | ${article.publishedAt?.slice(0, 10) ?? 'N/A'}`,
      ];
      if (article.description) {
        const text = article.description;
        lines.push(`  ${text.length > 150 ? `${text.slice(0, 150)}...` : text}`);
      }
      return lines;
    })
    .join('\n');
}

export function createNewsTool({ apiKey, baseUrl = NEWS_API_BASE }: NewsToolOptions): Tool {
  const request = (path: string, params: QueryParams) =>
    getJson(`${baseUrl}${path}`, { tool: 'news', params, headers: { 'X-Api-Key': apiKey } });

  const searchNews = defineFunction({
    name: 'search_news',
    description: 'Search news articles from the last month by keyword',
    parameters: z.object({
      query: z.string().trim().min(1).describe('Search keywords'),
      limit: limitParam(5).describe('Maximum number of articles (1-100, default 5)'),
      sort_by: omitNull(z.enum(['relevancy', 'popularity', 'publishedAt']).default('publishedAt')).describe(
        'relevancy, popularity or publishedAt'
      ),
      language: twoLetterCode('en').describe('Two-letter language code (default en)'),
    }),
    handler: async ({ query, limit, sort_by, language }): Promise<NewsResults> => {
      console.log(`[News] Searching news for: ${query}`);
      const body = await request('/v2/everything', { q: query, pageSize: limit, sortBy: sort_by, language });
      return toResults(body, limit, query, null);
    },
    summarize: summarizeNews,
  });

  const getTopHeadlines = defineFunction({
    name: 'get_top_headlines',
    description: 'Get the top headlines, optionally for a category and/or keyword',
    parameters: z.object({
      category: omitNull(z.string().trim().toLowerCase().pipe(z.enum(NEWS_CATEGORIES)).optional()).describe(
        `One of: ${NEWS_CATEGORIES.join(', ')}`
      ),
      country: twoLetterCode('us').describe('Two-letter country code (default us)'),
      query: omitNull(z.string().trim().min(1).optional()).describe('Optional keywords'),
      limit: limitParam(5).describe('Maximum number of articles (1-100, default 5)'),
    }),
    handler: async ({ category, country, query, limit }): Promise<NewsResults> => {
      console.log(`[News] Getting top headlines (category: ${category ?? 'any'}, country: ${country})`);
      const body = await request('/v2/top-headlines', { category, country, q: query, pageSize: limit });
      return toResults(body, limit, query ?? null, category ?? null);
    },
    summarize: summarizeNews,
  });

  return {
    name: 'news',
    description: 'NewsAPI integration for searching news articles and getting top headlines',
    functions: [searchNews, getTopHeadlines],
    inferFunction: (parameters, description) =>
      /headline|top/i.test(description) || hasParams(parameters, 'category')
        ? 'get_top_headlines'
        : 'search_news',
  };
}
