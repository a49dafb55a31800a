import { z } from 'zod';
import type { ArticleRecord } from '../types/article';

const lenientString = z.string().catch('');

export const UpstreamSourceSchema = z
  .object({
    name: lenientString,
  })
  .catch({ name: '' });

export const UpstreamArticleSchema = z
  .object({
    title: lenientString,
    description: lenientString,
    url: lenientString,
    urlToImage: lenientString,
    publishedAt: lenientString,
    source: UpstreamSourceSchema,
  })
  .transform(
    (item): ArticleRecord => ({
      title: item.title,
      description: item.description,
      url: item.url.trim(),
      imageUrl: item.urlToImage,
      publishedAt: item.publishedAt,
      source: item.source.name,
    }),
  );

export const UpstreamEnvelopeSchema = z.object({
  articles: z.array(z.unknown()),
});

export const UpstreamErrorBodySchema = z.object({
  status: z.literal('error'),
  code: z.string().optional(),
  message: z.string().optional(),
});

export interface NormalizedArticles {
  articles: ArticleRecord[];
  rejectedCount: number;
}

/**
 * Maps raw upstream entries to article records, keeping upstream order.
 * Entries that are not objects or carry no url are dropped and counted.
 */
export const normalizeUpstreamArticles = (entries: unknown[]): NormalizedArticles => {
  const articles: ArticleRecord[] = [];
  let rejectedCount = 0;

  for (const entry of entries) {
    const parsed = UpstreamArticleSchema.safeParse(entry);
    if (!parsed.success || parsed.data.url === '') {
      rejectedCount += 1;
      continue;
    }
    articles.push(parsed.data);
  }

  return { articles, rejectedCount };
};
