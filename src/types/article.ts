export interface ArticleRecord {
  title: string;
  description: string;
  /** Identity of the record; used as the bookmark key. */
  url: string;
  imageUrl: string;
  /** ISO-8601 timestamp as delivered upstream. */
  publishedAt: string;
  source: string;
}

export type FeedRequest =
  | { kind: 'headlines'; category?: string }
  | { kind: 'search'; query: string };
