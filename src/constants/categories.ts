export const NEWS_CATEGORIES = [
  'business',
  'entertainment',
  'health',
  'science',
  'sports',
  'technology',
] as const;

export type NewsCategory = (typeof NEWS_CATEGORIES)[number];

export const DEFAULT_CATEGORY: NewsCategory = 'business';

export const isNewsCategory = (value: string): value is NewsCategory =>
  (NEWS_CATEGORIES as readonly string[]).includes(value);
