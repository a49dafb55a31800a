import { z } from 'zod';
import { defaultBookmarksDbPath } from './appPaths';
import { ConfigError } from './errors';

export const DEFAULT_NEWS_API_URL = 'https://newsapi.org/v2';
export const DEFAULT_TIMEOUT_MS = 10000;

const normalizeBaseUrl = (url: string) => url.trim().replace(/\/+$/, '');

const timeoutMs = z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS);

const EnvSchema = z.object({
  NEWS_API_KEY: z.string().trim().min(1, 'NEWS_API_KEY is required'),
  NEWS_API_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_NEWS_API_URL)
    .transform(normalizeBaseUrl),
  NEWS_COUNTRY: z
    .string()
    .trim()
    .regex(/^[a-z]{2}$/i, 'NEWS_COUNTRY must be a two-letter country code')
    .default('us')
    .transform((value) => value.toLowerCase()),
  NEWS_CONNECT_TIMEOUT_MS: timeoutMs,
  NEWS_RECEIVE_TIMEOUT_MS: timeoutMs,
  BOOKMARKS_DB_PATH: z.string().trim().min(1).optional(),
});

export interface NewsApiConfig {
  baseUrl: string;
  apiKey: string;
  country: string;
  connectTimeoutMs: number;
  receiveTimeoutMs: number;
}

export interface AppConfig {
  newsApi: NewsApiConfig;
  bookmarksDbPath: string;
}

// Empty strings count as unset so a blank line in an env file falls back to the default.
const withoutBlanks = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    newsApi: {
      baseUrl: values.NEWS_API_BASE_URL,
      apiKey: values.NEWS_API_KEY,
      country: values.NEWS_COUNTRY,
      connectTimeoutMs: values.NEWS_CONNECT_TIMEOUT_MS,
      receiveTimeoutMs: values.NEWS_RECEIVE_TIMEOUT_MS,
    },
    bookmarksDbPath: values.BOOKMARKS_DB_PATH ?? defaultBookmarksDbPath(env),
  };
};
