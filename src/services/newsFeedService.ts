import axios, { isAxiosError, type CreateAxiosDefaults } from 'axios';
import type { ArticleRecord } from '../types/article';
import { err, ok, type Result } from '../types/result';
import {
  normalizeUpstreamArticles,
  UpstreamEnvelopeSchema,
  UpstreamErrorBodySchema,
} from '../schemas/articleSchema';
import type { NewsApiConfig } from './apiConfig';
import { FetchError } from './errors';

export type FeedResult = Result<ArticleRecord[], FetchError>;

export interface NewsFeedClient {
  fetchHeadlines: (category?: string) => Promise<FeedResult>;
  search: (query: string) => Promise<FeedResult>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const upstreamMessage = (status: number, body: unknown) => {
  const parsed = UpstreamErrorBodySchema.safeParse(body);
  const detail = parsed.success ? parsed.data.message ?? parsed.data.code : undefined;
  return detail ? `Upstream responded with ${status}: ${detail}` : `Upstream responded with ${status}`;
};

/**
 * Folds any failure raised while talking to the upstream into a {@link FetchError}.
 */
export const classifyFetchError = (error: unknown): FetchError => {
  if (error instanceof FetchError) return error;

  // Cancellation only comes from the request deadline signal.
  if (axios.isCancel(error)) {
    return new FetchError('Timeout', 'Request exceeded its deadline', { cause: error });
  }

  if (isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new FetchError('Timeout', error.message || 'Request timed out', { cause: error });
    }
    if (error.response) {
      const { status, data } = error.response;
      if (status >= 200 && status < 300) {
        return new FetchError('Decode', error.message || 'Response body could not be parsed', {
          cause: error,
        });
      }
      return new FetchError('Upstream', upstreamMessage(status, data), { status, cause: error });
    }
    return new FetchError('Network', error.message || 'Network request failed', { cause: error });
  }

  const message = error instanceof Error ? error.message : 'Network request failed';
  return new FetchError('Network', message, { cause: error });
};

export const decodeArticlesPayload = (payload: unknown): FeedResult => {
  const envelope = UpstreamEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return err(
      new FetchError('Decode', 'Response body did not contain an articles array', {
        cause: envelope.error,
      }),
    );
  }

  const normalized = normalizeUpstreamArticles(envelope.data.articles);
  if (normalized.rejectedCount > 0) {
    console.warn(
      `[NewsFeed] Dropped ${normalized.rejectedCount} malformed article record(s) from response.`,
    );
  }
  return ok(normalized.articles);
};

/**
 * Builds the long-lived feed client. The axios instance is configured once and
 * reused for every request.
 */
export const createNewsFeedClient = (
  config: NewsApiConfig,
  httpDefaults: CreateAxiosDefaults = {},
): NewsFeedClient => {
  const http = axios.create({
    ...httpDefaults,
    baseURL: config.baseUrl,
    timeout: config.receiveTimeoutMs,
  });

  http.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (isAxiosError(error)) {
        const method = error.config?.method?.toUpperCase() ?? 'GET';
        const outcome = error.response?.status ?? error.code ?? 'no response';
        console.error(`[NewsFeed] ${method} ${error.config?.url ?? ''} failed (${outcome})`);
      }
      return Promise.reject(error);
    },
  );

  // The connect phase has no separate knob in the http adapter, so it is bounded
  // by an overall deadline covering connect plus receive.
  const deadlineMs = config.connectTimeoutMs + config.receiveTimeoutMs;

  const getArticles = async (
    path: string,
    params: Record<string, string>,
  ): Promise<FeedResult> => {
    try {
      const response = await http.get<unknown>(path, {
        params: { apiKey: config.apiKey, ...params },
        signal: AbortSignal.timeout(deadlineMs),
      });
      return decodeArticlesPayload(response.data);
    } catch (error: unknown) {
      return err(classifyFetchError(error));
    }
  };

  return {
    fetchHeadlines: (category) =>
      getArticles('/top-headlines', {
        country: config.country,
        ...(category ? { category } : {}),
      }),
    search: (query) => getArticles('/everything', { q: query }),
  };
};
