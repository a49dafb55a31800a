import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createNewsCore,
  isNewsCategory,
  loadConfig,
  requestHeadlines,
  selectFeedState,
  selectIsBookmarked,
  toggleBookmark,
  type ArticleRecord,
  type NewsCore,
  type NewsFeedClient,
} from './index';
import { ok } from './types/result';

const article: ArticleRecord = {
  title: 'Chip exports rise',
  description: 'Shipments grew for a third month.',
  url: 'https://example.com/chips',
  imageUrl: '',
  publishedAt: '2024-05-01T10:00:00Z',
  source: 'Example Wire',
};

describe('createNewsCore', () => {
  let core: NewsCore;
  let feedClient: NewsFeedClient;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    feedClient = {
      fetchHeadlines: vi.fn<NewsFeedClient['fetchHeadlines']>().mockResolvedValue(ok([article])),
      search: vi.fn<NewsFeedClient['search']>().mockResolvedValue(ok([])),
    };
    const config = loadConfig({ NEWS_API_KEY: 'test-key', BOOKMARKS_DB_PATH: ':memory:' });
    core = createNewsCore(config, { feedClient });
  });

  afterEach(async () => {
    await core.close();
  });

  it('shares one feed client and one bookmark store with the state store', async () => {
    await core.store.dispatch(requestHeadlines('technology'));
    await core.store.dispatch(toggleBookmark(article));

    expect(core.feedClient).toBe(feedClient);
    expect(selectFeedState(core.store.getState())).toEqual({ status: 'loaded', articles: [article] });
    expect(selectIsBookmarked(core.store.getState(), article.url)).toBe(true);
    expect(await core.bookmarkStore.list()).toEqual({ ok: true, value: [article] });
  });

  it('reopens the bookmark database lazily after close', async () => {
    await core.bookmarkStore.add(article);
    await core.close();

    // A fresh in-memory database starts empty.
    expect(await core.bookmarkStore.list()).toEqual({ ok: true, value: [] });
  });
});

describe('isNewsCategory', () => {
  it('accepts the known categories only', () => {
    expect(isNewsCategory('business')).toBe(true);
    expect(isNewsCategory('weather')).toBe(false);
  });
});
