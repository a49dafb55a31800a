import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ArticleRecord } from '../types/article';
import { err, ok } from '../types/result';
import { createBookmarkStore, IN_MEMORY_DATABASE, type BookmarkStore } from '../services/bookmarkStore';
import { StoreError } from '../services/errors';
import type { NewsFeedClient } from '../services/newsFeedService';
import {
  clearBookmarkError,
  loadBookmarks,
  selectBookmarkError,
  selectBookmarks,
  selectIsBookmarked,
  toggleBookmark,
} from './bookmarksSlice';
import { createAppStore } from './index';

const buildArticle = (slug: string): ArticleRecord => ({
  title: `Story ${slug}`,
  description: `About ${slug}`,
  url: `https://example.com/${slug}`,
  imageUrl: `https://example.com/${slug}.jpg`,
  publishedAt: '2024-05-01T10:00:00Z',
  source: 'Example Wire',
});

const idleFeedClient: NewsFeedClient = {
  fetchHeadlines: async () => ok([]),
  search: async () => ok([]),
};

describe('bookmarks view state', () => {
  let bookmarkStore: BookmarkStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    bookmarkStore = createBookmarkStore({ databasePath: IN_MEMORY_DATABASE });
  });

  afterEach(async () => {
    await bookmarkStore.close();
  });

  it('loads persisted bookmarks', async () => {
    await bookmarkStore.add(buildArticle('saved'));
    const store = createAppStore({ feedClient: idleFeedClient, bookmarkStore });

    await store.dispatch(loadBookmarks());

    expect(selectBookmarks(store.getState())).toEqual([buildArticle('saved')]);
    expect(selectIsBookmarked(store.getState(), 'https://example.com/saved')).toBe(true);
    expect(store.getState().bookmarks.loading).toBe(false);
  });

  it('toggles a bookmark on and off through the store', async () => {
    const store = createAppStore({ feedClient: idleFeedClient, bookmarkStore });
    const article = buildArticle('toggle');

    await store.dispatch(toggleBookmark(article));

    expect(selectIsBookmarked(store.getState(), article.url)).toBe(true);
    expect(await bookmarkStore.isBookmarked(article.url)).toEqual({ ok: true, value: true });

    await store.dispatch(toggleBookmark(article));

    expect(selectIsBookmarked(store.getState(), article.url)).toBe(false);
    expect(selectBookmarks(store.getState())).toEqual([]);
    expect(await bookmarkStore.isBookmarked(article.url)).toEqual({ ok: true, value: false });
  });

  it('applies two toggles dispatched together one after the other', async () => {
    const store = createAppStore({ feedClient: idleFeedClient, bookmarkStore });
    const article = buildArticle('double');

    await Promise.all([store.dispatch(toggleBookmark(article)), store.dispatch(toggleBookmark(article))]);

    expect(selectIsBookmarked(store.getState(), article.url)).toBe(false);
    expect(selectBookmarks(store.getState())).toEqual([]);
    expect(await bookmarkStore.isBookmarked(article.url)).toEqual({ ok: true, value: false });
  });

  it('reports a store failure without changing the view', async () => {
    const failingStore: BookmarkStore = {
      ...bookmarkStore,
      toggle: async () => err(new StoreError('IOFailure', 'Bookmark toggle failed: disk I/O error')),
    };
    const store = createAppStore({ feedClient: idleFeedClient, bookmarkStore: failingStore });

    await store.dispatch(toggleBookmark(buildArticle('broken')));

    expect(selectBookmarkError(store.getState())).toBe('Bookmark toggle failed: disk I/O error');
    expect(selectBookmarks(store.getState())).toEqual([]);

    store.dispatch(clearBookmarkError());
    expect(selectBookmarkError(store.getState())).toBeNull();
  });

  it('reports a failed load', async () => {
    const failingStore: BookmarkStore = {
      ...bookmarkStore,
      list: async () => err(new StoreError('InitFailure', 'Could not open bookmark database: locked')),
    };
    const store = createAppStore({ feedClient: idleFeedClient, bookmarkStore: failingStore });

    await store.dispatch(loadBookmarks());

    expect(selectBookmarkError(store.getState())).toBe('Could not open bookmark database: locked');
    expect(store.getState().bookmarks.loading).toBe(false);
  });
});
