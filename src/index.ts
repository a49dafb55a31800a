import { loadConfig, type AppConfig } from './services/apiConfig';
import { createBookmarkStore, type BookmarkStore, type BookmarkStoreOptions } from './services/bookmarkStore';
import { createNewsFeedClient, type NewsFeedClient } from './services/newsFeedService';
import { createAppStore, type AppStore } from './store';

export interface NewsCore {
  config: AppConfig;
  feedClient: NewsFeedClient;
  bookmarkStore: BookmarkStore;
  store: AppStore;
  close: () => Promise<void>;
}

export interface NewsCoreOverrides {
  feedClient?: NewsFeedClient;
  openDatabase?: BookmarkStoreOptions['openDatabase'];
}

/**
 * Wires the long-lived services once. Consumers receive them from here instead
 * of constructing their own.
 */
export const createNewsCore = (
  config: AppConfig = loadConfig(),
  overrides: NewsCoreOverrides = {},
): NewsCore => {
  const feedClient = overrides.feedClient ?? createNewsFeedClient(config.newsApi);
  const bookmarkStore = createBookmarkStore({
    databasePath: config.bookmarksDbPath,
    openDatabase: overrides.openDatabase,
  });
  const store = createAppStore({ feedClient, bookmarkStore });

  return {
    config,
    feedClient,
    bookmarkStore,
    store,
    close: () => bookmarkStore.close(),
  };
};

export type { ArticleRecord, FeedRequest } from './types/article';
export type { Result } from './types/result';
export type { AppConfig, NewsApiConfig } from './services/apiConfig';
export type { BookmarkStore } from './services/bookmarkStore';
export type { NewsFeedClient, FeedResult } from './services/newsFeedService';
export type { AppStore, AppDispatch, RootState } from './store';
export type { FeedState } from './store/feedSlice';
export { loadConfig } from './services/apiConfig';
export { createBookmarkStore } from './services/bookmarkStore';
export { createNewsFeedClient } from './services/newsFeedService';
export { ConfigError, FetchError, StoreError } from './services/errors';
export { createAppStore, subscribeToFeed } from './store';
export {
  refreshFeed,
  requestHeadlines,
  requestSearch,
  resetFeed,
  selectFeedArticles,
  selectFeedErrorMessage,
  selectFeedState,
  selectIsFeedLoading,
} from './store/feedSlice';
export {
  clearBookmarkError,
  loadBookmarks,
  selectBookmarkError,
  selectBookmarks,
  selectIsBookmarked,
  toggleBookmark,
} from './store/bookmarksSlice';
export { NEWS_CATEGORIES, DEFAULT_CATEGORY, isNewsCategory } from './constants/categories';
export type { NewsCategory } from './constants/categories';
export { formatPublishedDate, formatPublishedRelative } from './utils/articleUtils';
