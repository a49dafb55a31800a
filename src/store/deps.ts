import type { BookmarkStore } from '../services/bookmarkStore';
import type { NewsFeedClient } from '../services/newsFeedService';

/** Services handed to every thunk as its extra argument. */
export interface NewsCoreDeps {
  feedClient: NewsFeedClient;
  bookmarkStore: BookmarkStore;
}
