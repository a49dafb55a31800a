import { createAsyncThunk, createSlice } from '@reduxjs/toolkit';
import type { ArticleRecord } from '../types/article';
import type { NewsCoreDeps } from './deps';

interface BookmarksState {
  items: ArticleRecord[];
  urls: string[];
  loading: boolean;
  error: string | null;
}

const initialState: BookmarksState = {
  items: [],
  urls: [],
  loading: false,
  error: null,
};

const createBookmarkThunk = createAsyncThunk.withTypes<{
  extra: NewsCoreDeps;
  rejectValue: string;
}>();

export const loadBookmarks = createBookmarkThunk(
  'bookmarks/load',
  async (_: void, { extra, rejectWithValue }) => {
    const result = await extra.bookmarkStore.list();
    if (!result.ok) {
      return rejectWithValue(result.error.message);
    }
    return result.value;
  },
);

/**
 * Adds the article when it is not bookmarked yet, removes it otherwise.
 * The persisted state decides, not the cached view.
 */
export const toggleBookmark = createBookmarkThunk(
  'bookmarks/toggle',
  async (article: ArticleRecord, { extra, rejectWithValue }) => {
    const result = await extra.bookmarkStore.toggle(article);
    if (!result.ok) {
      return rejectWithValue(result.error.message);
    }
    return { article, bookmarked: result.value };
  },
);

const bookmarksSlice = createSlice({
  name: 'bookmarks',
  initialState,
  reducers: {
    clearBookmarkError: (state) => {
      state.error = null;
    },
  },
  extraReducers: (builder) => {
    builder
      .addCase(loadBookmarks.pending, (state) => {
        state.loading = true;
        state.error = null;
      })
      .addCase(loadBookmarks.fulfilled, (state, action) => {
        state.loading = false;
        state.items = action.payload;
        state.urls = action.payload.map((item) => item.url);
      })
      .addCase(loadBookmarks.rejected, (state, action) => {
        state.loading = false;
        state.error = action.payload ?? action.error.message ?? 'Failed to load bookmarks';
      })
      .addCase(toggleBookmark.pending, (state) => {
        state.error = null;
      })
      .addCase(toggleBookmark.fulfilled, (state, action) => {
        const { article, bookmarked } = action.payload;
        state.items = state.items.filter((item) => item.url !== article.url);
        state.urls = state.urls.filter((existing) => existing !== article.url);
        if (bookmarked) {
          state.items.push(article);
          state.urls.push(article.url);
        }
      })
      .addCase(toggleBookmark.rejected, (state, action) => {
        state.error = action.payload ?? action.error.message ?? 'Failed to update bookmark';
      });
  },
});

type BookmarksRootState = { bookmarks: BookmarksState };

export const selectBookmarks = (state: BookmarksRootState) => state.bookmarks.items;

export const selectIsBookmarked = (state: BookmarksRootState, url: string) =>
  state.bookmarks.urls.includes(url);

export const selectBookmarkError = (state: BookmarksRootState) => state.bookmarks.error;

export const { clearBookmarkError } = bookmarksSlice.actions;
export default bookmarksSlice.reducer;
