import { createAsyncThunk, createSlice, isFulfilled, isRejected } from '@reduxjs/toolkit';
import type { ArticleRecord, FeedRequest } from '../types/article';
import type { FetchErrorKind } from '../services/errors';
import type { NewsCoreDeps } from './deps';

export const HEADLINES_FAILURE_MESSAGE = 'Failed to fetch news';
export const SEARCH_FAILURE_MESSAGE = 'Failed to search news';

export type FeedState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'loaded'; articles: ArticleRecord[] }
  | { status: 'error'; message: string; kind: FetchErrorKind };

export interface FeedSliceState {
  current: FeedState;
  /** Id of the request whose completion may still update `current`. */
  currentRequestId: string | null;
  lastRequest: FeedRequest | null;
  lastUpdated: number | null;
}

export interface FeedFailure {
  message: string;
  kind: FetchErrorKind;
}

const initialState: FeedSliceState = {
  current: { status: 'idle' },
  currentRequestId: null,
  lastRequest: null,
  lastUpdated: null,
};

const createFeedThunk = createAsyncThunk.withTypes<{
  state: { feed: FeedSliceState };
  extra: NewsCoreDeps;
  rejectValue: FeedFailure;
}>();

export const requestHeadlines = createFeedThunk(
  'feed/requestHeadlines',
  async (category: string | undefined, { extra, rejectWithValue }) => {
    const result = await extra.feedClient.fetchHeadlines(category);
    if (!result.ok) {
      console.warn(`[Feed] Headlines request failed (${result.error.kind}): ${result.error.message}`);
      return rejectWithValue({ message: HEADLINES_FAILURE_MESSAGE, kind: result.error.kind });
    }
    return result.value;
  },
);

export const requestSearch = createFeedThunk(
  'feed/requestSearch',
  async (query: string, { extra, rejectWithValue }) => {
    const result = await extra.feedClient.search(query.trim());
    if (!result.ok) {
      console.warn(`[Feed] Search request failed (${result.error.kind}): ${result.error.message}`);
      return rejectWithValue({ message: SEARCH_FAILURE_MESSAGE, kind: result.error.kind });
    }
    return result.value;
  },
  {
    // Blank submissions never leave the current state.
    condition: (query) => query.trim().length > 0,
  },
);

/** Re-issues the most recent feed request, if there was one. */
export const refreshFeed = createFeedThunk(
  'feed/refresh',
  async (_: void, { dispatch, getState }) => {
    const last = getState().feed.lastRequest;
    if (last?.kind === 'search') {
      await dispatch(requestSearch(last.query));
    } else if (last?.kind === 'headlines') {
      await dispatch(requestHeadlines(last.category));
    }
  },
  {
    condition: (_, { getState }) => getState().feed.lastRequest !== null,
  },
);

const startRequest = (state: FeedSliceState, requestId: string, request: FeedRequest) => {
  state.current = { status: 'loading' };
  state.currentRequestId = requestId;
  state.lastRequest = request;
};

const feedSlice = createSlice({
  name: 'feed',
  initialState,
  reducers: {
    resetFeed: () => initialState,
  },
  extraReducers: (builder) => {
    builder
      .addCase(requestHeadlines.pending, (state, action) => {
        startRequest(state, action.meta.requestId, {
          kind: 'headlines',
          category: action.meta.arg,
        });
      })
      .addCase(requestSearch.pending, (state, action) => {
        startRequest(state, action.meta.requestId, {
          kind: 'search',
          query: action.meta.arg.trim(),
        });
      })
      .addMatcher(isFulfilled(requestHeadlines, requestSearch), (state, action) => {
        // Completions of superseded requests are dropped.
        if (action.meta.requestId !== state.currentRequestId) return;
        state.current = { status: 'loaded', articles: action.payload };
        state.currentRequestId = null;
        state.lastUpdated = Date.now();
      })
      .addMatcher(isRejected(requestHeadlines, requestSearch), (state, action) => {
        if (action.meta.requestId !== state.currentRequestId) return;
        const fallbackMessage = requestSearch.rejected.match(action)
          ? SEARCH_FAILURE_MESSAGE
          : HEADLINES_FAILURE_MESSAGE;
        if (!action.payload) {
          console.error('[Feed] Feed request threw unexpectedly:', action.error.message);
        }
        state.current = {
          status: 'error',
          message: action.payload?.message ?? fallbackMessage,
          kind: action.payload?.kind ?? 'Network',
        };
        state.currentRequestId = null;
      });
  },
});

type FeedRootState = { feed: FeedSliceState };

const NO_ARTICLES: ArticleRecord[] = [];

export const selectFeedState = (state: FeedRootState): FeedState => state.feed.current;

export const selectFeedArticles = (state: FeedRootState): ArticleRecord[] =>
  state.feed.current.status === 'loaded' ? state.feed.current.articles : NO_ARTICLES;

export const selectIsFeedLoading = (state: FeedRootState): boolean =>
  state.feed.current.status === 'loading';

export const selectFeedErrorMessage = (state: FeedRootState): string | null =>
  state.feed.current.status === 'error' ? state.feed.current.message : null;

export const { resetFeed } = feedSlice.actions;
export default feedSlice.reducer;
