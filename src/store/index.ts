import { combineReducers, configureStore } from '@reduxjs/toolkit';
import feedReducer, { selectFeedState, type FeedState } from './feedSlice';
import bookmarksReducer from './bookmarksSlice';
import type { NewsCoreDeps } from './deps';

export { default as feedReducer } from './feedSlice';
export { default as bookmarksReducer } from './bookmarksSlice';

export const rootReducer = combineReducers({
  feed: feedReducer,
  bookmarks: bookmarksReducer,
});

/**
 * Builds the state store. Services are injected once here and reach the thunks
 * through the thunk middleware's extra argument.
 */
export const createAppStore = (deps: NewsCoreDeps) =>
  configureStore({
    reducer: rootReducer,
    middleware: (getDefaultMiddleware) =>
      getDefaultMiddleware({
        thunk: { extraArgument: deps },
        serializableCheck: {
          warnAfter: 128,
        },
        immutableCheck: {
          warnAfter: 128,
        },
      }),
  });

export type AppStore = ReturnType<typeof createAppStore>;
export type RootState = ReturnType<typeof rootReducer>;
export type AppDispatch = AppStore['dispatch'];

/**
 * Calls `listener` every time the current feed state is replaced.
 * Returns the unsubscribe function.
 */
export const subscribeToFeed = (store: AppStore, listener: (feed: FeedState) => void) => {
  let previous = selectFeedState(store.getState());
  return store.subscribe(() => {
    const next = selectFeedState(store.getState());
    if (next !== previous) {
      previous = next;
      listener(next);
    }
  });
};
