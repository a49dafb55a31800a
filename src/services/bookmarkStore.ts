import initSqlJs, {
  type BindParams,
  type Database,
  type ParamsObject,
  type SqlJsStatic,
  type SqlValue,
} from 'sql.js';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ArticleRecord } from '../types/article';
import { err, ok, type Result } from '../types/result';
import { describeError, StoreError } from './errors';

export type SqlDatabase = Database;

export const BOOKMARKS_SCHEMA_VERSION = 1;
export const IN_MEMORY_DATABASE = ':memory:';

const CREATE_BOOKMARKS_TABLE = `
  CREATE TABLE IF NOT EXISTS bookmarks (
    url TEXT PRIMARY KEY,
    title TEXT NOT NULL DEFAULT '',
    description TEXT NOT NULL DEFAULT '',
    imageUrl TEXT NOT NULL DEFAULT '',
    publishedAt TEXT NOT NULL DEFAULT '',
    source TEXT NOT NULL DEFAULT ''
  );
`;

const UPSERT_BOOKMARK = `
  INSERT OR REPLACE INTO bookmarks (url, title, description, imageUrl, publishedAt, source)
  VALUES (?, ?, ?, ?, ?, ?)
`;
const DELETE_BOOKMARK = 'DELETE FROM bookmarks WHERE url = ?';
const FIND_BOOKMARK = 'SELECT 1 AS found FROM bookmarks WHERE url = ? LIMIT 1';
const LIST_BOOKMARKS =
  'SELECT url, title, description, imageUrl, publishedAt, source FROM bookmarks ORDER BY rowid';

export interface BookmarkStore {
  /** Opens the database ahead of the first operation. */
  init: () => Promise<Result<void, StoreError>>;
  add: (article: ArticleRecord) => Promise<Result<void, StoreError>>;
  remove: (url: string) => Promise<Result<void, StoreError>>;
  /** Removes the article when present, adds it otherwise. Resolves to the new membership. */
  toggle: (article: ArticleRecord) => Promise<Result<boolean, StoreError>>;
  isBookmarked: (url: string) => Promise<Result<boolean, StoreError>>;
  list: () => Promise<Result<ArticleRecord[], StoreError>>;
  close: () => Promise<void>;
}

export interface BookmarkStoreOptions {
  databasePath: string;
  /** Builds the connection from the file contents, or an empty database when there are none. */
  openDatabase?: (contents: Uint8Array | null) => Promise<SqlDatabase>;
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

const loadSqlJs = (): Promise<SqlJsStatic> => {
  if (sqlJsPromise) return sqlJsPromise;
  const pending = initSqlJs();
  sqlJsPromise = pending;
  void pending.catch(() => {
    if (sqlJsPromise === pending) sqlJsPromise = null;
  });
  return pending;
};

export const openSqlDatabase = async (contents: Uint8Array | null): Promise<SqlDatabase> => {
  const SQL = await loadSqlJs();
  return new SQL.Database(contents);
};

const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === code;

const readDatabaseFile = async (databasePath: string): Promise<Uint8Array | null> => {
  try {
    return await readFile(databasePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
};

const writeDatabaseFile = async (databasePath: string, database: SqlDatabase) => {
  const tempPath = `${databasePath}.tmp`;
  await writeFile(tempPath, database.export());
  await rename(tempPath, databasePath);
};

const inTransaction = (database: SqlDatabase, fn: () => void) => {
  database.run('BEGIN');
  try {
    fn();
    database.run('COMMIT');
  } catch (error) {
    database.run('ROLLBACK');
    throw error;
  }
};

const selectRows = (database: SqlDatabase, sql: string, params: BindParams = null): ParamsObject[] => {
  const statement = database.prepare(sql, params);
  try {
    const rows: ParamsObject[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
};

const readSchemaVersion = (database: SqlDatabase): number => {
  const [row] = selectRows(database, 'PRAGMA user_version');
  const version = row?.user_version;
  return typeof version === 'number' ? version : 0;
};

/** Returns true when the schema was created. */
const ensureSchema = (database: SqlDatabase): boolean => {
  const version = readSchemaVersion(database);
  if (version > BOOKMARKS_SCHEMA_VERSION) {
    throw new Error(
      `Bookmark database schema version ${version} is newer than supported version ${BOOKMARKS_SCHEMA_VERSION}`,
    );
  }
  if (version === BOOKMARKS_SCHEMA_VERSION) return false;

  inTransaction(database, () => {
    database.run(CREATE_BOOKMARKS_TABLE);
    database.run(`PRAGMA user_version = ${BOOKMARKS_SCHEMA_VERSION}`);
  });
  console.log(`[Bookmarks] Created bookmarks schema (version ${BOOKMARKS_SCHEMA_VERSION})`);
  return true;
};

const text = (value: SqlValue | undefined): string => (typeof value === 'string' ? value : '');

const toArticle = (row: ParamsObject): ArticleRecord => ({
  url: text(row.url),
  title: text(row.title),
  description: text(row.description),
  imageUrl: text(row.imageUrl),
  publishedAt: text(row.publishedAt),
  source: text(row.source),
});

const requireUrl = (article: ArticleRecord): string => {
  if (!article.url.trim()) {
    throw new Error('Cannot bookmark an article without a url');
  }
  return article.url;
};

const upsert = (database: SqlDatabase, article: ArticleRecord) => {
  database.run(UPSERT_BOOKMARK, [
    article.url,
    article.title,
    article.description,
    article.imageUrl,
    article.publishedAt,
    article.source,
  ]);
};

const exists = (database: SqlDatabase, url: string): boolean =>
  selectRows(database, FIND_BOOKMARK, [url]).length > 0;

interface DatabaseHandle {
  database: SqlDatabase;
}

const asInitFailure = (error: unknown): StoreError =>
  error instanceof StoreError
    ? error
    : new StoreError('InitFailure', describeError(error), { cause: error });

/**
 * Bookmark persistence over a single SQLite file. The connection is opened on
 * first use and shared by every later operation until `close()`. The file is
 * rewritten after each change.
 */
export const createBookmarkStore = ({
  databasePath,
  openDatabase = openSqlDatabase,
}: BookmarkStoreOptions): BookmarkStore => {
  const persistent = databasePath !== IN_MEMORY_DATABASE;
  let initPromise: Promise<DatabaseHandle> | null = null;
  let mutex: Promise<void> = Promise.resolve();

  const runExclusive = async <T>(fn: () => Promise<T>): Promise<T> => {
    const previous = mutex;
    let release: () => void = () => undefined;
    mutex = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  };

  const openHandle = async (): Promise<DatabaseHandle> => {
    let database: SqlDatabase | null = null;
    try {
      let contents: Uint8Array | null = null;
      if (persistent) {
        await mkdir(path.dirname(databasePath), { recursive: true });
        contents = await readDatabaseFile(databasePath);
      }
      database = await openDatabase(contents);
      const created = ensureSchema(database);
      if (created && persistent) {
        await writeDatabaseFile(databasePath, database);
      }
      console.log(`[Bookmarks] Database ready at ${databasePath}`);
      return { database };
    } catch (error) {
      console.error('[Bookmarks] Error initializing database:', error);
      if (database) {
        try {
          database.close();
        } catch (closeError) {
          console.warn('[Bookmarks] Failed to close database after init error:', closeError);
        }
      }
      throw new StoreError('InitFailure', `Could not open bookmark database: ${describeError(error)}`, {
        cause: error,
      });
    }
  };

  const initDatabase = (): Promise<DatabaseHandle> => {
    if (initPromise) return initPromise;
    const pending = openHandle();
    initPromise = pending;
    // Allow retry on failure
    void pending.catch(() => {
      if (initPromise === pending) initPromise = null;
    });
    return pending;
  };

  // The on-disk copy is authoritative once a write fails; reload it on next use.
  const discardHandle = (handle: DatabaseHandle) => {
    initPromise = null;
    try {
      handle.database.close();
    } catch (closeError) {
      console.warn('[Bookmarks] Failed to close database after write error:', closeError);
    }
  };

  const withDatabaseLock = <T>(
    operation: string,
    fn: (database: SqlDatabase) => T,
    { mutates = false }: { mutates?: boolean } = {},
  ): Promise<Result<T, StoreError>> =>
    runExclusive(async () => {
      let handle: DatabaseHandle;
      try {
        handle = await initDatabase();
      } catch (error) {
        return err(asInitFailure(error));
      }

      try {
        const value = fn(handle.database);
        if (mutates && persistent) {
          await writeDatabaseFile(databasePath, handle.database);
        }
        return ok(value);
      } catch (error) {
        console.error(`[Bookmarks] Error in ${operation}:`, error);
        if (mutates && persistent) {
          discardHandle(handle);
        }
        return err(
          new StoreError('IOFailure', `Bookmark ${operation} failed: ${describeError(error)}`, {
            cause: error,
          }),
        );
      }
    });

  return {
    init: async () => {
      try {
        await initDatabase();
        return ok(undefined);
      } catch (error) {
        return err(asInitFailure(error));
      }
    },

    add: (article) =>
      withDatabaseLock(
        'add',
        (database) => {
          requireUrl(article);
          inTransaction(database, () => upsert(database, article));
        },
        { mutates: true },
      ),

    remove: (url) =>
      withDatabaseLock(
        'remove',
        (database) => {
          database.run(DELETE_BOOKMARK, [url]);
        },
        { mutates: true },
      ),

    toggle: (article) =>
      withDatabaseLock(
        'toggle',
        (database) => {
          const url = requireUrl(article);
          const bookmarked = exists(database, url);
          inTransaction(database, () => {
            if (bookmarked) {
              database.run(DELETE_BOOKMARK, [url]);
            } else {
              upsert(database, article);
            }
          });
          return !bookmarked;
        },
        { mutates: true },
      ),

    isBookmarked: (url) => withDatabaseLock('lookup', (database) => exists(database, url)),

    list: () => withDatabaseLock('list', (database) => selectRows(database, LIST_BOOKMARKS).map(toArticle)),

    close: () =>
      runExclusive(async () => {
        const pending = initPromise;
        initPromise = null;
        if (!pending) return;
        // A failed init was already reported to the operation that triggered it.
        const handle = await pending.catch(() => null);
        if (handle) {
          handle.database.close();
          console.log('[Bookmarks] Database closed');
        }
      }),
  };
};
