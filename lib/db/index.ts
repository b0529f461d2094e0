/**
 * Database adapter factory.
 * SQLite at SQLITE_PATH, or <SHUTTERBUG_DATA_DIR>/shutterbug.db (default ~/.shutterbug).
 */

import type { DbAdapter } from "./adapter";
import { createSqliteAdapter } from "./sqlite-adapter";
import { getSqlitePath } from "@/lib/config/data-dir";

let _adapter: DbAdapter | null = null;

export function getDb(): DbAdapter {
  if (_adapter) return _adapter;
  _adapter = createSqliteAdapter(getSqlitePath());
  return _adapter;
}

/** For tests: reset the singleton and optionally use in-memory DB */
export function resetDbForTesting(inMemory = true): DbAdapter {
  _adapter = null;
  const adapter = createSqliteAdapter(inMemory ? ":memory:" : getSqlitePath());
  _adapter = adapter;
  return adapter;
}
