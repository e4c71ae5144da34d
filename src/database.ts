/**
 * Database module for the flood warden bot.
 * Provides the SQLite connection, typed query functions, store fault
 * classification and schema initialization.
 * Uses better-sqlite3 for synchronous database operations: a transaction
 * runs start to finish without yielding to other tasks.
 *
 * @module database
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { TransientStoreError } from "./errors";
import { logger } from "./utils/logger";

/**
 * Opens the SQLite database with WAL journaling and a busy timeout,
 * creating the parent directory of a file database if needed.
 *
 * @param path - Database file path, or ":memory:"
 */
export const openDatabase = (path: string): Database.Database => {
	if (path !== ":memory:") {
		mkdirSync(dirname(path), { recursive: true });
	}
	const db = new Database(path);
	db.pragma("journal_mode = WAL");
	db.pragma("busy_timeout = 5000");
	return db;
};

/**
 * Executes a SELECT query and returns all matching rows as typed objects.
 *
 * @template T - The row type expected in the result set
 * @param db - Database handle
 * @param sql - The SQL query string (supports parameterized queries)
 * @param params - Parameters bound to the query
 * @throws {Error} If the query fails to execute
 *
 * @example
 * ```typescript
 * const rows = query<ExemptionRow>(db, 'SELECT * FROM exemptions WHERE chat_id = ?', [chatId]);
 * ```
 */
export const query = <T>(
	db: Database.Database,
	sql: string,
	params: unknown[] = [],
): T[] => {
	try {
		return db.prepare<unknown[], T>(sql).all(...params);
	} catch (error) {
		logger.error(`Database query failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes an INSERT, UPDATE, or DELETE statement.
 *
 * @returns RunResult object containing changes count and lastInsertRowid
 * @throws {Error} If the statement fails to execute
 *
 * @example
 * ```typescript
 * const result = execute(db, 'DELETE FROM exemptions WHERE user_id = ? AND chat_id = ?', [userId, chatId]);
 * console.log(`Removed ${result.changes} rows`);
 * ```
 */
export const execute = (
	db: Database.Database,
	sql: string,
	params: unknown[] = [],
): Database.RunResult => {
	try {
		return db.prepare<unknown[]>(sql).run(...params);
	} catch (error) {
		logger.error(`Database execution failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes a SELECT query and returns a single row, or undefined if none match.
 */
export const get = <T>(
	db: Database.Database,
	sql: string,
	params: unknown[] = [],
): T | undefined => {
	try {
		return db.prepare<unknown[], T>(sql).get(...params);
	} catch (error) {
		logger.error(`Database get failed: ${sql}`, error);
		throw error;
	}
};

/** SQLite result codes (and their extended variants) that mean "try again later" */
const TRANSIENT_CODES = [
	"SQLITE_BUSY",
	"SQLITE_LOCKED",
	"SQLITE_IOERR",
	"SQLITE_CANTOPEN",
	"SQLITE_FULL",
	"SQLITE_PROTOCOL",
];

/**
 * Whether a failure comes from the storage being unavailable rather than
 * from a faulty statement.
 */
export const isTransientStoreFailure = (error: unknown): boolean => {
	if (!(error instanceof Database.SqliteError)) {
		return false;
	}
	const { code } = error;
	return TRANSIENT_CODES.some(
		(prefix) => code === prefix || code.startsWith(`${prefix}_`),
	);
};

/**
 * Runs a unit of store work, translating storage faults into
 * {@link TransientStoreError}. Other errors propagate unchanged.
 *
 * @param db - Database handle
 * @param operation - Name used in the error and the log line
 * @param work - Synchronous store work (a transaction or a single statement)
 */
export const withStore = <T>(
	db: Database.Database,
	operation: string,
	work: () => T,
): T => {
	if (!db.open) {
		throw new TransientStoreError(
			operation,
			new Error("The database connection is not open"),
		);
	}

	try {
		return work();
	} catch (error) {
		if (isTransientStoreFailure(error)) {
			throw new TransientStoreError(operation, error);
		}
		throw error;
	}
};

/**
 * Initializes the database schema by creating all required tables and indexes.
 *
 * Creates the following tables:
 * - activity_events: Inbound content events for trailing-window counting
 * - exemptions: Members exempt from flood detection, per chat
 * - chat_policies: Per-chat overrides of the default limits (NULL = default)
 * - violations: Violation count and running restriction per member and chat
 * - restriction_events: History of applied restrictions for statistics
 *
 * Safe to call multiple times - uses IF NOT EXISTS clauses.
 *
 * @example
 * ```typescript
 * const db = openDatabase(config.databasePath);
 * initDb(db);
 * ```
 */
export const initDb = (db: Database.Database): void => {
	db.exec(`
    CREATE TABLE IF NOT EXISTS activity_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      chat_id INTEGER NOT NULL,
      category TEXT NOT NULL,
      fingerprint TEXT,
      timestamp INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS exemptions (
      user_id INTEGER NOT NULL,
      chat_id INTEGER NOT NULL,
      granted_by INTEGER,
      granted_at INTEGER NOT NULL,
      PRIMARY KEY (user_id, chat_id)
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS chat_policies (
      chat_id INTEGER PRIMARY KEY,
      sticker_threshold INTEGER,
      sticker_window INTEGER,
      text_threshold INTEGER,
      text_window INTEGER,
      photo_threshold INTEGER,
      photo_window INTEGER,
      video_threshold INTEGER,
      video_window INTEGER,
      warn_enabled INTEGER,
      updated_at INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS violations (
      user_id INTEGER NOT NULL,
      chat_id INTEGER NOT NULL,
      violation_count INTEGER NOT NULL DEFAULT 0,
      last_violation_at INTEGER,
      restricted_until INTEGER,
      created_at INTEGER NOT NULL,
      PRIMARY KEY (user_id, chat_id)
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS restriction_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      chat_id INTEGER NOT NULL,
      category TEXT NOT NULL,
      ordinal INTEGER NOT NULL,
      duration_minutes INTEGER NOT NULL,
      reason TEXT,
      timestamp INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE INDEX IF NOT EXISTS idx_activity_member ON activity_events(user_id, chat_id, category, timestamp);
    CREATE INDEX IF NOT EXISTS idx_activity_timestamp ON activity_events(timestamp);
    CREATE INDEX IF NOT EXISTS idx_exemptions_chat ON exemptions(chat_id);
    CREATE INDEX IF NOT EXISTS idx_violations_chat_count ON violations(chat_id, violation_count);
    CREATE INDEX IF NOT EXISTS idx_restriction_events_chat_time ON restriction_events(chat_id, timestamp);
    CREATE INDEX IF NOT EXISTS idx_restriction_events_member ON restriction_events(user_id, chat_id);
  `);

	logger.info("Database initialized successfully");
};
