import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { initializeSchema } from './initialize';
import * as schema from './schema';

export type ChallengeDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
	/** Raw connection, for pragmas and closing. */
	sqlite: Database.Database;
	db: ChallengeDatabase;
}

/**
 * Opens (or creates) the SQLite store at `path` and applies the schema.
 * Pass `:memory:` for a throwaway database.
 */
export function createDatabase(path: string): DatabaseHandle {
	const inMemory = path === ':memory:';
	if (!inMemory) mkdirSync(dirname(path), { recursive: true });

	const sqlite = new Database(path);
	if (!inMemory) sqlite.pragma('journal_mode = WAL');

	// Snowflakes do not fit in a double.
	sqlite.defaultSafeIntegers(true);

	try {
		initializeSchema(sqlite);
	} catch (error) {
		sqlite.close();
		throw error;
	}

	return { sqlite, db: drizzle(sqlite, { schema }) };
}
