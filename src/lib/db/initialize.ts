import type BetterSqlite3 from 'better-sqlite3';
import { is } from 'drizzle-orm';
import { getTableConfig, SQLiteColumn, type SQLiteTable } from 'drizzle-orm/sqlite-core';
import { CREATE_SCHEMA_SQL } from './ddl';
import { SchemaConflictError, sqliteErrorCode } from './errors';
import { challenges, matchTypeRoles } from './schema';

const TABLES: SQLiteTable[] = [challenges, matchTypeRoles];

interface StoredColumn {
	name: string;
	type: string;
	notNull: boolean;
	primaryKey: boolean;
}

interface StoredIndex {
	name: string;
	unique: boolean;
	columns: string[];
}

function isRecord(row: unknown): row is Record<string, unknown> {
	return typeof row === 'object' && row !== null;
}

/** Runs a pragma query with plain numbers, whatever the connection's integer mode. */
function pragmaRows(sqlite: BetterSqlite3.Database, query: string, argument: string): Record<string, unknown>[] {
	return sqlite.prepare(query).safeIntegers(false).all(argument).filter(isRecord);
}

function readColumns(sqlite: BetterSqlite3.Database, table: string): StoredColumn[] {
	return pragmaRows(sqlite, 'select name, type, "notnull", pk from pragma_table_info(?)', table).map((row) => ({
		name: String(row.name),
		type: String(row.type).toLowerCase(),
		notNull: row.notnull === 1,
		primaryKey: typeof row.pk === 'number' && row.pk > 0
	}));
}

function readIndexes(sqlite: BetterSqlite3.Database, table: string): StoredIndex[] {
	return pragmaRows(sqlite, 'select name, "unique" from pragma_index_list(?)', table).map((row) => {
		const name = String(row.name);
		const columns = pragmaRows(sqlite, 'select name from pragma_index_info(?) order by seqno', name).map((column) => String(column.name));
		return { name, unique: row.unique === 1, columns };
	});
}

const columnList = (columns: readonly string[]) => `(${columns.join(', ')})`;

/** Differences between a table in the store and its drizzle definition. */
function findShapeProblems(table: SQLiteTable, stored: StoredColumn[], indexes: StoredIndex[]): string[] {
	const config = getTableConfig(table);
	const problems: string[] = [];
	const byName = new Map(stored.map((column) => [column.name, column]));

	for (const column of config.columns) {
		const actual = byName.get(column.name);
		if (!actual) continue;

		const expectedType = column.getSQLType().toLowerCase();
		if (actual.type !== expectedType) problems.push(`column "${column.name}" is ${actual.type || 'untyped'}, expected ${expectedType}`);

		if (column.primary) {
			if (!actual.primaryKey) problems.push(`column "${column.name}" is not the primary key`);
		} else if (column.notNull !== actual.notNull) {
			problems.push(`column "${column.name}" ${actual.notNull ? 'is not null, expected nullable' : 'allows null, expected not null'}`);
		}
	}

	const uniqueSets = [
		...config.columns.filter((column) => column.isUnique).map((column) => [column.name]),
		...config.uniqueConstraints.map((constraint) => constraint.columns.map((column) => column.name))
	];
	for (const columns of uniqueSets) {
		const key = columnList(columns);
		if (!indexes.some((index) => index.unique && columnList(index.columns) === key)) {
			problems.push(`no unique constraint on ${key}`);
		}
	}

	for (const { config: index } of config.indexes) {
		const expected = index.columns.filter((column): column is SQLiteColumn => is(column, SQLiteColumn)).map((column) => column.name);
		const actual = indexes.find((candidate) => candidate.name === index.name);
		if (!actual) {
			problems.push(`index "${index.name}" is missing`);
		} else if (columnList(actual.columns) !== columnList(expected)) {
			problems.push(`index "${index.name}" covers ${columnList(actual.columns)}, expected ${columnList(expected)}`);
		}
	}

	return problems;
}

/**
 * Creates the challenge tables and their indexes when they are missing, then
 * checks that the tables in the store have the shape the queries rely on:
 * every column with its declared type and nullability, the unique
 * constraints, and the named indexes.
 *
 * Safe to run on every startup: each statement is conditional and no rows are
 * written.
 *
 * @throws {SchemaConflictError} when an existing object with the same name has
 * a different shape.
 */
export function initializeSchema(sqlite: BetterSqlite3.Database): void {
	try {
		sqlite.exec(CREATE_SCHEMA_SQL);
	} catch (error) {
		// SQLITE_ERROR here means a statement referenced an existing object it cannot work with.
		if (sqliteErrorCode(error) === 'SQLITE_ERROR') {
			const message = error instanceof Error ? error.message : String(error);
			throw new SchemaConflictError(`Existing schema objects are incompatible: ${message}`, { cause: error });
		}
		throw error;
	}

	for (const table of TABLES) {
		const { name, columns } = getTableConfig(table);
		const stored = readColumns(sqlite, name);
		const present = new Set(stored.map((column) => column.name));
		const missing = columns.map((column) => column.name).filter((column) => !present.has(column));
		if (missing.length > 0) {
			throw new SchemaConflictError(`Table "${name}" exists without the columns: ${missing.join(', ')}.`);
		}

		const problems = findShapeProblems(table, stored, readIndexes(sqlite, name));
		if (problems.length > 0) {
			throw new SchemaConflictError(`Table "${name}" does not match the schema: ${problems.join('; ')}.`);
		}
	}
}
