import type { Snowflake } from 'discord.js';
import type { Challenge } from './challenges';

export class ChallengeStoreError extends Error {
	public override readonly name: string = 'ChallengeStoreError';
}

/** A row would repeat a value that a unique constraint covers. */
export class UniqueConstraintViolationError extends ChallengeStoreError {
	public override readonly name: string = 'UniqueConstraintViolationError';
}

export class ChallengeExistsError extends UniqueConstraintViolationError {
	public override readonly name: string = 'ChallengeExistsError';

	public constructor(
		public readonly messageId: Snowflake,
		options?: ErrorOptions
	) {
		super(`A challenge is already recorded for message ${messageId}.`, options);
	}
}

export class RoleExistsError extends UniqueConstraintViolationError {
	public override readonly name: string = 'RoleExistsError';

	public constructor(
		public readonly guildId: Snowflake,
		public readonly matchType: string,
		public readonly roleId: Snowflake,
		options?: ErrorOptions
	) {
		super(`Role ${roleId} is already registered for "${matchType}" in guild ${guildId}.`, options);
	}
}

export class NotNullViolationError extends ChallengeStoreError {
	public override readonly name: string = 'NotNullViolationError';
}

export class CheckConstraintViolationError extends ChallengeStoreError {
	public override readonly name: string = 'CheckConstraintViolationError';
}

export class SchemaConflictError extends ChallengeStoreError {
	public override readonly name: string = 'SchemaConflictError';
}

export class ChallengeNotFoundError extends ChallengeStoreError {
	public override readonly name: string = 'ChallengeNotFoundError';
}

export class ChallengeRespondedError extends ChallengeStoreError {
	public override readonly name: string = 'ChallengeRespondedError';

	public constructor(public readonly challenge: Challenge) {
		super(`Challenge ${challenge.id} (message ${challenge.messageId}) has already been answered.`);
	}
}

/**
 * Reads the SQLite result code off an error thrown by better-sqlite3, looking
 * through one level of `cause` for errors wrapped by the query builder.
 */
export function sqliteErrorCode(error: unknown): string | null {
	if (!(error instanceof Error)) return null;
	if ('code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_')) return error.code;
	return error.cause === undefined ? null : sqliteErrorCode(error.cause);
}

/**
 * Maps a constraint failure from the driver to the matching store error.
 * Anything that is not a constraint failure comes back unchanged.
 */
export function translateSqliteError(error: unknown): unknown {
	const code = sqliteErrorCode(error);
	const message = error instanceof Error ? error.message : String(error);

	switch (code) {
		case 'SQLITE_CONSTRAINT_UNIQUE':
		case 'SQLITE_CONSTRAINT_PRIMARYKEY':
			return new UniqueConstraintViolationError(message, { cause: error });
		case 'SQLITE_CONSTRAINT_NOTNULL':
			return new NotNullViolationError(message, { cause: error });
		case 'SQLITE_CONSTRAINT_CHECK':
			return new CheckConstraintViolationError(message, { cause: error });
		default:
			return error;
	}
}

/** Runs a statement, rethrowing driver constraint failures as store errors. */
export function withConstraintErrors<T>(statement: () => T): T {
	try {
		return statement();
	} catch (error) {
		throw translateSqliteError(error);
	}
}
