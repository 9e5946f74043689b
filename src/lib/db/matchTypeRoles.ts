import type { Snowflake } from 'discord.js';
import { and, asc, eq, type SQL } from 'drizzle-orm';
import type { ChallengeDatabase } from './index';
import { RoleExistsError, UniqueConstraintViolationError, translateSqliteError } from './errors';
import { matchTypeRoles, type MatchTypeRoleRow } from './schema';

export type MatchTypeRole = MatchTypeRoleRow;

export interface NewMatchTypeRole {
	guildId: Snowflake;
	matchType: string;
	roleId: Snowflake;
}

export interface MatchTypeRoleFilter {
	guildId?: Snowflake;
	matchType?: string;
}

/**
 * Registers a role for a match type in a guild.
 *
 * @throws {RoleExistsError} when the role is already registered for that match type.
 */
export function createMatchTypeRole(db: ChallengeDatabase, input: NewMatchTypeRole): MatchTypeRole {
	try {
		return db.insert(matchTypeRoles).values(input).returning().get();
	} catch (error) {
		const translated = translateSqliteError(error);
		if (translated instanceof UniqueConstraintViolationError) {
			throw new RoleExistsError(input.guildId, input.matchType, input.roleId, { cause: error });
		}
		throw translated;
	}
}

/** Removes a registration by row id. Returns whether a row was removed. */
export function deleteMatchTypeRole(db: ChallengeDatabase, id: number): boolean {
	const removed = db.delete(matchTypeRoles).where(eq(matchTypeRoles.id, id)).returning({ id: matchTypeRoles.id }).all();
	return removed.length > 0;
}

export function fetchMatchTypeRoles(db: ChallengeDatabase, filter: MatchTypeRoleFilter = {}): MatchTypeRole[] {
	const conditions: SQL[] = [];
	if (filter.guildId !== undefined) conditions.push(eq(matchTypeRoles.guildId, filter.guildId));
	if (filter.matchType !== undefined) conditions.push(eq(matchTypeRoles.matchType, filter.matchType));

	return db
		.select()
		.from(matchTypeRoles)
		.where(and(...conditions))
		.orderBy(asc(matchTypeRoles.id))
		.all();
}
