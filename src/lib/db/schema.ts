import type { Snowflake } from 'discord.js';
import { customType, index, sqliteTable, text, unique } from 'drizzle-orm/sqlite-core';

/**
 * Integer primary key. The connection runs in safe-integer mode, so the driver
 * hands back a bigint that always fits in a number for a row id.
 */
const rowId = customType<{ data: number; driverData: bigint | number; notNull: true; default: true }>({
	dataType() {
		return 'integer';
	},
	fromDriver(value) {
		return Number(value);
	}
});

/** Discord snowflake, stored as a 64-bit integer and surfaced as its decimal string. */
const snowflake = customType<{ data: Snowflake; driverData: bigint | number }>({
	dataType() {
		return 'bigint';
	},
	toDriver(value) {
		return BigInt(value);
	},
	fromDriver(value) {
		return String(value);
	}
});

/** Point in time stored as ISO-8601 text. */
const isoTimestamp = customType<{ data: Date; driverData: string }>({
	dataType() {
		return 'text';
	},
	toDriver(value) {
		return value.toISOString();
	},
	fromDriver(value) {
		return new Date(value);
	}
});

/**
 * A match request posted in a guild channel, waiting for a member to accept it.
 */
export const challenges = sqliteTable(
	'challenges',
	{
		id: rowId('id').primaryKey(),
		created: isoTimestamp('created').notNull(),
		guildId: snowflake('guild_id').notNull(),
		textChannelId: snowflake('text_channel_id').notNull(),
		/** Snowflake of the match request message. One challenge per message. */
		messageId: snowflake('message_id').notNull().unique(),
		challengeType: text('challenge_type').notNull(),
		/** Set together with `respondedAt` when a member accepts. */
		respondingMemberId: snowflake('responding_member_id'),
		respondedAt: isoTimestamp('responded_at')
	},
	(t) => [index('idx_challenge_guild_id').on(t.guildId)]
);

/**
 * Roles to ping when a challenge of the given match type goes unanswered.
 */
export const matchTypeRoles = sqliteTable(
	'match_type_roles',
	{
		id: rowId('id').primaryKey(),
		guildId: snowflake('guild_id').notNull(),
		matchType: text('match_type').notNull(),
		roleId: snowflake('role_id').notNull()
	},
	(t) => [
		unique().on(t.guildId, t.matchType, t.roleId),
		index('idx_match_type_roles_guild_id_and_match_type').on(t.guildId, t.matchType)
	]
);

export type ChallengeRow = typeof challenges.$inferSelect;
export type MatchTypeRoleRow = typeof matchTypeRoles.$inferSelect;
