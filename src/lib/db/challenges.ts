import type { Snowflake } from 'discord.js';
import { and, asc, eq, isNotNull, isNull, sql, type SQL } from 'drizzle-orm';
import type { ChallengeDatabase } from './index';
import {
	ChallengeExistsError,
	ChallengeNotFoundError,
	ChallengeRespondedError,
	UniqueConstraintViolationError,
	translateSqliteError,
	withConstraintErrors
} from './errors';
import { challenges, type ChallengeRow } from './schema';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ChallengeResponse =
	| { status: 'open' }
	| {
			status: 'answered';
			memberId: Snowflake;
			respondedAt: Date;
	  };

export interface Challenge {
	id: number;
	createdAt: Date;
	guildId: Snowflake;
	textChannelId: Snowflake;
	messageId: Snowflake;
	challengeType: string;
	response: ChallengeResponse;
}

/** A challenge is addressed either by its row id or by its message. */
export type ChallengeKey = { id: number } | { messageId: Snowflake };

export interface NewChallenge {
	guildId: Snowflake;
	textChannelId: Snowflake;
	messageId: Snowflake;
	challengeType: string;
	/** Defaults to now. */
	createdAt?: Date;
}

export interface ChallengeFilter {
	guildId?: Snowflake;
	openOnly?: boolean;
}

export interface RecentCompletedFilter {
	guildId?: Snowflake;
	/** Window size in days, counted back from `now`. Defaults to 3. */
	days?: number;
	now?: Date;
}

export function toChallenge(row: ChallengeRow): Challenge {
	const { respondingMemberId, respondedAt } = row;
	return {
		id: row.id,
		createdAt: row.created,
		guildId: row.guildId,
		textChannelId: row.textChannelId,
		messageId: row.messageId,
		challengeType: row.challengeType,
		response:
			respondingMemberId !== null && respondedAt !== null
				? { status: 'answered', memberId: respondingMemberId, respondedAt }
				: { status: 'open' }
	};
}

export function isOpen(challenge: Challenge): boolean {
	return challenge.response.status === 'open';
}

/** Milliseconds between creation and response, or `null` while the challenge is open. */
export function elapsed(challenge: Challenge): number | null {
	if (challenge.response.status === 'open') return null;
	return challenge.response.respondedAt.getTime() - challenge.createdAt.getTime();
}

function describeKey(key: ChallengeKey): string {
	return 'id' in key ? `id ${key.id}` : `message ${key.messageId}`;
}

function keyCondition(key: ChallengeKey): SQL {
	return 'id' in key ? eq(challenges.id, key.id) : eq(challenges.messageId, key.messageId);
}

/** UTC calendar date of `date`, as SQLite's `date()` prints it. */
function utcDay(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/**
 * Records a new, unanswered challenge. The challenge type is stored lower-cased.
 *
 * @throws {ChallengeExistsError} when the message already has a challenge.
 */
export function insertChallenge(db: ChallengeDatabase, input: NewChallenge): Challenge {
	try {
		const row = db
			.insert(challenges)
			.values({
				created: input.createdAt ?? new Date(),
				guildId: input.guildId,
				textChannelId: input.textChannelId,
				messageId: input.messageId,
				challengeType: input.challengeType.toLowerCase()
			})
			.returning()
			.get();
		return toChallenge(row);
	} catch (error) {
		const translated = translateSqliteError(error);
		if (translated instanceof UniqueConstraintViolationError) throw new ChallengeExistsError(input.messageId, { cause: error });
		throw translated;
	}
}

/**
 * Marks an open challenge as answered by `memberId`. Both response fields are
 * written by one statement that only matches open rows, so two concurrent
 * acceptances cannot both succeed.
 *
 * @throws {ChallengeNotFoundError} when no challenge matches `key`.
 * @throws {ChallengeRespondedError} when the challenge was already answered.
 */
export function respondToChallenge(db: ChallengeDatabase, key: ChallengeKey, memberId: Snowflake, respondedAt: Date = new Date()): Challenge {
	const row = withConstraintErrors(() =>
		db
			.update(challenges)
			.set({ respondingMemberId: memberId, respondedAt })
			.where(and(keyCondition(key), isNull(challenges.respondedAt)))
			.returning()
			.get()
	);
	if (row) return toChallenge(row);

	const existing = fetchChallenge(db, key);
	if (!existing) throw new ChallengeNotFoundError(`No challenge recorded for ${describeKey(key)}.`);
	throw new ChallengeRespondedError(existing);
}

export function fetchChallenge(db: ChallengeDatabase, key: ChallengeKey): Challenge | null {
	const row = db.select().from(challenges).where(keyCondition(key)).get();
	return row ? toChallenge(row) : null;
}

/** Challenges matching `filter`, oldest first. */
export function fetchChallenges(db: ChallengeDatabase, filter: ChallengeFilter = {}): Challenge[] {
	const conditions: SQL[] = [];
	if (filter.guildId !== undefined) conditions.push(eq(challenges.guildId, filter.guildId));
	if (filter.openOnly) conditions.push(isNull(challenges.respondedAt));

	return db
		.select()
		.from(challenges)
		.where(and(...conditions))
		.orderBy(asc(challenges.created), asc(challenges.id))
		.all()
		.map(toChallenge);
}

/**
 * Answered challenges created during the last `days` days. The window compares
 * UTC calendar dates, so it covers `days + 1` dates including today.
 */
export function fetchRecentCompletedChallenges(db: ChallengeDatabase, filter: RecentCompletedFilter = {}): Challenge[] {
	const { guildId, days = 3, now = new Date() } = filter;
	const from = utcDay(new Date(now.getTime() - days * DAY_MS));
	const to = utcDay(now);

	const conditions: SQL[] = [isNotNull(challenges.respondedAt), sql`date(${challenges.created}) between ${from} and ${to}`];
	if (guildId !== undefined) conditions.push(eq(challenges.guildId, guildId));

	return db
		.select()
		.from(challenges)
		.where(and(...conditions))
		.orderBy(asc(challenges.created), asc(challenges.id))
		.all()
		.map(toChallenge);
}
