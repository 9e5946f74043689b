import type { ILogger } from '@sapphire/framework';
import type { Snowflake } from 'discord.js';
import {
	fetchChallenge,
	fetchChallenges,
	fetchRecentCompletedChallenges,
	insertChallenge,
	isOpen,
	respondToChallenge,
	type Challenge,
	type NewChallenge
} from '../db/challenges';
import type { ChallengeDatabase } from '../db/index';
import {
	createMatchTypeRole,
	deleteMatchTypeRole,
	fetchMatchTypeRoles,
	type MatchTypeRole,
	type NewMatchTypeRole
} from '../db/matchTypeRoles';

export interface RoleToggle {
	action: 'added' | 'removed';
	role: MatchTypeRole;
}

/**
 * Keeps open challenges and role registrations in memory so message handling
 * does not hit the store for every message. Writes go through to the store
 * first; the caches only change once the store accepted the write.
 */
export class ChallengeTracker {
	/** Open challenges keyed by message id. */
	readonly #open = new Map<Snowflake, Challenge>();
	readonly #roles = new Map<Snowflake, MatchTypeRole[]>();

	public constructor(
		private readonly db: ChallengeDatabase,
		private readonly logger: ILogger
	) {}

	/** Replaces both caches with what the store holds. */
	public load(): void {
		this.#open.clear();
		this.#roles.clear();

		const open = fetchChallenges(this.db, { openOnly: true });
		for (const challenge of open) this.#open.set(challenge.messageId, challenge);

		const roles = fetchMatchTypeRoles(this.db);
		for (const role of roles) this.#guildRoles(role.guildId).push(role);

		this.logger.info(`Challenges: Loaded ${open.length} open challenge(s) and ${roles.length} role registration(s).`);
	}

	public open(input: NewChallenge): Challenge {
		const challenge = insertChallenge(this.db, input);
		this.#open.set(challenge.messageId, challenge);
		this.logger.debug(`Challenges: Opened ${challenge.challengeType} challenge for message ${challenge.messageId} in guild ${challenge.guildId}.`);
		return challenge;
	}

	public get(messageId: Snowflake): Challenge | undefined {
		return this.#open.get(messageId);
	}

	/**
	 * Cached challenge, or the stored one when the cache lost it (e.g. after a
	 * restart). Open challenges found in the store are cached again.
	 */
	public resolve(messageId: Snowflake): Challenge | null {
		const cached = this.#open.get(messageId);
		if (cached) return cached;

		const stored = fetchChallenge(this.db, { messageId });
		if (stored && isOpen(stored)) this.#open.set(messageId, stored);
		return stored;
	}

	/**
	 * Records `memberId` as the respondent and stops tracking the challenge.
	 *
	 * @throws {ChallengeRespondedError} when someone answered first.
	 */
	public answer(messageId: Snowflake, memberId: Snowflake, respondedAt?: Date): Challenge {
		const answered = respondToChallenge(this.db, { messageId }, memberId, respondedAt);
		this.#open.delete(messageId);
		this.logger.debug(`Challenges: Message ${messageId} answered by ${memberId}.`);
		return answered;
	}

	/** Stops tracking a challenge without touching the store. */
	public expire(messageId: Snowflake): boolean {
		return this.#open.delete(messageId);
	}

	/** Tracked open challenges of a guild, oldest first. */
	public openChallenges(guildId: Snowflake): Challenge[] {
		return [...this.#open.values()]
			.filter((challenge) => challenge.guildId === guildId)
			.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id);
	}

	public recentCompleted(guildId: Snowflake, days: number, now?: Date): Challenge[] {
		return fetchRecentCompletedChallenges(this.db, { guildId, days, now });
	}

	/** @throws {RoleExistsError} when the role is already registered for the match type. */
	public addRole(input: NewMatchTypeRole): MatchTypeRole {
		const role = createMatchTypeRole(this.db, input);
		this.#guildRoles(role.guildId).push(role);
		return role;
	}

	public removeRole(guildId: Snowflake, id: number): boolean {
		const removed = deleteMatchTypeRole(this.db, id);
		const roles = this.#roles.get(guildId);
		if (roles) this.#roles.set(guildId, roles.filter((role) => role.id !== id));
		return removed;
	}

	/** Registers the role when it is not registered for the match type yet, and unregisters it otherwise. */
	public toggleRole(guildId: Snowflake, matchType: string, roleId: Snowflake): RoleToggle {
		const existing = this.rolesFor(guildId, matchType).find((role) => role.roleId === roleId);
		if (existing) {
			this.removeRole(guildId, existing.id);
			return { action: 'removed', role: existing };
		}

		return { action: 'added', role: this.addRole({ guildId, matchType, roleId }) };
	}

	public rolesFor(guildId: Snowflake, matchType?: string): MatchTypeRole[] {
		const roles = this.#roles.get(guildId) ?? [];
		return matchType === undefined ? [...roles] : roles.filter((role) => role.matchType === matchType);
	}

	public guildsWithRoles(): Snowflake[] {
		return [...this.#roles.entries()].filter(([, roles]) => roles.length > 0).map(([guildId]) => guildId);
	}

	/** Drops registrations of roles that no longer exist in the guild. Returns what was dropped. */
	public pruneRoles(guildId: Snowflake, existingRoleIds: ReadonlySet<Snowflake>): MatchTypeRole[] {
		const stale = this.rolesFor(guildId).filter((role) => !existingRoleIds.has(role.roleId));
		for (const role of stale) this.removeRole(guildId, role.id);

		if (stale.length > 0) {
			this.logger.info(`Challenges: Removed ${stale.length} registration(s) of deleted roles in guild ${guildId}.`);
		}
		return stale;
	}

	#guildRoles(guildId: Snowflake): MatchTypeRole[] {
		let roles = this.#roles.get(guildId);
		if (!roles) {
			roles = [];
			this.#roles.set(guildId, roles);
		}
		return roles;
	}
}
