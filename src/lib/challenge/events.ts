import type { Message } from 'discord.js';
import type { Challenge } from '../db/challenges';
import type { MatchType } from './matchTypes';

export const ChallengeEvents = {
	/** A match request was posted. */
	ChallengeCreate: 'challengeCreate',
	/** A member accepted an open challenge by replying to it. */
	ChallengeAccept: 'challengeAccept',
	/** A challenge waited past the timeout without being accepted. */
	ChallengeTimeout: 'challengeTimeout'
} as const;

declare module 'discord.js' {
	interface ClientEvents {
		challengeCreate: [message: Message<true>, matchType: MatchType];
		challengeAccept: [challenge: Challenge, message: Message<true>];
		challengeTimeout: [challenge: Challenge, message: Message<true>];
	}
}
