import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import type { Message } from 'discord.js';
import { setTimeout as sleep } from 'node:timers/promises';
import { ChallengeEvents } from '../../lib/challenge/events';
import { matchTypeName, type MatchType } from '../../lib/challenge/matchTypes';
import { challengeTimeoutMinutes } from '../../lib/config';
import { isOpen } from '../../lib/db/challenges';
import { ChallengeExistsError } from '../../lib/db/errors';

@ApplyOptions<Listener.Options>({ event: ChallengeEvents.ChallengeCreate })
export class ChallengeCreateListener extends Listener {
	public override async run(message: Message<true>, matchType: MatchType) {
		const { client, challenges, logger } = this.container;

		try {
			challenges.open({
				guildId: message.guildId,
				textChannelId: message.channelId,
				messageId: message.id,
				challengeType: matchType
			});
		} catch (error) {
			if (error instanceof ChallengeExistsError) {
				logger.debug(`Challenges: Message ${message.id} is already tracked, skipping.`);
				return;
			}
			throw error;
		}

		const minutes = challengeTimeoutMinutes();
		await message.channel.send(
			`Tracking this ${matchTypeName(matchType)} request. Registered roles get pinged if nobody accepts within ${minutes} minute${minutes === 1 ? '' : 's'}.`
		);

		await sleep(minutes * 60_000);

		// The tracker may have lost the challenge across a reconnect; the store has the final word.
		const challenge = challenges.resolve(message.id);
		if (!challenge) {
			logger.warn(`Challenges: Message ${message.id} was never recorded, not timing it out.`);
			return;
		}

		if (isOpen(challenge)) client.emit(ChallengeEvents.ChallengeTimeout, challenge, message);
	}
}
