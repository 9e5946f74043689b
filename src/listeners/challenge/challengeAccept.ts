import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import type { Message } from 'discord.js';
import { ChallengeEvents } from '../../lib/challenge/events';
import type { Challenge } from '../../lib/db/challenges';
import { ChallengeRespondedError } from '../../lib/db/errors';

@ApplyOptions<Listener.Options>({ event: ChallengeEvents.ChallengeAccept })
export class ChallengeAcceptListener extends Listener {
	public override async run(challenge: Challenge, message: Message<true>) {
		const { challenges, logger } = this.container;

		try {
			challenges.answer(challenge.messageId, message.author.id);
		} catch (error) {
			if (error instanceof ChallengeRespondedError) {
				logger.debug(`Challenges: ${message.author.id} was late to message ${challenge.messageId}.`);
				return;
			}
			throw error;
		}

		logger.info(`Challenges: Message ${challenge.messageId} in guild ${challenge.guildId} accepted by ${message.author.id}.`);
		await message.channel.send(`I see you! ${message.author}`);
	}
}
