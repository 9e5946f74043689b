import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import { Events, type Message } from 'discord.js';
import { ChallengeEvents } from '../lib/challenge/events';
import { isAcceptance, isMatchRequest, parseMatchType } from '../lib/challenge/matchTypes';

@ApplyOptions<Listener.Options>({ name: Events.MessageCreate })
export class MessageCreateListener extends Listener {
	public override run(message: Message) {
		const { client, challenges, logger } = this.container;
		if (!message.inGuild() || message.author.id === client.user?.id) return;

		if (isMatchRequest(message.content)) {
			const matchType = parseMatchType(message.content);
			if (!matchType) {
				logger.warn(`Challenges: Match request ${message.id} in guild ${message.guildId} names no known match type, ignoring.`);
				return;
			}

			logger.debug(`Challenges: Match request ${message.id} detected (${matchType}).`);
			client.emit(ChallengeEvents.ChallengeCreate, message, matchType);
			return;
		}

		const referencedId = message.reference?.messageId;
		if (!referencedId || !isAcceptance(message.content)) return;

		const challenge = challenges.get(referencedId);
		if (challenge) client.emit(ChallengeEvents.ChallengeAccept, challenge, message);
	}
}
