import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import type { Message, Role } from 'discord.js';
import { ChallengeEvents } from '../../lib/challenge/events';
import type { Challenge } from '../../lib/db/challenges';

@ApplyOptions<Listener.Options>({ event: ChallengeEvents.ChallengeTimeout })
export class ChallengeTimeoutListener extends Listener {
	public override async run(challenge: Challenge, message: Message<true>) {
		const { challenges, logger } = this.container;
		challenges.expire(challenge.messageId);

		const roles = challenges
			.rolesFor(challenge.guildId, challenge.challengeType)
			.map((entry) => message.guild.roles.cache.get(entry.roleId))
			.filter((role): role is Role => role !== undefined);

		const mentions = roles.map((role) => role.toString()).join(' ');
		await message.reply({
			content: mentions ? `${mentions} This order is still up!` : 'This order is still up!',
			allowedMentions: { roles: roles.map((role) => role.id) }
		});

		logger.info(`Challenges: Message ${challenge.messageId} timed out, pinged ${roles.length} role(s) in guild ${challenge.guildId}.`);
	}
}
