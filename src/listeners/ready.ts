import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import { Events, type Client } from 'discord.js';

@ApplyOptions<Listener.Options>({ name: Events.ClientReady, once: true })
export class ReadyListener extends Listener {
	public override run(client: Client<true>) {
		const { challenges, logger } = this.container;
		logger.info(`Logged in as ${client.user.tag}, serving ${client.guilds.cache.size} guild(s).`);

		// Roles deleted while the bot was offline. Guilds the bot has left keep
		// their registrations in case it is invited back.
		for (const guildId of challenges.guildsWithRoles()) {
			const guild = client.guilds.cache.get(guildId);
			if (guild) challenges.pruneRoles(guildId, new Set(guild.roles.cache.keys()));
		}
	}
}
