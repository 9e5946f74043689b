import { ApplyOptions } from '@sapphire/decorators';
import { Listener } from '@sapphire/framework';
import { Events, type Role } from 'discord.js';

@ApplyOptions<Listener.Options>({ name: Events.GuildRoleDelete })
export class GuildRoleDeleteListener extends Listener {
	public override run(role: Role) {
		const { challenges, logger } = this.container;
		const registrations = challenges.rolesFor(role.guild.id).filter((entry) => entry.roleId === role.id);

		for (const entry of registrations) challenges.removeRole(role.guild.id, entry.id);

		if (registrations.length > 0) {
			logger.info(`Challenges: Role ${role.id} was deleted in guild ${role.guild.id}, removed ${registrations.length} registration(s).`);
		}
	}
}
