import { ApplyOptions } from '@sapphire/decorators';
import { Subcommand } from '@sapphire/plugin-subcommands';
import {
	InteractionContextType,
	MessageFlags,
	PermissionFlagsBits,
	type ChatInputCommandInteraction,
	type ContainerBuilder,
	type Guild,
	type Role,
	type Snowflake
} from 'discord.js';
import {
	buildErrorComponents,
	buildListMessages,
	buildNoticeComponents,
	formatHistoryLine,
	formatOpenLine,
	historyTitle
} from '../../lib/challenge/display';
import { averageDuration } from '../../lib/challenge/format';
import { MATCH_TYPES, matchTypeName } from '../../lib/challenge/matchTypes';
import { DEFAULT_HISTORY_DAYS } from '../../lib/constants';
import { elapsed } from '../../lib/db/challenges';
import { RoleExistsError } from '../../lib/db/errors';

const EPHEMERAL_V2 = MessageFlags.IsComponentsV2 | MessageFlags.Ephemeral;

@ApplyOptions<Subcommand.Options>({
	description: 'Track match requests and the roles pinged when nobody accepts them',
	subcommands: [
		{ name: 'open', chatInputRun: 'chatInputOpen' },
		{ name: 'history', chatInputRun: 'chatInputHistory' },
		{ name: 'set-role', chatInputRun: 'chatInputSetRole' },
		{ name: 'list-roles', chatInputRun: 'chatInputListRoles' }
	]
})
export class ChallengeCommand extends Subcommand {
	public override registerApplicationCommands(registry: Subcommand.Registry) {
		registry.registerChatInputCommand((builder) =>
			builder
				.setName(this.name)
				.setDescription(this.description)
				.setContexts(InteractionContextType.Guild)
				.addSubcommand((command) => command.setName('open').setDescription('Show match requests nobody has accepted yet'))
				.addSubcommand((command) =>
					command
						.setName('history')
						.setDescription('See the history of completed matches')
						.addIntegerOption((option) =>
							option
								.setName('days')
								.setDescription(`How many days back to look (default: ${DEFAULT_HISTORY_DAYS})`)
								.setMinValue(0)
								.setMaxValue(365)
								.setRequired(false)
						)
				)
				.addSubcommand((command) =>
					command
						.setName('set-role')
						.setDescription('Add or remove a role to ping when a match type goes unanswered')
						.addStringOption((option) =>
							option
								.setName('match-type')
								.setDescription('Match type the role is pinged for')
								.addChoices(...MATCH_TYPES)
								.setRequired(true)
						)
						.addRoleOption((option) => option.setName('role').setDescription('Role to add or remove').setRequired(true))
				)
				.addSubcommand((command) =>
					command
						.setName('list-roles')
						.setDescription('Show which roles are registered for a match type')
						.addStringOption((option) =>
							option
								.setName('match-type')
								.setDescription('Match type to list the roles of')
								.addChoices(...MATCH_TYPES)
								.setRequired(true)
						)
				)
		);
	}

	public async chatInputOpen(interaction: Subcommand.ChatInputCommandInteraction) {
		if (!interaction.inCachedGuild()) return this.#replyOutsideGuild(interaction);

		const now = new Date();
		const { guild } = interaction;
		const lines = this.container.challenges
			.openChallenges(interaction.guildId)
			.map((challenge) => formatOpenLine(challenge, now, guild.channels.cache.has(challenge.textChannelId)));

		return this.#replyList(interaction, buildListMessages('## ⏳ Open Matches', lines, '*No open matches.*'));
	}

	public async chatInputHistory(interaction: Subcommand.ChatInputCommandInteraction) {
		if (!interaction.inCachedGuild()) return this.#replyOutsideGuild(interaction);

		const days = interaction.options.getInteger('days') ?? DEFAULT_HISTORY_DAYS;
		const { guild } = interaction;
		const completed = this.container.challenges.recentCompleted(interaction.guildId, days);

		const respondentIds = new Set<Snowflake>();
		for (const challenge of completed) {
			if (challenge.response.status === 'answered') respondentIds.add(challenge.response.memberId);
		}
		const names = await this.#resolveMemberNames(guild, [...respondentIds]);

		const durations = completed.map(elapsed).filter((value): value is number => value !== null);
		const lines = completed.map((challenge) =>
			formatHistoryLine(
				challenge,
				challenge.response.status === 'answered' ? (names.get(challenge.response.memberId) ?? null) : null,
				guild.channels.cache.has(challenge.textChannelId)
			)
		);

		const header = `## 📜 ${historyTitle(completed.length, days, averageDuration(durations))}`;
		return this.#replyList(interaction, buildListMessages(header, lines, '*No history.*'));
	}

	public async chatInputSetRole(interaction: Subcommand.ChatInputCommandInteraction) {
		if (!interaction.inCachedGuild()) return this.#replyOutsideGuild(interaction);

		if (!interaction.memberPermissions.has(PermissionFlagsBits.ManageRoles)) {
			return interaction.reply({
				flags: EPHEMERAL_V2,
				components: buildErrorComponents('You need the **Manage Roles** permission to use this command.')
			});
		}

		const matchType = interaction.options.getString('match-type', true);
		const role = interaction.options.getRole('role', true);

		try {
			const { action } = this.container.challenges.toggleRole(interaction.guildId, matchType, role.id);
			this.container.logger.info(
				`Challenges: ${interaction.user.tag} ${action} role ${role.id} for "${matchType}" in guild ${interaction.guildId}.`
			);

			return interaction.reply({
				flags: EPHEMERAL_V2,
				components:
					action === 'added'
						? buildNoticeComponents('## ✅ Role Added', `<@&${role.id}> will be pinged when a **${matchTypeName(matchType)}** match goes unanswered.`)
						: buildNoticeComponents('## 🗑️ Role Removed', `<@&${role.id}> will no longer be pinged for **${matchTypeName(matchType)}** matches.`)
			});
		} catch (error) {
			if (!(error instanceof RoleExistsError)) throw error;
			return interaction.reply({
				flags: EPHEMERAL_V2,
				components: buildErrorComponents(`<@&${role.id}> is already registered for **${matchTypeName(matchType)}**.`)
			});
		}
	}

	public async chatInputListRoles(interaction: Subcommand.ChatInputCommandInteraction) {
		if (!interaction.inCachedGuild()) return this.#replyOutsideGuild(interaction);

		const matchType = interaction.options.getString('match-type', true);
		const lines = this.container.challenges
			.rolesFor(interaction.guildId, matchType)
			.map((entry) => interaction.guild.roles.cache.get(entry.roleId))
			.filter((role): role is Role => role !== undefined)
			.map((role) => `• <@&${role.id}>`);

		return this.#replyList(
			interaction,
			buildListMessages(
				`## 🔔 Pinging Roles for ${matchTypeName(matchType)}`,
				lines,
				'*None*',
				'-# Use `/challenge set-role` to add or remove a role.'
			)
		);
	}

	async #replyList(interaction: ChatInputCommandInteraction<'cached'>, messages: ContainerBuilder[][]) {
		const [first, ...rest] = messages;
		await interaction.reply({ flags: EPHEMERAL_V2, components: first });
		for (const components of rest) await interaction.followUp({ flags: EPHEMERAL_V2, components });
	}

	#replyOutsideGuild(interaction: ChatInputCommandInteraction) {
		return interaction.reply({
			flags: EPHEMERAL_V2,
			components: buildErrorComponents('This command can only be used inside a server.')
		});
	}

	/** Display names of the members still in the guild, by user id. */
	async #resolveMemberNames(guild: Guild, userIds: Snowflake[]): Promise<Map<Snowflake, string>> {
		const names = new Map<Snowflake, string>();
		if (userIds.length === 0) return names;

		try {
			const members = await guild.members.fetch({ user: userIds });
			for (const [id, member] of members) names.set(id, member.displayName);
		} catch (error) {
			// Members that cannot be fetched are shown as having left.
			this.container.logger.debug(`Challenges: Could not fetch respondents in guild ${guild.id}:`, error);
		}
		return names;
	}
}
