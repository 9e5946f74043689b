import { ContainerBuilder, SeparatorBuilder, SeparatorSpacingSize, TextDisplayBuilder } from 'discord.js';
import { elapsed, type Challenge } from '../db/challenges';
import { chunkLines, formatDay, formatDuration, jumpUrl } from './format';
import { matchTypeName } from './matchTypes';

/** Room left for the body once header and hint are in; a message's text displays share 4000 characters. */
export const LIST_BODY_LIMIT = 3500;

/** Open challenge line: a link to the request and how long it has waited. */
export function formatOpenLine(challenge: Challenge, now: Date, channelExists: boolean): string {
	const label = matchTypeName(challenge.challengeType);
	const age = formatDuration(now.getTime() - challenge.createdAt.getTime());
	if (!channelExists) return `${label} (channel deleted): ${age}`;
	return `[${label}](${jumpUrl(challenge.guildId, challenge.textChannelId, challenge.messageId)}): ${age}`;
}

/** Completed challenge line: date, type, respondent and response time. */
export function formatHistoryLine(challenge: Challenge, respondent: string | null, channelExists: boolean): string {
	const label = `${formatDay(challenge.createdAt)}/${matchTypeName(challenge.challengeType)}/${respondent ?? 'Member Left Server'}`;
	const took = elapsed(challenge);
	const duration = took === null ? 'open' : formatDuration(took);
	if (!channelExists) return `${label} (channel deleted): ${duration}`;
	return `[${label}](${jumpUrl(challenge.guildId, challenge.textChannelId, challenge.messageId)}): ${duration}`;
}

export function historyTitle(count: number, days: number, average: number | null): string {
	const averageText = average === null ? '(No Average)' : formatDuration(average);
	return `${count} Completed Challenge${count === 1 ? '' : 's'} over ${days} day${days === 1 ? '' : 's'} · Avg: ${averageText}`;
}

/**
 * Builds one component list per message for a list that may not fit in one:
 * the first message carries the header, the last one the hint.
 */
export function buildListMessages(header: string, lines: readonly string[], empty: string, hint?: string): ContainerBuilder[][] {
	const chunks = lines.length > 0 ? chunkLines(lines, LIST_BODY_LIMIT) : [empty];

	return chunks.map((chunk, index) => {
		const container = new ContainerBuilder();
		if (index === 0) {
			container
				.addTextDisplayComponents(new TextDisplayBuilder().setContent(header))
				.addSeparatorComponents(new SeparatorBuilder().setSpacing(SeparatorSpacingSize.Small).setDivider(true));
		}

		container.addTextDisplayComponents(new TextDisplayBuilder().setContent(chunk));

		if (hint !== undefined && index === chunks.length - 1) {
			container
				.addSeparatorComponents(new SeparatorBuilder().setSpacing(SeparatorSpacingSize.Small).setDivider(true))
				.addTextDisplayComponents(new TextDisplayBuilder().setContent(hint));
		}

		return [container];
	});
}

export function buildNoticeComponents(header: string, body: string) {
	return [
		new ContainerBuilder()
			.addTextDisplayComponents(new TextDisplayBuilder().setContent(header))
			.addSeparatorComponents(new SeparatorBuilder().setSpacing(SeparatorSpacingSize.Small).setDivider(true))
			.addTextDisplayComponents(new TextDisplayBuilder().setContent(body))
	];
}

export function buildErrorComponents(message: string) {
	return [new ContainerBuilder().addTextDisplayComponents(new TextDisplayBuilder().setContent(`## ❌ Error\n${message}`))];
}
