import type { Snowflake } from 'discord.js';

const PERIODS: [name: string, seconds: number][] = [
	['year', 60 * 60 * 24 * 365],
	['month', 60 * 60 * 24 * 30],
	['day', 60 * 60 * 24],
	['hour', 60 * 60],
	['minute', 60],
	['second', 1]
];

/** Human readable duration, largest units first: `"1 hour, 5 minutes"`. */
export function formatDuration(ms: number): string {
	let seconds = Math.floor(Math.abs(ms) / 1000);
	const parts: string[] = [];

	for (const [name, length] of PERIODS) {
		if (seconds < length) continue;
		const value = Math.floor(seconds / length);
		seconds %= length;
		parts.push(`${value} ${name}${value > 1 ? 's' : ''}`);
	}

	return parts.length > 0 ? parts.join(', ') : '0 seconds';
}

export function averageDuration(durations: readonly number[]): number | null {
	if (durations.length === 0) return null;
	return durations.reduce((sum, value) => sum + value, 0) / durations.length;
}

export function jumpUrl(guildId: Snowflake, channelId: Snowflake, messageId: Snowflake): string {
	return `https://discord.com/channels/${guildId}/${channelId}/${messageId}`;
}

/** `YYYY-MM-DD` of a date in UTC. */
export function formatDay(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/**
 * Groups lines into blocks whose newline-joined text stays within `limit`
 * characters. A single line longer than `limit` is cut to fit.
 */
export function chunkLines(lines: readonly string[], limit: number): string[] {
	const chunks: string[] = [];
	let current = '';

	for (const raw of lines) {
		const line = raw.length > limit ? `${raw.slice(0, limit - 1)}…` : raw;
		if (current.length === 0) {
			current = line;
		} else if (current.length + 1 + line.length <= limit) {
			current += `\n${line}`;
		} else {
			chunks.push(current);
			current = line;
		}
	}

	if (current.length > 0) chunks.push(current);
	return chunks;
}
