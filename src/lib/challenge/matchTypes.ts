export const MATCH_TYPES = [
	{ name: 'Solo', value: 'solo' },
	{ name: 'Solo Ultra', value: 'solo ultra' }
] as const;

export type MatchType = (typeof MATCH_TYPES)[number]['value'];

// Longer alternative first so "Solo Ultra" is not read as "Solo".
const MATCH_TYPE_PATTERN = /Type: .* (Solo Ultra|Solo)/;
const MATCH_REQUEST_MARKER = 'new match request received!';

export function isMatchType(value: string): value is MatchType {
	return MATCH_TYPES.some((type) => type.value === value);
}

/** Display name of a stored match type, falling back to the stored value. */
export function matchTypeName(value: string): string {
	return MATCH_TYPES.find((type) => type.value === value)?.name ?? value;
}

export function isMatchRequest(content: string): boolean {
	return content.toLowerCase().includes(MATCH_REQUEST_MARKER);
}

/** Reads the match type out of a match request, or `null` when it names none we know. */
export function parseMatchType(content: string): MatchType | null {
	const match = MATCH_TYPE_PATTERN.exec(content);
	if (!match) return null;

	const value = match[1].toLowerCase();
	return isMatchType(value) ? value : null;
}

export function isAcceptance(content: string): boolean {
	return content.toLowerCase().includes('accept');
}
