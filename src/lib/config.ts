import { envParseInteger, envParseString } from '@skyra/env-utilities';
import { DEFAULT_DATABASE_PATH, DEFAULT_TIMEOUT_MINUTES } from './constants';

export function databasePath(): string {
	return envParseString('DATABASE_PATH', DEFAULT_DATABASE_PATH);
}

/** Minutes a match request may wait before its registered roles are pinged. */
export function challengeTimeoutMinutes(): number {
	return envParseInteger('CHALLENGE_TIMEOUT_MINUTES', DEFAULT_TIMEOUT_MINUTES);
}
