import type BetterSqlite3 from 'better-sqlite3';
import type { ChallengeTracker } from '../challenge/tracker';
import type { ChallengeDatabase } from './index';

declare module '@sapphire/pieces' {
	interface Container {
		sqlite: BetterSqlite3.Database;
		db: ChallengeDatabase;
		challenges: ChallengeTracker;
	}
}
