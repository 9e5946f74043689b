import { describe, expect, it } from 'vitest';
import {
	elapsed,
	fetchChallenge,
	fetchChallenges,
	fetchRecentCompletedChallenges,
	insertChallenge,
	isOpen,
	respondToChallenge,
	type NewChallenge
} from '../../src/lib/db/challenges';
import {
	ChallengeExistsError,
	ChallengeNotFoundError,
	ChallengeRespondedError,
	CheckConstraintViolationError,
	NotNullViolationError,
	UniqueConstraintViolationError,
	translateSqliteError,
	withConstraintErrors
} from '../../src/lib/db/errors';
import { createTestDatabase, daysBefore } from '../test-utils';

const CAPTCHA: NewChallenge = {
	guildId: '100',
	textChannelId: '200',
	messageId: '300',
	challengeType: 'captcha',
	createdAt: new Date('2024-01-01T00:00:00Z')
};

describe('insertChallenge', () => {
	it('stores an open challenge and returns it', () => {
		const { db } = createTestDatabase();

		const challenge = insertChallenge(db, CAPTCHA);

		expect(challenge).toEqual({
			id: 1,
			createdAt: new Date('2024-01-01T00:00:00.000Z'),
			guildId: '100',
			textChannelId: '200',
			messageId: '300',
			challengeType: 'captcha',
			response: { status: 'open' }
		});
		expect(isOpen(challenge)).toBe(true);
		expect(elapsed(challenge)).toBeNull();
	});

	it('assigns distinct, stable ids', () => {
		const { db } = createTestDatabase();

		const ids = ['301', '302', '303'].map((messageId) => insertChallenge(db, { ...CAPTCHA, messageId }).id);

		expect(ids).toEqual([1, 2, 3]);
		expect(fetchChallenge(db, { id: 2 })?.messageId).toBe('302');
	});

	it('lower-cases the challenge type', () => {
		const { db } = createTestDatabase();

		expect(insertChallenge(db, { ...CAPTCHA, challengeType: 'Solo Ultra' }).challengeType).toBe('solo ultra');
	});

	it('defaults the creation time to now', () => {
		const { db } = createTestDatabase();
		const before = Date.now();

		const { createdAt } = insertChallenge(db, { ...CAPTCHA, createdAt: undefined });

		expect(createdAt.getTime()).toBeGreaterThanOrEqual(before);
		expect(createdAt.getTime()).toBeLessThanOrEqual(Date.now());
	});

	it('keeps snowflakes beyond double precision intact', () => {
		const { db } = createTestDatabase();

		insertChallenge(db, {
			...CAPTCHA,
			guildId: '1234567890123456789',
			textChannelId: '1234567890123456790',
			messageId: '1234567890123456791'
		});

		const [stored] = fetchChallenges(db, { guildId: '1234567890123456789' });
		expect(stored.guildId).toBe('1234567890123456789');
		expect(stored.textChannelId).toBe('1234567890123456790');
		expect(stored.messageId).toBe('1234567890123456791');
		expect(fetchChallenges(db, { guildId: '1234567890123456788' })).toEqual([]);
	});

	it('rejects a second challenge for the same message', () => {
		const { db } = createTestDatabase();
		insertChallenge(db, CAPTCHA);

		let thrown: unknown;
		try {
			insertChallenge(db, { ...CAPTCHA, guildId: '101', challengeType: 'solo' });
		} catch (error) {
			thrown = error;
		}

		expect(thrown).toBeInstanceOf(ChallengeExistsError);
		expect(thrown).toBeInstanceOf(UniqueConstraintViolationError);
		expect(thrown).toHaveProperty('messageId', '300');
		expect(fetchChallenges(db)).toHaveLength(1);
	});

	it('accepts challenges with distinct messages', () => {
		const { db } = createTestDatabase();
		insertChallenge(db, CAPTCHA);
		insertChallenge(db, { ...CAPTCHA, messageId: '301' });

		expect(fetchChallenges(db).map((challenge) => challenge.messageId)).toEqual(['300', '301']);
	});
});

describe('respondToChallenge', () => {
	it('records the respondent and leaves every other field unchanged', () => {
		const { db } = createTestDatabase();
		const created = insertChallenge(db, CAPTCHA);

		const answered = respondToChallenge(db, { messageId: '300' }, '42', new Date('2024-01-01T00:05:00Z'));

		expect(answered).toEqual({
			...created,
			response: { status: 'answered', memberId: '42', respondedAt: new Date('2024-01-01T00:05:00.000Z') }
		});
		expect(fetchChallenge(db, { messageId: '300' })).toEqual(answered);
		expect(isOpen(answered)).toBe(false);
		expect(elapsed(answered)).toBe(5 * 60 * 1000);
	});

	it('addresses a challenge by row id', () => {
		const { db } = createTestDatabase();
		const { id } = insertChallenge(db, CAPTCHA);

		const answered = respondToChallenge(db, { id }, '42', new Date('2024-01-01T00:01:00Z'));

		expect(answered.response).toEqual({ status: 'answered', memberId: '42', respondedAt: new Date('2024-01-01T00:01:00Z') });
	});

	it('refuses a second response and keeps the first', () => {
		const { db } = createTestDatabase();
		insertChallenge(db, CAPTCHA);
		respondToChallenge(db, { messageId: '300' }, '42', new Date('2024-01-01T00:05:00Z'));

		expect(() => respondToChallenge(db, { messageId: '300' }, '43')).toThrow(ChallengeRespondedError);
		expect(fetchChallenge(db, { messageId: '300' })?.response).toEqual({
			status: 'answered',
			memberId: '42',
			respondedAt: new Date('2024-01-01T00:05:00Z')
		});
	});

	it('reports an unknown challenge', () => {
		const { db } = createTestDatabase();

		expect(() => respondToChallenge(db, { messageId: '999' }, '42')).toThrow(new ChallengeNotFoundError('No challenge recorded for message 999.'));
		expect(() => respondToChallenge(db, { id: 7 }, '42')).toThrow(new ChallengeNotFoundError('No challenge recorded for id 7.'));
	});
});

describe('fetchChallenges', () => {
	it('returns exactly the challenges of one guild, oldest first', () => {
		const { db } = createTestDatabase();
		insertChallenge(db, { ...CAPTCHA, guildId: '1', messageId: '11', createdAt: new Date('2024-01-02T00:00:00Z') });
		insertChallenge(db, { ...CAPTCHA, guildId: '2', messageId: '21' });
		insertChallenge(db, { ...CAPTCHA, guildId: '1', messageId: '12', createdAt: new Date('2024-01-01T00:00:00Z') });

		expect(fetchChallenges(db, { guildId: '1' }).map((challenge) => challenge.messageId)).toEqual(['12', '11']);
		expect(fetchChallenges(db, { guildId: '3' })).toEqual([]);
	});

	it('can leave out answered challenges', () => {
		const { db } = createTestDatabase();
		insertChallenge(db, { ...CAPTCHA, messageId: '1' });
		insertChallenge(db, { ...CAPTCHA, messageId: '2' });
		insertChallenge(db, { ...CAPTCHA, messageId: '3' });
		respondToChallenge(db, { messageId: '1' }, '99999');

		expect(fetchChallenges(db)).toHaveLength(3);
		expect(fetchChallenges(db, { openOnly: true }).map((challenge) => challenge.messageId)).toEqual(['2', '3']);
	});
});

describe('fetchRecentCompletedChallenges', () => {
	const now = new Date('2024-06-10T12:00:00Z');

	function seed() {
		const { db } = createTestDatabase();
		const rows: [guildId: string, messageId: string, daysAgo: number][] = [
			['123456', '111', 5],
			['3434', '222', 5],
			['12312452346', '333', 3],
			['123456', '444', 2],
			['3434', '555', 1],
			['12312452346', '666', 0]
		];
		for (const [guildId, messageId, daysAgo] of rows) {
			insertChallenge(db, { guildId, textChannelId: '1', messageId, challengeType: 'solo', createdAt: daysBefore(now, daysAgo) });
		}
		for (const messageId of ['111', '222', '333', '444', '555']) {
			respondToChallenge(db, { messageId }, '99999', now);
		}
		return db;
	}

	it('returns answered challenges created within the window', () => {
		const db = seed();

		const recent = fetchRecentCompletedChallenges(db, { days: 3, now });

		expect(recent.map((challenge) => challenge.messageId)).toEqual(['333', '444', '555']);
	});

	it('narrows the window to one guild', () => {
		const db = seed();

		expect(fetchRecentCompletedChallenges(db, { guildId: '3434', days: 3, now }).map((challenge) => challenge.messageId)).toEqual(['555']);
		expect(fetchRecentCompletedChallenges(db, { guildId: '3434', days: 5, now }).map((challenge) => challenge.messageId)).toEqual([
			'222',
			'555'
		]);
	});
});

describe('constraint errors', () => {
	it('rejects a half-set response', () => {
		const { sqlite, db } = createTestDatabase();
		insertChallenge(db, CAPTCHA);

		expect(() =>
			withConstraintErrors(() => sqlite.prepare("update challenges set responded_at = '2024-01-01T00:05:00.000Z' where message_id = 300").run())
		).toThrow(CheckConstraintViolationError);
	});

	it('rejects a challenge without its required fields', () => {
		const { sqlite } = createTestDatabase();

		expect(() => withConstraintErrors(() => sqlite.prepare('insert into challenges (guild_id) values (1)').run())).toThrow(NotNullViolationError);
	});

	it('passes other errors through unchanged', () => {
		const error = new Error('disk I/O error');

		expect(translateSqliteError(error)).toBe(error);
	});
});
