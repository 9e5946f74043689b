// Unless explicitly defined, set NODE_ENV as development:
process.env.NODE_ENV ??= 'development';

import { ApplicationCommandRegistries, RegisterBehavior } from '@sapphire/framework';
import '@sapphire/plugin-logger/register';
import '@sapphire/plugin-subcommands/register';
import { container } from '@sapphire/pieces';
import { setup, type IntegerString } from '@skyra/env-utilities';
import * as colorette from 'colorette';
import { join } from 'path';
import { inspect } from 'util';
import { databasePath } from './config';
import { rootDir } from './constants';
import './db/augment';
import { createDatabase } from './db/index';

// Set default behavior to bulk overwrite
ApplicationCommandRegistries.setDefaultBehaviorWhenNotIdentical(RegisterBehavior.Overwrite);

// Read env var
setup({ path: join(rootDir, '.env') });

// Set default inspection depth
inspect.defaultOptions.depth = 1;

// Enable colorette
colorette.createColors({ useColor: true });

// Open the store and apply the schema before any piece loads, so every
// command and listener can reach it via `this.container.db`.
const { sqlite, db } = createDatabase(databasePath());
container.sqlite = sqlite;
container.db = db;

declare module '@skyra/env-utilities' {
	interface Env {
		DISCORD_TOKEN: string;
		/** Path to the SQLite database file. Defaults to <cwd>/data/challenges.sqlite. */
		DATABASE_PATH: string;
		/** Minutes before an unanswered match request pings its roles. Defaults to 1. */
		CHALLENGE_TIMEOUT_MINUTES: IntegerString;
	}
}
