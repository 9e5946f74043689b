import './lib/setup';

import { LogLevel, SapphireClient } from '@sapphire/framework';
import { container } from '@sapphire/pieces';
import { GatewayIntentBits } from 'discord.js';
import { ChallengeTracker } from './lib/challenge/tracker';

const client = new SapphireClient({
	logger: {
		level: process.env.NODE_ENV === 'production' ? LogLevel.Info : LogLevel.Debug
	},
	intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent, GatewayIntentBits.GuildMembers]
});

const shutdown = async (signal: NodeJS.Signals) => {
	client.logger.info(`Received ${signal}, shutting down`);
	await client.destroy();
	container.sqlite.close();
	process.exit(0);
};

const main = async () => {
	try {
		container.challenges = new ChallengeTracker(container.db, client.logger);
		container.challenges.load();

		process.once('SIGINT', (signal) => void shutdown(signal));
		process.once('SIGTERM', (signal) => void shutdown(signal));

		client.logger.info('Logging in');
		await client.login();
		client.logger.info('Logged in');
	} catch (error) {
		client.logger.fatal(error);
		await client.destroy();
		container.sqlite.close();
		process.exit(1);
	}
};

void main();
