import { join } from 'path';

export const rootDir = process.cwd();
export const dataDir = join(rootDir, 'data');

export const DEFAULT_DATABASE_PATH = join(dataDir, 'challenges.sqlite');
export const DEFAULT_TIMEOUT_MINUTES = 1;
export const DEFAULT_HISTORY_DAYS = 3;
