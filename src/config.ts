import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CACHE_VALID_DURATION_MS } from './models/GameCacheModel';

dotenv.config();

const HOUR_MS = 60 * 60 * 1000;

export interface AppConfig {
    DATA_DIR: string;
    STEAM_PATH: string;
    GAME_CACHE_VALID_DURATION_MS: number;
    LOG_LEVEL: string;
    LOG_FILE: string;
    NODE_ENV: string;
}

const parseCacheValidDuration = (rawHours: string | undefined): number => {
    if (!rawHours || rawHours.trim() === '') {
        return DEFAULT_CACHE_VALID_DURATION_MS;
    }

    const hours = parseFloat(rawHours);
    if (isNaN(hours) || hours <= 0) {
        console.warn(`Invalid GAME_CACHE_VALID_HOURS "${rawHours}", using default of ${DEFAULT_CACHE_VALID_DURATION_MS / HOUR_MS} hours`);
        return DEFAULT_CACHE_VALID_DURATION_MS;
    }

    return hours * HOUR_MS;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV || 'development';

    return {
        DATA_DIR: env.DATA_DIR || path.join(os.homedir(), '.steam-switcher'),
        STEAM_PATH: env.STEAM_PATH || '',
        GAME_CACHE_VALID_DURATION_MS: parseCacheValidDuration(env.GAME_CACHE_VALID_HOURS),
        LOG_LEVEL: env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
        LOG_FILE: env.LOG_FILE || '',
        NODE_ENV: nodeEnv,
    };
}

export const config = loadConfig();
