/**
 * Game Type Cache - remembers whether an app is paid or free-to-play
 * Entries live 30 days, or 7 days for apps whose store page was unavailable
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from '../config';
import { GameCacheError, errorMessage } from '../errors';
import { getLogger } from './LogService';

const log = getLogger('GameTypeCache');

export const GAME_TYPE_CACHE_FILENAME = 'game_types_cache.json';

const DAY_MS = 24 * 60 * 60 * 1000;
const ENTRY_TTL_MS = 30 * DAY_MS;
const UNAVAILABLE_ENTRY_TTL_MS = 7 * DAY_MS;

export interface GameTypeInfo {
    isPaid: boolean;
    lastChecked: Date;
    isUnavailable: boolean;
}

const gameTypeFileSchema = z.record(
    z.string().regex(/^\d+$/),
    z.object({
        isPaid: z.boolean(),
        lastChecked: z
            .string()
            .datetime({ offset: true })
            .transform((value) => new Date(value)),
        isUnavailable: z.boolean().default(false),
    }),
);

export class GameTypeCache {
    readonly filePath: string;
    private readonly entries = new Map<number, GameTypeInfo>();

    constructor(dataDir: string = config.DATA_DIR) {
        this.filePath = path.join(dataDir, GAME_TYPE_CACHE_FILENAME);
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Cached paid flag, or undefined when unknown or expired. Expired entries are dropped.
     */
    get(appId: number, now: Date = new Date()): boolean | undefined {
        const info = this.entries.get(appId);
        if (!info) return undefined;

        const ttl = info.isUnavailable ? UNAVAILABLE_ENTRY_TTL_MS : ENTRY_TTL_MS;
        if (now.getTime() - info.lastChecked.getTime() < ttl) {
            return info.isPaid;
        }

        this.entries.delete(appId);
        return undefined;
    }

    set(appId: number, isPaid: boolean, isUnavailable = false, now: Date = new Date()): void {
        this.entries.set(appId, { isPaid, lastChecked: now, isUnavailable });
    }

    async load(): Promise<void> {
        this.entries.clear();
        if (!fs.existsSync(this.filePath)) return;

        try {
            const content = await fs.promises.readFile(this.filePath, 'utf-8');
            const parsed = gameTypeFileSchema.parse(JSON.parse(content));
            for (const [appId, info] of Object.entries(parsed)) {
                this.entries.set(parseInt(appId, 10), info);
            }
            log.info({ count: this.entries.size }, 'Loaded game type cache');
        } catch (error) {
            log.warn({ error, path: this.filePath }, 'Failed to load game type cache, starting empty');
            this.entries.clear();
        }
    }

    async save(): Promise<void> {
        const persisted: Record<string, { isPaid: boolean; lastChecked: string; isUnavailable: boolean }> = {};
        for (const [appId, info] of this.entries) {
            persisted[String(appId)] = {
                isPaid: info.isPaid,
                lastChecked: info.lastChecked.toISOString(),
                isUnavailable: info.isUnavailable,
            };
        }

        try {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.promises.writeFile(this.filePath, JSON.stringify(persisted, null, 2), 'utf-8');
        } catch (error) {
            log.error({ error, path: this.filePath }, 'Failed to save game type cache');
            throw new GameCacheError(`Failed to save game type cache: ${errorMessage(error)}`, { cause: error });
        }
    }
}
