/**
 * Game Cache Service - Persist the owned-games snapshot as JSON
 *
 * The cache file is replaced wholesale on every save. A missing, empty,
 * malformed or expired file loads as `null` so the caller rescans.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from '../config';
import { GameCacheError, errorMessage, isFileNotFound } from '../errors';
import { CachedGame, GameCache } from '../models/GameCacheModel';
import type { Game } from '../models/GameModel';
import { getLogger } from './LogService';

const log = getLogger('GameCacheService');

export const CACHE_FILENAME = 'games_cache.json';

const isoDateSchema = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value));

// Older caches may lack the aggregated owner lists or store them as null
const ownerListSchema = z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []);

const cachedGameSchema = z.object({
    appId: z.number().int(),
    name: z.string().default(''),
    playtimeMinutes: z.number().int().nonnegative().default(0),
    iconUrl: z.string().default(''),
    ownerSteamId: z.string().default(''),
    ownerAccountName: z.string().default(''),
    ownerPersonaName: z.string().default(''),
    isPaid: z.boolean().default(true),
    isInstalled: z.boolean().default(false),
    lastUpdated: isoDateSchema,
    ownerSteamIdsAll: ownerListSchema,
    ownerAccountNamesAll: ownerListSchema,
});

const gameCacheSchema = z.object({
    lastUpdated: isoDateSchema,
    validDuration: z.number().nonnegative().optional(),
    games: z.array(cachedGameSchema).default([]),
});

export type PersistedGameCache = z.input<typeof gameCacheSchema>;

export interface GameCacheServiceOptions {
    dataDir?: string;
    validDuration?: number;
}

export interface CacheFileInfo {
    exists: boolean;
    lastModified: Date | null;
    sizeBytes: number;
}

export interface InstalledStatusUpdate {
    games: Game[];
    changed: number;
}

export class GameCacheService {
    readonly cacheFilePath: string;
    readonly validDuration: number;

    constructor(options: GameCacheServiceOptions = {}) {
        this.cacheFilePath = path.join(options.dataDir ?? config.DATA_DIR, CACHE_FILENAME);
        this.validDuration = options.validDuration ?? config.GAME_CACHE_VALID_DURATION_MS;
    }

    static serialize(cache: GameCache): string {
        const persisted = {
            lastUpdated: cache.lastUpdated.toISOString(),
            validDuration: cache.validDuration,
            games: cache.games.map((game) => ({
                appId: game.appId,
                name: game.name,
                playtimeMinutes: game.playtimeMinutes,
                iconUrl: game.iconUrl,
                ownerSteamId: game.ownerSteamId,
                ownerAccountName: game.ownerAccountName,
                ownerPersonaName: game.ownerPersonaName,
                isPaid: game.isPaid,
                isInstalled: game.isInstalled,
                lastUpdated: game.lastUpdated.toISOString(),
                ownerSteamIdsAll: [...game.ownerSteamIdsAll],
                ownerAccountNamesAll: [...game.ownerAccountNamesAll],
            })),
        } satisfies PersistedGameCache;

        return JSON.stringify(persisted, null, 2);
    }

    /**
     * Parse a cache file body. The stored validDuration wins over the
     * configured one so a cache expires under the rule it was written with.
     */
    static deserialize(json: string, fallbackValidDuration?: number): GameCache {
        let raw: unknown;
        try {
            raw = JSON.parse(json);
        } catch (error) {
            throw new GameCacheError(`Game cache is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }

        const parsed = gameCacheSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
            throw new GameCacheError(`Game cache has an invalid layout at ${where}: ${issue.message}`, {
                cause: parsed.error,
            });
        }

        return new GameCache({
            lastUpdated: parsed.data.lastUpdated,
            validDuration: parsed.data.validDuration ?? fallbackValidDuration,
            games: parsed.data.games.map((game) => new CachedGame(game)),
        });
    }

    /**
     * Read the cache file whether or not it has expired
     */
    async readCache(): Promise<GameCache | null> {
        if (!fs.existsSync(this.cacheFilePath)) {
            log.info({ path: this.cacheFilePath }, 'No game cache file found');
            return null;
        }

        try {
            const content = await fs.promises.readFile(this.cacheFilePath, 'utf-8');
            if (!content.trim()) {
                log.warn({ path: this.cacheFilePath }, 'Game cache file is empty');
                return null;
            }

            return GameCacheService.deserialize(content, this.validDuration);
        } catch (error) {
            log.warn({ error, path: this.cacheFilePath }, 'Discarding unreadable game cache');
            return null;
        }
    }

    /**
     * Load a cache that is still valid at `now`
     */
    async loadCache(now: Date = new Date()): Promise<GameCache | null> {
        const cache = await this.readCache();
        if (!cache) return null;

        if (cache.isExpired(now)) {
            log.info(
                { lastUpdated: cache.lastUpdated.toISOString(), validHours: cache.validDuration / 3_600_000 },
                'Game cache is expired',
            );
            return null;
        }

        log.info({ count: cache.games.length, lastUpdated: cache.lastUpdated.toISOString() }, 'Using valid game cache');
        return cache;
    }

    /**
     * Replace the cache file with a fresh snapshot of `games`
     */
    async saveCache(games: readonly Game[], now: Date = new Date()): Promise<GameCache> {
        const cache = GameCache.fromGames(games, now, this.validDuration);
        const tempPath = `${this.cacheFilePath}.${process.pid}.tmp`;

        try {
            await fs.promises.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
            await fs.promises.writeFile(tempPath, GameCacheService.serialize(cache), 'utf-8');
            await fs.promises.rename(tempPath, this.cacheFilePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            log.error({ error, path: this.cacheFilePath }, 'Failed to save game cache');
            throw new GameCacheError(`Failed to save game cache: ${errorMessage(error)}`, { cause: error });
        }

        log.info(
            { count: cache.games.length, path: this.cacheFilePath, expiresAt: cache.expiresAt.toISOString() },
            'Game cache saved',
        );
        return cache;
    }

    async clearCache(): Promise<boolean> {
        try {
            await fs.promises.unlink(this.cacheFilePath);
            log.info({ path: this.cacheFilePath }, 'Game cache cleared');
            return true;
        } catch (error) {
            if (isFileNotFound(error)) return false;
            log.error({ error, path: this.cacheFilePath }, 'Failed to clear game cache');
            throw new GameCacheError(`Failed to clear game cache: ${errorMessage(error)}`, { cause: error });
        }
    }

    getCacheInfo(): CacheFileInfo {
        if (!fs.existsSync(this.cacheFilePath)) {
            return { exists: false, lastModified: null, sizeBytes: 0 };
        }

        const stats = fs.statSync(this.cacheFilePath);
        return { exists: true, lastModified: stats.mtime, sizeBytes: stats.size };
    }

    /**
     * Set each game's isInstalled flag from the detected app ids
     */
    updateInstalledStatus(games: readonly Game[], installedAppIds: ReadonlySet<number>): InstalledStatusUpdate {
        let changed = 0;

        const updated = games.map((game) => {
            const isInstalled = installedAppIds.has(game.appId);
            if (isInstalled === game.isInstalled) return game;
            changed++;
            return { ...game, isInstalled };
        });

        log.debug({ total: games.length, installed: installedAppIds.size, changed }, 'Updated installed status');
        return { games: updated, changed };
    }
}
