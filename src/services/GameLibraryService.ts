/**
 * Game Library Service - the owned-games refresh workflow
 *
 * Loads a still-valid cache, rebuilds live games, refreshes installed flags
 * and assigns the local accounts that can launch each game. A completed scan
 * replaces the snapshot wholesale; readers see the old or the new snapshot,
 * never a mix.
 */

import { GameCache } from '../models/GameCacheModel';
import type { Game } from '../models/GameModel';
import type { SteamAccount } from '../models/SteamAccountModel';
import { GameCacheService } from './GameCacheService';
import { GameTypeCache } from './GameTypeCache';
import { getLogger } from './LogService';
import { SteamAccountService } from './SteamAccountService';
import { SteamLibraryService } from './SteamLibraryService';

const log = getLogger('GameLibraryService');

export interface GameLibraryServiceOptions {
    cacheService?: GameCacheService;
    typeCache?: GameTypeCache;
    // Skips Steam path discovery when set; null disables local Steam lookups
    steamPath?: string | null;
}

export interface LibraryLoadResult {
    fromCache: boolean;
    games: Game[];
    accounts: SteamAccount[];
    cache: GameCache | null;
}

export class GameLibraryService {
    readonly cacheService: GameCacheService;
    readonly typeCache: GameTypeCache;
    private readonly steamPath: string | null | undefined;
    private snapshot: GameCache = new GameCache();

    constructor(options: GameLibraryServiceOptions = {}) {
        this.cacheService = options.cacheService ?? new GameCacheService();
        this.typeCache = options.typeCache ?? new GameTypeCache();
        this.steamPath = options.steamPath;
    }

    /**
     * Fill `availableAccounts`. Free-to-play games can be launched from any
     * local account; paid games only from the local accounts that own them.
     */
    static assignAvailableAccounts(games: readonly Game[], accounts: readonly SteamAccount[]): Game[] {
        return games.map((game) => {
            const availableAccounts = game.isPaid
                ? accounts.filter(
                      (account) =>
                          (account.steamId !== undefined && game.ownerSteamIds.has(account.steamId)) ||
                          game.ownerAccountNames.has(account.accountName),
                  )
                : [...accounts];

            return { ...game, availableAccounts };
        });
    }

    private async resolveSteamPath(): Promise<string | null> {
        if (this.steamPath !== undefined) return this.steamPath;
        return SteamAccountService.getSteamPath();
    }

    private applyKnownGameTypes(games: readonly Game[], now: Date): Game[] {
        return games.map((game) => {
            const isPaid = this.typeCache.get(game.appId, now);
            return isPaid === undefined || isPaid === game.isPaid ? game : { ...game, isPaid };
        });
    }

    getSnapshot(): GameCache {
        return this.snapshot;
    }

    /**
     * Load games from a valid cache. Returns `fromCache: false` with no games
     * when the cache is missing or expired, signalling a rescan is needed.
     */
    async loadLibrary(now: Date = new Date()): Promise<LibraryLoadResult> {
        const cache = await this.cacheService.loadCache(now);
        if (!cache) {
            return { fromCache: false, games: [], accounts: [], cache: null };
        }

        await this.typeCache.load();
        let games = this.applyKnownGameTypes(
            cache.games.map((entry) => entry.toLive()),
            now,
        );
        let accounts: SteamAccount[] = [];

        const steamPath = await this.resolveSteamPath();
        if (steamPath) {
            const installedAppIds = await SteamLibraryService.getInstalledAppIds(steamPath);
            games = this.cacheService.updateInstalledStatus(games, installedAppIds).games;

            const response = await SteamAccountService.getAccounts(steamPath);
            if (response.success) {
                accounts = response.accounts;
            } else {
                log.warn({ error: response.error }, 'Local accounts unavailable, games keep no launch accounts');
            }
        }

        games = GameLibraryService.assignAvailableAccounts(games, accounts).sort((a, b) => a.name.localeCompare(b.name));
        this.snapshot = cache;

        log.info({ count: games.length, accounts: accounts.length }, 'Loaded game library from cache');
        return { fromCache: true, games, accounts, cache };
    }

    /**
     * Persist the result of a completed library scan and make it the current snapshot
     */
    async replaceSnapshot(games: readonly Game[], now: Date = new Date()): Promise<GameCache> {
        const saved = await this.cacheService.saveCache(games, now);

        // Merge into the remembered types rather than overwrite them
        await this.typeCache.load();
        for (const game of games) {
            this.typeCache.set(game.appId, game.isPaid, false, now);
        }
        await this.typeCache.save();

        this.snapshot = saved;
        return saved;
    }

    async clear(): Promise<boolean> {
        const removed = await this.cacheService.clearCache();
        this.snapshot = new GameCache();
        return removed;
    }
}
