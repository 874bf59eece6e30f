/**
 * Game Controller - request handlers for the cached game library
 */

import { errorMessage } from '../errors';
import {
    formatPlaytime,
    getGameType,
    getIconImageUrl,
    getOwnerDisplay,
    isFreeToPlayWithMultipleAccounts,
} from '../models/GameModel';
import type { Game } from '../models/GameModel';
import type { GameLibraryService } from '../services/GameLibraryService';
import { getLogger } from '../services/LogService';

const log = getLogger('GameController');

export interface GameView {
    appId: number;
    name: string;
    playtime: string;
    iconUrl: string;
    owner: string;
    type: 'Paid' | 'Free-to-Play';
    isInstalled: boolean;
    ownerAccountNames: string[];
    availableAccounts: string[];
    canChooseAccount: boolean;
}

export interface GamesResponse {
    success: boolean;
    fromCache: boolean;
    games: GameView[];
    error?: string;
}

export interface CacheStatusResponse {
    success: boolean;
    exists: boolean;
    gameCount: number;
    lastUpdated?: string;
    expiresAt?: string;
    isExpired: boolean;
    sizeBytes: number;
    error?: string;
}

export interface ClearCacheResponse {
    success: boolean;
    removed: boolean;
    error?: string;
}

export function toGameView(game: Game): GameView {
    return {
        appId: game.appId,
        name: game.name,
        playtime: formatPlaytime(game.playtimeMinutes),
        iconUrl: getIconImageUrl(game),
        owner: getOwnerDisplay(game),
        type: getGameType(game),
        isInstalled: game.isInstalled,
        ownerAccountNames: game.ownerAccountNames.toArray(),
        availableAccounts: game.availableAccounts.map((account) => account.accountName),
        canChooseAccount: isFreeToPlayWithMultipleAccounts(game),
    };
}

export class GameController {
    constructor(private readonly library: GameLibraryService) {}

    async getGames(): Promise<GamesResponse> {
        try {
            const { fromCache, games } = await this.library.loadLibrary();
            return {
                success: true,
                fromCache,
                games: games.map(toGameView),
            };
        } catch (error) {
            log.error({ error }, 'Failed to load games');
            return {
                success: false,
                fromCache: false,
                games: [],
                error: errorMessage(error) || 'Failed to load games',
            };
        }
    }

    async getCacheStatus(now: Date = new Date()): Promise<CacheStatusResponse> {
        try {
            const info = this.library.cacheService.getCacheInfo();
            const cache = info.exists ? await this.library.cacheService.readCache() : null;

            if (!cache) {
                return { success: true, exists: info.exists, gameCount: 0, isExpired: true, sizeBytes: info.sizeBytes };
            }

            return {
                success: true,
                exists: true,
                gameCount: cache.games.length,
                lastUpdated: cache.lastUpdated.toISOString(),
                expiresAt: cache.expiresAt.toISOString(),
                isExpired: cache.isExpired(now),
                sizeBytes: info.sizeBytes,
            };
        } catch (error) {
            log.error({ error }, 'Failed to read cache status');
            return {
                success: false,
                exists: false,
                gameCount: 0,
                isExpired: true,
                sizeBytes: 0,
                error: errorMessage(error),
            };
        }
    }

    async clearCache(): Promise<ClearCacheResponse> {
        try {
            const removed = await this.library.clear();
            return { success: true, removed };
        } catch (error) {
            log.error({ error }, 'Failed to clear game cache');
            return { success: false, removed: false, error: errorMessage(error) };
        }
    }
}
