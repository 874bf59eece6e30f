/**
 * Game Cache Model - snapshot of owned games with a time-based expiry
 */

import { CaseInsensitiveSet } from './CaseInsensitiveSet';
import type { Game, GameInput } from './GameModel';

export const DEFAULT_CACHE_VALID_DURATION_MS = 7 * 60 * 60 * 1000;

export interface CachedGameInit {
    appId?: number;
    name?: string;
    playtimeMinutes?: number;
    iconUrl?: string;
    ownerSteamId?: string;
    ownerAccountName?: string;
    ownerPersonaName?: string;
    isPaid?: boolean;
    isInstalled?: boolean;
    lastUpdated?: Date;
    ownerSteamIdsAll?: readonly string[] | null;
    ownerAccountNamesAll?: readonly string[] | null;
}

/**
 * Durable, serializable projection of a Game. Ownership sets are kept as
 * plain string arrays and are never absent.
 */
export class CachedGame {
    readonly appId: number;
    readonly name: string;
    readonly playtimeMinutes: number;
    readonly iconUrl: string;
    readonly ownerSteamId: string;
    readonly ownerAccountName: string;
    readonly ownerPersonaName: string;
    readonly isPaid: boolean;
    readonly isInstalled: boolean;
    readonly lastUpdated: Date;
    readonly ownerSteamIdsAll: readonly string[];
    readonly ownerAccountNamesAll: readonly string[];

    constructor(init: CachedGameInit = {}) {
        this.appId = init.appId ?? 0;
        this.name = init.name ?? '';
        this.playtimeMinutes = init.playtimeMinutes ?? 0;
        this.iconUrl = init.iconUrl ?? '';
        this.ownerSteamId = init.ownerSteamId ?? '';
        this.ownerAccountName = init.ownerAccountName ?? '';
        this.ownerPersonaName = init.ownerPersonaName ?? '';
        this.isPaid = init.isPaid ?? true;
        this.isInstalled = init.isInstalled ?? false;
        this.lastUpdated = new Date(init.lastUpdated ? init.lastUpdated.getTime() : 0);
        this.ownerSteamIdsAll = [...(init.ownerSteamIdsAll ?? [])];
        this.ownerAccountNamesAll = [...(init.ownerAccountNamesAll ?? [])];
    }

    static fromLive(game: GameInput): CachedGame {
        return new CachedGame({
            appId: game.appId,
            name: game.name,
            playtimeMinutes: game.playtimeMinutes,
            iconUrl: game.iconUrl,
            ownerSteamId: game.ownerSteamId,
            ownerAccountName: game.ownerAccountName,
            ownerPersonaName: game.ownerPersonaName,
            isPaid: game.isPaid,
            isInstalled: game.isInstalled,
            lastUpdated: game.lastUpdated,
            ownerSteamIdsAll: game.ownerSteamIds ? Array.from(game.ownerSteamIds) : [],
            ownerAccountNamesAll: game.ownerAccountNames ? Array.from(game.ownerAccountNames) : [],
        });
    }

    /**
     * Rebuild the live record. `availableAccounts` comes back empty: the
     * caller assigns it once the local accounts are known.
     */
    toLive(): Game {
        return {
            appId: this.appId,
            name: this.name,
            playtimeMinutes: this.playtimeMinutes,
            iconUrl: this.iconUrl,
            ownerSteamId: this.ownerSteamId,
            ownerAccountName: this.ownerAccountName,
            ownerPersonaName: this.ownerPersonaName,
            isPaid: this.isPaid,
            isInstalled: this.isInstalled,
            lastUpdated: new Date(this.lastUpdated.getTime()),
            ownerSteamIds: new Set(this.ownerSteamIdsAll),
            ownerAccountNames: new CaseInsensitiveSet(this.ownerAccountNamesAll),
            availableAccounts: [],
        };
    }
}

export interface GameCacheInit {
    lastUpdated?: Date;
    games?: readonly CachedGame[];
    validDuration?: number;
}

export class GameCache {
    readonly lastUpdated: Date;
    readonly games: readonly CachedGame[];
    // Milliseconds
    readonly validDuration: number;

    constructor(init: GameCacheInit = {}) {
        this.lastUpdated = new Date(init.lastUpdated ? init.lastUpdated.getTime() : 0);
        this.games = [...(init.games ?? [])];
        this.validDuration = init.validDuration ?? DEFAULT_CACHE_VALID_DURATION_MS;
    }

    /**
     * Build a fresh snapshot from live games
     */
    static fromGames(games: readonly GameInput[], lastUpdated: Date, validDuration?: number): GameCache {
        return new GameCache({
            lastUpdated,
            validDuration,
            games: games.map((game) => CachedGame.fromLive(game)),
        });
    }

    get expiresAt(): Date {
        return new Date(this.lastUpdated.getTime() + this.validDuration);
    }

    /**
     * True once more than `validDuration` has passed since `lastUpdated`.
     * A never-written cache (zero timestamp) is always expired.
     */
    isExpired(now: Date = new Date()): boolean {
        const updatedAt = this.lastUpdated.getTime();
        if (!Number.isFinite(updatedAt) || updatedAt <= 0) return true;
        return now.getTime() - updatedAt > this.validDuration;
    }
}
