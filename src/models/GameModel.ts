/**
 * Game Model - the live game record used for display and business logic
 *
 * A Game is the transient, richer form of a cached game entry: ownership is
 * held in real sets and `availableAccounts` lists the local accounts that can
 * launch the title. See GameCacheModel for the persisted projection.
 */

import type { CaseInsensitiveSet } from './CaseInsensitiveSet';
import type { SteamAccount } from './SteamAccountModel';

const STEAM_ICON_BASE_URL = 'https://media.steampowered.com/steamcommunity/public/images/apps';

export interface Game {
    appId: number;
    name: string;
    playtimeMinutes: number;
    // Icon hash as returned by Steam (img_icon_url), or a full URL
    iconUrl: string;
    ownerSteamId: string;
    ownerAccountName: string;
    ownerPersonaName: string;
    isPaid: boolean;
    isInstalled: boolean;
    lastUpdated: Date;
    // Every account that owns this appId
    ownerSteamIds: Set<string>;
    ownerAccountNames: CaseInsensitiveSet;
    // Not persisted; repopulated by the library refresh workflow
    availableAccounts: SteamAccount[];
}

/**
 * Loosely-populated game handed over by collaborators. Every field may be
 * missing; ownership may come as any iterable of strings.
 */
export type GameInput = Partial<Omit<Game, 'ownerSteamIds' | 'ownerAccountNames'>> & {
    ownerSteamIds?: Iterable<string> | null;
    ownerAccountNames?: Iterable<string> | null;
};

/**
 * Human readable playtime: "Not played", "45m", "3h", "3h 20m", "2d", "2d 5h"
 */
export function formatPlaytime(minutes: number): string {
    if (minutes <= 0) return 'Not played';

    const totalHours = Math.floor(minutes / 60);
    const remainingMinutes = minutes % 60;

    if (totalHours === 0) return `${remainingMinutes}m`;
    if (remainingMinutes === 0) return `${totalHours}h`;

    if (totalHours >= 24) {
        const days = Math.floor(totalHours / 24);
        const remainingHours = totalHours % 24;
        return remainingHours === 0 ? `${days}d` : `${days}d ${remainingHours}h`;
    }

    return `${totalHours}h ${remainingMinutes}m`;
}

export function getIconImageUrl(game: Pick<Game, 'appId' | 'iconUrl'>): string {
    if (!game.iconUrl) return '';
    if (/^https?:\/\//i.test(game.iconUrl)) return game.iconUrl;
    return `${STEAM_ICON_BASE_URL}/${game.appId}/${game.iconUrl}.jpg`;
}

export function getOwnerDisplay(game: Pick<Game, 'ownerPersonaName' | 'ownerAccountName'>): string {
    return game.ownerPersonaName || game.ownerAccountName;
}

export function getGameType(game: Pick<Game, 'isPaid'>): 'Paid' | 'Free-to-Play' {
    return game.isPaid ? 'Paid' : 'Free-to-Play';
}

export function isFreeToPlayWithMultipleAccounts(game: Pick<Game, 'isPaid' | 'availableAccounts'>): boolean {
    return !game.isPaid && game.availableAccounts.length > 1;
}
