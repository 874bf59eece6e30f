import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { CaseInsensitiveSet } from '../models/CaseInsensitiveSet';
import { GameCacheService } from '../services/GameCacheService';
import { GameLibraryService } from '../services/GameLibraryService';
import { GameTypeCache } from '../services/GameTypeCache';
import { HOUR_MS, makeGame, makeTempDir, removeDir, writeFile } from '../test/fixtures';
import { GameController, toGameView } from './GameController';

describe('toGameView', () => {
    test('maps a live game to display fields', () => {
        const view = toGameView(
            makeGame({
                appId: 570,
                name: 'Dota 2',
                playtimeMinutes: 200,
                iconUrl: 'hash570',
                ownerAccountName: 'alice_main',
                isPaid: false,
                isInstalled: true,
                ownerAccountNames: new CaseInsensitiveSet(['alice_main', 'ALICE_MAIN', 'bob_alt']),
                availableAccounts: [
                    { accountName: 'alice_main', personaName: 'Alice' },
                    { accountName: 'bob_alt', personaName: 'Bob' },
                ],
            }),
        );

        expect(view).toEqual({
            appId: 570,
            name: 'Dota 2',
            playtime: '3h 20m',
            iconUrl: 'https://media.steampowered.com/steamcommunity/public/images/apps/570/hash570.jpg',
            owner: 'alice_main',
            type: 'Free-to-Play',
            isInstalled: true,
            ownerAccountNames: ['alice_main', 'bob_alt'],
            availableAccounts: ['alice_main', 'bob_alt'],
            canChooseAccount: true,
        });
    });
});

describe('GameController', () => {
    let dataDir: string;
    let library: GameLibraryService;
    let controller: GameController;

    beforeEach(() => {
        dataDir = makeTempDir();
        library = new GameLibraryService({
            cacheService: new GameCacheService({ dataDir, validDuration: 7 * HOUR_MS }),
            typeCache: new GameTypeCache(dataDir),
            steamPath: null,
        });
        controller = new GameController(library);
    });

    afterEach(() => {
        removeDir(dataDir);
    });

    test('returns cached games as views', async () => {
        await library.replaceSnapshot([makeGame({ appId: 620, name: 'Portal 2' })]);

        const response = await controller.getGames();

        expect(response.success).toBe(true);
        expect(response.fromCache).toBe(true);
        expect(response.games.map((game) => game.name)).toEqual(['Portal 2']);
    });

    test('reports that no cache is available', async () => {
        const response = await controller.getGames();

        expect(response).toEqual({ success: true, fromCache: false, games: [] });
    });

    test('describes the cache file', async () => {
        const lastUpdated = new Date();
        await library.replaceSnapshot([makeGame(), makeGame({ appId: 11 })], lastUpdated);

        const status = await controller.getCacheStatus(new Date(lastUpdated.getTime() + HOUR_MS));

        expect(status.success).toBe(true);
        expect(status.exists).toBe(true);
        expect(status.gameCount).toBe(2);
        expect(status.isExpired).toBe(false);
        expect(status.lastUpdated).toBe(lastUpdated.toISOString());
        expect(status.expiresAt).toBe(new Date(lastUpdated.getTime() + 7 * HOUR_MS).toISOString());
        expect(status.sizeBytes).toBeGreaterThan(0);
    });

    test('reports an unreadable cache file as expired', async () => {
        writeFile(path.join(dataDir, 'games_cache.json'), 'garbage');

        const status = await controller.getCacheStatus();

        expect(status).toEqual({ success: true, exists: true, gameCount: 0, isExpired: true, sizeBytes: 7 });
    });

    test('clears the cache', async () => {
        await library.replaceSnapshot([makeGame()]);

        expect(await controller.clearCache()).toEqual({ success: true, removed: true });
        expect(await controller.clearCache()).toEqual({ success: true, removed: false });
    });
});
