import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { CaseInsensitiveSet } from '../models/CaseInsensitiveSet';
import type { Game } from '../models/GameModel';
import type { SteamAccount } from '../models/SteamAccountModel';
import { BASE_TIME, HOUR_MS, at, makeGame, makeTempDir, removeDir, writeFile } from '../test/fixtures';
import { GameCacheService } from './GameCacheService';
import { GameLibraryService } from './GameLibraryService';
import { GameTypeCache } from './GameTypeCache';

const ALICE: SteamAccount = { steamId: '76561198000000001', accountName: 'alice_main', personaName: 'Alice' };
const BOB: SteamAccount = { steamId: '76561198000000002', accountName: 'bob_alt', personaName: 'Bob' };

const LOGIN_USERS = `"users"
{
\t"76561198000000001"
\t{
\t\t"AccountName"\t\t"alice_main"
\t\t"PersonaName"\t\t"Alice"
\t\t"MostRecent"\t\t"1"
\t\t"Timestamp"\t\t"1700000000"
\t}
\t"76561198000000002"
\t{
\t\t"AccountName"\t\t"bob_alt"
\t\t"PersonaName"\t\t"Bob"
\t\t"MostRecent"\t\t"0"
\t\t"Timestamp"\t\t"1600000000"
\t}
}
`;

function scannedGames(): Game[] {
    return [
        makeGame({
            appId: 999,
            name: 'Zeta Quest',
            isInstalled: true,
            ownerSteamIds: new Set(['76561198000000099']),
        }),
        makeGame({
            appId: 730,
            name: 'Counter-Strike 2',
            isPaid: false,
            ownerSteamId: '76561198000000001',
            ownerSteamIds: new Set(['76561198000000001']),
            ownerAccountNames: new CaseInsensitiveSet(['alice_main']),
        }),
        makeGame({
            appId: 620,
            name: 'Portal 2',
            ownerAccountNames: new CaseInsensitiveSet(['BOB_ALT']),
        }),
    ];
}

describe('GameLibraryService.assignAvailableAccounts', () => {
    test('offers every local account for free-to-play games', () => {
        const [game] = GameLibraryService.assignAvailableAccounts([makeGame({ isPaid: false })], [ALICE, BOB]);

        expect(game.availableAccounts).toEqual([ALICE, BOB]);
    });

    test('offers only owning accounts for paid games, matching names case-insensitively', () => {
        const games = GameLibraryService.assignAvailableAccounts(
            [
                makeGame({ appId: 1, ownerSteamIds: new Set([ALICE.steamId ?? '']) }),
                makeGame({ appId: 2, ownerAccountNames: new CaseInsensitiveSet(['Bob_Alt']) }),
                makeGame({ appId: 3, ownerSteamIds: new Set(['someone-else']) }),
            ],
            [ALICE, BOB],
        );

        expect(games.map((game) => game.availableAccounts)).toEqual([[ALICE], [BOB], []]);
    });

    test('leaves the input games untouched', () => {
        const input = makeGame({ isPaid: false });

        GameLibraryService.assignAvailableAccounts([input], [ALICE]);

        expect(input.availableAccounts).toEqual([]);
    });
});

describe('GameLibraryService', () => {
    let root: string;
    let dataDir: string;
    let steamPath: string;

    const createService = (steam: string | null = steamPath) =>
        new GameLibraryService({
            cacheService: new GameCacheService({ dataDir, validDuration: 7 * HOUR_MS }),
            typeCache: new GameTypeCache(dataDir),
            steamPath: steam,
        });

    beforeEach(() => {
        root = makeTempDir();
        dataDir = path.join(root, 'data');
        steamPath = path.join(root, 'Steam');
        const secondLibrary = path.join(root, 'Library2');

        writeFile(path.join(steamPath, 'config', 'loginusers.vdf'), LOGIN_USERS);
        writeFile(path.join(steamPath, 'steamapps', 'appmanifest_730.acf'), '');
        writeFile(
            path.join(steamPath, 'steamapps', 'libraryfolders.vdf'),
            `"libraryfolders"\n{\n"1"\n{\n"path" "${secondLibrary}"\n}\n}\n`,
        );
        writeFile(path.join(secondLibrary, 'steamapps', 'appmanifest_620.acf'), '');
    });

    afterEach(() => {
        removeDir(root);
    });

    test('starts with an empty, expired snapshot', () => {
        const snapshot = createService().getSnapshot();

        expect(snapshot.games).toEqual([]);
        expect(snapshot.isExpired(BASE_TIME)).toBe(true);
    });

    test('reports a rescan is needed when there is no cache', async () => {
        const result = await createService().loadLibrary(BASE_TIME);

        expect(result).toEqual({ fromCache: false, games: [], accounts: [], cache: null });
    });

    test('loads cached games with installed flags and launch accounts', async () => {
        await createService().replaceSnapshot(scannedGames(), BASE_TIME);

        const result = await createService().loadLibrary(at(HOUR_MS));

        expect(result.fromCache).toBe(true);
        expect(result.accounts.map((account) => account.accountName)).toEqual(['alice_main', 'bob_alt']);
        expect(result.games.map((game) => game.name)).toEqual(['Counter-Strike 2', 'Portal 2', 'Zeta Quest']);
        expect(result.games.map((game) => game.isInstalled)).toEqual([true, true, false]);
        expect(
            result.games.map((game) => game.availableAccounts.map((account) => account.accountName)),
        ).toEqual([['alice_main', 'bob_alt'], ['bob_alt'], []]);
    });

    test('keeps launch accounts empty when Steam is not available', async () => {
        const service = createService(null);
        await service.replaceSnapshot(scannedGames(), BASE_TIME);

        const result = await service.loadLibrary(at(HOUR_MS));

        expect(result.accounts).toEqual([]);
        expect(result.games.every((game) => game.availableAccounts.length === 0)).toBe(true);
        expect(result.games.find((game) => game.appId === 999)?.isInstalled).toBe(true);
    });

    test('ignores an expired cache', async () => {
        await createService().replaceSnapshot(scannedGames(), BASE_TIME);

        const result = await createService().loadLibrary(at(8 * HOUR_MS));

        expect(result.fromCache).toBe(false);
        expect(result.games).toEqual([]);
    });

    test('replaceSnapshot swaps in the saved snapshot', async () => {
        const service = createService();

        const saved = await service.replaceSnapshot(scannedGames(), BASE_TIME);

        expect(service.getSnapshot()).toBe(saved);
        expect(saved.games.map((game) => game.appId)).toEqual([999, 730, 620]);
        expect(saved.isExpired(at(HOUR_MS))).toBe(false);
    });

    test('records game types from the scan', async () => {
        const service = createService();
        await service.replaceSnapshot(scannedGames(), BASE_TIME);

        const typeCache = new GameTypeCache(dataDir);
        await typeCache.load();

        expect(typeCache.get(730, at(HOUR_MS))).toBe(false);
        expect(typeCache.get(620, at(HOUR_MS))).toBe(true);
    });

    test('keeps remembered game types of apps missing from the scan', async () => {
        const earlier = new GameTypeCache(dataDir);
        earlier.set(440, false, false, BASE_TIME);
        earlier.set(550, true, true, BASE_TIME);
        await earlier.save();

        await createService().replaceSnapshot([makeGame({ appId: 620, name: 'Portal 2' })], at(HOUR_MS));

        const typeCache = new GameTypeCache(dataDir);
        await typeCache.load();

        expect(typeCache.size).toBe(3);
        expect(typeCache.get(440, at(2 * HOUR_MS))).toBe(false);
        expect(typeCache.get(550, at(2 * HOUR_MS))).toBe(true);
        expect(typeCache.get(620, at(2 * HOUR_MS))).toBe(true);
    });

    test('applies remembered game types to cached games', async () => {
        const service = createService(null);
        await service.replaceSnapshot(scannedGames(), BASE_TIME);

        const typeCache = new GameTypeCache(dataDir);
        typeCache.set(620, false, false, BASE_TIME);
        await typeCache.save();

        const result = await service.loadLibrary(at(HOUR_MS));

        expect(result.games.find((game) => game.appId === 620)?.isPaid).toBe(false);
    });

    test('clear removes the cache file and resets the snapshot', async () => {
        const service = createService();
        await service.replaceSnapshot(scannedGames(), BASE_TIME);

        expect(await service.clear()).toBe(true);
        expect(service.getSnapshot().games).toEqual([]);
        expect((await service.loadLibrary(at(HOUR_MS))).fromCache).toBe(false);
    });
});
