import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CaseInsensitiveSet } from '../models/CaseInsensitiveSet';
import type { Game } from '../models/GameModel';

export const BASE_TIME = new Date('2026-01-01T12:00:00.000Z');

export const HOUR_MS = 60 * 60 * 1000;
export const MINUTE_MS = 60 * 1000;

export function at(offsetMs: number): Date {
    return new Date(BASE_TIME.getTime() + offsetMs);
}

export function makeGame(overrides: Partial<Game> = {}): Game {
    return {
        appId: 10,
        name: 'Test Game',
        playtimeMinutes: 0,
        iconUrl: '',
        ownerSteamId: '',
        ownerAccountName: '',
        ownerPersonaName: '',
        isPaid: true,
        isInstalled: false,
        lastUpdated: BASE_TIME,
        ownerSteamIds: new Set<string>(),
        ownerAccountNames: new CaseInsensitiveSet(),
        availableAccounts: [],
        ...overrides,
    };
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'steam-switcher-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
}
