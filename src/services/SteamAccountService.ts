/**
 * Steam Account Service - Read local Steam accounts
 * Reads from Steam's loginusers.vdf file and, on Windows, the registry
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { exec } from 'child_process';
import { promisify } from 'util';
import { config } from '../config';
import { errorMessage } from '../errors';
import type { SteamAccount, SteamAccountsResponse } from '../models/SteamAccountModel';
import { getVdfSection, getVdfString, parseVdf } from '../utils/vdf';
import { getLogger } from './LogService';

const execAsync = promisify(exec);
const log = getLogger('SteamAccountService');

const STEAM_REGISTRY_KEY = 'HKEY_CURRENT_USER\\SOFTWARE\\Valve\\Steam';

export class SteamAccountService {
    private static steamPath: string | null = null;

    /**
     * Read a REG_SZ value under the Steam registry key (Windows only)
     */
    private static async readRegistryValue(name: string): Promise<string | null> {
        if (process.platform !== 'win32') return null;

        const { stdout } = await execAsync(`reg query "${STEAM_REGISTRY_KEY}" /v ${name}`);
        const match = stdout.match(new RegExp(`${name}\\s+REG_SZ\\s+(.+)`));
        return match && match[1] ? match[1].trim() : null;
    }

    private static getCommonPaths(): string[] {
        const home = os.homedir();

        switch (process.platform) {
            case 'win32':
                return ['C:\\Program Files (x86)\\Steam', 'C:\\Program Files\\Steam', path.join(home, 'Steam')];
            case 'darwin':
                return [path.join(home, 'Library', 'Application Support', 'Steam')];
            default:
                return [
                    path.join(home, '.steam', 'steam'),
                    path.join(home, '.local', 'share', 'Steam'),
                    path.join(home, '.var', 'app', 'com.valvesoftware.Steam', '.local', 'share', 'Steam'),
                ];
        }
    }

    /**
     * Get Steam installation path from config, the registry, or common install locations
     */
    static async getSteamPath(): Promise<string | null> {
        if (this.steamPath) return this.steamPath;

        if (config.STEAM_PATH) {
            this.steamPath = config.STEAM_PATH;
            return this.steamPath;
        }

        try {
            const registryPath = await this.readRegistryValue('SteamPath');
            if (registryPath) {
                this.steamPath = registryPath;
                return this.steamPath;
            }
        } catch (error) {
            log.warn({ error }, 'Failed to get Steam path from registry');
        }

        for (const p of this.getCommonPaths()) {
            if (fs.existsSync(p)) {
                this.steamPath = p;
                return this.steamPath;
            }
        }

        return null;
    }

    private static async getAutoLoginUser(): Promise<string> {
        try {
            return (await this.readRegistryValue('AutoLoginUser')) ?? '';
        } catch {
            // AutoLoginUser may not exist
            return '';
        }
    }

    /**
     * Get all Steam accounts from loginusers.vdf
     */
    static async getAccounts(steamPathOverride?: string): Promise<SteamAccountsResponse> {
        try {
            const steamPath = steamPathOverride ?? (await this.getSteamPath());

            if (!steamPath) {
                return {
                    success: false,
                    accounts: [],
                    error: 'Steam installation not found',
                };
            }

            const loginUsersPath = path.join(steamPath, 'config', 'loginusers.vdf');

            if (!fs.existsSync(loginUsersPath)) {
                return {
                    success: false,
                    accounts: [],
                    steamPath,
                    error: 'loginusers.vdf not found',
                };
            }

            const content = await fs.promises.readFile(loginUsersPath, 'utf-8');
            const users = getVdfSection(parseVdf(content), 'users') ?? {};

            const accounts: SteamAccount[] = [];
            let hasMostRecent = false;

            for (const [steamId, userData] of Object.entries(users)) {
                if (typeof userData !== 'object') continue;

                const accountName = getVdfString(userData, 'AccountName') ?? '';
                const mostRecent = getVdfString(userData, 'MostRecent') === '1';
                const timestamp = parseInt(getVdfString(userData, 'Timestamp') ?? '0', 10);
                hasMostRecent = hasMostRecent || mostRecent;

                accounts.push({
                    steamId,
                    accountName,
                    personaName: getVdfString(userData, 'PersonaName') || accountName,
                    lastLogin: isNaN(timestamp) ? 0 : timestamp * 1000,
                    isLastUsed: mostRecent,
                });
            }

            // Fall back to the registry auto-login user when no entry is flagged
            if (!hasMostRecent) {
                const lastUsedAccount = (await this.getAutoLoginUser()).toLowerCase();
                for (const account of accounts) {
                    account.isLastUsed = lastUsedAccount !== '' && account.accountName.toLowerCase() === lastUsedAccount;
                }
            }

            // Sort by last login, most recent first
            accounts.sort((a, b) => (b.lastLogin || 0) - (a.lastLogin || 0));

            log.debug({ count: accounts.length, steamPath }, 'Loaded local Steam accounts');

            return {
                success: true,
                accounts,
                steamPath,
            };
        } catch (error) {
            log.error({ error }, 'Failed to read Steam accounts');
            return {
                success: false,
                accounts: [],
                error: `Failed to read Steam accounts: ${errorMessage(error)}`,
            };
        }
    }
}
