/**
 * Account Controller - request handlers for local Steam accounts
 */

import { errorMessage } from '../errors';
import type { SteamAccountsResponse } from '../models/SteamAccountModel';
import { getLogger } from '../services/LogService';
import { SteamAccountService } from '../services/SteamAccountService';

const log = getLogger('AccountController');

export class AccountController {
    constructor(private readonly steamPath?: string) {}

    async getAccounts(): Promise<SteamAccountsResponse> {
        try {
            return await SteamAccountService.getAccounts(this.steamPath);
        } catch (error) {
            log.error({ error }, 'Failed to get Steam accounts');
            return {
                success: false,
                accounts: [],
                error: errorMessage(error) || 'Failed to get Steam accounts',
            };
        }
    }
}
