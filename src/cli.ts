import { AccountController } from './controllers/AccountController';
import { GameController } from './controllers/GameController';
import { GameLibraryService } from './services/GameLibraryService';

export const USAGE = 'Usage: steam-switcher-cache <games|accounts|status|clear>';

export interface Controllers {
    games: GameController;
    accounts: AccountController;
}

export interface CommandResult {
    exitCode: number;
    output: string;
}

export function createControllers(): Controllers {
    return {
        games: new GameController(new GameLibraryService()),
        accounts: new AccountController(),
    };
}

export async function runCommand(command: string | undefined, controllers: Controllers): Promise<CommandResult> {
    let response: { success: boolean };

    switch (command) {
        case 'games':
            response = await controllers.games.getGames();
            break;
        case 'accounts':
            response = await controllers.accounts.getAccounts();
            break;
        case 'status':
            response = await controllers.games.getCacheStatus();
            break;
        case 'clear':
            response = await controllers.games.clearCache();
            break;
        default:
            return { exitCode: 1, output: USAGE };
    }

    return {
        exitCode: response.success ? 0 : 1,
        output: JSON.stringify(response, null, 2),
    };
}
