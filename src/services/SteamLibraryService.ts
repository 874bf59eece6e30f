/**
 * Steam Library Service - Detect installed games from local Steam libraries
 * Scans every library listed in libraryfolders.vdf for appmanifest_<appId>.acf files
 */

import * as fs from 'fs';
import * as path from 'path';
import { getVdfSection, getVdfString, parseVdf } from '../utils/vdf';
import { getLogger } from './LogService';

const log = getLogger('SteamLibraryService');

const APP_MANIFEST_PATTERN = /^appmanifest_(\d+)\.acf$/i;

export class SteamLibraryService {
    /**
     * Library paths from libraryfolders.vdf. Newer files nest each library
     * under a numbered section with a "path" key; older ones map the number
     * straight to the path.
     */
    private static readLibraryPaths(content: string): string[] {
        const folders = getVdfSection(parseVdf(content), 'libraryfolders');
        if (!folders) return [];

        const paths: string[] = [];
        for (const [key, value] of Object.entries(folders)) {
            if (typeof value === 'object') {
                const libPath = getVdfString(value, 'path');
                if (libPath) paths.push(libPath);
            } else if (/^\d+$/.test(key)) {
                paths.push(value);
            }
        }
        return paths;
    }

    /**
     * All existing steamapps directories, main install first, without duplicates
     */
    static async getLibraryFolders(steamPath: string): Promise<string[]> {
        const folders: string[] = [];
        const seen = new Set<string>();

        const addFolder = (dir: string) => {
            const key = path.resolve(dir).toLowerCase();
            if (seen.has(key)) return;
            if (!fs.existsSync(dir)) {
                log.warn({ dir }, 'Library path does not exist');
                return;
            }
            seen.add(key);
            folders.push(dir);
        };

        const mainSteamApps = path.join(steamPath, 'steamapps');
        addFolder(mainSteamApps);

        const libraryFoldersVdf = path.join(mainSteamApps, 'libraryfolders.vdf');
        if (!fs.existsSync(libraryFoldersVdf)) {
            log.debug({ libraryFoldersVdf }, 'libraryfolders.vdf not found');
            return folders;
        }

        try {
            const content = await fs.promises.readFile(libraryFoldersVdf, 'utf-8');
            for (const libPath of this.readLibraryPaths(content)) {
                addFolder(path.join(libPath, 'steamapps'));
            }
        } catch (error) {
            log.warn({ error, libraryFoldersVdf }, 'Failed to parse libraryfolders.vdf');
        }

        return folders;
    }

    static async getInstalledAppIds(steamPath: string): Promise<Set<number>> {
        const installed = new Set<number>();

        for (const dir of await this.getLibraryFolders(steamPath)) {
            try {
                const files = await fs.promises.readdir(dir);
                let count = 0;
                for (const file of files) {
                    const match = file.match(APP_MANIFEST_PATTERN);
                    if (match) {
                        installed.add(parseInt(match[1], 10));
                        count++;
                    }
                }
                log.debug({ dir, count }, 'Scanned library folder');
            } catch (error) {
                log.warn({ error, dir }, 'Error scanning library folder');
            }
        }

        return installed;
    }
}
