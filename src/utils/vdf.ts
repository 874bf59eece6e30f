/**
 * VDF (Valve Data Format) text parser
 * Handles the KeyValues layout Steam uses for loginusers.vdf,
 * libraryfolders.vdf and appmanifest_*.acf files
 */

export type VdfValue = string | VdfObject;

export interface VdfObject {
    [key: string]: VdfValue;
}

const unescape = (value: string): string => value.replace(/\\(["\\])/g, '$1');

export function parseVdf(content: string): VdfObject {
    const result: VdfObject = {};
    const stack: VdfObject[] = [result];
    let currentKey = '';

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();

        // Skip empty lines and comments
        if (!trimmed || trimmed.startsWith('//')) continue;

        const current = stack[stack.length - 1];

        // "key" "value"
        const kvMatch = trimmed.match(/^"([^"]+)"\s+"((?:[^"\\]|\\.)*)"$/);
        if (kvMatch) {
            current[kvMatch[1]] = unescape(kvMatch[2]);
            continue;
        }

        // "key", optionally followed by an opening brace on the same line
        const keyMatch = trimmed.match(/^"([^"]+)"\s*(\{)?$/);
        if (keyMatch) {
            currentKey = keyMatch[1];
            if (keyMatch[2]) {
                const child: VdfObject = {};
                current[currentKey] = child;
                stack.push(child);
            }
            continue;
        }

        if (trimmed === '{') {
            const child: VdfObject = {};
            current[currentKey] = child;
            stack.push(child);
            continue;
        }

        if (trimmed === '}' && stack.length > 1) {
            stack.pop();
        }
    }

    return result;
}

/**
 * Look up a nested section, ignoring key case ("LibraryFolders" vs "libraryfolders")
 */
export function getVdfSection(node: VdfObject, key: string): VdfObject | undefined {
    const lowerKey = key.toLowerCase();
    for (const [name, value] of Object.entries(node)) {
        if (name.toLowerCase() === lowerKey && typeof value === 'object') {
            return value;
        }
    }
    return undefined;
}

export function getVdfString(node: VdfObject, key: string): string | undefined {
    const lowerKey = key.toLowerCase();
    for (const [name, value] of Object.entries(node)) {
        if (name.toLowerCase() === lowerKey && typeof value === 'string') {
            return value;
        }
    }
    return undefined;
}
