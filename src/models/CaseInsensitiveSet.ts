/**
 * Case-Insensitive Set - string set whose membership ignores letter case
 *
 * Steam account names are case-insensitive ("Alice" and "ALICE" log into the
 * same account), so ownership sets keyed by account name collapse such
 * spellings into a single member. The first spelling added is the one kept.
 */

export class CaseInsensitiveSet implements Iterable<string> {
    private readonly items = new Map<string, string>();

    constructor(values?: Iterable<string> | null) {
        if (values) {
            for (const value of values) {
                this.add(value);
            }
        }
    }

    private static fold(value: string): string {
        return value.toLowerCase();
    }

    get size(): number {
        return this.items.size;
    }

    add(value: string): this {
        const key = CaseInsensitiveSet.fold(value);
        if (!this.items.has(key)) {
            this.items.set(key, value);
        }
        return this;
    }

    has(value: string): boolean {
        return this.items.has(CaseInsensitiveSet.fold(value));
    }

    delete(value: string): boolean {
        return this.items.delete(CaseInsensitiveSet.fold(value));
    }

    clear(): void {
        this.items.clear();
    }

    values(): IterableIterator<string> {
        return this.items.values();
    }

    [Symbol.iterator](): IterableIterator<string> {
        return this.values();
    }

    toArray(): string[] {
        return Array.from(this.items.values());
    }
}
