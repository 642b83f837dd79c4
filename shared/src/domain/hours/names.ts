/**
 * Name keys used to match people across the timesheet, leave and manager sources.
 */

/** Lower-case, trimmed, inner whitespace collapsed to a single space */
export function normalizeNameKey(name: string): string {
    return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Build a key → value map, first occurrence wins on duplicate keys */
export function indexByNameKey<T>(items: Iterable<[string, T]>): Map<string, T> {
    const index = new Map<string, T>();
    for (const [name, value] of items) {
        const key = normalizeNameKey(name);
        if (key && !index.has(key)) index.set(key, value);
    }
    return index;
}
