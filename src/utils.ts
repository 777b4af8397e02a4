export function isStr(thing: unknown): thing is string {
    return typeof thing === 'string';
}

/**
 * Normalizes a font name for comparison: trimmed, lower-cased, and without the
 * leading "@" that marks a vertical-writing font in ASS.
 */
export function normalizeFontName(name: string): string {
    const lower = name.trim().toLowerCase();
    return lower.startsWith('@') ? lower.slice(1) : lower;
}
