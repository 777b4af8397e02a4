import { FontDescriptor, matchFonts } from './fontMatcher';
import { scanDefaultOptions, scanLine, ScanOptions } from './scanLine';
import { Style, styleKey, StyleRegistry, StyleSet } from './style';

export interface DialogueEvent {
    styleName: string;
    text: string;
    /** 1-based position of the event in the [Events] section */
    lineNumber: number;
}

export interface FoundFont {
    style: Style;
    font: FontDescriptor;
}

export interface MatchResult {
    /** Keyed by styleKey() of the required style */
    found: Map<string, FoundFont>;
    /** Family names with no font at all */
    missing: Set<string>;
}

export class StyleLookupError extends Error {
    public readonly styleName: string;
    public readonly lineNumber: number;

    constructor(styleName: string, lineNumber: number) {
        super(`Unknown style "${styleName}" on line ${lineNumber}`);
        this.name = 'StyleLookupError';
        this.styleName = styleName;
        this.lineNumber = lineNumber;
    }
}

export type ResolveOptions = ScanOptions;

/**
 * Scans every event with its base style and returns the union of the styles that
 * draw text. Throws StyleLookupError on the first event naming an unknown style.
 */
export function collectRequiredStyles(
    registry: StyleRegistry,
    events: Iterable<DialogueEvent>,
    options?: Partial<ResolveOptions>
): StyleSet {
    const warn = options?.warn || scanDefaultOptions.warn;
    const required = new StyleSet();

    for (const event of events) {
        const baseStyle = registry.get(event.styleName);
        if (!baseStyle) {
            throw new StyleLookupError(event.styleName, event.lineNumber);
        }

        required.addAll(scanLine(event.text, baseStyle, {
            warn: msg => warn(`Line ${event.lineNumber}: ${msg}`)
        }));
    }

    return required;
}

export function matchStyles(required: Iterable<Style>, pool: Iterable<FontDescriptor>): MatchResult {
    const result: MatchResult = {
        found: new Map(),
        missing: new Set()
    };

    // The pool is walked once per style, so it must survive repeated iteration
    const fonts = [...pool];

    for (const style of required) {
        const [best] = matchFonts(style, fonts);
        if (best) {
            result.found.set(styleKey(style), { style, font: best });
        } else {
            result.missing.add(style.fontFamily);
        }
    }

    return result;
}

export function resolve(
    registry: StyleRegistry,
    events: Iterable<DialogueEvent>,
    pool: Iterable<FontDescriptor>,
    options?: Partial<ResolveOptions>
): MatchResult {
    return matchStyles(collectRequiredStyles(registry, events, options), pool);
}

/**
 * The distinct files behind the found fonts, in the order they were selected.
 */
export function selectedFonts(result: MatchResult): FontDescriptor[] {
    const byPath = new Map<string, FontDescriptor>();
    for (const { font } of result.found.values()) {
        if (!byPath.has(font.path)) {
            byPath.set(font.path, font);
        }
    }
    return [...byPath.values()];
}
