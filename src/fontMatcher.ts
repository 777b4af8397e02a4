import { Style } from './style';

export interface FontDescriptor {
    readonly path: string;
    readonly family: string;
    readonly weight: number;
    readonly italic: boolean;
    readonly isVariable: boolean;
}

export function fontKey(font: FontDescriptor): string {
    return font.family + '\u0000' + font.weight + '\u0000' + (font.italic ? 1 : 0);
}

/**
 * Font descriptors de-duplicated by appearance: two files with the same family,
 * weight and italic flag are interchangeable, so only the first one added is kept.
 */
export class FontPool implements Iterable<FontDescriptor> {
    protected _fonts = new Map<string, FontDescriptor>();

    constructor(fonts?: Iterable<FontDescriptor>) {
        if (fonts) {
            for (const font of fonts) {
                this.add(font);
            }
        }
    }

    get size(): number {
        return this._fonts.size;
    }

    /**
     * @returns false when an equivalent font was already in the pool
     */
    add(font: FontDescriptor): boolean {
        const key = fontKey(font);
        if (this._fonts.has(key)) {
            return false;
        }
        this._fonts.set(key, font);
        return true;
    }

    [Symbol.iterator](): IterableIterator<FontDescriptor> {
        return this._fonts.values();
    }
}

/**
 * The weight a candidate is compared with. When the closest real weight is much
 * lighter than requested, renderers embolden it, so it competes as if it were 150
 * heavier. This is a best-effort approximation of libass; the file is unchanged.
 */
export function comparisonWeight(required: Style, font: FontDescriptor): number {
    if (font.weight < required.weight - 150 && required.weight <= 850) {
        return font.weight + 150;
    }
    return font.weight;
}

interface Candidate {
    font: FontDescriptor;
    weight: number;
}

/**
 * Ranks the fonts of the required family, best first. When italic is requested,
 * italic faces come first even if a regular face is closer in weight. Within that,
 * the closest weight wins, then the lighter one. Equal candidates keep pool order.
 */
export function matchFonts(required: Style, pool: Iterable<FontDescriptor>): FontDescriptor[] {
    const candidates: Candidate[] = [];

    for (const font of pool) {
        if (font.family === required.fontFamily) {
            candidates.push({ font, weight: comparisonWeight(required, font) });
        }
    }

    const italicRank = (candidate: Candidate) => candidate.font.italic === required.italic ? 0 : 1;

    // Array.prototype.sort is stable
    candidates.sort((a, b) =>
        italicRank(a) - italicRank(b)
        || Math.abs(required.weight - a.weight) - Math.abs(required.weight - b.weight)
        || a.weight - b.weight
    );

    return candidates.map(candidate => candidate.font);
}
