export interface Style {
    readonly fontFamily: string;
    readonly weight: number;
    readonly italic: boolean;
}

export type StyleRegistry = ReadonlyMap<string, Style>;

export function styleKey(style: Style): string {
    return style.fontFamily + '\u0000' + style.weight + '\u0000' + (style.italic ? 1 : 0);
}

/**
 * A set of styles compared by value. Adding a style equal to one already present
 * keeps the first.
 */
export class StyleSet implements Iterable<Style> {
    protected _styles = new Map<string, Style>();

    constructor(styles?: Iterable<Style>) {
        if (styles) {
            this.addAll(styles);
        }
    }

    get size(): number {
        return this._styles.size;
    }

    add(style: Style): this {
        const key = styleKey(style);
        if (!this._styles.has(key)) {
            this._styles.set(key, style);
        }
        return this;
    }

    addAll(styles: Iterable<Style>): this {
        for (const style of styles) {
            this.add(style);
        }
        return this;
    }

    has(style: Style): boolean {
        return this._styles.has(styleKey(style));
    }

    values(): IterableIterator<Style> {
        return this._styles.values();
    }

    [Symbol.iterator](): IterableIterator<Style> {
        return this._styles.values();
    }
}
