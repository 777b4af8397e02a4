import { OverrideTag, parseOverrideBlock, tokenizeLine, TagType } from './overrideTags';
import { Style, StyleSet } from './style';
import { normalizeFontName } from './utils';

export interface ScanOptions {
    warn: (msg: string) => void;
}

export const scanDefaultOptions: ScanOptions = {
    warn: console.warn
};

const rxParenthesis = /[()]/;

/**
 * Maps the argument of a \b tag to a weight: 0 and below is regular, 1 is bold,
 * anything else falls into a 100-wide band around each weight class.
 */
export function boldToWeight(value: number): number {
    if (value <= 0) {
        return 400;
    }
    if (value === 1) {
        return 700;
    }

    const band = Math.ceil((value - 50) / 100);
    return Math.min(Math.max(band, 1), 9) * 100;
}

/**
 * Tracks the effective style across the override blocks of one line. Tags are
 * cumulative: a block only changes what its own tags name, and \r goes back to the
 * line's base style.
 */
export class OverrideScanner {
    public readonly baseStyle: Style;
    protected _options: ScanOptions;
    protected _style: Style;

    constructor(baseStyle: Style, options?: Partial<ScanOptions>) {
        this.baseStyle = baseStyle;
        this._style = baseStyle;
        this._options = {
            ...scanDefaultOptions,
            ...options
        };
    }

    get style(): Style {
        return this._style;
    }

    applyBlock(tags: string): Style {
        for (const tag of parseOverrideBlock(tags)) {
            this._applyTag(tag);
        }
        return this._style;
    }

    protected _applyTag(tag: OverrideTag): void {
        switch (tag.type) {
            case TagType.RESET:
                this._style = this.baseStyle;
                break;

            case TagType.BOLD: {
                const weight = boldToWeight(tag.param);
                if (weight !== this._style.weight) {
                    this._style = { ...this._style, weight };
                }
                break;
            }

            case TagType.ITALIC: {
                // Only a literal "1" turns italic on
                const italic = tag.arg === '1';
                if (italic !== this._style.italic) {
                    this._style = { ...this._style, italic };
                }
                break;
            }

            case TagType.FONT_NAME: {
                // ASS has no way to escape parentheses inside a tag argument
                if (rxParenthesis.test(tag.arg)) {
                    this._options.warn(`Font name can not contain "(" or ")": "${tag.raw}"`);
                    break;
                }

                const fontFamily = normalizeFontName(tag.arg) || this.baseStyle.fontFamily;
                if (fontFamily !== this._style.fontFamily) {
                    this._style = { ...this._style, fontFamily };
                }
                break;
            }

            case TagType.OTHER:
                break;
        }
    }
}

/**
 * Returns the distinct styles used to draw text in a line. A block followed by no
 * text draws nothing, so it adds no style even though its tags carry forward.
 */
export function scanLine(line: string, baseStyle: Style, options?: Partial<ScanOptions>): StyleSet {
    const scanner = new OverrideScanner(baseStyle, options);
    const styles = new StyleSet();

    for (const segment of tokenizeLine(line)) {
        const style = scanner.applyBlock(segment.tags);
        if (segment.text) {
            styles.add(style);
        }
    }

    return styles;
}
