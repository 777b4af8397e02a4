import * as fontkit from 'fontkit';
import { promises as fs } from 'fs';
import { FontDescriptor } from '../fontMatcher';
import { normalizeFontName } from '../utils';

/**
 * The parts of a fontkit face this module reads. The OS/2 table is only present as
 * a property when the file has one.
 */
export interface FontFace {
    familyName: string | null;
    variationAxes: Record<string, unknown>;
}

export interface FontFileOptions {
    warn: (msg: string) => void;
}

export const fontFileDefaultOptions: FontFileOptions = {
    warn: console.warn
};

interface Os2Info {
    usWeightClass: number;
    fsSelection?: unknown;
}

function isOs2Info(table: unknown): table is Os2Info {
    return typeof table === 'object'
        && table !== null
        && 'usWeightClass' in table
        && typeof table.usWeightClass === 'number';
}

// fontkit decodes fsSelection into named flags; bit 0 is italic
function isItalicSelection(fsSelection: unknown): boolean {
    if (typeof fsSelection === 'number') {
        return (fsSelection & 0b1) > 0;
    }
    if (typeof fsSelection === 'object' && fsSelection !== null && 'italic' in fsSelection) {
        return fsSelection.italic === true;
    }
    return false;
}

export function describeFontFace(path: string, face: FontFace, options?: Partial<FontFileOptions>): FontDescriptor {
    const opts = { ...fontFileDefaultOptions, ...options };

    if (!face.familyName) {
        throw new Error(`The file "${path}" has no font family name`);
    }

    const os2: unknown = 'OS/2' in face ? face['OS/2'] : undefined;

    let weight = 400;
    let italic = false;
    if (isOs2Info(os2)) {
        weight = os2.usWeightClass;
        italic = isItalicSelection(os2.fsSelection);
    } else {
        opts.warn(`The file "${path}" does not have an OS/2 table. This can lead to minor errors.`);
    }

    // Some designers store the weight class as 1-9
    if (weight <= 9) {
        weight *= 100;
    }

    return {
        path,
        family: normalizeFontName(face.familyName),
        weight,
        italic,
        isVariable: Object.keys(face.variationAxes).length > 0
    };
}

/**
 * Reads a .ttf, .otf or .ttc file. A collection is described by its first face.
 */
export async function loadFontFile(path: string, options?: Partial<FontFileOptions>): Promise<FontDescriptor> {
    const buffer = await fs.readFile(path);
    const result = fontkit.create(buffer);
    const face = 'fonts' in result ? result.fonts[0] : result;

    if (!face) {
        throw new Error(`The collection "${path}" contains no font`);
    }

    return describeFontFace(path, face, options);
}
