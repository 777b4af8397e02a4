import { promises as fs } from 'fs';
import * as path from 'path';
import { FontDescriptor } from '../fontMatcher';

/**
 * Copies each font file into directory, keeping its file name. A file selected for
 * several styles is copied once.
 *
 * @returns the paths written
 */
export async function copyFonts(fonts: Iterable<FontDescriptor>, directory: string): Promise<string[]> {
    const written: string[] = [];
    const seen = new Set<string>();

    for (const font of fonts) {
        if (seen.has(font.path)) {
            continue;
        }
        seen.add(font.path);

        const target = path.join(directory, path.basename(font.path));
        await fs.copyFile(font.path, target);
        written.push(target);
    }

    return written;
}
