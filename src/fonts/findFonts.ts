import { Dirent, promises as fs, Stats } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FontDescriptor, FontPool } from '../fontMatcher';
import { loadFontFile } from './fontFile';

export const fontExtensions = ['.ttf', '.otf', '.ttc'];

export interface FontPoolOptions {
    warn: (msg: string) => void;
    load: (fontPath: string, options: { warn: (msg: string) => void }) => Promise<FontDescriptor>;
}

export const fontPoolDefaultOptions: FontPoolOptions = {
    warn: console.warn,
    load: loadFontFile
};

/**
 * Where fonts are installed for the given platform, system-wide and per user.
 */
export function findSystemFontDirectories(
    platform: NodeJS.Platform = process.platform,
    env: NodeJS.ProcessEnv = process.env,
    home: string = os.homedir()
): string[] {
    switch (platform) {
        case 'win32': {
            const dirs = [path.win32.join(env.WINDIR || 'C:\\Windows', 'Fonts')];
            if (env.LOCALAPPDATA) {
                dirs.push(path.win32.join(env.LOCALAPPDATA, 'Microsoft', 'Windows', 'Fonts'));
            }
            return dirs;
        }
        case 'darwin':
            return [
                '/System/Library/Fonts',
                '/Library/Fonts',
                path.posix.join(home, 'Library', 'Fonts')
            ];
        default: {
            const dirs = [
                '/usr/share/fonts',
                '/usr/local/share/fonts',
                path.posix.join(home, '.fonts'),
                path.posix.join(env.XDG_DATA_HOME || path.posix.join(home, '.local', 'share'), 'fonts')
            ];
            return dirs;
        }
    }
}

export function isFontFile(fileName: string): boolean {
    return fontExtensions.includes(path.extname(fileName).toLowerCase());
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

async function walk(dir: string, found: string[]): Promise<void> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
        if (isNotFound(err)) {
            return;
        }
        throw err;
    }

    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            await walk(fullPath, found);
        } else if (isFontFile(entry.name)) {
            found.push(fullPath);
        }
    }
}

/**
 * Expands each path into font files: directories are searched recursively, font
 * files are taken as they are, and paths that do not exist are skipped.
 */
export async function findFontFiles(paths: string[]): Promise<string[]> {
    const found: string[] = [];

    for (const p of paths) {
        let stat: Stats;
        try {
            stat = await fs.stat(p);
        } catch (err) {
            if (isNotFound(err)) {
                continue;
            }
            throw err;
        }

        if (stat.isDirectory()) {
            await walk(p, found);
        } else if (stat.isFile()) {
            found.push(p);
        }
    }

    return found;
}

/**
 * Loads every font file under the given paths. A file that cannot be read as a font
 * is reported and left out of the pool.
 */
export async function buildFontPool(paths: string[], options?: Partial<FontPoolOptions>): Promise<FontPool> {
    const opts = { ...fontPoolDefaultOptions, ...options };
    const pool = new FontPool();

    for (const file of await findFontFiles(paths)) {
        try {
            pool.add(await opts.load(file, { warn: opts.warn }));
        } catch (err) {
            opts.warn(`Unable to read the font "${file}": ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    return pool;
}
