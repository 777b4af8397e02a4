import { execFile } from 'child_process';
import { constants, promises as fs } from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { FontDescriptor } from './fontMatcher';

export interface CommandOutput {
    stdout: string;
    stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

const defaultCommandRunner: CommandRunner = async (file, args) => {
    const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8' });
    return { stdout, stderr };
};

export interface MkvpropeditOptions {
    /** Executable to run; looked up on PATH when not given */
    path: string | undefined;
    run: CommandRunner;
    warn: (msg: string) => void;
}

export const mkvpropeditDefaultOptions: MkvpropeditOptions = {
    path: undefined,
    run: defaultCommandRunner,
    warn: console.warn
};

// The attachment types mpv hands to libass as fonts
export const fontMimeTypes = [
    'application/x-truetype-font',
    'application/vnd.ms-opentype',
    'application/x-font-ttf',
    'application/x-font',
    'application/font-sfnt',
    'font/collection',
    'font/otf',
    'font/sfnt',
    'font/ttf',
];

const ebmlMagic = Buffer.from([0x1A, 0x45, 0xDF, 0xA3]);

export class MkvpropeditError extends Error {
    public readonly stderr: string;

    constructor(message: string, stderr = '') {
        super(stderr ? `${message}: ${stderr.trim()}` : message);
        this.name = 'MkvpropeditError';
        this.stderr = stderr;
    }
}

function exitCode(err: unknown): unknown {
    return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
}

function readStderr(err: unknown): string {
    return typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
        ? err.stderr
        : '';
}

/**
 * Whether the file starts with the EBML signature used by Matroska.
 */
export async function isMkv(fileName: string): Promise<boolean> {
    const handle = await fs.open(fileName, 'r');
    try {
        const buf = Buffer.alloc(ebmlMagic.length);
        const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
        return bytesRead === ebmlMagic.length && buf.equals(ebmlMagic);
    } finally {
        await handle.close();
    }
}

/**
 * Looks an executable up on PATH, trying PATHEXT suffixes on Windows.
 */
export async function findExecutable(
    name: string,
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform
): Promise<string | undefined> {
    const dirs = (env.PATH || env.Path || '').split(platform === 'win32' ? ';' : ':').filter(Boolean);
    const suffixes = platform === 'win32'
        ? ['', ...(env.PATHEXT || '.EXE;.CMD;.BAT;.COM').split(';')]
        : [''];

    for (const dir of dirs) {
        for (const suffix of suffixes) {
            const candidate = path.join(dir, name + suffix);
            const mode = platform === 'win32' ? constants.F_OK : constants.X_OK;
            if (await fs.access(candidate, mode).then(() => true, () => false)) {
                return candidate;
            }
        }
    }

    return undefined;
}

export function buildDeleteFontsArgs(mkvFileName: string): string[] {
    const args = [mkvFileName];
    for (const mimeType of fontMimeTypes) {
        args.push('--delete-attachment', `mime-type:${mimeType}`);
    }
    return args;
}

export function buildMergeFontsArgs(fonts: Iterable<FontDescriptor>, mkvFileName: string): string[] {
    const args = [mkvFileName];
    const seen = new Set<string>();
    for (const font of fonts) {
        if (!seen.has(font.path)) {
            seen.add(font.path);
            args.push('--add-attachment', font.path);
        }
    }
    return args;
}

/**
 * Edits the font attachments of a Matroska file in place with mkvpropedit.
 */
export class Mkvpropedit {
    protected _options: MkvpropeditOptions;
    protected _resolvedPath: string | undefined;

    constructor(options?: Partial<MkvpropeditOptions>) {
        this._options = {
            ...mkvpropeditDefaultOptions,
            ...options
        };
    }

    async getPath(): Promise<string> {
        if (!this._resolvedPath) {
            const found = this._options.path || await findExecutable('mkvpropedit');
            if (!found) {
                throw new MkvpropeditError('mkvpropedit is not on your PATH, add it or pass its path');
            }

            const { stdout } = await this._options.run(found, ['--version']);
            if (!stdout.startsWith('mkvpropedit')) {
                throw new MkvpropeditError(`"${found}" is not a valid path for mkvpropedit`);
            }
            this._resolvedPath = found;
        }

        return this._resolvedPath;
    }

    protected async _edit(mkvFileName: string, args: string[], action: string): Promise<void> {
        const executable = await this.getPath();

        if (!await isMkv(mkvFileName)) {
            throw new MkvpropeditError(`The file "${mkvFileName}" is not an mkv file`);
        }

        let output: CommandOutput;
        try {
            output = await this._options.run(executable, args);
        } catch (err) {
            const stderr = readStderr(err);
            // Exit code 1 only means warnings were printed, e.g. an attachment type to delete was not there
            if (exitCode(err) === 1 && !stderr) {
                return;
            }
            throw new MkvpropeditError(
                `mkvpropedit reported an error when ${action}`,
                stderr || (err instanceof Error ? err.message : String(err))
            );
        }

        if (output.stderr.length) {
            throw new MkvpropeditError(`mkvpropedit reported an error when ${action}`, output.stderr);
        }
    }

    /**
     * Removes every attachment with a font MIME type.
     */
    async deleteFonts(mkvFileName: string): Promise<void> {
        await this._edit(mkvFileName, buildDeleteFontsArgs(mkvFileName), 'deleting the fonts in the mkv');
    }

    async mergeFonts(fonts: Iterable<FontDescriptor>, mkvFileName: string): Promise<void> {
        const list = [...fonts];
        for (const font of list) {
            if (font.isVariable) {
                this._options.warn(`"${font.path}" is a variable font, libass may not render it correctly`);
            }
        }

        await this._edit(mkvFileName, buildMergeFontsArgs(list, mkvFileName), 'merging the fonts into the mkv');
    }
}
