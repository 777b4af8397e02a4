import { parseArgs } from 'util';

export interface CliArgs {
    input: string | undefined;
    output: string | undefined;
    mkv: string | undefined;
    mkvpropedit: string | undefined;
    deleteFonts: boolean;
    additionalFonts: string[];
    encoding: string;
    help: boolean;
    /** Extra font files or directories */
    positionals: string[];
}

const outputFlags = new Set(['-o', '--output']);

/**
 * The output directory is optional: -o alone, or followed by another option, means
 * the working directory.
 */
export function expandBareOutput(args: string[], cwd: string): string[] {
    const end = args.indexOf('--');
    return args.map((arg, i) => {
        if (end !== -1 && i > end) {
            return arg;
        }

        const next = args[i + 1];
        if (outputFlags.has(arg) && (next === undefined || next.startsWith('-'))) {
            return `--output=${cwd}`;
        }
        return arg;
    });
}

export function parseCliArgs(args: string[], cwd: string = process.cwd()): CliArgs {
    const { values, positionals } = parseArgs({
        args: expandBareOutput(args, cwd),
        allowPositionals: true,
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
            mkv: { type: 'string' },
            mkvpropedit: { type: 'string' },
            'delete-fonts': { type: 'boolean', short: 'd', default: false },
            'additional-fonts': { type: 'string', multiple: true, default: [] },
            encoding: { type: 'string', default: 'utf8' },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });

    return {
        input: values.input,
        output: values.output,
        mkv: values.mkv,
        mkvpropedit: values.mkvpropedit,
        deleteFonts: values['delete-fonts'] || false,
        additionalFonts: values['additional-fonts'] || [],
        encoding: values.encoding || 'utf8',
        help: values.help || false,
        positionals
    };
}
