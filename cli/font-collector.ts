#!/usr/bin/env node
import * as fs from 'fs';
import * as iconvLite from 'iconv-lite';
import * as path from 'path';
import { parseCliArgs } from './args';
import { buildFontPool, findSystemFontDirectories } from '../src/fonts/findFonts';
import { copyFonts } from '../src/fonts/copyFonts';
import { parseScriptStream, ParseScriptOptions, resolveScript } from '../src/index';
import { isMkv, Mkvpropedit } from '../src/mkvpropedit';
import { MatchResult, selectedFonts, StyleLookupError } from '../src/resolve';

const usage = `Usage: font-collector --input <file.ass> [options] [additional font paths...]

  -i, --input <file>          ASS subtitle script
  -o, --output [dir]          copy the fonts used into this directory (default: current directory)
      --mkv <file>            attach the fonts used to this Matroska file
      --mkvpropedit <path>    mkvpropedit executable, when it is not on PATH
  -d, --delete-fonts          remove the fonts already attached to the mkv first
      --additional-fonts <p>  font file or directory to search as well (repeatable)
      --encoding <name>       encoding of the script (default utf8)`;

const warn = (str: string) => console.log('WARNING: ' + str);

function fail(msg: string): void {
    console.error('Error: ' + msg);
    process.exitCode = 1;
}

function isFile(p: string): boolean {
    return fs.existsSync(p) && fs.statSync(p).isFile();
}

function isDirectory(p: string): boolean {
    return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

function reportMissing(result: MatchResult): void {
    if (result.missing.size) {
        console.log('\nSome fonts were not found. Are they installed?');
        console.log([...result.missing].join('\n') + '\n');
    } else {
        console.log('All fonts found');
    }
}

async function run(args: string[]) {
    const values = parseCliArgs(args);

    if (values.help || !values.input) {
        console.log(usage);
        return;
    }

    const input = values.input;
    if (!isFile(input)) {
        return fail('the input file does not exist');
    }
    if (path.extname(input).toLowerCase() !== '.ass') {
        return fail('the input file is not an .ass file');
    }

    const output = values.output;
    if (output !== undefined && !isDirectory(output)) {
        return fail('the output path is not a valid folder');
    }

    const mkvFile = values.mkv;
    if (mkvFile !== undefined) {
        if (!isFile(mkvFile)) {
            return fail('the mkv file specified does not exist');
        }
        if (!await isMkv(mkvFile)) {
            return fail('the mkv file specified is not an .mkv file');
        }
    }

    const encoding = values.encoding;
    if (!iconvLite.encodingExists(encoding)) {
        return fail(`unknown encoding "${encoding}"`);
    }

    const options: Partial<ParseScriptOptions> = {
        encoding,
        warn
    };

    const script = await parseScriptStream(fs.createReadStream(input), options);

    console.time('fonts');
    const pool = await buildFontPool([
        ...findSystemFontDirectories(),
        ...values.additionalFonts,
        ...values.positionals
    ], { warn });
    console.timeEnd('fonts');

    let result: MatchResult;
    try {
        result = resolveScript(script, pool, { warn });
    } catch (err) {
        if (err instanceof StyleLookupError) {
            return fail(`unknown style "${err.styleName}" on line ${err.lineNumber}. You need to correct the .ass file named "${path.basename(input)}"`);
        }
        throw err;
    }

    reportMissing(result);
    const fonts = selectedFonts(result);

    if (output !== undefined) {
        const written = await copyFonts(fonts, output);
        console.log(`Copied ${written.length} font(s) to "${output}"`);
    }

    if (mkvFile !== undefined) {
        const mkvpropedit = new Mkvpropedit({ path: values.mkvpropedit, warn });

        if (values.deleteFonts) {
            await mkvpropedit.deleteFonts(mkvFile);
            console.log(`Successfully deleted fonts in "${mkvFile}"`);
        }

        await mkvpropedit.mergeFonts(fonts, mkvFile);
        console.log(`Successfully merged fonts into "${mkvFile}"`);
    }
}

run(process.argv.slice(2)).catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
