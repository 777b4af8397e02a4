import { FontDescriptor } from './fontMatcher';
import { ProcessScript } from './ProcessScript';
import { ProcessScriptOptions } from './ProcessScript.types';
import { DialogueEvent, MatchResult, resolve, ResolveOptions } from './resolve';
import { collectStream } from './collectStream';
import { StyleRegistry } from './style';
import { Token, Tokenize, TokenizeOptions } from './tokenize';

export { Tokenize, ProcessScript };
export { boldToWeight, OverrideScanner, scanLine } from './scanLine';
export { comparisonWeight, FontPool, matchFonts } from './fontMatcher';
export type { FontDescriptor } from './fontMatcher';
export { collectRequiredStyles, matchStyles, resolve, selectedFonts, StyleLookupError } from './resolve';
export type { DialogueEvent, FoundFont, MatchResult } from './resolve';
export { StyleSet, styleKey } from './style';
export type { Style, StyleRegistry } from './style';
export { buildFontPool, findFontFiles, findSystemFontDirectories } from './fonts/findFonts';
export { describeFontFace, loadFontFile } from './fonts/fontFile';
export { copyFonts } from './fonts/copyFonts';
export { isMkv, Mkvpropedit, MkvpropeditError } from './mkvpropedit';

export type ParseScriptOptions = TokenizeOptions & ProcessScriptOptions;

export interface SubtitleScript {
    styles: StyleRegistry;
    events: DialogueEvent[];
}

export function parseScriptSync(script: Buffer | string, options?: Partial<ParseScriptOptions>): SubtitleScript {
    const onError = (err?: Error | null) => {
        if (err) {
            throw err;
        }
    };

    const stream1 = new Tokenize(options);
    const stream2 = new ProcessScript(options);

    // Hijack the push methods
    stream1.push = (token: Token) => {
        stream2._transform(token, undefined, onError);
        return true;
    };

    const events: DialogueEvent[] = [];
    stream2.push = (event: DialogueEvent) => {
        events.push(event);
        return true;
    };

    // Pump the data
    stream1._transform(script, undefined, onError);
    stream1._flush(onError);
    stream2._flush(onError);

    return {
        styles: stream2.styles,
        events
    };
}

export async function parseScriptStream(streamIn: NodeJS.ReadableStream, options?: Partial<ParseScriptOptions>): Promise<SubtitleScript> {
    const stream1 = new Tokenize(options);
    const stream2 = new ProcessScript(options);

    const events = await collectStream<DialogueEvent>(
        streamIn,
        stream1,
        stream2
    );

    return {
        styles: stream2.styles,
        events
    };
}

export function resolveScript(
    script: SubtitleScript,
    pool: Iterable<FontDescriptor>,
    options?: Partial<ResolveOptions>
): MatchResult {
    return resolve(script.styles, script.events, pool, options);
}
