import * as iconvLite from 'iconv-lite';
import { Transform, TransformCallback } from 'stream';
import { isStr } from './utils';

export enum TokenType {
    SECTION,
    ENTRY,
    TEXT
}

export interface BaseToken {
    type: TokenType;
    /** 1-based physical line in the script */
    line: number;
    name?: string;
    key?: string;
    value?: string;
}

export interface SectionToken extends BaseToken {
    type: TokenType.SECTION;
    name: string;
}

export interface EntryToken extends BaseToken {
    type: TokenType.ENTRY;
    key: string;
    value: string;
}

export interface TextToken extends BaseToken {
    type: TokenType.TEXT;
    value: string;
}

export type Token = SectionToken | EntryToken | TextToken;

export interface TokenizeOptions {
    /** Any encoding name iconv-lite knows */
    encoding: string;
}

export const tokenizeDefaultOptions: TokenizeOptions = {
    encoding: 'utf8'
};

// Embedded files are uuencoded with characters 33-96, so their lines never contain
// a lower-case letter or a space while every section name does
const dataSections = new Set(['fonts', 'graphics']);
const rxSectionName = /[a-z ]/;

type Decoder = ReturnType<typeof iconvLite.getDecoder>;

/**
 * Splits an ASS script into section headers and "Key: value" entries. Chunks are
 * decoded before lines are cut at CR, LF or CRLF, so multi-byte and UTF-16 text
 * survives any chunk boundary.
 */
export class Tokenize extends Transform {
    protected _options: TokenizeOptions;
    protected _decoder: Decoder | undefined;
    protected _pending = '';
    protected _afterCR = false;
    protected _line = 0;
    protected _inDataSection = false;

    constructor(options?: Partial<TokenizeOptions>) {
        super({ readableObjectMode: true });
        this._options = {
            ...tokenizeDefaultOptions,
            ...options
        };
    }

    protected _getDecoder(): Decoder {
        if (!this._decoder) {
            const encoding = this._options.encoding;
            if (!iconvLite.encodingExists(encoding)) {
                throw new Error(`Unsupported encoding "${encoding}"`);
            }
            this._decoder = iconvLite.getDecoder(encoding);
        }
        return this._decoder;
    }

    _flushLine(): void {
        let text = this._pending;
        this._pending = '';
        ++this._line;

        if (this._line === 1 && text.charCodeAt(0) === 0xFEFF) {
            text = text.slice(1);
        }

        const trimmed = text.trim();
        if (!trimmed || trimmed.startsWith(';')) {
            return;
        }

        if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
            const name = trimmed.slice(1, -1).trim();
            if (!this._inDataSection || rxSectionName.test(name)) {
                this._inDataSection = dataSections.has(name.toLowerCase());
                this.push({ type: TokenType.SECTION, line: this._line, name });
                return;
            }
        }

        const colon = text.indexOf(':');
        if (colon === -1) {
            this.push({ type: TokenType.TEXT, line: this._line, value: text });
            return;
        }

        this.push({
            type: TokenType.ENTRY,
            line: this._line,
            key: text.slice(0, colon).trim(),
            value: text.slice(colon + 1).replace(/^[ \t]+/, '')
        });
    }

    _transform(chunk: Buffer | string, encoding: string | undefined, cb: TransformCallback): void {
        try {
            this.__transform(isStr(chunk) ? chunk : this._getDecoder().write(chunk));
        } catch (err) {
            return cb(err instanceof Error ? err : new Error(String(err)));
        }

        cb();
    }

    __transform(text: string): void {
        const len = text.length;
        let i = 0;
        while (i < len) {
            // Second half of a CRLF
            if (this._afterCR) {
                this._afterCR = false;
                if (text[i] === '\n') {
                    i++;
                    continue;
                }
            }

            let end = i;
            while (end < len && text[end] !== '\n' && text[end] !== '\r') {
                end++;
            }

            this._pending += text.slice(i, end);

            // Line continues in the next chunk
            if (end === len) {
                break;
            }

            this._afterCR = text[end] === '\r';
            this._flushLine();
            i = end + 1;
        }
    }

    _flush(cb: TransformCallback): void {
        try {
            const rest = this._decoder && this._decoder.end();
            if (rest) {
                this.__transform(rest);
            }
            if (this._pending) {
                this._flushLine();
            }
        } catch (err) {
            return cb(err instanceof Error ? err : new Error(String(err)));
        }

        cb();
    }
}

export default Tokenize;
