import { EntryToken, SectionToken, TextToken, Token, TokenType } from '../tokenize';

export type EntryHandler<G> = (global: G, token: EntryToken) => void | true;
export type EntryHandlers<G> = { [key: string]: EntryHandler<G> | undefined };

export type TokenHandler<G, T extends Token> = (global: G, token: T) => void | true;

export type TokenHandlers<G> = {
    [TokenType.SECTION]?: TokenHandler<G, SectionToken>,
    [TokenType.ENTRY]?: TokenHandler<G, EntryToken>,
    [TokenType.TEXT]?: TokenHandler<G, TextToken>
};

export interface FeatureHandler<G> {
    allTokenHandler?: TokenHandler<G, Token>,
    tokenHandlers?: TokenHandlers<G>;
    /** Keyed by the lower-cased entry key, e.g. "dialogue" */
    entryHandlers?: EntryHandlers<G>;
    preStreamFlushHandler?: (global: G) => void
}

export interface WarnOption {
    _options: {
        warn: (msg: string) => void;
    };
}
