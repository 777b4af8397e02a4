import { Transform, TransformCallback } from 'stream';
import { checkScriptInfo } from './features/checkScriptInfo';
import { countTokens } from './features/countTokens';
import { handleEvents } from './features/handleEvents';
import { handleFormat } from './features/handleFormat';
import { handleSections } from './features/handleSections';
import { handleStyles } from './features/handleStyles';
import { FeatureHandler, TokenHandlers } from './features/types';
import { ProcessScriptGlobalState, ProcessScriptOptions } from './ProcessScript.types';
import { DialogueEvent } from './resolve';
import { Style, StyleRegistry } from './style';
import { Token, TokenType } from './tokenize';

export const procScriptDefaultOptions: ProcessScriptOptions = {
    warn: console.warn
};

function runTokenHandler<G>(handlers: TokenHandlers<G>, global: G, token: Token): void | true {
    switch (token.type) {
        case TokenType.SECTION: {
            const handler = handlers[TokenType.SECTION];
            return handler && handler(global, token);
        }
        case TokenType.ENTRY: {
            const handler = handlers[TokenType.ENTRY];
            return handler && handler(global, token);
        }
        case TokenType.TEXT: {
            const handler = handlers[TokenType.TEXT];
            return handler && handler(global, token);
        }
    }
}

/**
 * Consumes script tokens, builds the style registry and pushes every Dialogue
 * event. Styles always precede events in a well-formed script, but the registry is
 * only complete once the stream has ended.
 */
export class ProcessScript extends Transform implements ProcessScriptGlobalState {
    // These members are all public to allow the handler functions to access without TS complaining...
    public _options: ProcessScriptOptions;
    public readonly _featureHandlers: FeatureHandler<ProcessScriptGlobalState>[] = [
        countTokens,
        checkScriptInfo,
        handleSections,
        handleFormat,
        handleStyles,
        handleEvents,
    ];

    public _count = 0;
    public _section: string | undefined;
    public _sections = new Set<string>();
    public _formats: { [section: string]: string[] | undefined } = {};
    public _styles = new Map<string, Style>();
    public _eventCount = 0;

    constructor(options?: Partial<ProcessScriptOptions>) {
        super({ writableObjectMode: true, readableObjectMode: true });

        this._options = {
            ...procScriptDefaultOptions,
            ...options
        };

        this._pushEvent = this._pushEvent.bind(this);
    }

    get styles(): StyleRegistry {
        return this._styles;
    }

    get eventCount(): number {
        return this._eventCount;
    }

    _pushEvent(event: DialogueEvent): void {
        this.push(event);
    }

    _handleToken(token: Token): void {
        // Do all token functions
        for (const feature of this._featureHandlers) {
            if (feature.allTokenHandler && feature.allTokenHandler(this, token)) {
                return;
            }
        }

        // Do token type functions
        for (const feature of this._featureHandlers) {
            if (feature.tokenHandlers && runTokenHandler(feature.tokenHandlers, this, token)) {
                return;
            }
        }

        if (token.type === TokenType.ENTRY) {
            // Do entry functions
            const key = token.key.toLowerCase();
            for (const feature of this._featureHandlers) {
                const handler = feature.entryHandlers && feature.entryHandlers[key];
                if (handler && handler(this, token)) {
                    return;
                }
            }
        }
    }

    _transform(token: Token, encoding: string | undefined, cb: TransformCallback): void {
        try {
            this._handleToken(token);
        } catch (err) {
            return cb(err instanceof Error ? err : new Error(String(err)));
        }

        cb();
    }

    _flush(cb: TransformCallback): void {
        try {
            for (const feature of this._featureHandlers) {
                if (feature.preStreamFlushHandler) {
                    feature.preStreamFlushHandler(this);
                }
            }
        } catch (err) {
            return cb(err instanceof Error ? err : new Error(String(err)));
        }

        cb();
    }
}

export default ProcessScript;
