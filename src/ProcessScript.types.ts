import { TokenCountGlobalState } from './features/countTokens.types';
import { EventGlobalState } from './features/handleEvents.types';
import { StyleGlobalState } from './features/handleStyles.types';

export interface ProcessScriptOptions {
    warn: (msg: string) => void;
}

export interface ProcessScriptGlobalState extends
    TokenCountGlobalState,
    StyleGlobalState,
    EventGlobalState {
    _options: ProcessScriptOptions;
}
