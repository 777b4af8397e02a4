import { TokenType } from '../tokenize';
import { TokenCountGlobalState } from './countTokens.types';
import { FeatureHandler, WarnOption } from './types';

export const checkScriptInfo: FeatureHandler<TokenCountGlobalState & WarnOption> = {
    allTokenHandler: (global, token) => {
        // First token should be [Script Info]
        if (global._count === 1 && (token.type !== TokenType.SECTION || token.name.toLowerCase() !== 'script info')) {
            global._options.warn('Script should start with "[Script Info]"');
        }
    },
    preStreamFlushHandler: global => {
        if (global._count === 0) {
            throw new Error('Script is empty');
        }
    }
};
