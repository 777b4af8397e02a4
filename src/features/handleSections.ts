import { TokenType } from '../tokenize';
import { SectionGlobalState } from './handleSections.types';
import { FeatureHandler, TokenHandlers } from './types';

// Sections whose lines are uuencoded data rather than entries
const dataSections = new Set(['fonts', 'graphics']);

const rxStyleSection = /^v4\+*\s*styles$/;

export function isStyleSection(section: string | undefined): section is string {
    return !!section && rxStyleSection.test(section);
}

export function isEventSection(section: string | undefined): section is string {
    return section === 'events';
}

const sectionTokenHandlers: TokenHandlers<SectionGlobalState> = {
    [TokenType.SECTION]: (global, token) => {
        const section = token.name.toLowerCase();
        if (global._sections.has(section)) {
            global._options.warn(`Line ${token.line}: section [${token.name}] appears more than once`);
        }
        global._sections.add(section);
        global._section = section;
    },
    [TokenType.TEXT]: (global, token) => {
        if (global._section && dataSections.has(global._section)) {
            return;
        }
        global._options.warn(`Line ${token.line}: ignoring "${token.value.trim()}"`);
    }
};

export const handleSections: FeatureHandler<SectionGlobalState> = {
    tokenHandlers: sectionTokenHandlers
};
