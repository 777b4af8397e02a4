import { normalizeFontName } from '../utils';
import { getFormat, splitFields } from './handleFormat';
import { isStyleSection } from './handleSections';
import { StyleGlobalState } from './handleStyles.types';
import { EntryHandlers, FeatureHandler } from './types';

// ASS writes -1 for true, but any non-zero value counts
function parseFlag(value: string | undefined): boolean {
    const num = Number.parseInt(value || '0', 10);
    return !Number.isNaN(num) && num !== 0;
}

const styleEntryHandlers: EntryHandlers<StyleGlobalState> = {
    style: (global, token) => {
        const section = global._section;
        if (!isStyleSection(section)) {
            return;
        }

        const fields = splitFields(token.value, getFormat(global, section));
        const name = fields.get('name');
        const fontname = fields.get('fontname');

        if (!name || fontname === undefined) {
            global._options.warn(`Line ${token.line}: ignoring incomplete style "${token.value}"`);
            return true;
        }

        const styleName = name.trim();
        if (global._styles.has(styleName)) {
            global._options.warn(`Line ${token.line}: style "${styleName}" is defined more than once, the last definition is used`);
        }

        global._styles.set(styleName, {
            fontFamily: normalizeFontName(fontname),
            weight: parseFlag(fields.get('bold')) ? 700 : 400,
            italic: parseFlag(fields.get('italic'))
        });
        return true;
    }
};

export const handleStyles: FeatureHandler<StyleGlobalState> = {
    entryHandlers: styleEntryHandlers
};
