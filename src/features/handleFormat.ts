import { FormatGlobalState } from './handleFormat.types';
import { isEventSection, isStyleSection } from './handleSections';
import { EntryHandlers, FeatureHandler } from './types';

const v4PlusStyleFormat = [
    'name', 'fontname', 'fontsize', 'primarycolour', 'secondarycolour', 'outlinecolour', 'backcolour',
    'bold', 'italic', 'underline', 'strikeout', 'scalex', 'scaley', 'spacing', 'angle', 'borderstyle',
    'outline', 'shadow', 'alignment', 'marginl', 'marginr', 'marginv', 'encoding'
];

const v4StyleFormat = [
    'name', 'fontname', 'fontsize', 'primarycolour', 'secondarycolour', 'tertiarycolour', 'backcolour',
    'bold', 'italic', 'borderstyle', 'outline', 'shadow', 'alignment', 'marginl', 'marginr', 'marginv',
    'alphalevel', 'encoding'
];

const eventFormat = [
    'layer', 'start', 'end', 'style', 'name', 'marginl', 'marginr', 'marginv', 'effect', 'text'
];

/**
 * Field names of a section: its own "Format:" line, or the standard list when the
 * script has none.
 */
export function getFormat(global: FormatGlobalState, section: string): string[] {
    const format = global._formats[section];
    if (format) {
        return format;
    }

    if (section === 'events') {
        return eventFormat;
    }
    return section === 'v4 styles' ? v4StyleFormat : v4PlusStyleFormat;
}

/**
 * Splits an entry value into the fields of a format. The last field takes the rest
 * of the line, commas included, since dialogue text may contain them.
 */
export function splitFields(value: string, format: string[]): Map<string, string> {
    const fields = new Map<string, string>();

    let pos = 0;
    for (let i = 0; i < format.length; i++) {
        if (i === format.length - 1) {
            fields.set(format[i], value.slice(pos));
            break;
        }

        const comma = value.indexOf(',', pos);
        if (comma === -1) {
            fields.set(format[i], value.slice(pos));
            break;
        }

        fields.set(format[i], value.slice(pos, comma));
        pos = comma + 1;
    }

    return fields;
}

const formatEntryHandlers: EntryHandlers<FormatGlobalState> = {
    format: (global, token) => {
        const section = global._section;
        if (!isStyleSection(section) && !isEventSection(section)) {
            return;
        }

        global._formats[section] = token.value.split(',').map(field => field.trim().toLowerCase());
        return true;
    }
};

export const handleFormat: FeatureHandler<FormatGlobalState> = {
    entryHandlers: formatEntryHandlers
};
