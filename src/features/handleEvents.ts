import { EntryToken } from '../tokenize';
import { EventGlobalState } from './handleEvents.types';
import { getFormat, splitFields } from './handleFormat';
import { isEventSection } from './handleSections';
import { EntryHandler, FeatureHandler } from './types';

const countEvent: EntryHandler<EventGlobalState> = global => {
    if (!isEventSection(global._section)) {
        return;
    }

    ++global._eventCount;
    return true;
};

const handleDialogue: EntryHandler<EventGlobalState> = (global, token: EntryToken) => {
    const section = global._section;
    if (!isEventSection(section)) {
        return;
    }

    const lineNumber = ++global._eventCount;
    const fields = splitFields(token.value, getFormat(global, section));
    const styleName = fields.get('style');
    const text = fields.get('text');

    if (styleName === undefined || text === undefined) {
        global._options.warn(`Line ${token.line}: ignoring incomplete dialogue "${token.value}"`);
        return true;
    }

    global._pushEvent({
        styleName: styleName.trim(),
        text,
        lineNumber
    });
    return true;
};

export const handleEvents: FeatureHandler<EventGlobalState> = {
    entryHandlers: {
        dialogue: handleDialogue,
        comment: countEvent,
        picture: countEvent,
        sound: countEvent,
        movie: countEvent,
        command: countEvent
    },
    preStreamFlushHandler: global => {
        if (!global._sections.has('events')) {
            global._options.warn('Script has no [Events] section');
        }
    }
};
