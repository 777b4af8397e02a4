import { DialogueEvent } from '../resolve';
import { FormatGlobalState } from './handleFormat.types';

export interface EventGlobalState extends FormatGlobalState {
    /** Entries seen in [Events], Dialogue and Comment alike */
    _eventCount: number;
    _pushEvent: (event: DialogueEvent) => void;
}
