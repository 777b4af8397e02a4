import { SectionGlobalState } from './handleSections.types';

export interface FormatGlobalState extends SectionGlobalState {
    /** Lower-cased field names per section, from its "Format:" line */
    _formats: { [section: string]: string[] | undefined };
}
