import { WarnOption } from './types';

export interface SectionGlobalState extends WarnOption {
    /** Lower-cased name of the current section, e.g. "v4+ styles" */
    _section: string | undefined;
    _sections: Set<string>;
}
