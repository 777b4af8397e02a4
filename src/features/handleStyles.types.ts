import { Style } from '../style';
import { FormatGlobalState } from './handleFormat.types';

export interface StyleGlobalState extends FormatGlobalState {
    _styles: Map<string, Style>;
}
