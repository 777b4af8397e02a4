export interface TokenCountGlobalState {
    _count: number;
}
