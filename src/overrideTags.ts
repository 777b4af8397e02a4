export enum Mode {
    TEXT,
    BLOCK
}

export enum TagType {
    BOLD,
    ITALIC,
    FONT_NAME,
    RESET,
    OTHER
}

export interface BaseTag {
    type: TagType;
    name?: string;
    param?: number;
    arg?: string;
}

export interface BoldTag extends BaseTag {
    type: TagType.BOLD;
    param: number;
}

export interface ItalicTag extends BaseTag {
    type: TagType.ITALIC;
    arg: string;
}

export interface FontNameTag extends BaseTag {
    type: TagType.FONT_NAME;
    arg: string;
    /** The name as written, before a closing ")" is dropped */
    raw: string;
}

export interface ResetTag extends BaseTag {
    type: TagType.RESET;
    arg: string;
}

export interface OtherTag extends BaseTag {
    type: TagType.OTHER;
    name: string;
}

export type OverrideTag = BoldTag | ItalicTag | FontNameTag | ResetTag | OtherTag;

/**
 * One override block and the text drawn after it. Text before the first block
 * comes with an empty block.
 */
export interface LineSegment {
    tags: string;
    text: string;
}

const rxNumericParam = /^[+-]?\d+/;

/**
 * Splits a dialogue line into override blocks and text runs. A block opens at "{"
 * and runs to the next "}" (or the end of the line); text runs to the next "{".
 */
export function tokenizeLine(line: string): LineSegment[] {
    const segments: LineSegment[] = [];
    let segment: LineSegment | null = null;
    let mode = Mode.TEXT;
    let start = 0;

    const len = line.length;
    for (let i = 0; i < len; i++) {
        const c = line[i];

        switch (mode) {
            case Mode.TEXT: {
                if (c === '{') {
                    if (segment) {
                        segment.text = line.slice(start, i);
                        segments.push(segment);
                    }
                    segment = { tags: '', text: '' };
                    mode = Mode.BLOCK;
                    start = i + 1;
                } else if (!segment) {
                    // Leading text with no block before it
                    segment = { tags: '', text: '' };
                    start = i;
                }
                break;
            }

            case Mode.BLOCK: {
                if (c === '}' && segment) {
                    segment.tags = line.slice(start, i);
                    mode = Mode.TEXT;
                    start = i + 1;
                }
                break;
            }

            default:
                throw new Error('Unknown state!');
        }
    }

    if (segment) {
        if (mode === Mode.BLOCK) {
            // Unclosed block
            segment.tags = line.slice(start);
        } else {
            segment.text = line.slice(start);
        }
        segments.push(segment);
    }

    return segments;
}

function parseTag(body: string): OverrideTag {
    if (body.startsWith('fn')) {
        // A ")" right before the next tag closes an enclosing \t(...)
        const raw = body.slice(2);
        const arg = raw.endsWith(')') ? raw.slice(0, -1) : raw;
        return { type: TagType.FONT_NAME, arg, raw };
    }

    if (body.startsWith('r')) {
        return { type: TagType.RESET, arg: body.slice(1) };
    }

    if (body.startsWith('b')) {
        const match = rxNumericParam.exec(body.slice(1));
        if (match) {
            return { type: TagType.BOLD, param: Number.parseInt(match[0], 10) };
        }
    }

    if (body.startsWith('i')) {
        const match = rxNumericParam.exec(body.slice(1));
        if (match) {
            return { type: TagType.ITALIC, arg: match[0] };
        }
    }

    const name = /^[a-z]*/i.exec(body);
    return { type: TagType.OTHER, name: name ? name[0] : '' };
}

/**
 * Breaks the contents of one override block into tags. Every tag starts at a "\"
 * and runs to the next "\" or the end of the block, so an argument never bridges
 * into the following block. Text before the first "\" is a comment.
 */
export function parseOverrideBlock(tags: string): OverrideTag[] {
    const result: OverrideTag[] = [];

    let pos = tags.indexOf('\\');
    while (pos !== -1) {
        const next = tags.indexOf('\\', pos + 1);
        const body = next === -1 ? tags.slice(pos + 1) : tags.slice(pos + 1, next);
        result.push(parseTag(body));
        pos = next;
    }

    return result;
}
