import * as chai from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { Readable } from 'stream';
import { ProcessScript } from '../src/ProcessScript';
import type { DialogueEvent } from '../src/resolve';
import { collectStream } from '../src/collectStream';
import type { StyleRegistry } from '../src/style';
import { Tokenize } from '../src/tokenize';

chai.use(chaiAsPromised);
const expect = chai.expect;

interface Processed {
    events: DialogueEvent[];
    styles: StyleRegistry;
    eventCount: number;
    warnings: string[];
}

async function process(lines: string[]): Promise<Processed> {
    const warnings: string[] = [];
    const processor = new ProcessScript({ warn: msg => warnings.push(msg) });
    const events = await collectStream<DialogueEvent>(
        Readable.from([lines.join('\n')]),
        new Tokenize(),
        processor
    );

    return {
        events,
        styles: processor.styles,
        eventCount: processor.eventCount,
        warnings
    };
}

describe('ProcessScript', () => {
    describe('styles', () => {
        it('should read the standard V4+ fields when there is no Format line', async () => {
            const result = await process([
                '[Script Info]',
                '[V4+ Styles]',
                'Style: Default,Arial,20,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,-1,-1,0,0,100,100,0,0,1,2,2,2,10,10,10,1',
                '[Events]'
            ]);
            expect(result.styles.get('Default')).to.eql({ fontFamily: 'arial', weight: 700, italic: true });
            expect(result.warnings).to.eql([]);
        });

        it('should read the standard V4 fields in a [V4 Styles] section', async () => {
            const result = await process([
                '[Script Info]',
                '[V4 Styles]',
                'Style: Old,Times New Roman,20,1,2,3,4,0,-1',
                '[Events]'
            ]);
            expect(result.styles.get('Old')).to.eql({ fontFamily: 'times new roman', weight: 400, italic: true });
        });

        it('should follow the order of a Format line', async () => {
            const result = await process([
                '[Script Info]',
                '[V4+ Styles]',
                'Format: Name, Bold, Fontname',
                'Style: Main, 1, @MS Gothic',
                '[Events]'
            ]);
            expect(result.styles.get('Main')).to.eql({ fontFamily: 'ms gothic', weight: 700, italic: false });
        });

        it('should warn and keep the last of two styles with the same name', async () => {
            const result = await process([
                '[Script Info]',
                '[V4+ Styles]',
                'Style: A,Arial,20',
                'Style: A,Verdana,20',
                '[Events]'
            ]);
            expect(result.styles.get('A')).to.eql({ fontFamily: 'verdana', weight: 400, italic: false });
            expect(result.warnings).to.eql(['Line 4: style "A" is defined more than once, the last definition is used']);
        });

        it('should ignore styles outside a style section', async () => {
            const result = await process([
                '[Script Info]',
                'Style: A,Arial,20',
                '[Events]'
            ]);
            expect(result.styles.size).to.equal(0);
        });
    });

    describe('events', () => {
        it('should keep commas in the text and trim the style name', async () => {
            const result = await process([
                '[Script Info]',
                '[Events]',
                'Format: Layer, Style, Text',
                'Dialogue: 0, Default ,a, b, c'
            ]);
            expect(result.events).to.eql([{ styleName: 'Default', text: 'a, b, c', lineNumber: 1 }]);
        });

        it('should count every event entry when numbering lines', async () => {
            const result = await process([
                '[Script Info]',
                '[Events]',
                'Comment: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,one',
                'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,two',
                'Command: 0,0:00:02.00,0:00:03.00,Default,,0,0,0,,three',
                'Dialogue: 0,0:00:03.00,0:00:04.00,Default,,0,0,0,,four'
            ]);
            expect(result.events.map(e => [e.text, e.lineNumber])).to.eql([['two', 2], ['four', 4]]);
            expect(result.eventCount).to.equal(4);
        });

        it('should warn about an incomplete dialogue and still count it', async () => {
            const result = await process([
                '[Script Info]',
                '[Events]',
                'Dialogue: 0,0:00',
                'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,ok'
            ]);
            expect(result.warnings).to.eql(['Line 3: ignoring incomplete dialogue "0,0:00"']);
            expect(result.events).to.eql([{ styleName: 'Default', text: 'ok', lineNumber: 2 }]);
        });

        it('should ignore dialogue outside [Events]', async () => {
            const result = await process([
                '[Script Info]',
                'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,nope',
                '[Events]'
            ]);
            expect(result.events).to.eql([]);
            expect(result.eventCount).to.equal(0);
        });
    });

    describe('warnings', () => {
        it('should warn when the script does not start with [Script Info]', async () => {
            const result = await process(['[Events]']);
            expect(result.warnings).to.eql(['Script should start with "[Script Info]"']);
        });

        it('should warn when there is no [Events] section', async () => {
            const result = await process(['[Script Info]', 'Title: x']);
            expect(result.warnings).to.eql(['Script has no [Events] section']);
        });

        it('should warn about a repeated section', async () => {
            const result = await process(['[Script Info]', '[Events]', '[events]']);
            expect(result.warnings).to.eql(['Line 3: section [events] appears more than once']);
        });

        it('should warn about lines that are not entries, except in data sections', async () => {
            const result = await process([
                '[Script Info]',
                'nonsense line',
                '[Fonts]',
                'M)!R&<T',
                '[1$%]',
                '[Events]'
            ]);
            expect(result.warnings).to.eql(['Line 2: ignoring "nonsense line"']);
        });

        it('should reject an empty script', async () => {
            await expect(process(['', '; comment'])).to.be.rejectedWith('Script is empty');
        });
    });
});
