import * as chai from 'chai';
import chaiAsPromised from 'chai-as-promised';
import * as iconvLite from 'iconv-lite';
import { Readable } from 'stream';
import { collectStream } from '../src/collectStream';
import { Token, Tokenize, TokenizeOptions, TokenType } from '../src/tokenize';

chai.use(chaiAsPromised);
const expect = chai.expect;

describe('Tokenize', () => {
    async function process(inputs: (string | Buffer)[], options?: Partial<TokenizeOptions>): Promise<Token[]> {
        const streamIn = new Readable();
        // eslint-disable-next-line @typescript-eslint/no-empty-function
        streamIn._read = () => { };
        const p = collectStream<Token>(streamIn, new Tokenize(options));

        // Do in a timeout just to simulate more async-ness
        setTimeout(() => {
            for (const input of inputs) {
                streamIn.push(input);
            }
            streamIn.push(null);
        }, 1);

        return p;
    }

    it('should emit section headers and entries', async () => {
        const result = await process(['[Script Info]\nTitle: Example\n']);
        expect(result).to.eql([
            { type: TokenType.SECTION, line: 1, name: 'Script Info' },
            { type: TokenType.ENTRY, line: 2, key: 'Title', value: 'Example' }
        ]);
    });

    it('should handle LF, CRLF and CR line endings', async () => {
        const result = await process(['[A]\r\nB: 1\rC: 2\nD: 3']);
        expect(result.map(t => t.line)).to.eql([1, 2, 3, 4]);
        expect(result[3]).to.eql({ type: TokenType.ENTRY, line: 4, key: 'D', value: '3' });
    });

    it('should join a CRLF split across chunks', async () => {
        const result = await process([Buffer.from('A: 1\r'), Buffer.from('\nB: 2\n')]);
        expect(result).to.eql([
            { type: TokenType.ENTRY, line: 1, key: 'A', value: '1' },
            { type: TokenType.ENTRY, line: 2, key: 'B', value: '2' }
        ]);
    });

    it('should find entries across chunks', async () => {
        const result = await process([Buffer.from('Dia'), Buffer.from('logue: 0,{\\b1}Hi\n')]);
        expect(result).to.eql([
            { type: TokenType.ENTRY, line: 1, key: 'Dialogue', value: '0,{\\b1}Hi' }
        ]);
    });

    it('should keep colons and trailing spaces in the value', async () => {
        const result = await process(['Dialogue: 0,0:00:01.00,Hi there  \n']);
        expect(result[0]).to.eql({ type: TokenType.ENTRY, line: 1, key: 'Dialogue', value: '0,0:00:01.00,Hi there  ' });
    });

    it('should skip blank lines and comments but count them', async () => {
        const result = await process(['; a comment\n\n   \nKey: v\n']);
        expect(result).to.eql([{ type: TokenType.ENTRY, line: 4, key: 'Key', value: 'v' }]);
    });

    it('should emit lines with no colon as text', async () => {
        const result = await process(['[Fonts]\nM)0*Y\n']);
        expect(result[1]).to.eql({ type: TokenType.TEXT, line: 2, value: 'M)0*Y' });
    });

    it('should drop a UTF-8 byte order mark', async () => {
        const result = await process([Buffer.from('\uFEFF[Script Info]\n', 'utf8')]);
        expect(result).to.eql([{ type: TokenType.SECTION, line: 1, name: 'Script Info' }]);
    });

    it('should not split a multi-byte character across chunks', async () => {
        const bytes = Buffer.from('Title: café\n', 'utf8');
        const result = await process([bytes.subarray(0, 11), bytes.subarray(11)]);
        expect(result).to.eql([{ type: TokenType.ENTRY, line: 1, key: 'Title', value: 'café' }]);
    });

    it('should decode a legacy code page', async () => {
        const result = await process([iconvLite.encode('Title: Ça va\n', 'cp1252')], { encoding: 'cp1252' });
        expect(result).to.eql([{ type: TokenType.ENTRY, line: 1, key: 'Title', value: 'Ça va' }]);
    });

    it('should decode UTF-16 split at an odd byte', async () => {
        const bytes = iconvLite.encode('\uFEFF[Script Info]\r\nTitle: Ünï\r\n', 'utf16le');
        const result = await process([bytes.subarray(0, 7), bytes.subarray(7, 30), bytes.subarray(30)], { encoding: 'utf16le' });
        expect(result).to.eql([
            { type: TokenType.SECTION, line: 1, name: 'Script Info' },
            { type: TokenType.ENTRY, line: 2, key: 'Title', value: 'Ünï' }
        ]);
    });

    it('should reject an encoding iconv-lite does not know', async () => {
        await expect(process([Buffer.from('A: 1\n')], { encoding: 'no-such-encoding' }))
            .to.be.rejectedWith('Unsupported encoding "no-such-encoding"');
    });

    it('should not take uuencoded lines in [Fonts] for section headers', async () => {
        const result = await process(['[Fonts]\nfontname: a.ttf\n[1$%]\n[Events]\n']);
        expect(result).to.eql([
            { type: TokenType.SECTION, line: 1, name: 'Fonts' },
            { type: TokenType.ENTRY, line: 2, key: 'fontname', value: 'a.ttf' },
            { type: TokenType.TEXT, line: 3, value: '[1$%]' },
            { type: TokenType.SECTION, line: 4, name: 'Events' }
        ]);
    });

    it('should read any bracketed line as a header outside data sections', async () => {
        const result = await process(['[1$%]\n']);
        expect(result).to.eql([{ type: TokenType.SECTION, line: 1, name: '1$%' }]);
    });
});
