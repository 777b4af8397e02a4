import { expect } from 'chai';
import { expandBareOutput, parseCliArgs } from '../cli/args';

const cwd = '/work/subs';

describe('parseCliArgs', () => {
    it('should fill in the defaults', () => {
        expect(parseCliArgs(['-i', 'episode.ass'], cwd)).to.eql({
            input: 'episode.ass',
            output: undefined,
            mkv: undefined,
            mkvpropedit: undefined,
            deleteFonts: false,
            additionalFonts: [],
            encoding: 'utf8',
            help: false,
            positionals: []
        });
    });

    it('should use the working directory for a bare -o at the end', () => {
        expect(parseCliArgs(['-i', 'episode.ass', '-o'], cwd).output).to.equal(cwd);
    });

    it('should use the working directory for a bare --output before another option', () => {
        const args = parseCliArgs(['--output', '--mkv', 'video.mkv', '-i', 'episode.ass'], cwd);
        expect(args.output).to.equal(cwd);
        expect(args.mkv).to.equal('video.mkv');
        expect(args.input).to.equal('episode.ass');
    });

    it('should keep an explicit output directory', () => {
        expect(parseCliArgs(['-o', 'fonts', '-i', 'episode.ass'], cwd).output).to.equal('fonts');
    });

    it('should collect repeated font paths and positionals', () => {
        const args = parseCliArgs(['-i', 'a.ass', '--additional-fonts', 'x', '--additional-fonts', 'y', '-d', 'extra'], cwd);
        expect(args.additionalFonts).to.eql(['x', 'y']);
        expect(args.positionals).to.eql(['extra']);
        expect(args.deleteFonts).to.equal(true);
    });
});

describe('expandBareOutput', () => {
    it('should leave arguments after -- alone', () => {
        expect(expandBareOutput(['-i', 'a.ass', '--', '-o'], cwd)).to.eql(['-i', 'a.ass', '--', '-o']);
    });
});
