import { countWords, firstWords, stripFrontMatter, withFrontMatter } from '../utils/wordCount.js';

describe('countWords', () => {
    it('counts plain prose words', () => {
        expect(countWords('The tide came in fast.')).toBe(5);
    });

    it('keeps contractions and possessives as one word', () => {
        expect(countWords("Mara's boat wasn't there")).toBe(4);
    });

    it('ignores front matter, headings and fenced code', () => {
        const text = [
            '---',
            'title: Draft',
            '---',
            '# Chapter 1',
            'She ran.',
            '```',
            'not counted at all',
            '```',
            'He followed.'
        ].join('\n');
        expect(countWords(text)).toBe(4);
    });

    it('returns 0 for empty text', () => {
        expect(countWords('')).toBe(0);
        expect(countWords('   \n ')).toBe(0);
    });
});

describe('stripFrontMatter', () => {
    it('removes only a leading block', () => {
        expect(stripFrontMatter('---\na: 1\n---\nBody\n---\nmore')).toBe('Body\n---\nmore');
    });

    it('leaves text without front matter alone', () => {
        expect(stripFrontMatter('Just text')).toBe('Just text');
    });
});

describe('withFrontMatter', () => {
    it('writes a header that stripFrontMatter removes and countWords ignores', () => {
        const text = withFrontMatter({ book: 'Salt: Road', chapter: 2, within_bounds: false }, 'One two three.\n');

        expect(text).toBe('---\nbook: "Salt: Road"\nchapter: 2\nwithin_bounds: false\n---\n\nOne two three.\n');
        expect(stripFrontMatter(text)).toBe('\nOne two three.\n');
        expect(countWords(text)).toBe(3);
    });
});

describe('firstWords', () => {
    it('truncates to the word limit and keeps spacing', () => {
        expect(firstWords('one two\n\nthree four', 3)).toBe('one two\n\nthree');
    });

    it('returns the whole text when it is shorter than the limit', () => {
        expect(firstWords('  one two \n', 10)).toBe('one two');
    });
});
