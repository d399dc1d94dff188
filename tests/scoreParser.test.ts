import { describe, expect, it } from 'vitest';
import { parseHeader, parseScoreValue, parseScores } from '../src/services/scoreParser';

describe('parseHeader', () => {
    it('returns the trimmed text between double asterisks', () => {
        expect(parseHeader('**Clarity**')).toBe('Clarity');
        expect(parseHeader('  ** Image Attribution **  ')).toBe('Image Attribution');
        expect(parseHeader('**[Layout]**')).toBe('[Layout]');
    });

    it('rejects lines that do not both start and end with double asterisks', () => {
        expect(parseHeader('**Score:** 4/5')).toBeNull();
        expect(parseHeader('Clarity**')).toBeNull();
        expect(parseHeader('****')).toBeNull();
        expect(parseHeader('** **')).toBeNull();
    });
});

describe('parseScoreValue', () => {
    it('reads the integer before the slash', () => {
        expect(parseScoreValue('Score: 4/5')).toBe(4);
        expect(parseScoreValue('score:3 / 5')).toBe(3);
        expect(parseScoreValue('SCORE: 5')).toBe(5);
    });

    it('returns null for non-integer values', () => {
        expect(parseScoreValue('Score: abc/5')).toBeNull();
        expect(parseScoreValue('Score: 4.5/5')).toBeNull();
        expect(parseScoreValue('Score: /5')).toBeNull();
        expect(parseScoreValue('Justification: Score: 4/5')).toBeNull();
    });
});

describe('parseScores', () => {
    it('pairs a header with the following score line', () => {
        expect(parseScores('**Clarity**\nScore: 4/5')).toEqual([{ category: 'Clarity', score: 4 }]);
    });

    it('drops malformed score lines without an entry', () => {
        expect(parseScores('**Clarity**\nScore: abc/5')).toEqual([]);
    });

    it('uses the last header before a score line', () => {
        const text = ['**Draft**', '**Citations**', 'Justification: solid APA formatting.', 'Score: 5/5'].join('\n');
        expect(parseScores(text)).toEqual([{ category: 'Citations', score: 5 }]);
    });

    it('ignores score lines with no pending category', () => {
        const text = ['Score: 3/5', '**Layout**', 'Score: 2/5', 'Score: 1/5'].join('\n');
        expect(parseScores(text)).toEqual([{ category: 'Layout', score: 2 }]);
    });

    it('closes the pending category on a malformed score line', () => {
        const text = ['**Layout**', 'Score: n/a', 'Score: 4/5'].join('\n');
        expect(parseScores(text)).toEqual([]);
    });

    it('parses several categories and CRLF line endings', () => {
        const text = '**Clarity**\r\nJustification: ok\r\nScore: 4/5\r\n\r\n**Citations**\r\nscore: 2/5\r\n';
        expect(parseScores(text)).toEqual([
            { category: 'Clarity', score: 4 },
            { category: 'Citations', score: 2 }
        ]);
    });

    it('finds nothing in a failure sentinel', () => {
        expect(parseScores('[ERROR: Vision API failed]')).toEqual([]);
    });
});
