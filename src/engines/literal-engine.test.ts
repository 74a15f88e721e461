import { describe, expect, it } from 'vitest';

import { literalEngine, matchLiteralAt } from './literal-engine.js';
import { regexEngine } from './regex-engine.js';

const flags = { caseSensitive: false, dotAll: false, wordBoundary: false };

describe('literal-engine', () => {
    describe('matchLiteralAt', () => {
        it('should return the end offset on a match', () => {
            expect(matchLiteralAt('FINDINGS: x', 0, 'findings:', false)).toBe(9);
        });

        it('should honour case sensitivity', () => {
            expect(matchLiteralAt('FINDINGS: x', 0, 'findings:', true)).toBeNull();
        });

        it('should return null past the end of the text', () => {
            expect(matchLiteralAt('FIND', 0, 'FINDINGS', false)).toBeNull();
        });
    });

    describe('literalEngine.compile', () => {
        it('should treat regex syntax literally', () => {
            const matcher = literalEngine.compile(['Finding(s)?'], flags);
            expect(matcher.search('Findings: x')).toBeNull();
            expect(matcher.search('see Finding(s)? here')).toEqual({ end: 15, start: 4 });
        });

        it('should prefer the leftmost match over list order', () => {
            const matcher = literalEngine.compile(['IMPRESSION', 'FINDINGS'], flags);
            expect(matcher.search('FINDINGS: a IMPRESSION: b')).toEqual({ end: 8, start: 0 });
        });

        it('should respect word boundaries', () => {
            const matcher = literalEngine.compile(['history'], { ...flags, wordBoundary: true });
            expect(matcher.search('clinicalhistory')).toBeNull();
            expect(matcher.search('historyx history')).toEqual({ end: 16, start: 9 });
        });

        it('should fall back to a later fragment when the earlier one fails the trailing boundary', () => {
            const matcher = literalEngine.compile(['find', 'findings'], { ...flags, wordBoundary: true });
            expect(matcher.search('findings: x')).toEqual({ end: 8, start: 0 });
        });

        it('should list non-overlapping matches', () => {
            const matcher = literalEngine.compile(['aa'], flags);
            expect(matcher.searchAll('aaaaa')).toEqual([
                { end: 2, start: 0 },
                { end: 4, start: 2 },
            ]);
        });

        it('should agree with the regex engine on plain markers', () => {
            const text = 'HISTORY: a\nIMPRESSION: b\nFINDINGS: c\nImpression: d';
            const markers = ['IMPRESSION:', 'FINDINGS:'];
            expect(literalEngine.compile(markers, flags).searchAll(text)).toEqual(
                regexEngine.compile(markers, flags).searchAll(text),
            );
        });

        it('should advance past empty matches', () => {
            expect(literalEngine.compile([''], flags).searchAll('ab')).toEqual([
                { end: 0, start: 0 },
                { end: 1, start: 1 },
                { end: 2, start: 2 },
            ]);
        });
    });
});
