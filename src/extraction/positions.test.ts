import { describe, expect, it, vi } from 'vitest';

import { literalEngine } from '../engines/literal-engine.js';
import type { Logger } from '../types/options.js';
import { ConfigurationError } from './errors.js';
import { compileMarkers } from './pattern-compiler.js';
import {
    collectDuplicateMarkers,
    compileMarkerLookup,
    compileMarkerMatchers,
    findAllStarts,
    findAllStartsSequential,
    findEndGreedy,
    findEndSequential,
    findFirstMarker,
    findFirstStart,
    findStartSequential,
    isNoMatch,
    matchEndGreedy,
    matchFirstStart,
    NO_MATCH,
} from './positions.js';

const REPORT = `CT CHEST WITH CONTRAST
HISTORY: 61M with cough
TECHNIQUES: Axial helical scan
COMPARISON: None.
FINDINGS: Clear lungs
IMPRESSION: No acute finding`;

describe('positions', () => {
    describe('findFirstStart', () => {
        it('should return the span of the first marker match', () => {
            expect(findFirstStart('FINDINGS: Normal study', ['FINDINGS:'])).toEqual({ end: 9, start: 0 });
        });

        it('should pick the leftmost match across markers', () => {
            expect(findFirstStart('Clinical History: x', ['History:', 'Clinical History:'])).toEqual({
                end: 17,
                start: 0,
            });
        });

        it('should start at the text start for null markers', () => {
            expect(findFirstStart('Some text', null)).toEqual({ end: 0, start: 0 });
        });

        it('should return the sentinel when nothing matches', () => {
            const span = findFirstStart('Normal study', ['FINDINGS:']);
            expect(span).toEqual(NO_MATCH);
            expect(isNoMatch(span)).toBe(true);
        });

        it('should return the sentinel for empty text', () => {
            expect(findFirstStart('', ['TEST:'])).toEqual({ end: -1, start: -1 });
        });

        it('should honour case sensitivity', () => {
            expect(findFirstStart('findings: x', ['FINDINGS:'], { caseSensitive: true })).toEqual(NO_MATCH);
            expect(findFirstStart('findings: x', ['FINDINGS:'])).toEqual({ end: 9, start: 0 });
        });

        it('should honour word boundaries', () => {
            expect(findFirstStart('FINDINGSx: heading', ['FINDINGS'])).toEqual({ end: 8, start: 0 });
            expect(findFirstStart('FINDINGSx: heading', ['FINDINGS'], { useWordBoundary: true })).toEqual(NO_MATCH);
        });

        it('should throw a ConfigurationError for an empty marker list', () => {
            expect(() => findFirstStart('text', [])).toThrow(ConfigurationError);
        });

        it('should warn once for a marker that occurs three times and still return the first', () => {
            const warn = vi.fn();
            const text = 'History: a\nHistory: b\nHISTORY: c';

            const span = findFirstStart(text, ['History'], { logger: { warn } });

            expect(span).toEqual({ end: 7, start: 0 });
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn).toHaveBeenCalledWith(
                'Start marker "History" appears 3 times in text, only the first one will be matched.',
                {
                    count: 3,
                    marker: 'History',
                    message: 'Start marker "History" appears 3 times in text, only the first one will be matched.',
                    type: 'duplicate_marker',
                },
            );
        });

        it('should warn per duplicated marker only', () => {
            const warn = vi.fn();
            findFirstStart('A: 1\nB: 2\nB: 3', ['A:', 'B:'], { logger: { warn } });
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn.mock.calls[0][1]).toMatchObject({ count: 2, marker: 'B:' });
        });

        it('should not warn when diagnostics are disabled', () => {
            const warn = vi.fn();
            findFirstStart('x x', ['x'], { logger: { warn }, warnOnDuplicateMarkers: false });
            expect(warn).not.toHaveBeenCalled();
        });

        it('should trace the resolution', () => {
            const logger: Logger = { trace: vi.fn() };
            findFirstStart('FINDINGS: x', ['FINDINGS:'], { logger });
            expect(logger.trace).toHaveBeenCalledWith('[positions] findFirstStart', {
                source: '(?:FINDINGS:)',
                span: { end: 9, start: 0 },
            });
        });
    });

    describe('collectDuplicateMarkers', () => {
        it('should not count matches inside words when word boundaries are on', () => {
            const text = 'History: a\nclinicalhistory b\nHistory c';
            expect(collectDuplicateMarkers(text, ['History'])[0].count).toBe(3);
            expect(collectDuplicateMarkers(text, ['History'], { useWordBoundary: true })[0].count).toBe(2);
        });

        it('should report counts without a logger', () => {
            expect(collectDuplicateMarkers('x y x y x', ['x', 'y', 'z'])).toEqual([
                {
                    count: 3,
                    marker: 'x',
                    message: 'Start marker "x" appears 3 times in text, only the first one will be matched.',
                    type: 'duplicate_marker',
                },
                {
                    count: 2,
                    marker: 'y',
                    message: 'Start marker "y" appears 2 times in text, only the first one will be matched.',
                    type: 'duplicate_marker',
                },
            ]);
        });
    });

    describe('compileMarkerMatchers', () => {
        it('should compile the alternation and one matcher per marker', () => {
            const matchers = compileMarkerMatchers(['A:', 'B:']);
            expect(matchers.markers).toEqual(['A:', 'B:']);
            expect(matchers.any.source).toBe('(?:A:|B:)');
            expect(matchers.each.map((matcher) => matcher.source)).toEqual(['(?:A:)', '(?:B:)']);
        });

        it('should throw a ConfigurationError for a marker the engine cannot compile', () => {
            expect(() => compileMarkerMatchers(['FINDINGS(', 'X'])).toThrow(
                'Cannot compile markers [FINDINGS(, X] with the regex engine',
            );
        });

        it('should be reusable across searches', () => {
            const start = compileMarkerMatchers(['FINDINGS:']);
            const end = compileMarkerMatchers(['IMPRESSION:']);
            const first = 'FINDINGS: a\nIMPRESSION: b';
            const second = 'x FINDINGS: c';

            expect(matchFirstStart(first, start)).toEqual({ end: 9, start: 0 });
            expect(matchFirstStart(second, start)).toEqual({ end: 11, start: 2 });
            expect(matchEndGreedy(first, end, 0)).toBe(12);
            expect(matchEndGreedy(second, end, 2)).toBe(13);
        });
    });

    describe('findStartSequential', () => {
        it('should let the first listed marker decide', () => {
            expect(findStartSequential('Clinical History: x', ['History:', 'Clinical History:'])).toEqual({
                end: 17,
                start: 9,
            });
        });

        it('should fall through to later markers', () => {
            expect(findStartSequential('Indication: x', ['History', 'Indication'])).toEqual({ end: 10, start: 0 });
        });

        it('should return the sentinel when no marker matches', () => {
            expect(findStartSequential('nothing here', ['History'])).toEqual(NO_MATCH);
        });

        it('should warn only for the deciding marker', () => {
            const warn = vi.fn();
            findStartSequential('b a b a', ['a', 'b'], { logger: { warn } });
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn.mock.calls[0][1]).toMatchObject({ count: 2, marker: 'a' });
        });

        it('should reject an empty marker list', () => {
            expect(() => findStartSequential('text', [])).toThrow(ConfigurationError);
        });
    });

    describe('findAllStarts', () => {
        it('should return every match left to right', () => {
            const text = 'Human: Hi\nAI: Hello\nHuman: Bye\nAI: See ya';
            expect(findAllStarts(text, ['Human:'])).toEqual([
                { end: 6, start: 0 },
                { end: 26, start: 20 },
            ]);
        });

        it('should return a single text-start span for null markers', () => {
            expect(findAllStarts('anything', null)).toEqual([{ end: 0, start: 0 }]);
        });

        it('should return an empty list when nothing matches', () => {
            expect(findAllStarts('anything', ['FINDINGS'])).toEqual([]);
        });

        it('should mix markers in document order', () => {
            expect(findAllStarts('B A B', ['A', 'B'])).toEqual([
                { end: 1, start: 0 },
                { end: 3, start: 2 },
                { end: 5, start: 4 },
            ]);
        });
    });

    describe('findAllStartsSequential', () => {
        it('should collect per marker and sort into document order', () => {
            expect(findAllStartsSequential('B A B', ['A', 'B'])).toEqual([
                { end: 1, start: 0 },
                { end: 3, start: 2 },
                { end: 5, start: 4 },
            ]);
        });

        it('should keep overlapping matches of different markers', () => {
            expect(findAllStartsSequential('Clinical History', ['History', 'Clinical History'])).toEqual([
                { end: 16, start: 0 },
                { end: 16, start: 9 },
            ]);
        });

        it('should handle null and unmatched markers', () => {
            expect(findAllStartsSequential('x', null)).toEqual([{ end: 0, start: 0 }]);
            expect(findAllStartsSequential('x', ['y'])).toEqual([]);
        });
    });

    describe('findEndGreedy', () => {
        it('should stop at the earliest end marker regardless of list order', () => {
            const text = 'HISTORY: Patient info FINDINGS: Normal IMPRESSION: Clear';
            expect(findEndGreedy(text, ['IMPRESSION:', 'FINDINGS:'], 0)).toBe(22);
        });

        it('should search from the given offset', () => {
            const text = 'A: x B: y A: z B: w';
            expect(findEndGreedy(text, ['B:'], 10)).toBe(15);
        });

        it('should return the text length when nothing matches', () => {
            expect(findEndGreedy('FINDINGS: Normal study', ['IMPRESSION:'], 0)).toBe(22);
        });

        it('should return the text length for null markers', () => {
            expect(findEndGreedy('Some text', null, 0)).toBe(9);
        });

        it('should handle empty text and offsets past the end', () => {
            expect(findEndGreedy('', ['TEST:'], 0)).toBe(0);
            const text = 'FINDINGS: Test IMPRESSION:';
            expect(findEndGreedy(text, ['IMPRESSION:'], text.length)).toBe(text.length);
            expect(findEndGreedy(text, ['IMPRESSION:'], text.length + 5)).toBe(text.length);
        });

        it('should locate the impression after findings in a full report', () => {
            const start = findFirstStart(REPORT, ['FINDINGS:']);
            const end = findEndGreedy(REPORT, ['IMPRESSION:'], start.start);
            expect(REPORT.slice(start.start, end)).toBe('FINDINGS: Clear lungs\n');
        });
    });

    describe('findEndSequential', () => {
        it('should respect marker priority over text position', () => {
            const text = 'HISTORY: Info TECHNIQUES: Details FINDINGS: Normal';
            expect(text.slice(findEndSequential(text, ['FINDINGS:', 'TECHNIQUES:'], 0))).toBe('FINDINGS: Normal');
            expect(text.slice(findEndSequential(text, ['TECHNIQUES:', 'FINDINGS:'], 0))).toBe(
                'TECHNIQUES: Details FINDINGS: Normal',
            );
        });

        it('should fall through to the next marker when the first never matches', () => {
            expect(findEndSequential('A: x C: y', ['B:', 'C:'], 0)).toBe(5);
        });

        it('should ignore matches before the offset', () => {
            expect(findEndSequential('B: x A: y B: z', ['B:'], 1)).toBe(10);
        });

        it('should return the text length when nothing matches or markers are null', () => {
            expect(findEndSequential('FINDINGS: Normal study', ['IMPRESSION:'], 0)).toBe(22);
            expect(findEndSequential('Some text', null, 0)).toBe(9);
            expect(findEndSequential('', ['TEST:'], 0)).toBe(0);
        });

        it('should reject an empty marker list', () => {
            expect(() => findEndSequential('text', [], 0)).toThrow(ConfigurationError);
        });
    });

    describe('greedy and sequential end strategies', () => {
        it('should differ when a lower-priority marker occurs first', () => {
            const text = 'HISTORY: a\nIMPRESSION: b\nFINDINGS: c';
            const start = findFirstStart(text, ['HISTORY']);
            const endMarkers = ['FINDINGS', 'IMPRESSION'];

            expect(text.slice(findEndGreedy(text, endMarkers, start.start))).toBe('IMPRESSION: b\nFINDINGS: c');
            expect(text.slice(findEndSequential(text, endMarkers, start.start))).toBe('FINDINGS: c');
        });
    });

    describe('findFirstMarker', () => {
        it('should return the matched marker text', () => {
            const lookup = compileMarkerLookup(['clinical\\s+history', 'history']);
            expect(findFirstMarker('Clinical History: cough', lookup)).toBe('Clinical History');
        });

        it('should let dot match across lines', () => {
            const lookup = compileMarkerLookup(['clinical.history']);
            expect(findFirstMarker('CLINICAL\nHISTORY: x', lookup)).toBe('CLINICAL\nHISTORY');
            expect(compileMarkers(['clinical.history']).search('CLINICAL\nHISTORY: x')).toBeNull();
        });

        it('should return null without a match', () => {
            expect(findFirstMarker('nothing', compileMarkerLookup(['history']))).toBeNull();
        });
    });

    describe('with the literal engine', () => {
        it('should resolve the same boundaries for plain markers', () => {
            const options = { engine: literalEngine };
            const start = findFirstStart(REPORT, ['COMPARISON:'], options);
            const end = findEndGreedy(REPORT, ['FINDINGS:', 'IMPRESSION:'], start.start, options);
            expect(REPORT.slice(start.start, end).trim()).toBe('COMPARISON: None.');
        });
    });
});
