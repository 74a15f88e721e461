/**
 * Section boundary position search.
 *
 * Start positions are spans (`[start, end)` of the start marker), end
 * positions are single offsets where the next section's marker begins.
 *
 * The `match*` functions run on matchers compiled once by
 * {@link compileMarkerMatchers}; the `find*` functions take raw marker lists
 * and compile them per call.
 *
 * @module positions
 */

import type { CompiledMatcher, MatchSpan } from '../types/engine.js';
import type { MarkerList, SearchOptions } from '../types/options.js';
import type { DuplicateMarkerDiagnostic } from '../types/sections.js';
import { type CompileMarkersOptions, compileMarkers } from './pattern-compiler.js';

/** Sentinel span returned when no start marker matches. */
export const NO_MATCH: Readonly<MatchSpan> = Object.freeze({ end: -1, start: -1 });

/** Span returned when start markers are `null` (the section starts at the text start). */
export const TEXT_START: Readonly<MatchSpan> = Object.freeze({ end: 0, start: 0 });

export const isNoMatch = (span: MatchSpan) => span.start < 0;

/**
 * A marker list compiled for every search strategy.
 */
export type MarkerMatchers = Readonly<{
    markers: readonly string[];
    /** All markers in one alternation (greedy searches). */
    any: CompiledMatcher;
    /** One matcher per marker, in list order (sequential searches, duplicate counting). */
    each: readonly CompiledMatcher[];
}>;

const toCompileOptions = (options: SearchOptions, dotAll = false): CompileMarkersOptions => ({
    caseSensitive: options.caseSensitive,
    dotAll,
    engine: options.engine,
    wordBoundary: options.useWordBoundary,
});

/**
 * Compiles a marker list once for reuse across searches.
 *
 * @throws ConfigurationError when the list is empty or a marker cannot be compiled
 */
export const compileMarkerMatchers = (markers: readonly string[], options: SearchOptions = {}): MarkerMatchers => {
    const compileOptions = toCompileOptions(options);
    const any = compileMarkers(markers, compileOptions);
    return Object.freeze({
        any,
        each: Object.freeze(markers.map((marker) => compileMarkers([marker], compileOptions))),
        markers: Object.freeze([...markers]),
    });
};

/**
 * Like {@link compileMarkerMatchers}, passing `null` (whole scope) through.
 */
export const compileMarkerList = (markers: MarkerList, options: SearchOptions = {}) =>
    markers === null ? null : compileMarkerMatchers(markers, options);

const buildDuplicateDiagnostic = (marker: string, count: number): DuplicateMarkerDiagnostic => ({
    count,
    marker,
    message: `Start marker "${marker}" appears ${count} times in text, only the first one will be matched.`,
    type: 'duplicate_marker',
});

const shouldWarn = (options: SearchOptions) => options.warnOnDuplicateMarkers !== false && !!options.logger?.warn;

/**
 * Lists every marker of a compiled list that, on its own, matches two or
 * more times in `text`.
 */
export const countDuplicateMarkers = (text: string, matchers: MarkerMatchers): DuplicateMarkerDiagnostic[] => {
    const diagnostics: DuplicateMarkerDiagnostic[] = [];
    matchers.each.forEach((matcher, index) => {
        const count = matcher.searchAll(text).length;
        if (count >= 2) {
            diagnostics.push(buildDuplicateDiagnostic(matchers.markers[index], count));
        }
    });
    return diagnostics;
};

/**
 * Lists every start marker that, on its own, matches two or more times in `text`.
 *
 * Occurrences are counted under the search's own flags, word boundaries
 * included, so `History` is not counted inside `clinicalhistory` when
 * `useWordBoundary` is set. A plain substring count would include it.
 *
 * @example
 * collectDuplicateMarkers('History: a\nHistory: b', ['History'])
 * // → [{ type: 'duplicate_marker', marker: 'History', count: 2, message: '...' }]
 */
export const collectDuplicateMarkers = (
    text: string,
    markers: readonly string[],
    options: SearchOptions = {},
): DuplicateMarkerDiagnostic[] => countDuplicateMarkers(text, compileMarkerMatchers(markers, options));

const warnDuplicates = (diagnostics: DuplicateMarkerDiagnostic[], options: SearchOptions) => {
    for (const diagnostic of diagnostics) {
        options.logger?.warn?.(diagnostic.message, diagnostic);
    }
};

/**
 * Greedy start search on compiled markers. See {@link findFirstStart}.
 */
export const matchFirstStart = (
    text: string,
    matchers: MarkerMatchers | null,
    options: SearchOptions = {},
): MatchSpan => {
    if (!matchers) {
        return { ...TEXT_START };
    }

    if (shouldWarn(options)) {
        warnDuplicates(countDuplicateMarkers(text, matchers), options);
    }

    const span = matchers.any.search(text);
    options.logger?.trace?.('[positions] findFirstStart', { source: matchers.any.source, span });
    return span ?? { ...NO_MATCH };
};

/**
 * Finds the span of the first match of any start marker.
 *
 * All markers compete in one alternation; the leftmost match wins. For
 * every marker that independently matches more than once, a
 * `duplicate_marker` diagnostic is sent to `logger.warn`. The diagnostic
 * never changes the result.
 *
 * @returns `{ start: 0, end: 0 }` for `null` markers, `NO_MATCH` when nothing matches
 *
 * @example
 * findFirstStart('FINDINGS: Normal study', ['FINDINGS:']) // → { start: 0, end: 9 }
 * findFirstStart('Normal study', ['FINDINGS:'])           // → { start: -1, end: -1 }
 */
export const findFirstStart = (text: string, markers: MarkerList, options: SearchOptions = {}): MatchSpan =>
    matchFirstStart(text, compileMarkerList(markers, options), options);

/**
 * Sequential start search on compiled markers. See {@link findStartSequential}.
 */
export const matchStartSequential = (
    text: string,
    matchers: MarkerMatchers | null,
    options: SearchOptions = {},
): MatchSpan => {
    if (!matchers) {
        return { ...TEXT_START };
    }

    for (let i = 0; i < matchers.each.length; i++) {
        const matcher = matchers.each[i];
        const span = matcher.search(text);
        if (!span) {
            continue;
        }
        const marker = matchers.markers[i];
        if (shouldWarn(options)) {
            const count = matcher.searchAll(text).length;
            if (count >= 2) {
                warnDuplicates([buildDuplicateDiagnostic(marker, count)], options);
            }
        }
        options.logger?.trace?.('[positions] findStartSequential', { marker, span });
        return span;
    }

    return { ...NO_MATCH };
};

/**
 * Finds the start span by trying markers one at a time, in list order.
 *
 * The first marker that matches anywhere decides, even when a later marker
 * occurs earlier in the text. The duplicate diagnostic is only emitted for
 * the deciding marker.
 *
 * @example
 * findStartSequential('Clinical History: x', ['History:', 'Clinical History:']) // → { start: 9, end: 17 }
 */
export const findStartSequential = (text: string, markers: MarkerList, options: SearchOptions = {}): MatchSpan =>
    matchStartSequential(text, compileMarkerList(markers, options), options);

export const matchAllStarts = (text: string, matchers: MarkerMatchers | null): MatchSpan[] =>
    matchers ? matchers.any.searchAll(text) : [{ ...TEXT_START }];

/**
 * Finds every non-overlapping start span, left to right.
 *
 * @returns `[{ start: 0, end: 0 }]` for `null` markers, `[]` when nothing matches
 */
export const findAllStarts = (text: string, markers: MarkerList, options: SearchOptions = {}): MatchSpan[] =>
    matchAllStarts(text, compileMarkerList(markers, options));

export const matchAllStartsSequential = (text: string, matchers: MarkerMatchers | null): MatchSpan[] => {
    if (!matchers) {
        return [{ ...TEXT_START }];
    }
    return matchers.each
        .flatMap((matcher) => matcher.searchAll(text))
        .sort((a, b) => a.start - b.start || a.end - b.end);
};

/**
 * Collects every match of every marker, marker by marker, then sorts them
 * into document order. Matches of different markers may overlap.
 */
export const findAllStartsSequential = (text: string, markers: MarkerList, options: SearchOptions = {}): MatchSpan[] =>
    matchAllStartsSequential(text, compileMarkerList(markers, options));

const clampOffset = (text: string, fromPos: number) => Math.min(Math.max(fromPos, 0), text.length);

/**
 * Greedy end search on compiled markers. See {@link findEndGreedy}.
 */
export const matchEndGreedy = (
    text: string,
    matchers: MarkerMatchers | null,
    fromPos: number,
    options: SearchOptions = {},
): number => {
    if (!matchers) {
        return text.length;
    }
    const from = clampOffset(text, fromPos);
    const span = matchers.any.search(text.slice(from));
    options.logger?.trace?.('[positions] findEndGreedy', { from, span });
    return span ? from + span.start : text.length;
};

/**
 * Finds where a section ends using greedy matching: the earliest offset, at
 * or after `fromPos`, where any end marker matches.
 *
 * @returns `text.length` when `endMarkers` is `null` or nothing matches
 *
 * @example
 * findEndGreedy('HISTORY: info FINDINGS: x IMPRESSION: y', ['IMPRESSION:', 'FINDINGS:'], 0) // → 14
 */
export const findEndGreedy = (
    text: string,
    endMarkers: MarkerList,
    fromPos: number,
    options: SearchOptions = {},
): number => matchEndGreedy(text, compileMarkerList(endMarkers, options), fromPos, options);

/**
 * Sequential end search on compiled markers. See {@link findEndSequential}.
 */
export const matchEndSequential = (
    text: string,
    matchers: MarkerMatchers | null,
    fromPos: number,
    options: SearchOptions = {},
): number => {
    if (!matchers) {
        return text.length;
    }

    const from = clampOffset(text, fromPos);
    const remainder = text.slice(from);
    for (let i = 0; i < matchers.each.length; i++) {
        const span = matchers.each[i].search(remainder);
        if (span) {
            options.logger?.trace?.('[positions] findEndSequential', { from, marker: matchers.markers[i], span });
            return from + span.start;
        }
    }
    return text.length;
};

/**
 * Finds where a section ends using sequential matching: end markers are
 * tried in list order and the first one with any match after `fromPos`
 * decides. Later markers are never considered once one has matched, even if
 * they occur earlier in the text.
 *
 * @returns `text.length` when `endMarkers` is `null` or no marker matches
 *
 * @example
 * findEndSequential('HISTORY: a IMPRESSION: b FINDINGS: c', ['FINDINGS', 'IMPRESSION'], 0) // → 25
 */
export const findEndSequential = (
    text: string,
    endMarkers: MarkerList,
    fromPos: number,
    options: SearchOptions = {},
): number => matchEndSequential(text, compileMarkerList(endMarkers, options), fromPos, options);

/**
 * Compiles markers for {@link findFirstMarker}, in dot-all mode so a marker
 * containing `.` may span lines.
 *
 * @throws ConfigurationError when the list is empty or a marker cannot be compiled
 */
export const compileMarkerLookup = (markers: readonly string[], options: SearchOptions = {}): CompiledMatcher =>
    compileMarkers(markers, toCompileOptions(options, true));

/**
 * Returns the text of the first marker match.
 *
 * @returns The matched text, or `null` when no marker matches
 *
 * @example
 * findFirstMarker('Clinical History: cough', compileMarkerLookup(['clinical\\s+history', 'history']))
 * // → 'Clinical History'
 */
export const findFirstMarker = (text: string, lookup: CompiledMatcher) => {
    const span = lookup.search(text);
    return span ? text.slice(span.start, span.end) : null;
};
