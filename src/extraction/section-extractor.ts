/**
 * Reusable section extraction built on the position search.
 *
 * An extractor validates its options and compiles its start and end markers
 * once; the resulting object is frozen and holds no per-call state.
 *
 * @module section-extractor
 */

import type { MatchSpan } from '../types/engine.js';
import type { ResolvedSectionOptions, SectionExtractorOptions } from '../types/options.js';
import type { SectionMatch } from '../types/sections.js';
import { buildPreview } from '../utils/textUtils.js';
import { resolveSectionOptions } from './options.js';
import {
    compileMarkerList,
    isNoMatch,
    type MarkerMatchers,
    matchAllStarts,
    matchAllStartsSequential,
    matchEndGreedy,
    matchEndSequential,
    matchFirstStart,
    matchStartSequential,
} from './positions.js';

export type SectionExtractor = Readonly<{
    /** Resolved, frozen options. */
    options: ResolvedSectionOptions;
    /** First section in `text`, or `''` when the start marker is missing. */
    extract: (text: string) => string;
    /** Every occurrence of the section, empty ones dropped. */
    extractAll: (text: string) => string[];
    /** First section with its offsets, or `null` when the start marker is missing. */
    locate: (text: string) => SectionMatch | null;
}>;

const resolveEnd = (
    text: string,
    fromPos: number,
    endMatchers: MarkerMatchers | null,
    options: ResolvedSectionOptions,
) => {
    const find = options.matchStrategy === 'sequential' ? matchEndSequential : matchEndGreedy;
    return find(text, endMatchers, fromPos, options);
};

/**
 * Slices one section given its start marker span.
 *
 * The end search starts at the marker's own start offset, so each
 * occurrence in `extractAll` is resolved independently of the others.
 */
const sliceSection = (
    text: string,
    marker: MatchSpan,
    endMatchers: MarkerMatchers | null,
    options: ResolvedSectionOptions,
): SectionMatch => {
    const contentStart = options.includeStartMarker ? marker.start : marker.end;
    const contentEnd = resolveEnd(text, marker.start, endMatchers, options);
    // An end marker inside the start marker leaves nothing to slice
    const sliced = contentEnd > contentStart ? text.slice(contentStart, contentEnd) : '';
    return { contentEnd, contentStart, marker, text: sliced.trim() };
};

/**
 * Creates a section extractor.
 *
 * @throws ConfigurationError for an unknown strategy, an empty marker list, a marker the engine
 * cannot compile or another invalid option
 *
 * @example
 * const findings = createSectionExtractor({
 *   startMarkers: ['FINDINGS:'],
 *   endMarkers: ['IMPRESSION:'],
 *   includeStartMarker: false,
 * });
 * findings.extract('FINDINGS: Normal study\nIMPRESSION: Clear'); // → 'Normal study'
 *
 * @example
 * // Every occurrence of a repeated section
 * const turns = createSectionExtractor({ startMarkers: ['Human:'], endMarkers: ['AI'], includeStartMarker: false });
 * turns.extractAll('Human: Hi\nAI: Hello\nHuman: Bye\nAI: See ya'); // → ['Hi', 'Bye']
 */
export const createSectionExtractor = (input: SectionExtractorOptions): SectionExtractor => {
    const options = resolveSectionOptions(input);
    const { logger } = options;
    const startMatchers = compileMarkerList(options.startMarkers, options);
    const endMatchers = compileMarkerList(options.endMarkers, options);

    const locate = (text: string): SectionMatch | null => {
        const findStart = options.startStrategy === 'sequential' ? matchStartSequential : matchFirstStart;
        const marker = findStart(text, startMatchers, options);
        if (isNoMatch(marker)) {
            logger?.debug?.('[section-extractor] start marker not found', {
                preview: buildPreview(text),
                startMarkers: options.startMarkers,
            });
            return null;
        }
        return sliceSection(text, marker, endMatchers, options);
    };

    const extractAll = (text: string): string[] => {
        const findStarts = options.startStrategy === 'sequential' ? matchAllStartsSequential : matchAllStarts;
        const markers = findStarts(text, startMatchers);
        logger?.debug?.('[section-extractor] occurrences', { count: markers.length });
        return markers.map((marker) => sliceSection(text, marker, endMatchers, options).text).filter(Boolean);
    };

    return Object.freeze({
        extract: (text: string) => locate(text)?.text ?? '',
        extractAll,
        locate,
        options,
    });
};

/**
 * One-shot extraction for callers that do not reuse the configuration.
 *
 * @example
 * extractSection('HISTORY: cough\nFINDINGS: clear', { startMarkers: ['HISTORY:'], endMarkers: ['FINDINGS:'] })
 * // → 'HISTORY: cough'
 */
export const extractSection = (text: string, options: SectionExtractorOptions) =>
    createSectionExtractor(options).extract(text);
