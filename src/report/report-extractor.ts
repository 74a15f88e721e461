/**
 * Canonical radiology report façade.
 *
 * Wires one section extractor per canonical section. Each section ends where
 * any of the sections that typically follow it begins
 * (history → technique → comparison → findings → impression → footer).
 * A section is only extracted once a dot-all lookup finds one of its
 * headings.
 *
 * @module report-extractor
 */

import { ConfigurationError } from '../extraction/errors.js';
import { compileMarkerLookup, findFirstMarker } from '../extraction/positions.js';
import { createSectionExtractor, type SectionExtractor } from '../extraction/section-extractor.js';
import type { CompiledMatcher } from '../types/engine.js';
import type { MarkerList, SectionExtractorOptions } from '../types/options.js';
import {
    type MarkedSectionName,
    type ReportSections,
    SECTION_NAMES,
    type SectionConfig,
    type SectionMatch,
    type SectionName,
} from '../types/sections.js';
import { DEFAULT_FOOTER_MARKERS, DEFAULT_SECTION_MARKERS, type MarkerTable } from './markers.js';

/**
 * Report façade options. Boundary options apply to every section.
 *
 * @example
 * const options: ReportExtractorOptions = {
 *   markers: { findings: ['DESCRIPTION:', 'FINDINGS:'], impression: ['CONCLUSION:', 'IMPRESSION:'] },
 *   includeStartMarker: false,
 * };
 */
export type ReportExtractorOptions = Omit<SectionExtractorOptions, 'startMarkers' | 'endMarkers'> & {
    /** Start markers per section; missing entries keep the defaults. */
    markers?: Partial<Record<MarkedSectionName, readonly string[]>>;
    /** Trailer markers ending findings and impression. `null` disables them. */
    footerMarkers?: MarkerList;
};

export type ReportExtractor = Readonly<{
    /** The section table the extractors were built from, in report order. */
    sections: readonly SectionConfig[];
    /** Section text, or `''` when the section is missing. */
    extract: (name: SectionName, text: string) => string;
    /** Section with offsets, or `null` when its start marker is missing. */
    locate: (name: SectionName, text: string) => SectionMatch | null;
    /** Runs every section against the same text. */
    extractReport: (text: string) => ReportSections;
}>;

type SectionEntry = {
    extractor: SectionExtractor;
    /** Dot-all heading lookup; `null` for sections that start at the text start. */
    lookup: CompiledMatcher | null;
};

const concatMarkers = (...lists: MarkerList[]): MarkerList => {
    const all = lists.flatMap((list) => list ?? []);
    return all.length ? all : null;
};

/**
 * Builds the canonical section table from per-section start markers.
 *
 * Title has no start marker (it starts at the text start) and ends at
 * whichever other section begins first.
 */
export const buildSectionTable = (markers: MarkerTable, footerMarkers: MarkerList): SectionConfig[] => {
    const { comparison, findings, history, impression, technique } = markers;
    return [
        {
            name: 'title',
            nextSectionMarkers: concatMarkers(history, technique, comparison, findings, impression),
            startMarkers: null,
        },
        {
            name: 'history',
            nextSectionMarkers: concatMarkers(technique, comparison, findings, impression),
            startMarkers: history,
        },
        { name: 'technique', nextSectionMarkers: concatMarkers(comparison, findings, impression), startMarkers: technique },
        { name: 'comparison', nextSectionMarkers: concatMarkers(technique, findings, impression), startMarkers: comparison },
        { name: 'findings', nextSectionMarkers: concatMarkers(impression, footerMarkers), startMarkers: findings },
        { name: 'impression', nextSectionMarkers: concatMarkers(footerMarkers), startMarkers: impression },
    ];
};

const resolveMarkerTable = (overrides: ReportExtractorOptions['markers'] = {}): MarkerTable => ({
    comparison: overrides.comparison ?? DEFAULT_SECTION_MARKERS.comparison,
    findings: overrides.findings ?? DEFAULT_SECTION_MARKERS.findings,
    history: overrides.history ?? DEFAULT_SECTION_MARKERS.history,
    impression: overrides.impression ?? DEFAULT_SECTION_MARKERS.impression,
    technique: overrides.technique ?? DEFAULT_SECTION_MARKERS.technique,
});

/**
 * Creates the report façade.
 *
 * Every section's markers are compiled here, so an override the engine
 * cannot compile fails at construction.
 *
 * @throws ConfigurationError when a marker override or boundary option is invalid
 *
 * @example
 * const extractor = createReportExtractor();
 * extractor.extract('findings', 'TECHNIQUE: CT\nFINDINGS: Normal chest CT\nIMPRESSION: No acute abnormality');
 * // → 'FINDINGS: Normal chest CT'
 */
export const createReportExtractor = (options: ReportExtractorOptions = {}): ReportExtractor => {
    const { markers, footerMarkers = DEFAULT_FOOTER_MARKERS, ...boundary } = options;
    const sections = buildSectionTable(resolveMarkerTable(markers), footerMarkers).map((section) =>
        Object.freeze(section),
    );

    const entries = new Map<string, SectionEntry>(
        sections.map((section): [SectionName, SectionEntry] => {
            const extractor = createSectionExtractor({
                ...boundary,
                endMarkers: section.nextSectionMarkers,
                startMarkers: section.startMarkers,
            });
            const lookup = section.startMarkers ? compileMarkerLookup(section.startMarkers, extractor.options) : null;
            return [section.name, { extractor, lookup }];
        }),
    );

    const getEntry = (name: SectionName) => {
        const entry = entries.get(name);
        if (!entry) {
            throw new ConfigurationError(`Unknown section: ${name}. Expected one of ${SECTION_NAMES.join(', ')}`);
        }
        return entry;
    };

    const locate = (name: SectionName, text: string) => {
        const { extractor, lookup } = getEntry(name);
        if (lookup && findFirstMarker(text, lookup) === null) {
            return null;
        }
        return extractor.locate(text);
    };
    const read = (name: SectionName, text: string) => locate(name, text)?.text ?? null;

    const extractReport = (text: string): ReportSections => {
        const report: ReportSections = {
            title: read('title', text),
            history: read('history', text),
            technique: read('technique', text),
            comparison: read('comparison', text),
            findings: read('findings', text),
            impression: read('impression', text),
        };
        options.logger?.debug?.('[report-extractor] extracted report', {
            absent: SECTION_NAMES.filter((name) => report[name] === null),
        });
        return report;
    };

    return Object.freeze({
        extract: (name: SectionName, text: string) => read(name, text) ?? '',
        extractReport,
        locate,
        sections: Object.freeze(sections),
    });
};
