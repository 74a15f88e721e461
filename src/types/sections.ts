import type { MatchSpan } from './engine.js';
import type { MarkerList } from './options.js';

/**
 * A resolved section.
 *
 * Returned by `locate()`. Unlike `extract()`, it tells apart a section whose
 * start marker is missing (`null`) from one that is present but empty
 * (`text === ''`).
 */
export type SectionMatch = {
    /** Span of the start marker (`{ start: 0, end: 0 }` when start markers are `null`). */
    marker: MatchSpan;
    /** Offset where the sliced content starts (marker start or marker end). */
    contentStart: number;
    /** Offset where the section ends (exclusive). */
    contentEnd: number;
    /** Trimmed section text. */
    text: string;
};

/**
 * Emitted when a single start marker occurs more than once in a text.
 * Informational only: the first overall match is still used.
 */
export type DuplicateMarkerDiagnostic = {
    type: 'duplicate_marker';
    marker: string;
    count: number;
    message: string;
};

/** Canonical section names, in report order. */
export const SECTION_NAMES = ['title', 'history', 'technique', 'comparison', 'findings', 'impression'] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

/** Sections with their own start markers (title always starts at the text start). */
export type MarkedSectionName = Exclude<SectionName, 'title'>;

/**
 * One row of the canonical section table.
 */
export type SectionConfig = {
    name: SectionName;
    startMarkers: MarkerList;
    /** Start markers of the sections that may follow; they end this one. */
    nextSectionMarkers: MarkerList;
};

/**
 * Output of the report façade: every canonical section mapped to its text,
 * or `null` when its start marker does not occur.
 *
 * @example
 * { title: 'CT BRAIN', history: 'HISTORY: headache', technique: null, ... }
 */
export type ReportSections = Record<SectionName, string | null>;
