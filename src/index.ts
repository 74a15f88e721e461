/**
 * report-sections - Marker-based section extraction for semi-structured reports.
 *
 * Locates labeled sections (history, findings, impression, ...) in free text
 * by matching configurable start and end marker patterns, with greedy or
 * priority-ordered end matching and a pluggable matching engine.
 *
 * @packageDocumentation
 *
 * @example
 * import { createReportExtractor, createSectionExtractor } from 'report-sections';
 *
 * const report = createReportExtractor().extractReport(text);
 * // { title: 'CT BRAIN', history: 'HISTORY: ...', ..., impression: 'IMPRESSION: ...' }
 *
 * const findings = createSectionExtractor({
 *   startMarkers: ['FINDINGS:'],
 *   endMarkers: ['IMPRESSION:'],
 *   includeStartMarker: false,
 * });
 * findings.extract(text);
 */

// ─────────────────────────────────────────────────────────────
// Matching engines
// ─────────────────────────────────────────────────────────────

export { literalEngine, matchLiteralAt } from './engines/literal-engine.js';
export { buildAlternationSource, regexEngine } from './engines/regex-engine.js';

// ─────────────────────────────────────────────────────────────
// Section extraction
// ─────────────────────────────────────────────────────────────

export { ConfigurationError } from './extraction/errors.js';
export { resolveSectionOptions } from './extraction/options.js';
export type { CompileMarkersOptions } from './extraction/pattern-compiler.js';
export { compileMarkers } from './extraction/pattern-compiler.js';
export {
    collectDuplicateMarkers,
    findAllStarts,
    findAllStartsSequential,
    findEndGreedy,
    findEndSequential,
    findFirstStart,
    findStartSequential,
    isNoMatch,
    NO_MATCH,
    TEXT_START,
} from './extraction/positions.js';
export type { SectionExtractor } from './extraction/section-extractor.js';
export { createSectionExtractor, extractSection } from './extraction/section-extractor.js';

// ─────────────────────────────────────────────────────────────
// Radiology report façade
// ─────────────────────────────────────────────────────────────

export type { MarkerTable } from './report/markers.js';
export { DEFAULT_FOOTER_MARKERS, DEFAULT_SECTION_MARKERS } from './report/markers.js';
export type { ReportExtractor, ReportExtractorOptions } from './report/report-extractor.js';
export { buildSectionTable, createReportExtractor } from './report/report-extractor.js';
export type { ReportJsonOptions, ReportRecordOptions } from './report/report-record.js';
export { toReportJson, toReportRecord } from './report/report-record.js';

// ─────────────────────────────────────────────────────────────
// Types, validation and utilities
// ─────────────────────────────────────────────────────────────

export type {
    CompiledMatcher,
    CompileFlags,
    DuplicateMarkerDiagnostic,
    Logger,
    MarkedSectionName,
    MarkerIssue,
    MarkerIssueType,
    MarkerList,
    MarkerValidationResult,
    MatchEngine,
    MatchSpan,
    MatchStrategy,
    ReportSections,
    ResolvedSectionOptions,
    SearchOptions,
    SectionConfig,
    SectionExtractorOptions,
    SectionMatch,
    SectionName,
} from './types/index.js';
export { SECTION_NAMES } from './types/index.js';
export { escapeRegex, headingMarker, labelMarker } from './utils/textUtils.js';
export type { MarkerValidationOptions } from './validation/marker-validator.js';
export { formatMarkerIssues, validateMarkers, validateSectionMarkers } from './validation/marker-validator.js';
