import type { MatchEngine } from './engine.js';

/**
 * Logger interface for custom logging implementations.
 *
 * All methods are optional - only implement the verbosity levels you need.
 * When no logger is provided, no logging overhead is incurred.
 *
 * @example
 * // Simple console logger
 * const logger: Logger = {
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 *   error: console.error,
 * };
 *
 * @example
 * // Report-quality auditing (only warnings)
 * const auditLogger: Logger = {
 *   warn: (msg, ...args) => auditTrail.push({ msg, args }),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-resolution details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (potential issues, e.g. duplicate markers) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Ordered list of marker fragments. Fragments are patterns, not literals
 * (unless the literal engine is used).
 *
 * `null` means "the whole remaining scope": the start of the text for start
 * markers, the end of the text for end markers.
 */
export type MarkerList = readonly string[] | null;

/**
 * How a boundary is picked when several markers could decide it.
 *
 * - `'greedy'`: all markers compete together, the earliest textual match wins.
 * - `'sequential'`: markers are tried in list order, the first marker that
 *   matches anywhere decides, regardless of where lower-priority markers sit.
 */
export type MatchStrategy = 'greedy' | 'sequential';

/**
 * Options shared by every position search.
 */
export type SearchOptions = {
    /** Anchor markers on word boundaries so "history" does not match inside "clinicalhistory". */
    useWordBoundary?: boolean;
    /** Match letter case exactly. Default `false`. */
    caseSensitive?: boolean;
    /** Matching engine. Defaults to the `RegExp` engine. */
    engine?: MatchEngine;
    /** Receives duplicate-marker diagnostics and resolution traces. */
    logger?: Logger;
    /** Emit the duplicate-marker diagnostic. Default `true`. */
    warnOnDuplicateMarkers?: boolean;
};

/**
 * Configuration of a section extractor.
 *
 * @example
 * const options: SectionExtractorOptions = {
 *   startMarkers: ['FINDINGS:'],
 *   endMarkers: ['IMPRESSION:', 'CONCLUSION:'],
 *   includeStartMarker: false,
 *   matchStrategy: 'sequential',
 * };
 */
export type SectionExtractorOptions = SearchOptions & {
    startMarkers: MarkerList;
    endMarkers: MarkerList;
    /** Keep the matched start marker in the output. Default `true`. */
    includeStartMarker?: boolean;
    /** End boundary strategy. Default `'greedy'`. */
    matchStrategy?: MatchStrategy;
    /** Start boundary strategy. Default `'greedy'`. */
    startStrategy?: MatchStrategy;
};

/**
 * Options after defaults are applied. Frozen once an extractor is built.
 */
export type ResolvedSectionOptions = Readonly<{
    startMarkers: MarkerList;
    endMarkers: MarkerList;
    includeStartMarker: boolean;
    useWordBoundary: boolean;
    caseSensitive: boolean;
    matchStrategy: MatchStrategy;
    startStrategy: MatchStrategy;
    warnOnDuplicateMarkers: boolean;
    engine: MatchEngine;
    logger?: Logger;
}>;
