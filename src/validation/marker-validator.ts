/**
 * Marker validation utilities for catching configuration mistakes before
 * markers are compiled.
 *
 * Unlike extractor construction, these never throw: they report every issue
 * so a whole marker table can be audited at once.
 */

import { regexEngine } from '../engines/regex-engine.js';
import type { MatchEngine } from '../types/engine.js';
import type { MarkerList } from '../types/options.js';
import type { MarkerIssue, MarkerValidationResult } from '../types/validation.js';

export type MarkerValidationOptions = {
    /** Engine used to check that each marker compiles. Defaults to the regex engine. */
    engine?: MatchEngine;
};

/**
 * Validates a single marker for common issues.
 */
const validateMarker = (marker: string, seen: Set<string>, engine: MatchEngine): MarkerIssue | undefined => {
    if (!marker.trim()) {
        return { marker, message: 'Empty marker matches everywhere', type: 'empty_marker' };
    }
    if (seen.has(marker)) {
        return { marker, message: `Duplicate marker: "${marker}"`, type: 'duplicate' };
    }
    seen.add(marker);

    try {
        engine.compile([marker], { caseSensitive: false, dotAll: false, wordBoundary: false });
    } catch (error) {
        const cause = error instanceof Error ? error.message : String(error);
        return { cause, marker, message: `Invalid marker pattern: "${marker}"`, type: 'invalid_pattern' };
    }
    return undefined;
};

/**
 * Validates a marker list.
 *
 * @returns Array parallel to input (undefined where a marker is fine), or
 * undefined when the whole list is fine
 *
 * @example
 * validateMarkers(['FINDINGS:', '(unclosed', 'FINDINGS:'])
 * // → [undefined, { type: 'invalid_pattern', ... }, { type: 'duplicate', ... }]
 */
export const validateMarkers = (
    markers: readonly string[],
    options: MarkerValidationOptions = {},
): MarkerValidationResult | undefined => {
    const { engine = regexEngine } = options;
    const seen = new Set<string>();
    const issues = markers.map((marker) => validateMarker(marker, seen, engine));

    if (issues.every((issue) => issue === undefined)) {
        return undefined;
    }
    return issues;
};

/**
 * Validates every list of a marker table, keyed by section name.
 * `null` lists are valid and skipped.
 *
 * @returns Only the sections that have issues
 */
export const validateSectionMarkers = (
    table: Record<string, MarkerList | undefined>,
    options: MarkerValidationOptions = {},
): Record<string, MarkerValidationResult> => {
    const results: Record<string, MarkerValidationResult> = {};
    for (const [section, markers] of Object.entries(table)) {
        if (!markers) {
            continue;
        }
        const issues = markers.length
            ? validateMarkers(markers, options)
            : [{ marker: '', message: 'Marker list is empty (use null instead)', type: 'empty_marker' as const }];
        if (issues) {
            results[section] = issues;
        }
    }
    return results;
};

/**
 * Formats validation results into human-readable lines.
 *
 * @example
 * formatMarkerIssues(validateSectionMarkers({ history: ['History', 'History'] }))
 * // → ['history, marker 2: Duplicate marker: "History"']
 */
export const formatMarkerIssues = (results: Record<string, MarkerValidationResult>): string[] => {
    const lines: string[] = [];
    for (const [section, issues] of Object.entries(results)) {
        issues.forEach((issue, index) => {
            if (!issue) {
                return;
            }
            const cause = issue.cause ? ` (${issue.cause})` : '';
            lines.push(`${section}, marker ${index + 1}: ${issue.message}${cause}`);
        });
    }
    return lines;
};
