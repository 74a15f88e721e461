/**
 * Default heading markers for radiology report sections.
 *
 * Every marker absorbs the non-word characters around the heading on the
 * same line, so `HISTORY:`, `**History:**` and `Indications -` all match.
 */

import type { MarkedSectionName } from '../types/sections.js';
import { headingMarker } from '../utils/textUtils.js';

export type MarkerTable = Record<MarkedSectionName, readonly string[]>;

export const DEFAULT_SECTION_MARKERS: Readonly<MarkerTable> = Object.freeze({
    comparison: [headingMarker('Comparisons?')],
    findings: [headingMarker('Findings?')],
    history: [
        headingMarker('History'),
        headingMarker('Indications?'),
        headingMarker('clinical\\s+history'),
        headingMarker('clinical\\s+indications?'),
    ],
    impression: [headingMarker('Impressions?')],
    technique: [headingMarker('Techniques?')],
});

/** Report trailer lines; they end the findings and impression sections. */
export const DEFAULT_FOOTER_MARKERS: readonly string[] = Object.freeze([
    headingMarker('Report\\s+Severity'),
    headingMarker('Finalized\\s+Datetime'),
    headingMarker('Preliminary\\s+Datetime'),
]);
