import { type ReportSections, SECTION_NAMES, type SectionName } from '../types/sections.js';

export type ReportRecordOptions = {
    /** Drop sections whose start marker was not found instead of emitting `null`. */
    omitAbsent?: boolean;
};

export type ReportJsonOptions = ReportRecordOptions & {
    /** Passed to `JSON.stringify` for pretty printing. */
    indent?: number | string;
};

/**
 * Converts façade output to a plain record in canonical section order.
 *
 * Absent sections are `null`. Present-but-empty sections stay `''` and are
 * never omitted.
 *
 * @example
 * toReportRecord(report, { omitAbsent: true })
 * // → { title: 'CT BRAIN', findings: 'FINDINGS: Normal' }
 */
export const toReportRecord = (
    sections: Partial<ReportSections>,
    options: ReportRecordOptions = {},
): Partial<Record<SectionName, string | null>> => {
    const record: Partial<Record<SectionName, string | null>> = {};
    for (const name of SECTION_NAMES) {
        const value = sections[name] ?? null;
        if (value === null && options.omitAbsent) {
            continue;
        }
        record[name] = value;
    }
    return record;
};

/**
 * Serializes façade output to JSON.
 *
 * @example
 * toReportJson({ ...report, technique: null }, { omitAbsent: true })
 * // → '{"title":"CT BRAIN",...}' without "technique"
 */
export const toReportJson = (sections: Partial<ReportSections>, options: ReportJsonOptions = {}) => {
    const { indent, ...recordOptions } = options;
    return JSON.stringify(toReportRecord(sections, recordOptions), null, indent);
};
