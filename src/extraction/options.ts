import { z } from 'zod';

import { regexEngine } from '../engines/regex-engine.js';
import type { MatchEngine } from '../types/engine.js';
import type { MarkerList, ResolvedSectionOptions, SectionExtractorOptions } from '../types/options.js';
import { ConfigurationError } from './errors.js';

const markerListSchema = z
    .array(z.string({ invalid_type_error: 'Markers must be strings' }))
    .min(1, 'Marker list must contain at least one marker (use null to match the whole scope)')
    .nullable();

export const matchStrategySchema = z.enum(['greedy', 'sequential']);

/**
 * Schema of the serializable part of {@link SectionExtractorOptions}.
 * `engine` and `logger` are checked separately since they carry functions.
 */
export const sectionOptionsSchema = z.object({
    caseSensitive: z.boolean().default(false),
    endMarkers: markerListSchema,
    includeStartMarker: z.boolean().default(true),
    matchStrategy: matchStrategySchema.default('greedy'),
    startMarkers: markerListSchema,
    startStrategy: matchStrategySchema.default('greedy'),
    useWordBoundary: z.boolean().default(false),
    warnOnDuplicateMarkers: z.boolean().default(true),
});

const isMatchEngine = (value: unknown): value is MatchEngine =>
    typeof value === 'object' &&
    value !== null &&
    'compile' in value &&
    typeof value.compile === 'function' &&
    'name' in value &&
    typeof value.name === 'string';

const freezeMarkers = (markers: readonly string[] | null): MarkerList =>
    markers === null ? null : Object.freeze([...markers]);

/**
 * Formats zod issues as `path: message` lines.
 */
export const formatSchemaIssues = (issues: z.ZodIssue[]) =>
    issues.map((issue) => `${issue.path.length ? issue.path.join('.') : 'options'}: ${issue.message}`);

/**
 * Validates extractor options and applies defaults.
 *
 * Runs once, when an extractor is built, so a bad strategy or an empty
 * marker list fails at construction instead of on the first extraction.
 *
 * @throws ConfigurationError listing every invalid field
 */
export const resolveSectionOptions = (options: SectionExtractorOptions): ResolvedSectionOptions => {
    const parsed = sectionOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const issues = formatSchemaIssues(parsed.error.issues);
        throw new ConfigurationError(`Invalid section extractor options: ${issues.join('; ')}`, issues);
    }

    const engine = options.engine ?? regexEngine;
    if (!isMatchEngine(engine)) {
        throw new ConfigurationError('Invalid section extractor options: engine must provide name and compile()');
    }

    const { data } = parsed;
    return Object.freeze({
        caseSensitive: data.caseSensitive,
        endMarkers: freezeMarkers(data.endMarkers),
        engine,
        includeStartMarker: data.includeStartMarker,
        logger: options.logger,
        matchStrategy: data.matchStrategy,
        startMarkers: freezeMarkers(data.startMarkers),
        startStrategy: data.startStrategy,
        useWordBoundary: data.useWordBoundary,
        warnOnDuplicateMarkers: data.warnOnDuplicateMarkers,
    });
};
