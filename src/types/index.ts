export type { CompiledMatcher, CompileFlags, MatchEngine, MatchSpan } from './engine.js';
export type {
    Logger,
    MarkerList,
    MatchStrategy,
    ResolvedSectionOptions,
    SearchOptions,
    SectionExtractorOptions,
} from './options.js';
export type {
    DuplicateMarkerDiagnostic,
    MarkedSectionName,
    ReportSections,
    SectionConfig,
    SectionMatch,
    SectionName,
} from './sections.js';
export { SECTION_NAMES } from './sections.js';
export type { MarkerIssue, MarkerIssueType, MarkerValidationResult } from './validation.js';
