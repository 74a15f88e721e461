/**
 * Half-open span `[start, end)` over the UTF-16 offsets of a text.
 */
export type MatchSpan = {
    start: number;
    end: number;
};

/**
 * Flags accepted by a {@link MatchEngine} when compiling a marker list.
 */
export type CompileFlags = {
    /** Anchor every match on word boundaries (`\b` semantics). */
    wordBoundary: boolean;
    /** Match letter case exactly. Matching is case-insensitive when false. */
    caseSensitive: boolean;
    /** Let `.` match line terminators. Only used for first-marker lookup. */
    dotAll: boolean;
};

/**
 * A compiled alternation of marker fragments.
 *
 * Implementations hold no per-call state, so one matcher may be shared
 * across any number of searches.
 */
export type CompiledMatcher = {
    /** Source the matcher was compiled from, for diagnostics. */
    source: string;
    /** First match in `text`, or `null`. */
    search: (text: string) => MatchSpan | null;
    /** All non-overlapping matches, left to right. */
    searchAll: (text: string) => MatchSpan[];
};

/**
 * Pluggable matching capability.
 *
 * The extraction core only talks to this type, so the default `RegExp`
 * engine can be swapped for the literal engine (or any other) without
 * touching position resolution.
 *
 * @example
 * const matcher = regexEngine.compile(['FINDINGS:'], { caseSensitive: false, dotAll: false, wordBoundary: false });
 * matcher.search('findings: clear'); // { start: 0, end: 9 }
 */
export type MatchEngine = {
    name: string;
    /**
     * Compiles fragments into one matcher that matches any of them.
     * Throws when a fragment cannot be compiled.
     */
    compile: (fragments: readonly string[], flags: CompileFlags) => CompiledMatcher;
};
