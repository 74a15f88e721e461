/**
 * Default matching engine backed by ECMAScript `RegExp`.
 *
 * Fragments are joined into a single non-capturing alternation, so the
 * leftmost match wins and, at the same offset, the earlier fragment wins.
 */

import type { CompiledMatcher, CompileFlags, MatchEngine, MatchSpan } from '../types/engine.js';

/**
 * Builds the alternation source for a fragment list.
 *
 * @example
 * buildAlternationSource(['HISTORY', 'INDICATION'], true) // → '\\b(?:HISTORY|INDICATION)\\b'
 * buildAlternationSource(['HISTORY:'], false)             // → '(?:HISTORY:)'
 */
export const buildAlternationSource = (fragments: readonly string[], wordBoundary: boolean) => {
    const union = `(?:${fragments.join('|')})`;
    return wordBoundary ? `\\b${union}\\b` : union;
};

/**
 * Translates compile flags to RegExp flags. Always global so that
 * `matchAll` can walk every match.
 */
export const toRegexFlags = ({ caseSensitive, dotAll }: CompileFlags) =>
    `g${caseSensitive ? '' : 'i'}${dotAll ? 's' : ''}`;

/**
 * Safely compiles a regex pattern, throwing a helpful error if invalid.
 */
export const compileRegex = (pattern: string, flags: string): RegExp => {
    try {
        return new RegExp(pattern, flags);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid regex pattern: ${pattern}\n  Cause: ${message}`);
    }
};

const toSpan = (match: RegExpMatchArray): MatchSpan => {
    const start = match.index ?? 0;
    return { end: start + match[0].length, start };
};

export const regexEngine: MatchEngine = {
    compile: (fragments, flags): CompiledMatcher => {
        const source = buildAlternationSource(fragments, flags.wordBoundary);
        const regex = compileRegex(source, toRegexFlags(flags));

        return {
            search: (text) => {
                // The global regex is shared; start every search from a clean state
                regex.lastIndex = 0;
                const match = regex.exec(text);
                return match ? toSpan(match) : null;
            },
            searchAll: (text) => {
                // matchAll copies lastIndex into its internal clone
                regex.lastIndex = 0;
                return Array.from(text.matchAll(regex), toSpan);
            },
            source,
        };
    },
    name: 'regex',
};
