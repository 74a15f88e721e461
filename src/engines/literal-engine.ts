/**
 * Backtracking-free matching engine for plain-text markers.
 *
 * Fragments are compared as literal text, character by character, so a
 * search costs at most text length × total marker length.
 *
 * Regex syntax is NOT interpreted: `FINDINGS:` matches the literal heading,
 * `Finding(s)?` only matches those exact characters.
 */

import type { CompiledMatcher, MatchEngine, MatchSpan } from '../types/engine.js';
import { isWordBoundaryAt } from '../utils/textUtils.js';

const sameChar = (a: string, b: string, caseSensitive: boolean) =>
    a === b || (!caseSensitive && a.toLowerCase() === b.toLowerCase());

/**
 * Match a literal at a given offset.
 *
 * @returns endOffset (exclusive) in `text` if matched; otherwise null.
 */
export const matchLiteralAt = (text: string, offset: number, literal: string, caseSensitive: boolean): number | null => {
    if (offset + literal.length > text.length) {
        return null;
    }
    for (let j = 0; j < literal.length; j++) {
        if (!sameChar(text[offset + j], literal[j], caseSensitive)) {
            return null;
        }
    }
    return offset + literal.length;
};

export const literalEngine: MatchEngine = {
    compile: (fragments, { caseSensitive, wordBoundary }): CompiledMatcher => {
        const alternatives = [...fragments];

        const matchAt = (text: string, offset: number): number | null => {
            if (wordBoundary && !isWordBoundaryAt(text, offset)) {
                return null;
            }
            // Earlier alternatives win at the same offset, as in a regex alternation
            for (const alt of alternatives) {
                const end = matchLiteralAt(text, offset, alt, caseSensitive);
                if (end !== null && (!wordBoundary || isWordBoundaryAt(text, end))) {
                    return end;
                }
            }
            return null;
        };

        const searchFrom = (text: string, from: number): MatchSpan | null => {
            for (let i = from; i <= text.length; i++) {
                const end = matchAt(text, i);
                if (end !== null) {
                    return { end, start: i };
                }
            }
            return null;
        };

        return {
            search: (text) => searchFrom(text, 0),
            searchAll: (text) => {
                const spans: MatchSpan[] = [];
                let from = 0;
                while (from <= text.length) {
                    const span = searchFrom(text, from);
                    if (!span) {
                        break;
                    }
                    spans.push(span);
                    // Step over empty matches so the scan always advances
                    from = span.end === span.start ? span.end + 1 : span.end;
                }
                return spans;
            },
            source: alternatives.join('|'),
        };
    },
    name: 'literal',
};
