/**
 * Marker list → compiled matcher.
 *
 * Kept apart from position resolution so compilation errors surface in one
 * place and engines can be tested against the same entry point.
 */

import { regexEngine } from '../engines/regex-engine.js';
import type { CompiledMatcher, MatchEngine } from '../types/engine.js';
import { ConfigurationError } from './errors.js';

export type CompileMarkersOptions = {
    wordBoundary?: boolean;
    caseSensitive?: boolean;
    dotAll?: boolean;
    engine?: MatchEngine;
};

/**
 * Compiles an ordered marker list into one case-insensitive alternation.
 *
 * @throws ConfigurationError when the list is empty or a marker cannot be compiled
 *
 * @example
 * const matcher = compileMarkers(['HISTORY', 'INDICATION'], { wordBoundary: true });
 * matcher.search('Clinical history: fever'); // { start: 9, end: 16 }
 * matcher.search('clinicalhistory: fever');  // null
 */
export const compileMarkers = (markers: readonly string[], options: CompileMarkersOptions = {}): CompiledMatcher => {
    const { wordBoundary = false, caseSensitive = false, dotAll = false, engine = regexEngine } = options;

    if (!markers.length) {
        throw new ConfigurationError('Marker list must contain at least one marker');
    }

    try {
        return engine.compile(markers, { caseSensitive, dotAll, wordBoundary });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot compile markers [${markers.join(', ')}] with the ${engine.name} engine`, [
            message,
        ]);
    }
};
