/**
 * Escapes a string for safe inclusion in a regular expression.
 *
 * Escapes all regex metacharacters: `.*+?^${}()|[\]\\`
 *
 * @param s - Any string to escape
 * @returns String with regex metacharacters escaped
 *
 * @example
 * escapeRegex('hello.world')   // → 'hello\\.world'
 * escapeRegex('[test]')        // → '\\[test\\]'
 * escapeRegex('a+b*c?')        // → 'a\\+b\\*c\\?'
 */
export const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Same class as the `\w` escape without the `u` flag
const isWordCode = (code: number) =>
    (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a) || code === 0x5f;

/**
 * Whether the character at `index` is a word character (`[A-Za-z0-9_]`).
 * Out-of-range indices are not word characters.
 */
export const isWordCharAt = (text: string, index: number) =>
    index >= 0 && index < text.length && isWordCode(text.charCodeAt(index));

/**
 * Whether `index` sits on a word boundary, with the same semantics as `\b`:
 * exactly one of the characters on either side is a word character.
 *
 * @example
 * isWordBoundaryAt('clinicalhistory', 8) // → false
 * isWordBoundaryAt('clinical history', 9) // → true
 */
export const isWordBoundaryAt = (text: string, index: number) =>
    isWordCharAt(text, index - 1) !== isWordCharAt(text, index);

/**
 * Wraps a pattern fragment so it also absorbs the non-word, non-newline
 * characters around it (`**`, `:`, spaces, dashes).
 *
 * This is the shape of every default report heading marker, so
 * `**FINDINGS:**` and `Findings -` both resolve to the whole heading.
 *
 * @example
 * headingMarker('Finding(?:s)?') // → '[^\\w\\n]*Finding(?:s)?[^\\w\\n]*'
 */
export const headingMarker = (pattern: string) => `[^\\w\\n]*${pattern}[^\\w\\n]*`;

/**
 * Builds a heading marker from a plain label: metacharacters are escaped and
 * runs of whitespace match any whitespace.
 *
 * @example
 * labelMarker('Clinical  Notes') // → '[^\\w\\n]*Clinical\\s+Notes[^\\w\\n]*'
 */
export const labelMarker = (label: string) => headingMarker(escapeRegex(label.trim()).replace(/\s+/g, '\\s+'));

/**
 * Short single-line preview of a text for log messages.
 */
export const buildPreview = (text: string, limit = 40) => {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (normalized.length <= limit) {
        return normalized;
    }
    return `${normalized.slice(0, limit)}...`;
};
