import { InvalidPatternError } from '../errors';

export type SearchPattern = string | RegExp;

/**
 * Compile a catalog search expression. Matching is a case-insensitive
 * search anywhere in the field; a missing pattern matches everything.
 * Stateful flags (g, y) are dropped so test() gives the same answer for
 * every record.
 */
export function compilePattern(pattern?: SearchPattern): RegExp | undefined {
    if (pattern === undefined) return undefined;
    if (pattern instanceof RegExp) {
        const flags = new Set(pattern.flags.replace(/[gy]/g, ''));
        flags.add('i');
        return new RegExp(pattern.source, [...flags].join(''));
    }
    try {
        return new RegExp(pattern, 'i');
    } catch (error) {
        throw new InvalidPatternError(`Invalid search pattern "${pattern}"`, { cause: error });
    }
}

/**
 * True when any of the given fields matches.
 */
export function matchesAny(regex: RegExp | undefined, fields: readonly (string | undefined)[]): boolean {
    if (!regex) return true;
    return fields.some((field) => field !== undefined && regex.test(field));
}
