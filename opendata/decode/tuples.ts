/**
 * FMI Open Data — Tuple List Decoding
 *
 * A data block is delimited text: tuples separated by the tuple separator,
 * values inside a tuple by the field separator. Separators are read from the
 * payload element of each response; decoding itself is a pure function of
 * (payload, separators, field order).
 */

import { MalformedResponseError } from '../errors';
import type { Observation } from '../types';
import { attr, type XmlNode } from './xml';

// =============================================================================
// Separators
// =============================================================================

/**
 * A string separator splits on that literal. A pattern separator splits on
 * matches and makes blank tuples insignificant (line-oriented encodings).
 */
export interface Separators {
    tuple: string | RegExp;
    field: string | RegExp;
}

const LINES = /\r?\n/;
const WHITESPACE = /\s+/;

/** Encoding of gml:doubleOrNilReasonTupleList: one tuple per line. */
export const LINE_TUPLE_SEPARATORS: Separators = { tuple: LINES, field: WHITESPACE };

/** GML defaults for gml:tupleList when ts/cs are not declared. */
export const GML_TUPLE_SEPARATORS: Separators = { tuple: WHITESPACE, field: ',' };

export type TupleListElement = 'doubleOrNilReasonTupleList' | 'tupleList';

interface Declaration {
    ts: string;
    cs: string;
}

/** Undeclared ts/cs of each tuple list element type. */
const DEFAULT_DECLARATIONS: Record<TupleListElement, Declaration> = {
    tupleList: { ts: ' ', cs: ',' },
    doubleOrNilReasonTupleList: { ts: '\n', cs: ' ' }
};

const isWhitespace = (s: string) => s.trim() === '';

function escapeForClass(s: string): string {
    return s.replace(/[\\\]^-]/g, '\\$&');
}

/**
 * A whitespace separator splits on runs of its own characters, except that
 * a lone whitespace separator next to a printable one splits on any
 * whitespace. Line breaks always split on lines.
 */
function toSeparator(declared: string, other: string): string | RegExp {
    if (!isWhitespace(declared)) return declared;
    if (!isWhitespace(other)) return WHITESPACE;
    if (/^[\r\n]+$/.test(declared)) return LINES;
    return new RegExp(`[${escapeForClass([...new Set(declared)].join(''))}]+`);
}

/**
 * Read the declared separators (`ts`, `cs`) of a tuple list element,
 * falling back to the encoding of its element type for those not declared.
 */
export function readSeparators(element: XmlNode, elementName: TupleListElement): Separators {
    const ts = attr(element, 'ts');
    const cs = attr(element, 'cs');
    if (ts === undefined && cs === undefined) {
        return elementName === 'tupleList' ? GML_TUPLE_SEPARATORS : LINE_TUPLE_SEPARATORS;
    }

    const defaults = DEFAULT_DECLARATIONS[elementName];
    const declared: Declaration = { ts: ts ?? defaults.ts, cs: cs ?? defaults.cs };
    if (declared.ts === '') {
        throw new MalformedResponseError('Declared tuple separator is empty');
    }
    if (declared.cs === '') {
        throw new MalformedResponseError('Declared field separator is empty');
    }
    if (declared.ts === declared.cs) {
        throw new MalformedResponseError('Declared tuple and field separators are identical');
    }
    return {
        tuple: toSeparator(declared.ts, declared.cs),
        field: toSeparator(declared.cs, declared.ts)
    };
}

// =============================================================================
// Splitting
// =============================================================================

/**
 * Split a payload into tuples of trimmed field tokens.
 * A trailing empty tuple (terminal separator) is not a record.
 */
export function splitTuples(payload: string, separators: Separators): string[][] {
    const body = payload.trim();
    if (!body) return [];

    let tuples = body.split(separators.tuple).map((t) => t.trim());
    if (separators.tuple instanceof RegExp) {
        tuples = tuples.filter((t) => t !== '');
    } else if (tuples[tuples.length - 1] === '') {
        tuples.pop();
    }

    return tuples.map((tuple) => {
        const fields = tuple.split(separators.field).map((f) => f.trim());
        // Line encodings may carry trailing blanks before the newline.
        return separators.field instanceof RegExp ? fields.filter((f) => f !== '') : fields;
    });
}

// =============================================================================
// Values
// =============================================================================

/** Tokens the service uses for "not observed". */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
    'NaN',
    'missing',
    'inapplicable',
    'unknown',
    'withheld',
    'template'
]);

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const EPOCH_RE = /^-?\d+$/;
const ISO_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export function parseValue(token: string): number | null {
    if (MISSING_VALUE_TOKENS.has(token)) return null;
    if (!NUMBER_RE.test(token)) {
        throw new MalformedResponseError(`Unparseable value: "${token}"`);
    }
    return Number(token);
}

/**
 * Timestamps are either unix seconds or ISO-8601 with an explicit zone.
 */
export function parseTimestamp(token: string): Date {
    let ms = NaN;
    if (EPOCH_RE.test(token)) {
        ms = Number(token) * 1000;
    } else if (ISO_RE.test(token)) {
        ms = Date.parse(token);
    }
    if (!Number.isFinite(ms)) {
        throw new MalformedResponseError(`Unparseable timestamp: "${token}"`);
    }
    return new Date(ms);
}

// =============================================================================
// Decoding
// =============================================================================

export interface TupleBlock {
    /** Declared field order, one name per value column */
    fields: readonly string[];
    payload: string;
    separators: Separators;
    /**
     * Timestamps from the coverage domain, one per tuple. When absent, each
     * tuple carries its own timestamp as the first field.
     */
    times?: readonly Date[];
}

export interface DecodedRow {
    time: Date;
    observations: Observation[];
}

/**
 * Decode a tuple block into rows, one per tuple, in payload order.
 * Values follow the declared field order; missing values are kept with
 * `value: null`.
 */
export function decodeRows(block: TupleBlock): DecodedRow[] {
    const { fields, times } = block;
    const tuples = splitTuples(block.payload, block.separators);
    const leadingTime = times === undefined;
    const width = fields.length + (leadingTime ? 1 : 0);

    if (times !== undefined && times.length !== tuples.length) {
        throw new MalformedResponseError(
            `Data block has ${tuples.length} tuples but the domain declares ${times.length} positions`
        );
    }

    return tuples.map((tuple, index) => {
        if (tuple.length !== width) {
            throw new MalformedResponseError(
                `Tuple ${index + 1} has ${tuple.length} fields, expected ${width} (${fields.join(', ')})`
            );
        }
        const time = times === undefined ? parseTimestamp(tuple[0]) : times[index];
        const values = leadingTime ? tuple.slice(1) : tuple;
        return {
            time,
            observations: values.map((token, i) => ({
                time,
                parameter: fields[i],
                value: parseValue(token)
            }))
        };
    });
}

/**
 * Decode a tuple block into a flat, order-stable observation sequence.
 */
export function decodeTupleBlock(block: TupleBlock): Observation[] {
    return decodeRows(block).flatMap((row) => row.observations);
}
