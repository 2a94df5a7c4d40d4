/**
 * FMI Open Data — Stored Query Catalog
 *
 * Every stored query the download service offers, read from a single
 * describeStoredQueries request.
 */

import { getWfsUrl } from '../config';
import { attr, children, find, findAll, parseRoot, requireAttr, text, type XmlNode } from '../decode/xml';
import { wfsOperation } from '../query/dispatch';
import { defaultTransport, type Transport } from '../transport';
import type { Mode, OutputFormat } from '../types';
import { compilePattern, matchesAny, type SearchPattern } from './pattern';
import type { CatalogOptions } from './stations';

export interface StoredQueryParameter {
    name: string;
    type: string;
    title: string;
    abstract: string;
}

export interface StoredQueryDescriptor {
    id: string;
    title: string;
    abstract: string;
    parameters: readonly StoredQueryParameter[];
    returnFeatureTypes: readonly string[];
    /** Response encoding, from the id suffix */
    format: OutputFormat;
    mode?: Mode;
    /** Forecast model, e.g. `meps` or `silam` */
    model?: string;
}

export interface StoredQueryFilters {
    mode?: Mode;
    format?: OutputFormat;
}

const KNOWN_FORMATS: readonly OutputFormat[] = ['simple', 'multipointcoverage', 'timevaluepair', 'grid'];

function isKnownFormat(value: string): value is OutputFormat {
    const known: readonly string[] = KNOWN_FORMATS;
    return known.includes(value);
}

/**
 * Derive format, mode and model from an id such as
 * `fmi::forecast::meps::surface::point::simple`.
 */
export function classifyStoredQuery(id: string): Pick<StoredQueryDescriptor, 'format' | 'mode' | 'model'> {
    const segments = id.split('::');
    const suffix = segments[segments.length - 1] ?? '';
    const format = isKnownFormat(suffix) ? suffix : 'other';

    const forecastAt = segments.indexOf('forecast');
    if (forecastAt >= 0) {
        const model = segments[forecastAt + 1];
        return { format, mode: 'forecast', model: model && model !== suffix ? model : undefined };
    }
    if (segments.includes('observations')) {
        return { format, mode: 'observation' };
    }
    return { format };
}

function decodeParameter(node: XmlNode, queryId: string): StoredQueryParameter {
    const label = `parameter of ${queryId}`;
    return {
        name: requireAttr(node, 'name', label),
        type: attr(node, 'type') ?? '',
        title: text(find(node, 'Title')) ?? '',
        abstract: text(find(node, 'Abstract')) ?? ''
    };
}

export function decodeStoredQuery(description: XmlNode): StoredQueryDescriptor {
    const id = requireAttr(description, 'id', 'stored query description');
    const returnFeatureTypes = children(description, 'QueryExpressionText')
        .flatMap((node) => (attr(node, 'returnFeatureTypes') ?? '').split(/\s+/))
        .filter(Boolean);

    return Object.freeze({
        id,
        title: text(find(description, 'Title')) ?? '',
        abstract: text(find(description, 'Abstract')) ?? '',
        parameters: Object.freeze(children(description, 'Parameter').map((p) => decodeParameter(p, id))),
        returnFeatureTypes: Object.freeze(returnFeatureTypes),
        ...classifyStoredQuery(id)
    });
}

export function decodeStoredQueries(xml: string): StoredQueryDescriptor[] {
    const response = parseRoot(xml, 'DescribeStoredQueriesResponse');
    return findAll(response, 'StoredQueryDescription').map(decodeStoredQuery);
}

export class StoredQueries {
    private readonly queries: readonly StoredQueryDescriptor[];

    constructor(queries: readonly StoredQueryDescriptor[]) {
        this.queries = Object.freeze([...queries]);
    }

    static async get(options: CatalogOptions = {}): Promise<StoredQueries> {
        const transport: Transport = options.transport ?? defaultTransport();
        const xml = await transport.fetch(getWfsUrl(), wfsOperation('describeStoredQueries'));
        return new StoredQueries(decodeStoredQueries(xml));
    }

    all(): readonly StoredQueryDescriptor[] {
        return this.queries;
    }

    /**
     * Queries whose id, title or abstract matches `pattern`.
     */
    findMatches(pattern?: SearchPattern, filters: StoredQueryFilters = {}): StoredQueryDescriptor[] {
        const regex = compilePattern(pattern);
        return this.queries.filter(
            (query) =>
                (filters.mode === undefined || query.mode === filters.mode) &&
                (filters.format === undefined || query.format === filters.format) &&
                matchesAny(regex, [query.id, query.title, query.abstract])
        );
    }

    findById(id: string): StoredQueryDescriptor | undefined {
        return this.queries.find((query) => query.id === id);
    }
}
