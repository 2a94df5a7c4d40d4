/**
 * FMI Open Data — Observable Property Catalog
 *
 * Descriptions of the quantities that observations and forecasts report,
 * from the metadata service. Observations and forecasts are listed
 * separately, so building a snapshot takes one request for each.
 */

import { getMetaUrl } from '../config';
import { attr, find, findAll, parseDocument, requireAttr, requireText, type XmlNode } from '../decode/xml';
import { defaultTransport, type Transport } from '../transport';
import type { Mode } from '../types';
import { compilePattern, matchesAny, type SearchPattern } from './pattern';
import type { CatalogOptions } from './stations';

export interface ObservableProperty {
    /** Parameter name used in queries, e.g. `TA_PT1H_AVG` */
    id: string;
    label: string;
    basePhenomenon: string;
    unit?: string;
    applicability: Mode;
}

export interface PropertyFilters {
    observations?: boolean;
    forecasts?: boolean;
}

export function decodeProperty(node: XmlNode, applicability: Mode): ObservableProperty {
    const id = requireAttr(node, 'id', 'observable property');
    return Object.freeze({
        id,
        label: requireText(node, 'label', `property ${id}`),
        basePhenomenon: requireText(node, 'basePhenomenon', `property ${id}`),
        unit: attr(find(node, 'uom'), 'uom'),
        applicability
    });
}

export function decodeProperties(xml: string, applicability: Mode): ObservableProperty[] {
    // Root is CompositeObservableProperty; the components are what matter.
    const { root } = parseDocument(xml);
    return findAll(root, 'component/ObservableProperty').map((node) => decodeProperty(node, applicability));
}

async function fetchProperties(transport: Transport, applicability: Mode): Promise<ObservableProperty[]> {
    const xml = await transport.fetch(getMetaUrl(), { observableProperty: applicability });
    return decodeProperties(xml, applicability);
}

export class ObservableProperties {
    private readonly properties: readonly ObservableProperty[];

    constructor(properties: readonly ObservableProperty[]) {
        this.properties = Object.freeze([...properties]);
    }

    static async get(options: CatalogOptions = {}): Promise<ObservableProperties> {
        const transport = options.transport ?? defaultTransport();
        const observations = await fetchProperties(transport, 'observation');
        const forecasts = await fetchProperties(transport, 'forecast');
        return new ObservableProperties([...observations, ...forecasts]);
    }

    all(): readonly ObservableProperty[] {
        return this.properties;
    }

    /**
     * Properties whose id, label, base phenomenon or unit matches `pattern`.
     * Observation properties come first.
     */
    findMatches(pattern?: SearchPattern, filters: PropertyFilters = {}): ObservableProperty[] {
        const { observations = true, forecasts = true } = filters;
        const regex = compilePattern(pattern);
        return this.properties.filter(
            (property) =>
                (property.applicability === 'observation' ? observations : forecasts) &&
                matchesAny(regex, [property.id, property.label, property.basePhenomenon, property.unit])
        );
    }

    /** Observation entries win over forecast entries with the same id. */
    findById(id: string): ObservableProperty | undefined {
        return (
            this.properties.find((p) => p.id === id && p.applicability === 'observation') ??
            this.properties.find((p) => p.id === id)
        );
    }
}
