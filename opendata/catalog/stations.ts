/**
 * FMI Open Data — Station Catalog
 *
 * Monitoring facilities from the `fmi::ef::stations` stored query. A station
 * belongs to one or more networks; the network titles decide which kinds of
 * data it serves.
 */

import { MalformedResponseError } from '../errors';
import { dispatch, featureRequest } from '../query/dispatch';
import { defaultTransport, type Transport } from '../transport';
import type { Domain, GeoPoint } from '../types';
import { attr, find, findAll, parseRoot, requireAttr, requireNode, requireText, text, type XmlNode } from '../decode/xml';
import { compilePattern, matchesAny, type SearchPattern } from './pattern';

export const STATIONS_QUERY = 'fmi::ef::stations';

export type StationKind = Domain;

const NETWORK_KINDS: Readonly<Record<string, StationKind>> = {
    'Automaattinen sääasema': 'weather',
    'Auringonsäteilyasema': 'radiation',
    'Ilmanlaadun tausta-asema': 'airquality',
    'Kolmannen osapuolen ilmanlaadun havaintoasema': 'airquality'
};

export interface Station {
    fmisid: number;
    name: string;
    geoid?: string;
    region?: string;
    point: GeoPoint;
    /** Start of operation */
    begin: Date;
    /** End of operation; absent while the station is active */
    end?: Date;
    /** Network titles as published (Finnish) */
    networks: readonly string[];
    kinds: readonly StationKind[];
}

export interface StationFilters {
    kind?: StationKind;
}

export interface CatalogOptions {
    transport?: Transport;
}

// =============================================================================
// Decoding
// =============================================================================

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Date-times without a zone are UTC, never host-local time. */
function parseDate(value: string, label: string): Date {
    const utc = value.includes('T') && !ZONE_SUFFIX.test(value) ? `${value}Z` : value;
    const date = new Date(utc);
    if (Number.isNaN(date.getTime())) {
        throw new MalformedResponseError(`Unparseable ${label}: "${value}"`);
    }
    return date;
}

function readNames(facility: XmlNode): Map<string, string> {
    const names = new Map<string, string>();
    for (const node of findAll(facility, 'name')) {
        const codeSpace = attr(node, 'codeSpace');
        const value = text(node);
        if (codeSpace && value) {
            names.set(codeSpace.split('/').pop() ?? codeSpace, value);
        }
    }
    return names;
}

function readPoint(facility: XmlNode, label: string): GeoPoint {
    const point = requireNode(facility, 'representativePoint/Point', label);
    const [lat, lon] = requireText(point, 'pos', label).split(/\s+/).map(Number);
    if (lat === undefined || lon === undefined || !Number.isFinite(lat) || !Number.isFinite(lon)) {
        throw new MalformedResponseError(`${label}: unparseable position`);
    }
    return { lat, lon, srsName: attr(point, 'srsName') };
}

export function decodeStation(facility: XmlNode): Station {
    const identifier = requireText(facility, 'identifier', 'station identifier');
    const fmisid = Number(identifier);
    if (!Number.isSafeInteger(fmisid)) {
        throw new MalformedResponseError(`Invalid station identifier: "${identifier}"`);
    }
    const label = `station ${fmisid}`;

    const names = readNames(facility);
    const name = names.get('name');
    if (!name) {
        throw new MalformedResponseError(`${label} has no name`);
    }

    const period = requireNode(
        facility,
        'operationalActivityPeriod/OperationalActivityPeriod/activityTime/TimePeriod',
        label
    );
    const endText = text(find(period, 'endPosition'));

    const networks = findAll(facility, 'belongsTo').map((node) => requireAttr(node, 'title', label));
    const kinds = [...new Set(networks.map((n) => NETWORK_KINDS[n]).filter((k): k is StationKind => !!k))];

    return {
        fmisid,
        name,
        geoid: names.get('geoid'),
        region: names.get('region'),
        point: readPoint(facility, label),
        begin: parseDate(requireText(period, 'beginPosition', label), `${label} begin time`),
        end: endText ? parseDate(endText, `${label} end time`) : undefined,
        networks: Object.freeze(networks),
        kinds: Object.freeze(kinds)
    };
}

export function decodeStations(xml: string): Station[] {
    const collection = parseRoot(xml, 'FeatureCollection');
    const seen = new Set<number>();
    return findAll(collection, 'member/EnvironmentalMonitoringFacility').map((facility) => {
        const station = decodeStation(facility);
        if (seen.has(station.fmisid)) {
            throw new MalformedResponseError(`Duplicate station ${station.fmisid} in catalog`);
        }
        seen.add(station.fmisid);
        return Object.freeze(station);
    });
}

// =============================================================================
// Catalog
// =============================================================================

/**
 * Immutable snapshot of the station catalog. Call Stations.get() again for
 * fresh data.
 */
export class Stations {
    private readonly stations: readonly Station[];

    constructor(stations: readonly Station[]) {
        this.stations = Object.freeze([...stations]);
    }

    static async get(options: CatalogOptions = {}): Promise<Stations> {
        const transport = options.transport ?? defaultTransport();
        const xml = await dispatch(featureRequest(STATIONS_QUERY), transport);
        return new Stations(decodeStations(xml));
    }

    all(): readonly Station[] {
        return this.stations;
    }

    /**
     * Stations whose name matches `pattern`, in catalog order.
     */
    findMatches(pattern?: SearchPattern, filters: StationFilters = {}): Station[] {
        const regex = compilePattern(pattern);
        const { kind } = filters;
        return this.stations.filter(
            (station) => (kind === undefined || station.kinds.includes(kind)) && matchesAny(regex, [station.name])
        );
    }

    findById(fmisid: number): Station | undefined {
        return this.stations.find((station) => station.fmisid === fmisid);
    }

    weather(pattern?: SearchPattern): Station[] {
        return this.findMatches(pattern, { kind: 'weather' });
    }

    radiation(pattern?: SearchPattern): Station[] {
        return this.findMatches(pattern, { kind: 'radiation' });
    }

    airquality(pattern?: SearchPattern): Station[] {
        return this.findMatches(pattern, { kind: 'airquality' });
    }
}
