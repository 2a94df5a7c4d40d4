/**
 * FMI Open Data — Multipoint Coverage Decoder
 *
 * Decodes `omso:GridSeriesObservation` members of a feature collection:
 *
 *   result/MultiPointCoverage
 *     domainSet/SimpleMultiPoint/positions      "lat lon unixtime" per tuple
 *     rangeSet/DataBlock/doubleOrNilReasonTupleList (or tupleList)
 *     rangeType/DataRecord/field@name           value column order
 *
 * The first pass extracts this structure; the tuple list is then decoded by
 * decodeRows() with the separators the payload element declares.
 */

import { MalformedResponseError } from '../errors';
import type { GeoPoint, LocatedObservation, LocationKind } from '../types';
import {
    decodeRows,
    parseTimestamp,
    readSeparators,
    type TupleBlock,
    type TupleListElement
} from './tuples';
import { attr, children, find, findAll, parseRoot, requireNode, text, type XmlNode } from './xml';

const OBSERVATION_PATH = 'member/GridSeriesObservation';
const COVERAGE_PATH = 'result/MultiPointCoverage';
const SAMPLING_SHAPE_PATH = 'featureOfInterest/SF_SpatialSamplingFeature/shape/MultiPoint';
const TUPLE_LIST_ELEMENTS: readonly TupleListElement[] = ['doubleOrNilReasonTupleList', 'tupleList'];

interface CoveragePosition {
    lat: number;
    lon: number;
    time: Date;
}

interface SamplingPoint {
    point: GeoPoint;
    fmisid?: number;
}

function coordinateKey(lat: number, lon: number): string {
    return `${lat},${lon}`;
}

function parseCoordinate(token: string, label: string): number {
    const n = Number(token);
    if (token === '' || !Number.isFinite(n)) {
        throw new MalformedResponseError(`Unparseable ${label}: "${token}"`);
    }
    return n;
}

// =============================================================================
// Structure Extraction
// =============================================================================

/**
 * Declared value columns, in the order the tuples carry them.
 */
export function readFieldOrder(coverage: XmlNode): string[] {
    const record = requireNode(coverage, 'rangeType/DataRecord', 'field declaration');
    return children(record, 'field').map((field, i) => {
        const name = attr(field, 'name');
        if (!name) {
            throw new MalformedResponseError(`Field ${i + 1} of the data record has no name`);
        }
        return name;
    });
}

/**
 * Positions of the coverage domain. Absent when tuples carry their own time.
 */
export function readPositions(coverage: XmlNode): CoveragePosition[] | undefined {
    const multiPoint = find(coverage, 'domainSet/SimpleMultiPoint');
    const positions = multiPoint && find(multiPoint, 'positions');
    if (!multiPoint || !positions) return undefined;

    const dimension = attr(multiPoint, 'srsDimension') ?? '3';
    if (dimension !== '3') {
        throw new MalformedResponseError(`Expected lat/lon/time positions, got dimension ${dimension}`);
    }

    const tokens = (text(positions) ?? '').split(/\s+/).filter(Boolean);
    if (tokens.length % 3 !== 0) {
        throw new MalformedResponseError(`Position list has ${tokens.length} values, not a multiple of 3`);
    }

    const result: CoveragePosition[] = [];
    for (let i = 0; i < tokens.length; i += 3) {
        result.push({
            lat: parseCoordinate(tokens[i], 'latitude'),
            lon: parseCoordinate(tokens[i + 1], 'longitude'),
            time: parseTimestamp(tokens[i + 2])
        });
    }
    return result;
}

/**
 * Locate the tuple list element of the range set and read its payload
 * together with its declared separators.
 */
export function readDataBlock(coverage: XmlNode): Pick<TupleBlock, 'payload' | 'separators'> | undefined {
    const block = find(coverage, 'rangeSet/DataBlock');
    if (!block) return undefined;

    for (const name of TUPLE_LIST_ELEMENTS) {
        const element = find(block, name);
        if (element) {
            return { payload: text(element) ?? '', separators: readSeparators(element, name) };
        }
    }
    return undefined;
}

/**
 * Station points of the sampling feature. Observation queries identify
 * points as `point-<fmisid>`; forecast queries only give coordinates.
 */
export function readSamplingPoints(observation: XmlNode): SamplingPoint[] {
    const shape = find(observation, SAMPLING_SHAPE_PATH);
    if (!shape) return [];

    const points = [...findAll(shape, 'pointMember/Point'), ...findAll(shape, 'pointMembers/Point')];
    return points.map((point) => {
        const pos = (text(find(point, 'pos')) ?? '').split(/\s+/).filter(Boolean);
        if (pos.length < 2) {
            throw new MalformedResponseError('Sampling point has no coordinates');
        }
        const id = attr(point, 'id') ?? '';
        const idMatch = /^point-(\d+)$/.exec(id);
        return {
            point: {
                lat: parseCoordinate(pos[0], 'latitude'),
                lon: parseCoordinate(pos[1], 'longitude'),
                srsName: attr(point, 'srsName')
            },
            fmisid: idMatch ? Number(idMatch[1]) : undefined
        };
    });
}

function uniqueProjection(points: SamplingPoint[]): string | undefined {
    const projections = new Set(
        points.map((p) => p.point.srsName).filter((s): s is string => s !== undefined)
    );
    if (projections.size > 1) {
        throw new MalformedResponseError(`Non-unique (${projections.size}) projection for sampling points`);
    }
    return [...projections][0];
}

// =============================================================================
// Decoding
// =============================================================================

function decodeMember(observation: XmlNode, locations: LocationKind): LocatedObservation[] {
    const coverage = find(observation, COVERAGE_PATH);
    if (!coverage) return [];

    const fields = readFieldOrder(coverage);
    const positions = readPositions(coverage);
    const data = readDataBlock(coverage);
    if (!data) {
        if (positions && positions.length > 0) {
            throw new MalformedResponseError('Coverage declares positions but has no data block');
        }
        return [];
    }

    const rows = decodeRows({ ...data, fields, times: positions?.map((p) => p.time) });
    if (rows.length === 0) return [];

    const samplingPoints = readSamplingPoints(observation);
    const byCoordinate = new Map(
        samplingPoints.map((s) => [coordinateKey(s.point.lat, s.point.lon), s] as const)
    );
    const srsName = uniqueProjection(samplingPoints);
    const soleStation = samplingPoints.length === 1 ? samplingPoints[0] : undefined;

    return rows.flatMap((row, index) => {
        const position = positions?.[index];
        let point: GeoPoint | undefined;
        let fmisid: number | undefined;

        if (position) {
            point = { lat: position.lat, lon: position.lon, srsName };
            if (locations === 'fmisid') {
                const station = byCoordinate.get(coordinateKey(position.lat, position.lon));
                if (station?.fmisid === undefined) {
                    throw new MalformedResponseError(
                        `Station not found for coordinate (${position.lat}, ${position.lon})`
                    );
                }
                fmisid = station.fmisid;
            }
        } else if (soleStation) {
            point = soleStation.point;
            fmisid = locations === 'fmisid' ? soleStation.fmisid : undefined;
        }

        return row.observations.map((obs): LocatedObservation => {
            const located: LocatedObservation = { ...obs };
            if (point) located.point = point;
            if (fmisid !== undefined) located.fmisid = fmisid;
            return located;
        });
    });
}

/**
 * Decode a multipoint coverage feature collection. Members are decoded in
 * document order; within a member, tuple order then field order.
 */
export function decodeMultipointCoverage(xml: string, locations: LocationKind): LocatedObservation[] {
    const collection = parseRoot(xml, 'FeatureCollection');
    return findAll(collection, OBSERVATION_PATH).flatMap((member) => decodeMember(member, locations));
}
