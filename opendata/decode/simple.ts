/**
 * FMI Open Data — Simple Feature Decoder
 *
 * `::simple` stored queries return one `BsWfs:BsWfsElement` per
 * (time, parameter) pair. Document order is kept.
 */

import { MalformedResponseError } from '../errors';
import type { GeoPoint, LocatedObservation } from '../types';
import { parseTimestamp, parseValue } from './tuples';
import { attr, find, findAll, parseRoot, requireText, text, type XmlNode } from './xml';

function readLocation(element: XmlNode): GeoPoint | undefined {
    const point = find(element, 'Location/Point');
    if (!point) return undefined;
    const pos = (text(find(point, 'pos')) ?? '').split(/\s+/).filter(Boolean);
    if (pos.length < 2) return undefined;

    const lat = Number(pos[0]);
    const lon = Number(pos[1]);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
        throw new MalformedResponseError(`Unparseable location "${pos.join(' ')}"`);
    }
    return { lat, lon, srsName: attr(point, 'srsName') };
}

function decodeElement(element: XmlNode): LocatedObservation {
    const observation: LocatedObservation = {
        time: parseTimestamp(requireText(element, 'Time', 'BsWfsElement')),
        parameter: requireText(element, 'ParameterName', 'BsWfsElement'),
        value: parseValue(requireText(element, 'ParameterValue', 'BsWfsElement'))
    };
    const point = readLocation(element);
    if (point) observation.point = point;
    return observation;
}

export function decodeSimpleFeatures(xml: string): LocatedObservation[] {
    const collection = parseRoot(xml, 'FeatureCollection');
    return findAll(collection, 'member/BsWfsElement').map(decodeElement);
}
