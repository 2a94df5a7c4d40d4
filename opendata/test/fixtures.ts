/**
 * Canned service documents shaped like the download and metadata
 * service responses, trimmed to what the decoders read.
 */

const WFS_NAMESPACES = [
    'xmlns:wfs="http://www.opengis.net/wfs/2.0"',
    'xmlns:gml="http://www.opengis.net/gml/3.2"',
    'xmlns:om="http://www.opengis.net/om/2.0"',
    'xmlns:omso="http://inspire.ec.europa.eu/schemas/omso/3.0"',
    'xmlns:gmlcov="http://www.opengis.net/gmlcov/1.0"',
    'xmlns:swe="http://www.opengis.net/swe/2.0"',
    'xmlns:sams="http://www.opengis.net/samplingSpatial/2.0"',
    'xmlns:xlink="http://www.w3.org/1999/xlink"',
    'xmlns:BsWfs="http://xml.fmi.fi/schema/wfs/2.0"',
    'xmlns:ef="http://inspire.ec.europa.eu/schemas/ef/4.0"'
].join(' ');

export const EPSG_4258 = 'http://www.opengis.net/def/crs/EPSG/0/4258';

export function featureCollection(members: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<wfs:FeatureCollection timeStamp="2025-01-02T03:00:00Z" numberMatched="1" numberReturned="1" ${WFS_NAMESPACES}>
${members}
</wfs:FeatureCollection>`;
}

export const EMPTY_COLLECTION = `<?xml version="1.0" encoding="UTF-8"?>
<wfs:FeatureCollection timeStamp="2025-01-02T03:00:00Z" numberMatched="0" numberReturned="0" ${WFS_NAMESPACES}>
</wfs:FeatureCollection>`;

// =============================================================================
// Multipoint coverage
// =============================================================================

export interface CoverageMember {
    /** `pointMember` for stations, `pointMembers` for forecast points */
    pointElement?: 'pointMember' | 'pointMembers';
    pointId: string;
    lat: number;
    lon: number;
    /** Omit to leave out the domain set (tuples carry their own time) */
    times?: number[];
    fields: string[];
    /** Element name and attributes of the tuple list */
    tupleList?: string;
    payload: string;
}

export function coverageMember(member: CoverageMember): string {
    const pointElement = member.pointElement ?? 'pointMember';
    const tupleList = member.tupleList ?? 'gml:doubleOrNilReasonTupleList';
    const tupleListName = tupleList.split(' ')[0];
    const domainSet = member.times
        ? `<gml:domainSet>
          <gmlcov:SimpleMultiPoint gml:id="mp-1-1-fmisid" srsName="http://xml.fmi.fi/gml/crs/compoundCRS.php?crs=4258&amp;time=unixtime" srsDimension="3">
            <gmlcov:positions>
${member.times.map((t) => `              ${member.lat} ${member.lon}  ${t}`).join('\n')}
            </gmlcov:positions>
          </gmlcov:SimpleMultiPoint>
        </gml:domainSet>`
        : '';
    const fields = member.fields
        .map((name) => `<swe:field name="${name}" xlink:href="https://opendata.fmi.fi/meta?observableProperty=observation&amp;param=${name}"/>`)
        .join('\n            ');

    return `  <wfs:member>
    <omso:GridSeriesObservation gml:id="obs-obs-1-1">
      <om:featureOfInterest>
        <sams:SF_SpatialSamplingFeature gml:id="sampling-feature-1-1-fmisid">
          <sams:shape>
            <gml:MultiPoint gml:id="mp-1-1-fmisid">
              <gml:${pointElement}>
                <gml:Point gml:id="${member.pointId}" srsName="${EPSG_4258}" srsDimension="2">
                  <gml:name>Helsinki Kaisaniemi</gml:name>
                  <gml:pos>${member.lat} ${member.lon} </gml:pos>
                </gml:Point>
              </gml:${pointElement}>
            </gml:MultiPoint>
          </sams:shape>
        </sams:SF_SpatialSamplingFeature>
      </om:featureOfInterest>
      <om:result>
        <gmlcov:MultiPointCoverage gml:id="mpcv-1-1-fmisid">
        ${domainSet}
          <gml:rangeSet>
            <gml:DataBlock>
              <gml:rangeParameters/>
              <${tupleList}>${member.payload}</${tupleListName}>
            </gml:DataBlock>
          </gml:rangeSet>
          <gmlcov:rangeType>
            <swe:DataRecord gml:id="dr-1">
            ${fields}
            </swe:DataRecord>
          </gmlcov:rangeType>
        </gmlcov:MultiPointCoverage>
      </om:result>
    </omso:GridSeriesObservation>
  </wfs:member>`;
}

/** 2025-01-02T01:00:00Z and 02:00:00Z as unix seconds */
export const T1 = 1735779600;
export const T2 = 1735783200;

/** Kaisaniemi, t2m and rh at 01:00 and 02:00, rh missing at 02:00 */
export const WEATHER_COVERAGE = featureCollection(
    coverageMember({
        pointId: 'point-100971',
        lat: 60.17523,
        lon: 24.94459,
        times: [T1, T2],
        fields: ['t2m', 'rh'],
        payload: `
              1.5 80.0 
              2.0 NaN 
              `
    })
);

export const FORECAST_COVERAGE = featureCollection(
    coverageMember({
        pointElement: 'pointMembers',
        pointId: 'point-1',
        lat: 60.17523,
        lon: 24.94459,
        times: [T1, T2],
        fields: ['Temperature', 'RadiationGlobal'],
        payload: `
              -3.2 0.0 
              -3.6 12.5 
              `
    })
);

// =============================================================================
// Simple features
// =============================================================================

export interface SimpleElement {
    time: string;
    parameter: string;
    value: string;
}

export function simpleCollection(elements: SimpleElement[]): string {
    const members = elements
        .map(
            (e, i) => `  <wfs:member>
    <BsWfs:BsWfsElement gml:id="BsWfsElement.1.${i + 1}.1">
      <BsWfs:Location>
        <gml:Point gml:id="BsWfsElementP.1.${i + 1}.1" srsDimension="2" srsName="${EPSG_4258}">
          <gml:pos>60.20375 24.96168 </gml:pos>
        </gml:Point>
      </BsWfs:Location>
      <BsWfs:Time>${e.time}</BsWfs:Time>
      <BsWfs:ParameterName>${e.parameter}</BsWfs:ParameterName>
      <BsWfs:ParameterValue>${e.value}</BsWfs:ParameterValue>
    </BsWfs:BsWfsElement>
  </wfs:member>`
        )
        .join('\n');
    return featureCollection(members);
}

export const RADIATION_SIMPLE = simpleCollection([
    { time: '2025-01-02T01:00:00Z', parameter: 'GLOB_1MIN', value: '12.3' },
    { time: '2025-01-02T01:00:00Z', parameter: 'DIFF_1MIN', value: 'NaN' },
    { time: '2025-01-02T02:00:00Z', parameter: 'GLOB_1MIN', value: '15.0' },
    { time: '2025-01-02T02:00:00Z', parameter: 'DIFF_1MIN', value: '4.5' }
]);

// =============================================================================
// Stations
// =============================================================================

export interface StationEntry {
    fmisid: number;
    name: string;
    region: string;
    lat: number;
    lon: number;
    begin: string;
    end?: string;
    networks: string[];
}

export function stationMember(s: StationEntry): string {
    const end = s.end
        ? `<gml:endPosition>${s.end}</gml:endPosition>`
        : '<gml:endPosition indeterminatePosition="now"/>';
    return `  <wfs:member>
    <ef:EnvironmentalMonitoringFacility gml:id="wfs-obsstation.1.${s.fmisid}">
      <gml:identifier codeSpace="http://xml.fmi.fi/namespace/stationcode/fmisid">${s.fmisid}</gml:identifier>
      <gml:name codeSpace="http://xml.fmi.fi/namespace/locationcode/name">${s.name}</gml:name>
      <gml:name codeSpace="http://xml.fmi.fi/namespace/locationcode/geoid">-${s.fmisid}</gml:name>
      <gml:name codeSpace="http://xml.fmi.fi/namespace/location/region">${s.region}</gml:name>
      <ef:representativePoint>
        <gml:Point gml:id="point-${s.fmisid}" srsName="${EPSG_4258}" srsDimension="2">
          <gml:pos>${s.lat} ${s.lon}</gml:pos>
        </gml:Point>
      </ef:representativePoint>
      <ef:operationalActivityPeriod>
        <ef:OperationalActivityPeriod gml:id="oap-1-${s.fmisid}">
          <ef:activityTime>
            <gml:TimePeriod gml:id="oap-tp-1-${s.fmisid}">
              <gml:beginPosition>${s.begin}</gml:beginPosition>
              ${end}
            </gml:TimePeriod>
          </ef:activityTime>
        </ef:OperationalActivityPeriod>
      </ef:operationalActivityPeriod>
${s.networks.map((n) => `      <ef:belongsTo xlink:title="${n}" xlink:href="https://opendata.fmi.fi/network"/>`).join('\n')}
    </ef:EnvironmentalMonitoringFacility>
  </wfs:member>`;
}

export const STATION_ENTRIES: StationEntry[] = [
    {
        fmisid: 100971,
        name: 'Helsinki Kaisaniemi',
        region: 'Helsinki',
        lat: 60.17523,
        lon: 24.94459,
        begin: '1844-01-01T00:00:00Z',
        networks: ['Automaattinen sääasema', 'Sääasema']
    },
    {
        fmisid: 101004,
        name: 'Helsinki Kumpula',
        region: 'Helsinki',
        lat: 60.20307,
        lon: 24.96131,
        // No zone: read as UTC
        begin: '2005-12-08T00:00:00',
        networks: ['Automaattinen sääasema', 'Auringonsäteilyasema']
    },
    {
        fmisid: 100662,
        name: 'Helsinki Kallio 2',
        region: 'Helsinki',
        lat: 60.18739,
        lon: 24.95066,
        begin: '1998-01-01T00:00:00Z',
        networks: ['Ilmanlaadun tausta-asema']
    },
    {
        fmisid: 100723,
        name: 'Espoo Leppävaara',
        region: 'Espoo',
        lat: 60.21928,
        lon: 24.81358,
        begin: '2003-01-01T00:00:00Z',
        end: '2020-12-31T00:00:00Z',
        networks: ['Kolmannen osapuolen ilmanlaadun havaintoasema']
    }
];

export const STATIONS = featureCollection(STATION_ENTRIES.map(stationMember).join('\n'));

// =============================================================================
// Stored queries
// =============================================================================

function storedQueryDescription(id: string, title: string, abstract: string, returnType: string): string {
    return `  <StoredQueryDescription id="${id}">
    <Title>${title}</Title>
    <Abstract>${abstract}</Abstract>
    <Parameter name="starttime" type="dateTime">
      <Title>Begin of the time interval</Title>
      <Abstract>Parameter begin specifies the begin of time interval in ISO-format.</Abstract>
    </Parameter>
    <Parameter name="fmisid" type="xsi:int">
      <Title>FMI observation station identifier.</Title>
      <Abstract>Identifier of the observation station.</Abstract>
    </Parameter>
    <QueryExpressionText isPrivate="true" language="urn:ogc:def:queryLanguage:OGC-WFS::WFS_QueryExpression" returnFeatureTypes="${returnType}"/>
  </StoredQueryDescription>`;
}

export const STORED_QUERIES = `<?xml version="1.0" encoding="UTF-8"?>
<DescribeStoredQueriesResponse xmlns="http://www.opengis.net/wfs/2.0" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
${storedQueryDescription(
    'fmi::forecast::meps::surface::point::simple',
    'MEPS point weather forecast as simple features',
    'MEPS forecast for a point, one feature per value.',
    'BsWfs:BsWfsElement'
)}
${storedQueryDescription(
    'fmi::forecast::meps::surface::point::multipointcoverage',
    'MEPS point weather forecast as multipoint coverage',
    'Gridded values for a point.',
    'omso:GridSeriesObservation'
)}
${storedQueryDescription(
    'fmi::observations::weather::simple',
    'Instantaneous Weather Observations',
    'Real time weather observations from weather stations.',
    'BsWfs:BsWfsElement'
)}
${storedQueryDescription(
    'fmi::ef::stations',
    'Stations',
    'Observation stations and their networks.',
    'ef:EnvironmentalMonitoringFacility'
)}
</DescribeStoredQueriesResponse>`;

// =============================================================================
// Observable properties
// =============================================================================

interface PropertyEntry {
    id: string;
    label: string;
    basePhenomenon: string;
    uom?: string;
}

export function observableProperties(kind: string, entries: PropertyEntry[]): string {
    const components = entries
        .map(
            (p) => `  <component>
    <ObservableProperty gml:id="${p.id}">
      <label>${p.label}</label>
      <basePhenomenon>${p.basePhenomenon}</basePhenomenon>
      ${p.uom ? `<uom uom="${p.uom}"/>` : ''}
    </ObservableProperty>
  </component>`
        )
        .join('\n');
    return `<?xml version="1.0" encoding="UTF-8"?>
<CompositeObservableProperty xmlns="http://inspire.ec.europa.eu/schemas/omop/2.9" xmlns:gml="http://www.opengis.net/gml/3.2" gml:id="${kind}">
  <count>${entries.length}</count>
${components}
</CompositeObservableProperty>`;
}

export const OBSERVATION_PROPERTIES = observableProperties('observation', [
    { id: 'TA_PT1H_AVG', label: 'Air temperature', basePhenomenon: 'Temperature', uom: 'degC' },
    { id: 'GLOB_1MIN', label: 'Global radiation', basePhenomenon: 'Radiation', uom: 'W/m2' }
]);

export const FORECAST_PROPERTIES = observableProperties('forecast', [
    { id: 'Temperature', label: 'Air temperature', basePhenomenon: 'Temperature', uom: 'degC' },
    { id: 'RadiationGlobal', label: 'Global radiation', basePhenomenon: 'Radiation', uom: 'W/m2' },
    { id: 'WeatherSymbol3', label: 'Weather symbol', basePhenomenon: 'Weather' }
]);

// =============================================================================
// Service responses
// =============================================================================

export const CAPABILITIES = `<?xml version="1.0" encoding="UTF-8"?>
<wfs:WFS_Capabilities version="2.0.0" xmlns:wfs="http://www.opengis.net/wfs/2.0" xmlns:ows="http://www.opengis.net/ows/1.1">
  <ows:OperationsMetadata>
    <ows:Operation name="GetCapabilities"/>
    <ows:Operation name="DescribeFeatureType"/>
    <ows:Operation name="GetFeature"/>
    <ows:Operation name="ListStoredQueries"/>
    <ows:Operation name="DescribeStoredQueries"/>
  </ows:OperationsMetadata>
</wfs:WFS_Capabilities>`;

export const EXCEPTION_REPORT = `<?xml version="1.0" encoding="UTF-8"?>
<ExceptionReport xmlns="http://www.opengis.net/ows/1.1" version="2.0.0">
  <Exception exceptionCode="OperationParsingFailed" locator="starttime">
    <ExceptionText>Invalid time interval!</ExceptionText>
    <ExceptionText>The start time is later than the end time.</ExceptionText>
  </Exception>
</ExceptionReport>`;
