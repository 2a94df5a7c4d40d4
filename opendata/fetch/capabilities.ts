import { getWfsUrl } from '../config';
import { attr, findAll, parseRoot } from '../decode/xml';
import { wfsOperation } from '../query/dispatch';
import { defaultTransport, type Transport } from '../transport';

/**
 * Names of the operations the download service supports
 * (e.g. GetFeature, ListStoredQueries, DescribeStoredQueries).
 */
export async function getCapabilities(transport: Transport = defaultTransport()): Promise<string[]> {
    const xml = await transport.fetch(getWfsUrl(), wfsOperation('getCapabilities'));
    const capabilities = parseRoot(xml, 'WFS_Capabilities');
    return findAll(capabilities, 'OperationsMetadata/Operation')
        .map((operation) => attr(operation, 'name'))
        .filter((name): name is string => name !== undefined);
}
