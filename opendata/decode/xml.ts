/**
 * FMI Open Data — XML Helpers
 *
 * Thin navigation layer over fast-xml-parser output. Namespace prefixes are
 * dropped (`gml:pos` → `pos`, `gml:id` → `@_id`); element text lives under
 * `#text`. Required elements go through the require* helpers, which raise
 * MalformedResponseError naming what was missing.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedResponseError, TransportError } from '../errors';

export type XmlNode = Record<string, unknown>;

export interface XmlDocument {
    /** Local name of the root element */
    rootName: string;
    root: XmlNode;
}

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    // Whitespace is significant in declared separators (ts=" "); text() trims element text.
    trimValues: false,
    // Character references such as ts="&#10;"
    htmlEntities: true,
    ignoreDeclaration: true,
    ignorePiTags: true
});

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNode(value: unknown): XmlNode | undefined {
    if (isNode(value)) return value;
    // Elements without attributes or children collapse to their text.
    if (typeof value === 'string') return { '#text': value };
    return undefined;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a service response. An OWS exception report is the service saying
 * no, so it surfaces as a TransportError rather than a decode failure.
 */
export function parseDocument(xml: string): XmlDocument {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new MalformedResponseError(
            `Response is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`
        );
    }

    const parsed: unknown = parser.parse(xml);
    const rootName = isNode(parsed) ? Object.keys(parsed).find((key) => !key.startsWith('#')) : undefined;
    const root = rootName !== undefined && isNode(parsed) ? asNode(parsed[rootName]) : undefined;
    if (rootName === undefined || !root) {
        throw new MalformedResponseError('Response has no root element');
    }

    if (rootName === 'ExceptionReport') {
        const messages = findAll(root, 'Exception/ExceptionText')
            .map((node) => text(node))
            .filter((message): message is string => Boolean(message));
        throw new TransportError(`Service exception: ${messages.join('; ') || 'unknown error'}`, { body: xml });
    }

    return { rootName, root };
}

/**
 * Parse and require a specific root element.
 */
export function parseRoot(xml: string, expectedRoot: string): XmlNode {
    const { rootName, root } = parseDocument(xml);
    if (rootName !== expectedRoot) {
        throw new MalformedResponseError(`Expected ${expectedRoot} but response root is ${rootName}`);
    }
    return root;
}

// =============================================================================
// Navigation
// =============================================================================

export function children(node: XmlNode, name: string): XmlNode[] {
    const value = node[name];
    if (value === undefined) return [];
    const list = Array.isArray(value) ? value : [value];
    return list.map(asNode).filter((n): n is XmlNode => n !== undefined);
}

export function child(node: XmlNode, name: string): XmlNode | undefined {
    return children(node, name)[0];
}

/** First element along a slash-separated path of local names. */
export function find(node: XmlNode, path: string): XmlNode | undefined {
    return findAll(node, path)[0];
}

/** All elements along a slash-separated path of local names. */
export function findAll(node: XmlNode, path: string): XmlNode[] {
    let current: XmlNode[] = [node];
    for (const segment of path.split('/')) {
        current = current.flatMap((n) => children(n, segment));
    }
    return current;
}

export function text(node: XmlNode | undefined): string | undefined {
    const value = node?.['#text'];
    return typeof value === 'string' ? value.trim() : undefined;
}

export function attr(node: XmlNode | undefined, name: string): string | undefined {
    const value = node?.[`@_${name}`];
    return typeof value === 'string' ? value : undefined;
}

// =============================================================================
// Required Lookups
// =============================================================================

export function requireNode(node: XmlNode, path: string, label: string): XmlNode {
    const found = find(node, path);
    if (!found) {
        throw new MalformedResponseError(`${label} (${path}) missing`);
    }
    return found;
}

export function requireText(node: XmlNode, path: string, label: string): string {
    const value = text(requireNode(node, path, label));
    if (value === undefined || value === '') {
        throw new MalformedResponseError(`${label} (${path}) text missing`);
    }
    return value;
}

export function requireAttr(node: XmlNode, name: string, label: string): string {
    const value = attr(node, name);
    if (value === undefined) {
        throw new MalformedResponseError(`${label}: attribute ${name} missing`);
    }
    return value;
}
