import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { DecodeError } from './ExporterError';
import { parseDecimal } from '../utils/Helpers';

/**
 * XmlEnvelope.ts
 * Turns raw `| display xml` replies into typed envelope trees in two stages:
 * 1. Syntax: well-formedness check and XML → plain object tree.
 * 2. Schema: the tree is validated against the domain's zod schema.
 * Nothing is returned unless both stages succeed.
 */

export interface EnvelopeSchema<T> {
    /** Element names that may repeat and must always decode as arrays. */
    readonly repeated: ReadonlySet<string>;
    /** Schema of the whole document, rooted at `rpc-reply`. */
    readonly shape: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const ATTRIBUTE_PREFIX = '@_';

/**
 * Decodes a reply against an envelope schema.
 * @param raw Bytes returned by the command channel.
 * @param schema The domain's envelope description.
 * @param command The command the bytes answer, for error context.
 */
export function decodeEnvelope<T>(raw: Buffer | string, schema: EnvelopeSchema<T>, command: string): T {
    const text = typeof raw === 'string' ? raw : raw.toString('utf8');

    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        const { msg, line, col } = validation.err;
        throw new DecodeError(command, [`malformed XML at ${line}:${col}: ${msg}`]);
    }

    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: ATTRIBUTE_PREFIX,
        removeNSPrefix: true,
        parseTagValue: false,
        parseAttributeValue: false,
        trimValues: true,
        isArray: (name: string, jpath: string, isLeafNode: boolean, isAttribute: boolean) =>
            !isAttribute && schema.repeated.has(name)
    });

    const tree: unknown = parser.parse(text);
    const result = schema.shape.safeParse(tree);

    if (!result.success) {
        throw new DecodeError(command, formatIssues(result.error));
    }

    return result.data;
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('/') : '<root>';
        return `${path}: ${issue.message}`;
    });
}

// ===============================================
// FIELD BUILDERS
// ===============================================

/**
 * Text content of a leaf element. Elements carrying attributes decode as
 * objects with a `#text` key; empty elements decode as ''.
 */
function leafText(value: unknown): unknown {
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        const text: unknown = Reflect.get(value, '#text');
        return text === undefined ? '' : text;
    }
    return value;
}

/** Optional text element, absent → ''. */
export const text = () =>
    z.preprocess(leafText, z.string().optional()).transform(value => value ?? '');

/** Required text element. */
export const requiredText = () => z.preprocess(leafText, z.string());

/**
 * Optional numeric element, absent or empty → 0. Present text that is not a
 * plain decimal number fails validation.
 */
export const num = () =>
    z.preprocess(value => {
        const raw = leafText(value);
        if (raw === undefined || raw === '') return 0;
        if (typeof raw !== 'string') return raw;
        return parseDecimal(raw) ?? raw;
    }, z.number({ invalid_type_error: 'expected a number' }));

/**
 * Element whose value is carried in a numeric attribute, e.g.
 * `<temperature junos:celsius="43">43 degrees C / 109 degrees F</temperature>`.
 */
export const attributeNum = (attribute: string) =>
    z.preprocess(
        value => (value !== null && typeof value === 'object' ? Reflect.get(value, ATTRIBUTE_PREFIX + attribute) : undefined),
        num()
    );

/** Repeated element, absent → []. */
export const list = <S extends z.ZodTypeAny>(item: S) => z.array(item).optional().transform(items => items ?? []);

/**
 * Mandatory container element (the document root and the domain's information
 * element). A present-but-empty element reads as an empty container.
 */
export const section = <S extends z.ZodRawShape>(shape: S, name: string) =>
    z.preprocess(
        value => (value === '' ? {} : value),
        z.object(shape, { required_error: `missing <${name}> element` })
    );

/**
 * Container element whose absence is not an error; nested fields take their
 * defaults, as the vendor leaves out blocks it has nothing to report in.
 */
export const group = <S extends z.ZodRawShape>(shape: S) =>
    z.preprocess(value => (value === '' || value === undefined ? {} : value), z.object(shape));

/** Container that may be missing, absent → undefined. */
export const optionalGroup = <S extends z.ZodRawShape>(shape: S) =>
    z.preprocess(value => (value === '' ? {} : value), z.object(shape).optional());
