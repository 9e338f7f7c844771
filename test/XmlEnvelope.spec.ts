import { z } from 'zod';
import { DecodeError, TransportError, describeError, isExporterError } from '../src/core/ExporterError';
import { EnvelopeSchema, attributeNum, decodeEnvelope, group, list, num, optionalGroup, section, text } from '../src/core/XmlEnvelope';

const reading = z.object({
    'rpc-reply': section(
        {
            'sensor': list(
                group({
                    'name': text(),
                    'value': num(),
                    'temperature': attributeNum('celsius'),
                    'extra': optionalGroup({ 'note': text() })
                })
            )
        },
        'rpc-reply'
    )
});

const schema: EnvelopeSchema<z.output<typeof reading>> = {
    repeated: new Set(['sensor']),
    shape: reading
};

describe('decodeEnvelope', () => {
    it('decodes repeated elements, attributes and defaults', () => {
        const xml =
            '<rpc-reply xmlns:junos="http://xml.juniper.net/junos/21.4R0/junos">' +
            '<sensor><name> fan </name><value>12.5</value>' +
            '<temperature junos:celsius="40">40 degrees C</temperature></sensor>' +
            '</rpc-reply>';

        const decoded = decodeEnvelope(Buffer.from(xml), schema, 'show sensors');

        expect(decoded['rpc-reply'].sensor).toEqual([{ name: 'fan', value: 12.5, temperature: 40, extra: undefined }]);
    });

    it('reads empty and missing leaves as empty text and 0', () => {
        const decoded = decodeEnvelope('<rpc-reply><sensor><name/><extra/></sensor></rpc-reply>', schema, 'show sensors');

        expect(decoded['rpc-reply'].sensor).toEqual([{ name: '', value: 0, temperature: 0, extra: { note: '' } }]);
    });

    it('reads a missing repeated element as an empty list', () => {
        const decoded = decodeEnvelope('<rpc-reply></rpc-reply>', schema, 'show sensors');

        expect(decoded['rpc-reply'].sensor).toEqual([]);
    });

    it('rejects a document without its root element', () => {
        expect(() => decodeEnvelope('<other/>', schema, 'show sensors')).toThrow(
            'Decode (show sensors) -> rpc-reply: missing <rpc-reply> element'
        );
    });

    it('reports where malformed XML breaks', () => {
        let caught: unknown;
        try {
            decodeEnvelope('<rpc-reply><sensor></rpc-reply>', schema, 'show sensors');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(DecodeError);
        expect(describeError(caught)).toMatch(/^Decode \(show sensors\) -> malformed XML at 1:\d+: /);
    });
});

describe('ExporterError', () => {
    it('keeps the prototype chain and serializes its context', () => {
        const error = new TransportError('edge-1', 'connection reset', 'show bgp summary | display xml');

        expect(error).toBeInstanceOf(Error);
        expect(isExporterError(error)).toBe(true);
        expect(error.isTransport).toBe(true);
        expect(error.isDecode).toBe(false);
        expect(error.toJSON()).toMatchObject({
            errorType: 'TransportError',
            kind: 'transport',
            host: 'edge-1',
            command: 'show bgp summary | display xml',
            detail: 'connection reset'
        });
    });

    it('describes non-errors', () => {
        expect(isExporterError(new Error('plain'))).toBe(false);
        expect(describeError('plain')).toBe('plain');
    });
});
