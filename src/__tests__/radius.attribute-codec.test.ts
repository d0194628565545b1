/**
 * RADIUS Attribute Codec Tests
 * Tests for dictionary-driven attribute decoding and encoding, including VSAs
 */

import { describe, it, expect } from 'vitest';
import { AttributeDataKind } from '../radius/dictionary.js';
import { parseDictionary } from '../radius/dictionary-parser.js';
import {
    decodeAttributes,
    decodeAttributeValue,
    encodeAttributes,
    getAttributeByName,
} from '../radius/attribute-codec.js';

const MIKROTIK_VENDOR_ID = 14988;

const dictionary = parseDictionary([
    'ATTRIBUTE User-Name 1 string',
    'ATTRIBUTE NAS-IP-Address 4 ipaddr',
    'ATTRIBUTE Service-Type 6 integer',
    'ATTRIBUTE Vendor-Specific 26 octets',
    'VALUE Service-Type Login-User 1',
    'VALUE Service-Type Framed-User 2',
    'VENDOR 14988 Mikrotik',
    'VENDORATTR 14988 Mikrotik-Rate-Limit 8 string',
    'VENDORATTR 14988 Mikrotik-Total-Limit 17 integer',
].join('\n'));

// =============================================
// Standard Attribute Tests
// =============================================
describe('Standard Attributes', () => {
    it('should encode a string attribute', () => {
        const encoded = encodeAttributes([{ type: 1, value: 'alice' }], dictionary);

        expect(encoded[0]).toBe(1);
        expect(encoded[1]).toBe(7);
        expect(encoded.subarray(2).toString()).toBe('alice');
    });

    it('should decode a string attribute by its dictionary name', () => {
        const [attr] = decodeAttributes(Buffer.from([1, 7, ...Buffer.from('alice')]), dictionary);

        expect(attr.name).toBe('User-Name');
        expect(attr.dataKind).toBe(AttributeDataKind.STRING);
        expect(attr.value).toBe('alice');
    });

    it('should encode and decode an IPv4 address', () => {
        const encoded = encodeAttributes([{ type: 4, value: '192.168.1.1' }], dictionary);

        expect(Array.from(encoded)).toEqual([4, 6, 192, 168, 1, 1]);
        expect(decodeAttributes(encoded, dictionary)[0].value).toBe('192.168.1.1');
    });

    it('should encode an enumerated integer from its symbolic name', () => {
        const encoded = encodeAttributes([{ type: 6, value: 'Framed-User' }], dictionary);

        expect(Array.from(encoded)).toEqual([6, 6, 0, 0, 0, 2]);
    });

    it('should expose the enumeration name of a decoded integer', () => {
        const [attr] = decodeAttributes(Buffer.from([6, 6, 0, 0, 0, 1]), dictionary);

        expect(attr.value).toBe(1);
        expect(attr.enumName).toBe('Login-User');
    });

    it('should leave enumName unset for values without a name', () => {
        const [attr] = decodeAttributes(Buffer.from([6, 6, 0, 0, 0, 9]), dictionary);

        expect(attr.value).toBe(9);
        expect(attr.enumName).toBeUndefined();
    });

    it('should decode unknown attributes as raw octets', () => {
        const [attr] = decodeAttributes(Buffer.from([200, 4, 0xab, 0xcd]), dictionary);

        expect(attr.name).toBe('Attribute-200');
        expect(attr.dataKind).toBe(AttributeDataKind.OCTETS);
        expect(attr.value).toEqual(Buffer.from([0xab, 0xcd]));
    });

    it('should stop at a truncated attribute', () => {
        const buffer = Buffer.from([1, 5, ...Buffer.from('bob'), 1, 10, 0x61]);

        const attributes = decodeAttributes(buffer, dictionary);

        expect(attributes).toHaveLength(1);
        expect(attributes[0].value).toBe('bob');
    });

    it('should find a decoded attribute by name', () => {
        const encoded = encodeAttributes([
            { type: 1, value: 'alice' },
            { type: 6, value: 2 },
        ], dictionary);

        const attr = getAttributeByName(decodeAttributes(encoded, dictionary), 'Service-Type');

        expect(attr?.enumName).toBe('Framed-User');
    });
});

// =============================================
// VSA Encoding Tests
// =============================================
describe('Vendor-Specific Attributes', () => {
    it('should encode MikroTik Rate-Limit correctly', () => {
        const vsa = encodeAttributes([
            { type: 26, vendorId: MIKROTIK_VENDOR_ID, vendorType: 8, value: '10M/10M' },
        ], dictionary);

        expect(vsa[0]).toBe(26); // Vendor-Specific
        expect(vsa[1]).toBe(15);
        expect(vsa.readUInt32BE(2)).toBe(14988); // MikroTik Vendor ID
        expect(vsa[6]).toBe(8); // Rate-Limit type
        expect(vsa[7]).toBe(9);
        expect(vsa.subarray(8).toString()).toBe('10M/10M');
    });

    it('should encode MikroTik Total-Limit correctly', () => {
        const vsa = encodeAttributes([
            { type: 26, vendorId: MIKROTIK_VENDOR_ID, vendorType: 17, value: 1073741824 },
        ], dictionary);

        expect(vsa[0]).toBe(26);
        expect(vsa.readUInt32BE(2)).toBe(14988);
        expect(vsa[6]).toBe(17); // Total-Limit type
        expect(vsa.subarray(8).readUInt32BE()).toBe(1073741824);
    });

    it('should decode a VSA through the vendor namespace', () => {
        const vsa = encodeAttributes([
            { type: 26, vendorId: MIKROTIK_VENDOR_ID, vendorType: 8, value: '10M/10M' },
        ], dictionary);

        const [attr] = decodeAttributes(vsa, dictionary);

        expect(attr).toMatchObject({
            type: 26,
            name: 'Mikrotik-Rate-Limit',
            dataKind: AttributeDataKind.STRING,
            value: '10M/10M',
            vendorId: 14988,
            vendorType: 8,
        });
    });

    it('should decode several vendor sub-attributes from one VSA', () => {
        const buffer = Buffer.alloc(17);
        buffer.writeUInt8(26, 0);
        buffer.writeUInt8(17, 1);
        buffer.writeUInt32BE(MIKROTIK_VENDOR_ID, 2);
        buffer.writeUInt8(8, 6);
        buffer.writeUInt8(5, 7);
        buffer.write('1M/', 8);
        buffer.writeUInt8(17, 11);
        buffer.writeUInt8(6, 12);
        buffer.writeUInt32BE(1073741824, 13);

        const attributes = decodeAttributes(buffer, dictionary);

        expect(attributes.map((attr) => attr.name)).toEqual(['Mikrotik-Rate-Limit', 'Mikrotik-Total-Limit']);
        expect(attributes[0].value).toBe('1M/');
        expect(attributes[1].value).toBe(1073741824);
    });

    it('should name VSAs of unknown vendors by vendor id and type', () => {
        const vsa = encodeAttributes([{ type: 26, vendorId: 9, vendorType: 1, value: Buffer.from([1, 2]) }], dictionary);

        const [attr] = decodeAttributes(vsa, dictionary);

        expect(attr.name).toBe('Vendor-9-Attr-1');
        expect(attr.dataKind).toBe(AttributeDataKind.OCTETS);
        expect(attr.value).toEqual(Buffer.from([1, 2]));
    });
});

// =============================================
// Value Encoding Errors
// =============================================
describe('Attribute Value Errors', () => {
    it('should reject a malformed IPv4 address', () => {
        expect(() => encodeAttributes([{ type: 4, value: '300.1.1.1' }], dictionary))
            .toThrow('Invalid IPv4 address: 300.1.1.1');
    });

    it('should reject an unknown enumeration name', () => {
        expect(() => encodeAttributes([{ type: 6, value: 'Bogus' }], dictionary))
            .toThrow("Unknown value 'Bogus' for attribute Service-Type");
    });

    it('should reject values that do not fit in one attribute', () => {
        expect(() => encodeAttributes([{ type: 1, value: 'x'.repeat(254) }], dictionary))
            .toThrow('Attribute User-Name too long: 256 bytes (maximum 255)');
    });

    it('should reject enumerated integers that do not fit in an unsigned field', () => {
        const signed = parseDictionary('ATTRIBUTE Offset 30 integer\nVALUE Offset Behind -1');

        expect(() => encodeAttributes([{ type: 30, value: 'Behind' }], signed))
            .toThrow('Value -1 out of range for attribute Offset');
    });

    it('should reject numeric integers beyond 32 bits', () => {
        expect(() => encodeAttributes([{ type: 6, value: 4294967296 }], dictionary))
            .toThrow('Value 4294967296 out of range for attribute Service-Type');
    });

    it('should keep short integer values raw when decoding', () => {
        expect(decodeAttributeValue(Buffer.from([0, 1]), AttributeDataKind.INTEGER)).toEqual(Buffer.from([0, 1]));
    });
});
