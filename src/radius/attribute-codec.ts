/**
 * RADIUS Attribute Codec
 * Decodes and encodes the attribute section of a packet using a loaded dictionary.
 *
 * Attribute Format:
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-
 * |     Type      |    Length     |  Value ...
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-
 *
 * Vendor-Specific (26) Value:
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |                          Vendor-Id                            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |  Vendor type  | Vendor length |  Value ...
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-
 */

import {
    AttributeDataKind,
    VENDOR_SPECIFIC_CODE,
    type AttributeType,
    type Dictionary,
} from './dictionary.js';

export type AttributeValue = string | number | Buffer;

// Decoded attribute
export interface RadiusAttribute {
    type: number;
    name: string;
    dataKind: AttributeDataKind;
    value: AttributeValue;
    // Symbolic name of an enumerated integer value, when the dictionary has one
    enumName?: string;
    raw: Buffer;
    vendorId?: number;
    vendorType?: number;
}

// Attribute builder for encoding
export interface AttributeBuilder {
    type: number;
    value: AttributeValue;
    vendorId?: number;
    vendorType?: number;
}

const MAX_ATTRIBUTE_LENGTH = 255;
const MAX_UINT32 = 0xffffffff;

/**
 * Parse the attributes section of a RADIUS packet
 */
export function decodeAttributes(buffer: Buffer, dictionary: Dictionary): RadiusAttribute[] {
    const attributes: RadiusAttribute[] = [];
    let offset = 0;

    while (offset + 2 <= buffer.length) {
        const type = buffer.readUInt8(offset);
        const attrLength = buffer.readUInt8(offset + 1);

        if (attrLength < 2 || offset + attrLength > buffer.length) {
            break;
        }

        const valueBuffer = buffer.subarray(offset + 2, offset + attrLength);

        if (type === VENDOR_SPECIFIC_CODE && valueBuffer.length >= 6) {
            attributes.push(...decodeVendorSpecific(valueBuffer, dictionary));
        } else {
            attributes.push(decodeAttribute(type, valueBuffer, dictionary.getAttributeTypeByCode(type)));
        }

        offset += attrLength;
    }

    return attributes;
}

function decodeVendorSpecific(valueBuffer: Buffer, dictionary: Dictionary): RadiusAttribute[] {
    const attributes: RadiusAttribute[] = [];
    const vendorId = valueBuffer.readUInt32BE(0);
    let offset = 4;

    // One Vendor-Specific attribute may carry several vendor sub-attributes
    while (offset + 2 <= valueBuffer.length) {
        const vendorType = valueBuffer.readUInt8(offset);
        const vendorLength = valueBuffer.readUInt8(offset + 1);

        if (vendorLength < 2 || offset + vendorLength > valueBuffer.length) {
            break;
        }

        const vendorValue = valueBuffer.subarray(offset + 2, offset + vendorLength);
        const attributeType = dictionary.getAttributeTypeByCode(vendorType, vendorId);
        attributes.push({
            ...decodeAttribute(VENDOR_SPECIFIC_CODE, vendorValue, attributeType),
            name: attributeType?.name ?? `Vendor-${vendorId}-Attr-${vendorType}`,
            vendorId,
            vendorType,
        });

        offset += vendorLength;
    }

    return attributes;
}

function decodeAttribute(type: number, valueBuffer: Buffer, attributeType: AttributeType | undefined): RadiusAttribute {
    const dataKind = attributeType?.dataKind ?? AttributeDataKind.OCTETS;
    const value = decodeAttributeValue(valueBuffer, dataKind);
    const attribute: RadiusAttribute = {
        type,
        name: attributeType?.name ?? `Attribute-${type}`,
        dataKind,
        value,
        raw: valueBuffer,
    };

    if (typeof value === 'number') {
        const enumName = attributeType?.getEnumerationName(value);
        if (enumName !== undefined) {
            attribute.enumName = enumName;
        }
    }

    return attribute;
}

/**
 * Decode attribute value based on data kind; malformed integer and address values stay raw
 */
export function decodeAttributeValue(buffer: Buffer, dataKind: AttributeDataKind): AttributeValue {
    switch (dataKind) {
        case AttributeDataKind.STRING:
            return buffer.toString('utf8');
        case AttributeDataKind.INTEGER:
            return buffer.length === 4 ? buffer.readUInt32BE(0) : buffer;
        case AttributeDataKind.IPADDR:
            return buffer.length === 4 ? Array.from(buffer).join('.') : buffer;
        case AttributeDataKind.VENDOR_SPECIFIC:
        case AttributeDataKind.OCTETS:
        default:
            return buffer;
    }
}

function encodeInteger(value: AttributeValue, attributeType: AttributeType | undefined): Buffer {
    if (Buffer.isBuffer(value)) {
        return value;
    }

    let numeric = typeof value === 'number' ? value : attributeType?.getEnumerationValue(value);
    if (numeric === undefined && typeof value === 'string' && /^\d+$/.test(value)) {
        numeric = Number(value);
    }
    if (numeric === undefined) {
        throw new Error(`Unknown value '${value}' for attribute ${attributeType?.name ?? 'integer'}`);
    }
    if (!Number.isInteger(numeric) || numeric < 0 || numeric > MAX_UINT32) {
        throw new Error(`Value ${numeric} out of range for attribute ${attributeType?.name ?? 'integer'}`);
    }

    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(numeric);
    return buf;
}

function encodeIpAddress(value: AttributeValue): Buffer {
    if (Buffer.isBuffer(value)) {
        return value;
    }

    const parts = String(value).split('.').map(Number);
    if (parts.length !== 4 || parts.some((part) => !Number.isInteger(part) || part < 0 || part > 255)) {
        throw new Error(`Invalid IPv4 address: ${value}`);
    }
    return Buffer.from(parts);
}

/**
 * Encode an attribute value to buffer
 */
export function encodeAttributeValue(value: AttributeValue, attributeType: AttributeType | undefined): Buffer {
    switch (attributeType?.dataKind) {
        case AttributeDataKind.STRING:
            return Buffer.isBuffer(value) ? value : Buffer.from(String(value), 'utf8');
        case AttributeDataKind.INTEGER:
            return encodeInteger(value, attributeType);
        case AttributeDataKind.IPADDR:
            return encodeIpAddress(value);
        case AttributeDataKind.VENDOR_SPECIFIC:
        case AttributeDataKind.OCTETS:
        default:
            return Buffer.isBuffer(value) ? value : Buffer.from(String(value));
    }
}

/**
 * Encode attributes to buffer
 */
export function encodeAttributes(attributes: AttributeBuilder[], dictionary: Dictionary): Buffer {
    const buffers: Buffer[] = [];

    for (const attr of attributes) {
        if (attr.vendorId !== undefined && attr.vendorType !== undefined) {
            // Vendor-Specific Attribute
            const vsaDef = dictionary.getAttributeTypeByCode(attr.vendorType, attr.vendorId);
            const valueBuffer = encodeAttributeValue(attr.value, vsaDef);
            assertLength(8 + valueBuffer.length, vsaDef?.name ?? `Vendor-${attr.vendorId}-Attr-${attr.vendorType}`);

            // VSA format: Type(1) + Length(1) + VendorId(4) + VendorType(1) + VendorLength(1) + Value
            const vsaBuffer = Buffer.alloc(8 + valueBuffer.length);
            vsaBuffer.writeUInt8(VENDOR_SPECIFIC_CODE, 0);
            vsaBuffer.writeUInt8(8 + valueBuffer.length, 1);
            vsaBuffer.writeUInt32BE(attr.vendorId, 2);
            vsaBuffer.writeUInt8(attr.vendorType, 6);
            vsaBuffer.writeUInt8(2 + valueBuffer.length, 7);
            valueBuffer.copy(vsaBuffer, 8);
            buffers.push(vsaBuffer);
        } else {
            // Standard attribute
            const def = dictionary.getAttributeTypeByCode(attr.type);
            const valueBuffer = encodeAttributeValue(attr.value, def);
            assertLength(2 + valueBuffer.length, def?.name ?? `Attribute-${attr.type}`);

            // Attribute format: Type(1) + Length(1) + Value
            const attrBuffer = Buffer.alloc(2 + valueBuffer.length);
            attrBuffer.writeUInt8(attr.type, 0);
            attrBuffer.writeUInt8(2 + valueBuffer.length, 1);
            valueBuffer.copy(attrBuffer, 2);
            buffers.push(attrBuffer);
        }
    }

    return Buffer.concat(buffers);
}

function assertLength(length: number, name: string): void {
    if (length > MAX_ATTRIBUTE_LENGTH) {
        throw new Error(`Attribute ${name} too long: ${length} bytes (maximum ${MAX_ATTRIBUTE_LENGTH})`);
    }
}

/**
 * Find a decoded attribute by dictionary name
 */
export function getAttributeByName(attributes: RadiusAttribute[], name: string): RadiusAttribute | undefined {
    return attributes.find((attr) => attr.name === name);
}
