/**
 * RADIUS Attribute Dictionary
 * In-memory registry of attribute types, vendors and vendor-scoped attribute namespaces,
 * filled in by the dictionary parser and consulted by the attribute codec.
 */

// Vendor-Specific (RFC 2865 section 5.26) wraps every vendor attribute on the wire
export const VENDOR_SPECIFIC_CODE = 26;

// vendorId of attributes in the global namespace
export const GLOBAL_VENDOR_ID = -1;

export enum AttributeDataKind {
    OCTETS = 'octets',
    STRING = 'string',
    INTEGER = 'integer',
    IPADDR = 'ipaddr',
    VENDOR_SPECIFIC = 'vendor-specific',
}

export class AttributeType {
    readonly enumerationValues = new Map<number, string>();

    constructor(
        readonly code: number,
        readonly name: string,
        readonly dataKind: AttributeDataKind,
        readonly vendorId: number = GLOBAL_VENDOR_ID
    ) {}

    isVendorScoped(): boolean {
        return this.vendorId !== GLOBAL_VENDOR_ID;
    }

    /**
     * Bind a symbolic name to one value of this attribute; a repeated value is overwritten
     */
    addEnumerationValue(value: number, name: string): void {
        this.enumerationValues.set(value, name);
    }

    getEnumerationName(value: number): string | undefined {
        return this.enumerationValues.get(value);
    }

    getEnumerationValue(name: string): number | undefined {
        for (const [value, enumName] of this.enumerationValues) {
            if (enumName === name) {
                return value;
            }
        }
        return undefined;
    }
}

export interface AttributeTypeSnapshot {
    code: number;
    name: string;
    dataKind: AttributeDataKind;
    vendorId: number;
    values: Array<[number, string]>;
}

export interface VendorSnapshot {
    vendorId: number;
    vendorName: string | undefined;
    attributes: AttributeTypeSnapshot[];
}

export interface DictionarySnapshot {
    attributes: AttributeTypeSnapshot[];
    vendors: VendorSnapshot[];
}

// Read side, used by the codec and anything else that only looks attributes up
export interface Dictionary {
    getAttributeTypeByName(name: string): AttributeType | undefined;
    getAttributeTypeByCode(code: number, vendorId?: number): AttributeType | undefined;
    getVendorAttributeTypeByName(vendorId: number, name: string): AttributeType | undefined;
    getVendorName(vendorId: number): string | undefined;
    getVendorId(vendorName: string): number;
    getVendorIds(): number[];
    getAttributeTypes(vendorId?: number): AttributeType[];
}

// Write side, used by the parser
export interface WritableDictionary extends Dictionary {
    addAttributeType(attributeType: AttributeType): void;
    addVendor(vendorId: number, vendorName: string): void;
}

interface AttributeNamespace {
    byName: Map<string, AttributeType>;
    byCode: Map<number, AttributeType>;
}

function createNamespace(): AttributeNamespace {
    return { byName: new Map(), byCode: new Map() };
}

function snapshotAttribute(attributeType: AttributeType): AttributeTypeSnapshot {
    return {
        code: attributeType.code,
        name: attributeType.name,
        dataKind: attributeType.dataKind,
        vendorId: attributeType.vendorId,
        values: Array.from(attributeType.enumerationValues.entries()).sort((a, b) => a[0] - b[0]),
    };
}

/**
 * Mutable dictionary. Later registrations of the same name or code replace earlier ones
 * within their namespace; nothing is ever removed.
 */
export class DictionaryRegistry implements WritableDictionary {
    private global: AttributeNamespace = createNamespace();
    private vendorNames = new Map<number, string>();
    private vendorNamespaces = new Map<number, AttributeNamespace>();

    addAttributeType(attributeType: AttributeType): void {
        const namespace = attributeType.isVendorScoped()
            ? this.vendorNamespace(attributeType.vendorId)
            : this.global;

        namespace.byName.set(attributeType.name, attributeType);
        namespace.byCode.set(attributeType.code, attributeType);
    }

    addVendor(vendorId: number, vendorName: string): void {
        this.vendorNames.set(vendorId, vendorName);
        this.vendorNamespace(vendorId);
    }

    getAttributeTypeByName(name: string): AttributeType | undefined {
        return this.global.byName.get(name);
    }

    getAttributeTypeByCode(code: number, vendorId: number = GLOBAL_VENDOR_ID): AttributeType | undefined {
        if (vendorId === GLOBAL_VENDOR_ID) {
            return this.global.byCode.get(code);
        }
        return this.vendorNamespaces.get(vendorId)?.byCode.get(code);
    }

    getVendorAttributeTypeByName(vendorId: number, name: string): AttributeType | undefined {
        return this.vendorNamespaces.get(vendorId)?.byName.get(name);
    }

    getVendorName(vendorId: number): string | undefined {
        return this.vendorNames.get(vendorId);
    }

    /**
     * Vendor names are not unique; the first vendor registered under the name wins
     */
    getVendorId(vendorName: string): number {
        for (const [vendorId, name] of this.vendorNames) {
            if (name === vendorName) {
                return vendorId;
            }
        }
        return GLOBAL_VENDOR_ID;
    }

    getVendorIds(): number[] {
        return Array.from(this.vendorNamespaces.keys());
    }

    getAttributeTypes(vendorId: number = GLOBAL_VENDOR_ID): AttributeType[] {
        const namespace = vendorId === GLOBAL_VENDOR_ID
            ? this.global
            : this.vendorNamespaces.get(vendorId);
        return namespace ? Array.from(namespace.byName.values()) : [];
    }

    toJSON(): DictionarySnapshot {
        return {
            attributes: this.getAttributeTypes().map(snapshotAttribute),
            vendors: this.getVendorIds().map((vendorId) => ({
                vendorId,
                vendorName: this.vendorNames.get(vendorId),
                attributes: this.getAttributeTypes(vendorId).map(snapshotAttribute),
            })),
        };
    }

    // VENDORATTR lines may precede the VENDOR line, so namespaces are created on first use
    private vendorNamespace(vendorId: number): AttributeNamespace {
        let namespace = this.vendorNamespaces.get(vendorId);
        if (!namespace) {
            namespace = createNamespace();
            this.vendorNamespaces.set(vendorId, namespace);
        }
        return namespace;
    }
}
