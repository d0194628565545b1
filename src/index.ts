/**
 * RADIUS dictionary loading and attribute registry
 */

export {
    AttributeDataKind,
    AttributeType,
    DictionaryRegistry,
    GLOBAL_VENDOR_ID,
    VENDOR_SPECIFIC_CODE,
    type AttributeTypeSnapshot,
    type Dictionary,
    type DictionarySnapshot,
    type VendorSnapshot,
    type WritableDictionary,
} from './radius/dictionary.js';
export {
    loadDictionaryFile,
    parseDictionary,
    parseDictionaryInto,
    resolveDataKind,
    type ParseOptions,
} from './radius/dictionary-parser.js';
export {
    FileLineSource,
    openFileLineSource,
    textLineSource,
    type IncludeOpener,
    type LineSource,
    type OpenedLineSource,
} from './radius/line-source.js';
export {
    DEFAULT_DICTIONARY_PATH,
    MIKROTIK_VENDOR_ID,
    loadDefaultDictionary,
} from './radius/default-dictionary.js';
export {
    decodeAttributes,
    decodeAttributeValue,
    encodeAttributes,
    encodeAttributeValue,
    getAttributeByName,
    type AttributeBuilder,
    type AttributeValue,
    type RadiusAttribute,
} from './radius/attribute-codec.js';
export {
    DictionaryError,
    DictionarySyntaxError,
    IncludeCycleError,
    IncludeNotFoundError,
    UnresolvedReferenceError,
    isDictionaryError,
    type DictionaryErrorCode,
} from './lib/errors.js';
