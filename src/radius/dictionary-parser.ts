/**
 * RADIUS Dictionary Parser
 * Reads the line-oriented dictionary format and fills a WritableDictionary:
 *
 *   ATTRIBUTE   <name> <code> <type>
 *   VALUE       <attributeName> <enumName> <value>
 *   VENDOR      <vendorId> <vendorName>
 *   VENDORATTR  <vendorId> <name> <code> <type>
 *   $INCLUDE    <filePath>
 *
 * Keywords and type names are case-insensitive. Line numbers are 1-based and local to each file.
 */

import { dirname, resolve } from 'path';
import { z } from 'zod';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import {
    DictionarySyntaxError,
    IncludeCycleError,
    IncludeNotFoundError,
    UnresolvedReferenceError,
} from '../lib/errors.js';
import {
    AttributeDataKind,
    AttributeType,
    DictionaryRegistry,
    VENDOR_SPECIFIC_CODE,
    type WritableDictionary,
} from './dictionary.js';
import {
    openFileLineSource,
    textLineSource,
    FileLineSource,
    type IncludeOpener,
    type LineSource,
    type OpenedLineSource,
} from './line-source.js';

export interface ParseOptions {
    // Directory relative includes resolve against when the source is not a file (default: cwd)
    baseDir?: string;
    // Maximum nesting of $INCLUDE directives (default: config.dictionary.maxIncludeDepth)
    maxIncludeDepth?: number;
    // Opens included files; defaults to reading from the filesystem
    openInclude?: IncludeOpener;
}

const parseOptionsSchema = z.object({
    baseDir: z.string().min(1).optional(),
    maxIncludeDepth: z.number().int().min(1).optional(),
});

interface ParseContext {
    dictionary: WritableDictionary;
    maxIncludeDepth: number;
    openInclude: IncludeOpener;
    // Resolved paths of the files currently being read, outermost first
    openFiles: string[];
    depth: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Parse a dictionary into a new registry
 */
export function parseDictionary(source: LineSource | string, options: ParseOptions = {}): DictionaryRegistry {
    const dictionary = new DictionaryRegistry();
    parseDictionaryInto(source, dictionary, options);
    return dictionary;
}

/**
 * Parse a dictionary into an existing registry. On failure the registry holds
 * whatever was registered before the faulty line and should be discarded.
 */
export function parseDictionaryInto(
    source: LineSource | string,
    dictionary: WritableDictionary,
    options: ParseOptions = {}
): void {
    const { baseDir, maxIncludeDepth } = parseOptionsSchema.parse(options);
    const lines = typeof source === 'string' ? textLineSource(source) : source;

    const context: ParseContext = {
        dictionary,
        maxIncludeDepth: maxIncludeDepth ?? config.dictionary.maxIncludeDepth,
        openInclude: options.openInclude ?? openFileLineSource,
        openFiles: lines.origin ? [resolve(lines.origin)] : [],
        depth: 0,
    };
    const currentDir = lines.origin ? dirname(resolve(lines.origin)) : resolve(baseDir ?? process.cwd());

    try {
        parseLines(lines, context, currentDir);
    } catch (err) {
        logger.error({ err, origin: lines.origin }, 'Dictionary parse failed');
        throw err;
    }
}

/**
 * Open a dictionary file, parse it into the given (or a new) registry and close it again
 */
export function loadDictionaryFile(filePath: string, dictionary?: undefined, options?: ParseOptions): DictionaryRegistry;
export function loadDictionaryFile<T extends WritableDictionary>(filePath: string, dictionary: T, options?: ParseOptions): T;
export function loadDictionaryFile(
    filePath: string,
    dictionary?: WritableDictionary,
    options: ParseOptions = {}
): WritableDictionary {
    const target = dictionary ?? new DictionaryRegistry();
    const source = new FileLineSource(filePath);
    try {
        parseDictionaryInto(source, target, options);
    } finally {
        source.close();
    }

    logger.info({
        path: source.origin,
        attributes: target.getAttributeTypes().length,
        vendors: target.getVendorIds().length,
    }, 'Dictionary loaded');

    return target;
}

function parseLines(source: LineSource, context: ParseContext, currentDir: string): void {
    let lineNum = 0;

    for (const rawLine of source) {
        lineNum++;
        const line = rawLine.trim();
        if (line === '' || line.startsWith('#')) continue;

        const [lineType, ...tokens] = line.split(/\s+/);

        switch (lineType.toUpperCase()) {
            case 'ATTRIBUTE':
                parseAttributeLine(context.dictionary, tokens, lineNum);
                break;
            case 'VALUE':
                parseValueLine(context.dictionary, tokens, lineNum);
                break;
            case 'VENDORATTR':
                parseVendorAttributeLine(context.dictionary, tokens, lineNum);
                break;
            case 'VENDOR':
                parseVendorLine(context.dictionary, tokens, lineNum);
                break;
            case '$INCLUDE':
                includeDictionaryFile(context, tokens, lineNum, currentDir);
                break;
            default:
                throw new DictionarySyntaxError(`unknown line type: ${lineType}`, lineNum);
        }
    }
}

function expectTokens(tokens: string[], count: number, lineNum: number): void {
    if (tokens.length !== count) {
        throw new DictionarySyntaxError('syntax error', lineNum);
    }
}

function parseInteger(token: string, lineNum: number): number {
    const value = INTEGER_PATTERN.test(token) ? Number(token) : NaN;
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw new DictionarySyntaxError(`invalid integer '${token}'`, lineNum);
    }
    return value;
}

// Negative ids would collide with the global namespace
function parseVendorId(token: string, lineNum: number): number {
    const vendorId = parseInteger(token, lineNum);
    if (vendorId < 0) {
        throw new DictionarySyntaxError(`invalid vendor id '${token}'`, lineNum);
    }
    return vendorId;
}

/**
 * Map a dictionary type name to its data kind; unknown names are treated as octets
 */
export function resolveDataKind(typeName: string): AttributeDataKind {
    switch (typeName.toLowerCase()) {
        case 'string':
            return AttributeDataKind.STRING;
        case 'integer':
        case 'date':
            return AttributeDataKind.INTEGER;
        case 'ipaddr':
            return AttributeDataKind.IPADDR;
        case 'octets':
        default:
            return AttributeDataKind.OCTETS;
    }
}

function parseAttributeLine(dictionary: WritableDictionary, tokens: string[], lineNum: number): void {
    expectTokens(tokens, 3, lineNum);
    const [name, codeStr, typeName] = tokens;
    const code = parseInteger(codeStr, lineNum);

    const dataKind = code === VENDOR_SPECIFIC_CODE
        ? AttributeDataKind.VENDOR_SPECIFIC
        : resolveDataKind(typeName);

    dictionary.addAttributeType(new AttributeType(code, name, dataKind));
}

function parseValueLine(dictionary: WritableDictionary, tokens: string[], lineNum: number): void {
    expectTokens(tokens, 3, lineNum);
    const [attributeName, enumName, valueStr] = tokens;

    const attributeType = dictionary.getAttributeTypeByName(attributeName);
    if (!attributeType) {
        throw new UnresolvedReferenceError(attributeName, lineNum);
    }
    attributeType.addEnumerationValue(parseInteger(valueStr, lineNum), enumName);
}

function parseVendorAttributeLine(dictionary: WritableDictionary, tokens: string[], lineNum: number): void {
    expectTokens(tokens, 4, lineNum);
    const [vendorIdStr, name, codeStr, typeName] = tokens;
    const vendorId = parseVendorId(vendorIdStr, lineNum);
    const code = parseInteger(codeStr, lineNum);

    dictionary.addAttributeType(new AttributeType(code, name, resolveDataKind(typeName), vendorId));
}

function parseVendorLine(dictionary: WritableDictionary, tokens: string[], lineNum: number): void {
    expectTokens(tokens, 2, lineNum);
    const [vendorIdStr, vendorName] = tokens;

    dictionary.addVendor(parseVendorId(vendorIdStr, lineNum), vendorName);
}

function includeDictionaryFile(
    context: ParseContext,
    tokens: string[],
    lineNum: number,
    currentDir: string
): void {
    expectTokens(tokens, 1, lineNum);
    const [includePath] = tokens;
    const resolvedPath = resolve(currentDir, includePath);

    if (context.openFiles.includes(resolvedPath)) {
        throw new IncludeCycleError(includePath, lineNum, 'include cycle detected');
    }
    if (context.depth >= context.maxIncludeDepth) {
        throw new IncludeCycleError(includePath, lineNum, `include depth limit of ${context.maxIncludeDepth} exceeded`);
    }

    let included: OpenedLineSource;
    try {
        included = context.openInclude(resolvedPath);
    } catch (err) {
        throw new IncludeNotFoundError(includePath, lineNum, { cause: err });
    }

    logger.debug({ path: resolvedPath, depth: context.depth + 1 }, 'Including dictionary file');

    context.openFiles.push(resolvedPath);
    context.depth++;
    try {
        parseLines(included, context, dirname(resolvedPath));
    } finally {
        context.depth--;
        context.openFiles.pop();
        included.close();
    }
}
