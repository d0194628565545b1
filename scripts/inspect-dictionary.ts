#!/usr/bin/env node
/**
 * Load a dictionary file and print what it defines
 * Usage: inspect-dictionary [path]   (defaults to DICTIONARY_PATH or the bundled dictionary)
 */

import { config } from '../src/lib/config.js';
import { isDictionaryError } from '../src/lib/errors.js';
import { logger } from '../src/lib/logger.js';
import { loadDictionaryFile } from '../src/radius/dictionary-parser.js';

function main(): number {
    const path = process.argv[2] ?? config.dictionary.path;

    try {
        const dictionary = loadDictionaryFile(path);

        console.log(`Dictionary: ${path}`);
        console.log(`Attributes: ${dictionary.getAttributeTypes().length}`);
        for (const vendorId of dictionary.getVendorIds()) {
            const vendorName = dictionary.getVendorName(vendorId) ?? '(undeclared)';
            console.log(`Vendor ${vendorId} ${vendorName}: ${dictionary.getAttributeTypes(vendorId).length} attributes`);
        }
        return 0;
    } catch (error) {
        if (isDictionaryError(error)) {
            console.error(`${path}: ${error.message}`);
        } else {
            logger.error({ error, path }, 'Failed to load dictionary');
        }
        return 1;
    }
}

process.exitCode = main();
