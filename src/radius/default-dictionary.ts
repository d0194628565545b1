/**
 * Bundled dictionary: RFC 2865/2866 attributes plus the MikroTik vendor namespace
 */

import { join } from 'path';
import { BUNDLED_DICTIONARY_DIR } from '../lib/config.js';
import { DictionaryRegistry } from './dictionary.js';
import { loadDictionaryFile } from './dictionary-parser.js';

export const DEFAULT_DICTIONARY_PATH = join(BUNDLED_DICTIONARY_DIR, 'default.dict');

// MikroTik Vendor ID
export const MIKROTIK_VENDOR_ID = 14988;

/**
 * Load the bundled dictionary into a fresh registry. Every call parses the files again;
 * callers that need one shared instance keep it themselves.
 */
export function loadDefaultDictionary(): DictionaryRegistry {
    return loadDictionaryFile(DEFAULT_DICTIONARY_PATH);
}
