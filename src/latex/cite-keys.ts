import { isAdsBibcode } from '../resolver/key-classifier.js';

/**
 * \cite, \citep, \citet, \citealt, \citeauthor, \Citep, ... with any number of
 * optional arguments, e.g. \citep[e.g.][p.~3]{key1,key2}.
 */
const CITE_COMMAND_PATTERN = /\\[Cc]ite[a-zA-Z]*(?:\[[^\]]*\])*\{([^}]+)\}/g;

export interface CiteKeyExtraction {
    /** Keys in order of appearance; repeats are kept */
    keys: string[];
    warnings: string[];
}

/**
 * A key worth looking up: an INSPIRE-style `Author:YYYYxx` (anything with a
 * colon) or an ADS bibcode.
 */
function isLookupKey(key: string): boolean {
    return key.includes(':') || isAdsBibcode(key);
}

/**
 * Extract citation keys from LaTeX source.
 * `fileLabel` prefixes the warnings (usually the file path).
 */
export function extractCiteKeys(content: string, fileLabel: string): CiteKeyExtraction {
    const keys: string[] = [];
    const warnings: string[] = [];

    for (const match of content.matchAll(CITE_COMMAND_PATTERN)) {
        const group = match[1] ?? '';
        for (const rawKey of group.split(',')) {
            const key = rawKey.trim();
            if (!key) {
                warnings.push(`${fileLabel}: Empty citation key found`);
            } else if (!isLookupKey(key)) {
                warnings.push(`${fileLabel}: Skipping key '${key}' (not an INSPIRE/ADS key)`);
            } else {
                keys.push(key);
            }
        }
    }

    return { keys, warnings };
}
