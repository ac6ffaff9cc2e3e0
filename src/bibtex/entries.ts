/**
 * String-level BibTeX helpers. Entries are handled as text; nothing here
 * parses a full bibliography.
 */

import { escapeRegExp } from '../utils/text.js';

/** `@article{key,` with the type and brace in group 1, the key in group 2 */
const ENTRY_HEAD_PATTERN = /(@\w+\s*\{)\s*([^,\s]+)\s*,/;

/** Author field up to the closing brace at the end of its line */
const AUTHOR_FIELD_PATTERN = /(\s*author\s*=\s*\{)(.+?)(\},?\s*\n)/is;

/**
 * Citation keys of every entry in a .bib file's content.
 */
export function extractExistingBibKeys(content: string): Set<string> {
    const keys = new Set<string>();
    for (const match of content.matchAll(new RegExp(ENTRY_HEAD_PATTERN.source, 'g'))) {
        if (match[2]) keys.add(match[2]);
    }
    return keys;
}

/**
 * Citation key of the first entry, or null if there is none.
 */
export function extractBibtexKey(bibtex: string): string | null {
    return ENTRY_HEAD_PATTERN.exec(bibtex)?.[2] ?? null;
}

/**
 * Replace the first entry's citation key.
 */
export function replaceBibtexKey(bibtex: string, newKey: string): string {
    return bibtex.replace(ENTRY_HEAD_PATTERN, (_match, head: string) => `${head}${newKey},`);
}

/**
 * Values of the named fields, keyed by the names as given. Fields that are
 * absent are left out. Values may be brace- or quote-delimited; nested
 * braces are not followed.
 */
export function extractBibtexFields(bibtex: string, ...fieldNames: string[]): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const name of fieldNames) {
        const pattern = new RegExp(`^\\s*${escapeRegExp(name)}\\s*=\\s*(?:"([^"]+)"|\\{([^}]+)\\})`, 'mi');
        const match = pattern.exec(bibtex);
        const value = match?.[1] ?? match?.[2];
        if (value !== undefined) fields[name] = value.trim();
    }
    return fields;
}

/**
 * Keep the first `maxAuthors` authors and append "others".
 * A falsy `maxAuthors`, a missing author field, or a list that is already
 * short enough leaves the entry untouched.
 */
export function truncateAuthors(bibtex: string, maxAuthors: number | undefined): string {
    if (!maxAuthors) return bibtex;

    const match = AUTHOR_FIELD_PATTERN.exec(bibtex);
    if (!match) return bibtex;

    const [, prefix = '', authorList = '', suffix = ''] = match;
    const authors = authorList.split(/\s+and\s+/).map((author) => author.trim());
    if (authors.length <= maxAuthors) return bibtex;

    const truncated = [...authors.slice(0, maxAuthors), 'others'].join(' and ');
    return bibtex.slice(0, match.index) + prefix + truncated + suffix + bibtex.slice(match.index + match[0].length);
}

/**
 * A @misc entry keyed by the arXiv id that points at the full record, so
 * \cite{<arxivId>} resolves to it.
 */
export function makeArxivCrossrefStub(arxivId: string, bibtexKey: string): string {
    return `@misc{${arxivId},\n  crossref = {${bibtexKey}}\n}`;
}
