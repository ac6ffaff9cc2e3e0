import { appendFileSync, existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { BibliographicServices, CitefetchConfig } from '../types/index.js';
import { createServices, fetchBibtex } from '../resolver/fetch-orchestrator.js';
import { extractCiteKeys } from '../latex/cite-keys.js';
import {
    extractBibtexFields,
    extractExistingBibKeys,
    makeArxivCrossrefStub,
    replaceBibtexKey,
    truncateAuthors,
} from '../bibtex/entries.js';
import { expandAasMacros, findUsedMacros, parseAasMacros, type AasMacros } from '../bibtex/aas-macros.js';
import { getLogger } from '../utils/logger.js';

const SKIPPED_DIRECTORIES = new Set(['node_modules']);

export interface BuildOptions {
    /** ADS token */
    apiKey: string;
    /** Lookup primitives; defaults to the live INSPIRE and ADS adapters */
    services?: BibliographicServices;
}

export interface BuildSummary {
    /** File the entries were written to */
    output: string;
    /** Unique cite keys found, in first-seen order */
    keys: string[];
    found: Array<{ key: string; label: string }>;
    /** Keys already present in the output file */
    skipped: string[];
    /** Keys no strategy step could resolve */
    failed: string[];
    warnings: string[];
}

/**
 * Expand input paths into .tex files. Directories are walked recursively,
 * skipping dot-directories and node_modules; files named explicitly are kept
 * whatever their extension.
 */
export function collectTexFiles(paths: string[]): string[] {
    const files: string[] = [];

    const walk = (dir: string): void => {
        const entries = readdirSync(dir, { withFileTypes: true })
            .sort((a, b) => a.name.localeCompare(b.name));
        for (const entry of entries) {
            const fullPath = join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!entry.name.startsWith('.') && !SKIPPED_DIRECTORIES.has(entry.name)) walk(fullPath);
            } else if (entry.isFile() && entry.name.endsWith('.tex')) {
                files.push(fullPath);
            }
        }
    };

    for (const path of paths) {
        if (!existsSync(path)) {
            throw new Error(`Input not found: ${path}`);
        }
        if (statSync(path).isDirectory()) walk(path);
        else files.push(path);
    }

    return files;
}

/**
 * Cite keys across all inputs, de-duplicated in first-seen order, with the
 * warnings for keys that were skipped.
 */
export function collectCiteKeys(paths: string[]): { keys: string[]; warnings: string[] } {
    const keys = new Set<string>();
    const warnings: string[] = [];

    for (const file of collectTexFiles(paths)) {
        const extraction = extractCiteKeys(readFileSync(file, 'utf-8'), file);
        extraction.keys.forEach((key) => keys.add(key));
        warnings.push(...extraction.warnings);
    }

    return { keys: [...keys], warnings };
}

/**
 * Rewrite a fetched record for this project: the document's cite key,
 * truncated authors, and expanded journal macros.
 */
export function prepareEntry(bibtex: string, key: string, config: Pick<CitefetchConfig, 'maxAuthors'>, macros: AasMacros | null): string {
    let entry = truncateAuthors(replaceBibtexKey(bibtex, key), config.maxAuthors);

    if (macros) {
        const used = findUsedMacros(entry, macros);
        if (Object.keys(used).length > 0) {
            getLogger().debug({ key, macros: Object.keys(used) }, 'Expanding AAS macros');
            entry = expandAasMacros(entry, used);
        }
    }

    return entry;
}

/**
 * Journal macros from the configured AAS .sty file, or null when none is set.
 */
export function loadMacros(path: string | undefined): AasMacros | null {
    if (!path) return null;
    const macros = parseAasMacros(readFileSync(path, 'utf-8'));
    getLogger().debug({ path, count: Object.keys(macros).length }, 'Loaded AAS macros');
    return macros;
}

/**
 * Resolve a single key and rewrite the record the same way `build` does.
 * Null when every strategy step misses.
 */
export async function lookupEntry(
    key: string,
    config: CitefetchConfig,
    options: BuildOptions
): Promise<{ entry: string; label: string } | null> {
    const services = options.services ?? createServices(options.apiKey);
    const result = await fetchBibtex(key, options.apiKey, config.source, services);
    if (result.status === 'missed') return null;

    return { entry: prepareEntry(result.bibtex, key, config, loadMacros(config.aasMacros)), label: result.label };
}

function writeEntries(output: string, entries: string[], fresh: boolean): void {
    mkdirSync(dirname(output), { recursive: true });
    const body = entries.length > 0 ? `${entries.join('\n\n')}\n` : '';

    if (fresh) {
        writeFileSync(output, body, 'utf-8');
        return;
    }
    if (entries.length === 0) return;

    const existing = existsSync(output) ? readFileSync(output, 'utf-8') : '';
    const separator = existing.length === 0 ? '' : existing.endsWith('\n') ? '\n' : '\n\n';
    appendFileSync(output, separator + body, 'utf-8');
}

/**
 * Main bibliography builder. Runs the full pipeline:
 *
 * 1. Collect cite keys from the .tex inputs
 * 2. Skip keys the output file already has (unless `fresh`)
 * 3. Resolve each remaining key with the configured strategy
 * 4. Rewrite each record and write the new entries
 */
export async function buildBibliography(
    inputs: string[],
    config: CitefetchConfig,
    options: BuildOptions
): Promise<BuildSummary> {
    const logger = getLogger();
    const services = options.services ?? createServices(options.apiKey);
    const macros = loadMacros(config.aasMacros);

    const { keys, warnings } = collectCiteKeys(inputs);
    for (const warning of warnings) logger.warn(warning);
    logger.info({ keys: keys.length, source: config.source }, 'Cite keys collected');

    const knownKeys = !config.fresh && existsSync(config.output)
        ? extractExistingBibKeys(readFileSync(config.output, 'utf-8'))
        : new Set<string>();

    const summary: BuildSummary = { output: config.output, keys, found: [], skipped: [], failed: [], warnings };
    const entries: string[] = [];

    for (const key of keys) {
        if (knownKeys.has(key)) {
            summary.skipped.push(key);
            continue;
        }

        const result = await fetchBibtex(key, options.apiKey, config.source, services);
        if (result.status === 'missed') {
            logger.warn({ key }, 'No record found');
            summary.failed.push(key);
            continue;
        }

        logger.info({ key, label: result.label }, 'Fetched');
        const entry = prepareEntry(result.bibtex, key, config, macros);
        entries.push(entry);
        knownKeys.add(key);
        summary.found.push({ key, label: result.label });

        if (config.arxivStubs) {
            const { eprint } = extractBibtexFields(entry, 'eprint');
            if (eprint && !knownKeys.has(eprint)) {
                entries.push(makeArxivCrossrefStub(eprint, key));
                knownKeys.add(eprint);
            }
        }
    }

    writeEntries(config.output, entries, config.fresh);
    logger.info(
        { output: config.output, added: summary.found.length, skipped: summary.skipped.length, failed: summary.failed.length },
        'Bibliography updated'
    );

    return summary;
}
