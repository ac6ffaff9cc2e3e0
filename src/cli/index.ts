#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { getApiKey, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { buildBibliography, collectCiteKeys, lookupEntry } from '../builder/bib-builder.js';
import { classifyKey } from '../resolver/key-classifier.js';
import { LOG_LEVELS, SOURCE_PREFERENCES, type CitefetchConfig } from '../types/index.js';

const VERSION = '1.0.0';
const ADS_TOKEN_ENV = 'ADS_API_KEY';

interface CommonOptions {
    source?: string;
    maxAuthors?: number;
    config?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface LookupCommandOptions extends CommonOptions {
    aasMacros?: string;
}

interface BuildCommandOptions extends LookupCommandOptions {
    output?: string;
    arxivStubs?: boolean;
    fresh?: boolean;
    timeout?: number;
    retries?: number;
}

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

/**
 * Resolve config, start logging and the shared HTTP client, and read the
 * ADS token. Null (with a failing exit code set) when the token is required
 * and missing.
 */
async function setup(flags: Record<string, unknown>, configPath?: string): Promise<{ config: CitefetchConfig; apiKey: string } | null> {
    const config = await resolveConfig(flags, configPath);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.timeout, maxRetries: config.retries, version: VERSION });

    const apiKey = getApiKey(ADS_TOKEN_ENV);
    if (!apiKey) {
        if (config.source === 'ads') {
            getLogger().error(`${ADS_TOKEN_ENV} is not set; the ads source needs an ADS API token`);
            process.exitCode = 1;
            return null;
        }
        getLogger().warn(`${ADS_TOKEN_ENV} is not set; ADS fallbacks will miss`);
    }

    return { config, apiKey: apiKey ?? '' };
}

const program = new Command();

program
    .name('citefetch')
    .description('Fetch BibTeX for the citation keys in LaTeX sources from INSPIRE-HEP and NASA ADS.')
    .version(VERSION);

const sourceOption = () =>
    new Option('-s, --source <source>', 'Preferred source').choices(SOURCE_PREFERENCES);
const logLevelOption = () =>
    new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS);

// ─── BUILD command ────────────────────────────────────────

program
    .command('build')
    .description('Fetch missing entries for every cite key and append them to a .bib file')
    .argument('<paths...>', '.tex files or directories to scan')
    .option('-o, --output <path>', 'Bibliography file to update (default: references.bib)')
    .addOption(sourceOption())
    .option('-a, --max-authors <n>', 'Truncate author lists after n names (0 keeps all)', parseCount)
    .option('--aas-macros <sty>', 'Expand the journal macros defined in this AAS .sty file')
    .option('--arxiv-stubs', 'Also write @misc crossref stubs keyed by arXiv id')
    .option('--fresh', 'Rewrite the output file instead of appending to it')
    .option('--timeout <ms>', 'Per-request timeout', parseCount)
    .option('--retries <n>', 'Retries for rate-limited or failed requests', parseCount)
    .option('-c, --config <path>', 'Config file (default: citefetch.config.json)')
    .addOption(logLevelOption())
    .option('--json-logs', 'Output JSON logs')
    .action(async (paths: string[], opts: BuildCommandOptions) => {
        const context = await setup({
            output: opts.output,
            source: opts.source,
            maxAuthors: opts.maxAuthors,
            aasMacros: opts.aasMacros,
            arxivStubs: opts.arxivStubs,
            fresh: opts.fresh,
            timeout: opts.timeout,
            retries: opts.retries,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        }, opts.config);
        if (!context) return;

        const logger = getLogger();

        try {
            const summary = await buildBibliography(paths, context.config, { apiKey: context.apiKey });

            console.log(`\n📚 ${summary.output}\n`);
            console.log(`  Cite keys: ${summary.keys.length}`);
            console.log(`  Added:     ${summary.found.length}`);
            console.log(`  Present:   ${summary.skipped.length}`);
            console.log(`  Failed:    ${summary.failed.length}`);

            if (summary.failed.length > 0) {
                console.log('\n  Not found (add these by hand):');
                for (const key of summary.failed) {
                    console.log(`    ${key}`);
                }
                console.log('');
                process.exitCode = 1;
                return;
            }

            console.log('');
        } catch (error) {
            logger.error({ error }, 'Build failed');
            process.exitCode = 1;
        }
    });

// ─── LOOKUP command ───────────────────────────────────────

program
    .command('lookup')
    .description('Fetch and print the BibTeX for a single key')
    .argument('<key>', 'INSPIRE texkey or ADS bibcode')
    .addOption(sourceOption())
    .option('-a, --max-authors <n>', 'Truncate author lists after n names (0 keeps all)', parseCount)
    .option('--aas-macros <sty>', 'Expand the journal macros defined in this AAS .sty file')
    .option('-c, --config <path>', 'Config file (default: citefetch.config.json)')
    .addOption(logLevelOption())
    .option('--json-logs', 'Output JSON logs')
    .action(async (key: string, opts: LookupCommandOptions) => {
        const context = await setup({
            source: opts.source,
            maxAuthors: opts.maxAuthors,
            aasMacros: opts.aasMacros,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        }, opts.config);
        if (!context) return;

        const { config, apiKey } = context;
        try {
            const looked = await lookupEntry(key, config, { apiKey });
            if (!looked) {
                getLogger().error({ key, source: config.source }, 'No record found');
                process.exitCode = 1;
                return;
            }

            getLogger().info({ key, label: looked.label }, 'Fetched');
            console.log(looked.entry);
        } catch (error) {
            getLogger().error({ error }, 'Lookup failed');
            process.exitCode = 1;
        }
    });

// ─── KEYS command ─────────────────────────────────────────

program
    .command('keys')
    .description('List the cite keys found in LaTeX sources')
    .argument('<paths...>', '.tex files or directories to scan')
    .action((paths: string[]) => {
        try {
            const { keys, warnings } = collectCiteKeys(paths);
            for (const warning of warnings) {
                console.error(warning);
            }
            for (const key of keys) {
                console.log(`${key}\t${classifyKey(key)}`);
            }
        } catch (error) {
            console.error('Key extraction failed:', error instanceof Error ? error.message : error);
            process.exitCode = 1;
        }
    });

await program.parseAsync();
