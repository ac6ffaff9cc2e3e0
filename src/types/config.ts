import { z } from 'zod';

/**
 * Fetch strategies. Each names the service tried first.
 */
export const SOURCE_PREFERENCES = ['ads', 'inspire', 'auto'] as const;

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export const sourcePreferenceSchema = z.enum(SOURCE_PREFERENCES);
export const logLevelSchema = z.enum(LOG_LEVELS);

const countSchema = z.number().int().min(0);

/**
 * Full citefetch configuration merged from CLI flags, env vars, and config file.
 * Every field but `aasMacros` has a default.
 */
export const configSchema = z.object({
    // Source strategy
    source: sourcePreferenceSchema.default('ads'),

    // Output
    output: z.string().min(1).default('references.bib'),

    // Record rewriting
    /** Keep at most this many authors, then "others". 0 disables truncation. */
    maxAuthors: countSchema.default(0),
    /** Path to an AAS macro .sty file whose journal macros are expanded inline */
    aasMacros: z.string().min(1).optional(),
    /** Write @misc{<eprint>, crossref = {<key>}} stubs next to fetched records */
    arxivStubs: z.boolean().default(false),
    /** Rewrite the output file instead of appending to it */
    fresh: z.boolean().default(false),

    // Transport
    timeout: countSchema.default(30000),
    retries: countSchema.default(3),

    // Logging
    logLevel: logLevelSchema.default('info'),
    jsonLogs: z.boolean().default(false),
});

export type SourcePreference = z.infer<typeof sourcePreferenceSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type CitefetchConfig = z.infer<typeof configSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CitefetchConfig = configSchema.parse({});

export function isSourcePreference(value: unknown): value is SourcePreference {
    return sourcePreferenceSchema.safeParse(value).success;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return logLevelSchema.safeParse(value).success;
}
