/**
 * Barrel export for all shared types.
 */
export {
    DEFAULT_CONFIG,
    SOURCE_PREFERENCES,
    LOG_LEVELS,
    configSchema,
    sourcePreferenceSchema,
    logLevelSchema,
    isSourcePreference,
    isLogLevel,
} from './config.js';
export type { CitefetchConfig, SourcePreference, LogLevel } from './config.js';
export { MISSED, found } from './lookup.js';
export type { KeyKind, CrossReference, LookupResult } from './lookup.js';
export type { BibliographicServices, SourceAdapterOptions } from './source-adapter.js';
