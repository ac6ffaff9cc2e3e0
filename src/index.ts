/**
 * Programmatic API. The `citefetch` binary lives in ./cli/index.ts.
 */
export {
    fetchBibtex,
    fetchBibtexAdsPreferred,
    fetchBibtexInspirePreferred,
    fetchBibtexAuto,
    createServices,
    STRATEGIES,
} from './resolver/fetch-orchestrator.js';
export type { FetchStrategy } from './resolver/fetch-orchestrator.js';
export { isAdsBibcode, isInspireKey, classifyKey } from './resolver/key-classifier.js';
export { InspireAdapter } from './sources/inspire.js';
export { AdsAdapter } from './sources/ads.js';
export { extractCiteKeys } from './latex/cite-keys.js';
export type { CiteKeyExtraction } from './latex/cite-keys.js';
export {
    extractExistingBibKeys,
    extractBibtexKey,
    extractBibtexFields,
    replaceBibtexKey,
    truncateAuthors,
    makeArxivCrossrefStub,
} from './bibtex/entries.js';
export { parseAasMacros, findUsedMacros, expandAasMacros } from './bibtex/aas-macros.js';
export type { AasMacros } from './bibtex/aas-macros.js';
export {
    buildBibliography,
    collectCiteKeys,
    collectTexFiles,
    loadMacros,
    lookupEntry,
    prepareEntry,
} from './builder/bib-builder.js';
export type { BuildOptions, BuildSummary } from './builder/bib-builder.js';
export { HttpClient, HttpError, createHttpClient, getHttpClient } from './utils/http-client.js';
export { parseConfigObject, resolveConfig } from './utils/config.js';
export * from './types/index.js';
