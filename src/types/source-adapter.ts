import type { CrossReference } from './lookup.js';

/**
 * Lookup primitives the fetch strategies are composed from.
 * Every method resolves to null (or an empty cross-reference) on any failure;
 * none of them reject.
 */
export interface BibliographicServices {
    /** INSPIRE BibTeX for a texkey */
    fetchInspireBibtex(key: string): Promise<string | null>;

    /** ADS BibTeX export for a single bibcode */
    fetchAdsBibtex(bibcode: string): Promise<string | null>;

    /** First ADS bibcode matching an arXiv identifier */
    searchAdsBibcodeByArxiv(arxivId: string): Promise<string | null>;

    /** ADS bibcode and arXiv id recorded by INSPIRE for a texkey */
    resolveAdsInfoFromInspire(key: string): Promise<CrossReference>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;
}
