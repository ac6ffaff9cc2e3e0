import type { BibliographicServices, CrossReference, LookupResult, SourcePreference } from '../types/index.js';
import { MISSED, found, isSourcePreference } from '../types/index.js';
import { AdsAdapter } from '../sources/ads.js';
import { InspireAdapter } from '../sources/inspire.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isAdsBibcode } from './key-classifier.js';

/**
 * A fetch strategy: an ordered list of lookups that stops at the first
 * non-empty record.
 */
export type FetchStrategy = (key: string, services: BibliographicServices) => Promise<LookupResult>;

/**
 * Wire the INSPIRE and ADS adapters into the lookup primitives the
 * strategies use.
 */
export function createServices(apiKey: string, httpClient?: HttpClient): BibliographicServices {
    const inspire = new InspireAdapter();
    const ads = new AdsAdapter({ apiKey });
    if (httpClient) {
        inspire.setHttpClient(httpClient);
        ads.setHttpClient(httpClient);
    }

    return {
        fetchInspireBibtex: (key) => inspire.fetchBibtex(key),
        fetchAdsBibtex: (bibcode) => ads.fetchBibtex(bibcode),
        searchAdsBibcodeByArxiv: (arxivId) => ads.searchBibcodeByArxiv(arxivId),
        resolveAdsInfoFromInspire: (key) => inspire.resolveCrossReference(key),
    };
}

// ─── Single attempts ─────────────────────────────────────

async function attemptInspire(services: BibliographicServices, key: string, label: string): Promise<LookupResult> {
    const bibtex = await services.fetchInspireBibtex(key);
    getLogger().debug({ key, label, hit: bibtex !== null }, 'INSPIRE attempt');
    return bibtex ? found(bibtex, label) : MISSED;
}

async function attemptAds(services: BibliographicServices, bibcode: string, label: string): Promise<LookupResult> {
    const bibtex = await services.fetchAdsBibtex(bibcode);
    getLogger().debug({ bibcode, label, hit: bibtex !== null }, 'ADS attempt');
    return bibtex ? found(bibtex, label) : MISSED;
}

async function attemptAdsViaArxiv(services: BibliographicServices, arxivId: string, label: string): Promise<LookupResult> {
    const bibcode = await services.searchAdsBibcodeByArxiv(arxivId);
    getLogger().debug({ arxivId, bibcode }, 'ADS arXiv search');
    if (!bibcode) return MISSED;
    return attemptAds(services, bibcode, label);
}

interface CrossReferenceLabels {
    viaInspire: (bibcode: string) => string;
    viaArxiv: (arxivId: string) => string;
}

/**
 * Resolve INSPIRE's cross-reference for `key`, then try the ADS bibcode and
 * the arXiv search in that order. A bibcode whose export misses still falls
 * through to the arXiv path.
 */
async function attemptCrossReference(
    services: BibliographicServices,
    key: string,
    labels: CrossReferenceLabels
): Promise<LookupResult> {
    const crossReference: CrossReference = await services.resolveAdsInfoFromInspire(key);
    getLogger().debug({ key, ...crossReference }, 'INSPIRE cross-reference');

    if (crossReference.bibcode) {
        const result = await attemptAds(services, crossReference.bibcode, labels.viaInspire(crossReference.bibcode));
        if (result.status === 'found') return result;
    }

    if (crossReference.arxivId) {
        return attemptAdsViaArxiv(services, crossReference.arxivId, labels.viaArxiv(crossReference.arxivId));
    }

    return MISSED;
}

// ─── Strategies ──────────────────────────────────────────

/**
 * ADS first: the key as a bibcode, then ADS through INSPIRE's cross-reference,
 * then the raw key as a bibcode regardless of shape, then INSPIRE itself.
 */
export async function fetchBibtexAdsPreferred(key: string, services: BibliographicServices): Promise<LookupResult> {
    if (isAdsBibcode(key)) {
        const direct = await attemptAds(services, key, 'ADS (direct)');
        if (direct.status === 'found') return direct;
    }

    const crossReferenced = await attemptCrossReference(services, key, {
        viaInspire: (bibcode) => `ADS via INSPIRE (${bibcode})`,
        viaArxiv: (arxivId) => `ADS via arXiv (${arxivId})`,
    });
    if (crossReferenced.status === 'found') return crossReferenced;

    const directFallback = await attemptAds(services, key, 'ADS (direct fallback)');
    if (directFallback.status === 'found') return directFallback;

    return attemptInspire(services, key, 'INSPIRE (fallback)');
}

/**
 * INSPIRE first, then ADS through INSPIRE's cross-reference.
 */
export async function fetchBibtexInspirePreferred(key: string, services: BibliographicServices): Promise<LookupResult> {
    const inspire = await attemptInspire(services, key, 'INSPIRE');
    if (inspire.status === 'found') return inspire;

    return attemptCrossReference(services, key, {
        viaInspire: () => 'ADS (fallback, via INSPIRE)',
        viaArxiv: () => 'ADS (fallback, via arXiv)',
    });
}

/**
 * Whichever service the key's shape points to, then the other.
 */
export async function fetchBibtexAuto(key: string, services: BibliographicServices): Promise<LookupResult> {
    if (isAdsBibcode(key)) {
        const ads = await attemptAds(services, key, 'ADS (auto)');
        if (ads.status === 'found') return ads;
        return attemptInspire(services, key, 'INSPIRE (fallback)');
    }

    const inspire = await attemptInspire(services, key, 'INSPIRE (auto)');
    if (inspire.status === 'found') return inspire;

    return attemptCrossReference(services, key, {
        viaInspire: () => 'ADS (fallback, via INSPIRE)',
        viaArxiv: () => 'ADS (fallback, via arXiv)',
    });
}

export const STRATEGIES: Record<SourcePreference, FetchStrategy> = {
    ads: fetchBibtexAdsPreferred,
    inspire: fetchBibtexInspirePreferred,
    auto: fetchBibtexAuto,
};

/**
 * Resolve one citation key with the named strategy.
 *
 * An unrecognized strategy name runs the ADS-preferred strategy; the CLI
 * restricts the name before it gets here.
 */
export async function fetchBibtex(
    key: string,
    apiKey: string,
    source: string = 'ads',
    services: BibliographicServices = createServices(apiKey)
): Promise<LookupResult> {
    if (!isSourcePreference(source)) {
        getLogger().warn({ source }, 'Unknown source preference, using ads');
        return STRATEGIES.ads(key, services);
    }
    return STRATEGIES[source](key, services);
}
