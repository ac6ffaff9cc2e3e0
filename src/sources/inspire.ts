import type { CrossReference } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { asArray, describeError, getPath, stringField } from './utils.js';

const INSPIRE_BASE = 'https://inspirehep.net/api';

const NO_CROSS_REFERENCE: CrossReference = { bibcode: null, arxivId: null };

/**
 * INSPIRE-HEP literature API adapter.
 * Looks records up by texkey, either as BibTeX or as JSON metadata.
 *
 * @see https://github.com/inspirehep/rest-api-doc
 */
export class InspireAdapter {
    private httpClient: HttpClient;

    constructor() {
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /**
     * Fetch the BibTeX record for a texkey. Null when the request fails or
     * the body is blank.
     */
    async fetchBibtex(key: string): Promise<string | null> {
        const url = this.literatureUrl(key);
        getLogger().debug({ url }, 'INSPIRE BibTeX lookup');

        try {
            const response = await this.httpClient.get(url, {
                source: 'inspire',
                headers: { Accept: 'application/x-bibtex' },
            });
            if (typeof response.data !== 'string') return null;
            const bibtex = response.data.trim();
            return bibtex || null;
        } catch (error) {
            getLogger().debug({ key, error: describeError(error) }, 'INSPIRE BibTeX lookup failed');
            return null;
        }
    }

    /**
     * Read the ADS bibcode and arXiv eprint INSPIRE holds for a texkey.
     * Only the first hit is inspected.
     */
    async resolveCrossReference(key: string): Promise<CrossReference> {
        const url = this.literatureUrl(key);
        getLogger().debug({ url }, 'INSPIRE metadata lookup');

        let body: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: 'inspire',
                headers: { Accept: 'application/json' },
            });
            body = response.data;
        } catch (error) {
            getLogger().debug({ key, error: describeError(error) }, 'INSPIRE metadata lookup failed');
            return NO_CROSS_REFERENCE;
        }

        const [firstHit] = asArray(getPath(body, 'hits', 'hits'));
        if (firstHit === undefined) return NO_CROSS_REFERENCE;

        const metadata = getPath(firstHit, 'metadata');

        const adsIdentifier = asArray(getPath(metadata, 'external_system_identifiers'))
            .find((identifier) => stringField(identifier, 'schema') === 'ADS');
        const bibcode = adsIdentifier === undefined ? null : stringField(adsIdentifier, 'value');

        const [firstEprint] = asArray(getPath(metadata, 'arxiv_eprints'));
        const arxivId = firstEprint === undefined ? null : stringField(firstEprint, 'value');

        return { bibcode, arxivId };
    }

    private literatureUrl(key: string): string {
        // q=texkeys:<key>, colons percent-encoded
        const params = new URLSearchParams({ q: `texkeys:${key}` });
        return `${INSPIRE_BASE}/literature?${params.toString()}`;
    }
}
