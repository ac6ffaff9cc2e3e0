import type { SourceAdapterOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { asArray, describeError, getPath, stringField } from './utils.js';

const ADS_BASE = 'https://api.adsabs.harvard.edu/v1';

/** ADS answers an unknown bibcode with 200 and this text in `export`. */
const NOT_FOUND_MARKER = 'No records';

/**
 * NASA ADS API adapter: BibTeX export and arXiv-to-bibcode search.
 * Every request carries the bearer token given at construction.
 *
 * @see https://ui.adsabs.harvard.edu/help/api/
 */
export class AdsAdapter {
    private httpClient: HttpClient;
    private apiKey: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['ADS_API_KEY'] ?? '';
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /**
     * Export one bibcode as BibTeX. Null when the request fails, the export
     * is empty, or ADS reports no records.
     */
    async fetchBibtex(bibcode: string): Promise<string | null> {
        const url = `${ADS_BASE}/export/bibtex`;
        getLogger().debug({ url, bibcode }, 'ADS BibTeX export');

        try {
            const response = await this.httpClient.post(url, { bibcode: [bibcode] }, {
                source: 'ads',
                headers: this.authHeaders(),
            });
            const exported = stringField(response.data, 'export');
            if (!exported || exported.startsWith(NOT_FOUND_MARKER)) return null;
            return exported;
        } catch (error) {
            getLogger().debug({ bibcode, error: describeError(error) }, 'ADS BibTeX export failed');
            return null;
        }
    }

    /**
     * Bibcode of the first ADS record matching an arXiv identifier.
     */
    async searchBibcodeByArxiv(arxivId: string): Promise<string | null> {
        const params = new URLSearchParams({ q: `arXiv:${arxivId}`, fl: 'bibcode' });
        const url = `${ADS_BASE}/search/query?${params.toString()}`;
        getLogger().debug({ url }, 'ADS arXiv search');

        try {
            const response = await this.httpClient.get(url, {
                source: 'ads',
                headers: this.authHeaders(),
            });
            const [firstDoc] = asArray(getPath(response.data, 'response', 'docs'));
            return firstDoc === undefined ? null : stringField(firstDoc, 'bibcode');
        } catch (error) {
            getLogger().debug({ arxivId, error: describeError(error) }, 'ADS arXiv search failed');
            return null;
        }
    }

    private authHeaders(): Record<string, string> {
        return { Authorization: `Bearer ${this.apiKey}` };
    }
}
