import { describe, it, expect, vi } from 'vitest';
import {
    STRATEGIES,
    fetchBibtex,
    fetchBibtexAdsPreferred,
    fetchBibtexAuto,
    fetchBibtexInspirePreferred,
} from '../resolver/fetch-orchestrator.js';
import type { BibliographicServices, CrossReference } from '../types/index.js';

const TEXKEY = 'Maldacena:1997re';
const BIBCODE = '1998AdTMP...2..231M';
const ARXIV_ID = 'hep-th/9711200';
const LIGO_BIBCODE = '2016PhRvL.116f1102A';

const ADS_RECORD = '@ARTICLE{1998AdTMP...2..231M,\n  title = "{The Large N limit}"\n}';
const INSPIRE_RECORD = '@article{Maldacena:1997re,\n  title = "{The Large N limit}"\n}';

interface StubResponses {
    inspire?: Record<string, string>;
    ads?: Record<string, string>;
    arxiv?: Record<string, string>;
    crossReference?: Partial<CrossReference>;
}

/**
 * In-process stand-in for the INSPIRE and ADS adapters. Every call is
 * appended to `calls` as "<primitive>:<argument>".
 */
function stubServices(responses: StubResponses = {}) {
    const calls: string[] = [];
    const services = {
        fetchInspireBibtex: vi.fn(async (key: string) => {
            calls.push(`inspire:${key}`);
            return responses.inspire?.[key] ?? null;
        }),
        fetchAdsBibtex: vi.fn(async (bibcode: string) => {
            calls.push(`ads:${bibcode}`);
            return responses.ads?.[bibcode] ?? null;
        }),
        searchAdsBibcodeByArxiv: vi.fn(async (arxivId: string) => {
            calls.push(`arxiv:${arxivId}`);
            return responses.arxiv?.[arxivId] ?? null;
        }),
        resolveAdsInfoFromInspire: vi.fn(async (key: string): Promise<CrossReference> => {
            calls.push(`xref:${key}`);
            return { bibcode: null, arxivId: null, ...responses.crossReference };
        }),
    } satisfies BibliographicServices;
    return { services, calls };
}

/** Every primitive succeeds for every argument. */
function allSucceeding() {
    return stubServices({
        inspire: { [TEXKEY]: INSPIRE_RECORD, [LIGO_BIBCODE]: INSPIRE_RECORD },
        ads: { [BIBCODE]: ADS_RECORD, [LIGO_BIBCODE]: ADS_RECORD, [TEXKEY]: ADS_RECORD },
        arxiv: { [ARXIV_ID]: BIBCODE },
        crossReference: { bibcode: BIBCODE, arxivId: ARXIV_ID },
    });
}

describe('Fetch Orchestrator', () => {
    describe('ADS-preferred strategy', () => {
        it('should fetch a bibcode-shaped key directly from ADS', async () => {
            const { services, calls } = stubServices({ ads: { [LIGO_BIBCODE]: ADS_RECORD } });

            const result = await fetchBibtexAdsPreferred(LIGO_BIBCODE, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (direct)' });
            expect(calls).toEqual([`ads:${LIGO_BIBCODE}`]);
        });

        it('should use the bibcode INSPIRE cross-references', async () => {
            const { services, calls } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                crossReference: { bibcode: BIBCODE },
            });

            const result = await fetchBibtexAdsPreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: `ADS via INSPIRE (${BIBCODE})` });
            expect(calls).toEqual([`xref:${TEXKEY}`, `ads:${BIBCODE}`]);
        });

        it('should search ADS by arXiv id when INSPIRE has no bibcode', async () => {
            const { services, calls } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                arxiv: { [ARXIV_ID]: BIBCODE },
                crossReference: { arxivId: ARXIV_ID },
            });

            const result = await fetchBibtexAdsPreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: `ADS via arXiv (${ARXIV_ID})` });
            expect(calls).toEqual([`xref:${TEXKEY}`, `arxiv:${ARXIV_ID}`, `ads:${BIBCODE}`]);
        });

        it('should fall through to the arXiv path when the cross-referenced bibcode misses', async () => {
            const { services, calls } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                arxiv: { [ARXIV_ID]: BIBCODE },
                crossReference: { bibcode: '1998stale.........X', arxivId: ARXIV_ID },
            });

            const result = await fetchBibtexAdsPreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: `ADS via arXiv (${ARXIV_ID})` });
            expect(calls).toEqual([
                `xref:${TEXKEY}`,
                'ads:1998stale.........X',
                `arxiv:${ARXIV_ID}`,
                `ads:${BIBCODE}`,
            ]);
        });

        it('should try the raw key as a bibcode after the cross-reference misses', async () => {
            const { services, calls } = stubServices({ ads: { [TEXKEY]: ADS_RECORD } });

            const result = await fetchBibtexAdsPreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (direct fallback)' });
            expect(calls).toEqual([`xref:${TEXKEY}`, `ads:${TEXKEY}`]);
        });

        it('should fall back to INSPIRE last', async () => {
            const { services, calls } = stubServices({ inspire: { [TEXKEY]: INSPIRE_RECORD } });

            const result = await fetchBibtexAdsPreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE (fallback)' });
            expect(calls).toEqual([`xref:${TEXKEY}`, `ads:${TEXKEY}`, `inspire:${TEXKEY}`]);
        });

        it('should retry a bibcode-shaped key as a raw fallback after the direct attempt', async () => {
            const { services, calls } = stubServices();

            const result = await fetchBibtexAdsPreferred(LIGO_BIBCODE, services);

            expect(result).toEqual({ status: 'missed' });
            expect(calls).toEqual([
                `ads:${LIGO_BIBCODE}`,
                `xref:${LIGO_BIBCODE}`,
                `ads:${LIGO_BIBCODE}`,
                `inspire:${LIGO_BIBCODE}`,
            ]);
        });

        it('should prefer the earliest ADS step when every service succeeds', async () => {
            const forTexkey = allSucceeding();
            const forBibcode = allSucceeding();

            const texkeyResult = await fetchBibtexAdsPreferred(TEXKEY, forTexkey.services);
            const bibcodeResult = await fetchBibtexAdsPreferred(LIGO_BIBCODE, forBibcode.services);

            expect(texkeyResult).toEqual({ status: 'found', bibtex: ADS_RECORD, label: `ADS via INSPIRE (${BIBCODE})` });
            expect(bibcodeResult).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (direct)' });
            expect(forTexkey.services.fetchInspireBibtex).not.toHaveBeenCalled();
        });
    });

    describe('INSPIRE-preferred strategy', () => {
        it('should return the INSPIRE record when every service succeeds', async () => {
            const { services, calls } = allSucceeding();

            const result = await fetchBibtexInspirePreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE' });
            expect(calls).toEqual([`inspire:${TEXKEY}`]);
        });

        it('should fall back to ADS via the cross-referenced bibcode', async () => {
            const { services } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                crossReference: { bibcode: BIBCODE },
            });

            const result = await fetchBibtexInspirePreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (fallback, via INSPIRE)' });
        });

        it('should fall back to ADS via the arXiv id', async () => {
            const { services } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                arxiv: { [ARXIV_ID]: BIBCODE },
                crossReference: { arxivId: ARXIV_ID },
            });

            const result = await fetchBibtexInspirePreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (fallback, via arXiv)' });
        });

        it('should never use the key itself as a bibcode', async () => {
            const { services, calls } = stubServices({ ads: { [LIGO_BIBCODE]: ADS_RECORD } });

            const result = await fetchBibtexInspirePreferred(LIGO_BIBCODE, services);

            expect(result).toEqual({ status: 'missed' });
            expect(calls).toEqual([`inspire:${LIGO_BIBCODE}`, `xref:${LIGO_BIBCODE}`]);
            expect(services.fetchAdsBibtex).not.toHaveBeenCalled();
        });
    });

    describe('Auto strategy', () => {
        it('should go to ADS first for bibcode-shaped keys', async () => {
            const { services, calls } = allSucceeding();

            const result = await fetchBibtexAuto(LIGO_BIBCODE, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (auto)' });
            expect(calls).toEqual([`ads:${LIGO_BIBCODE}`]);
        });

        it('should fall back to INSPIRE for bibcode-shaped keys without a cross-reference', async () => {
            const { services, calls } = stubServices({ inspire: { [LIGO_BIBCODE]: INSPIRE_RECORD } });

            const result = await fetchBibtexAuto(LIGO_BIBCODE, services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE (fallback)' });
            expect(calls).toEqual([`ads:${LIGO_BIBCODE}`, `inspire:${LIGO_BIBCODE}`]);
        });

        it('should go to INSPIRE first for texkeys', async () => {
            const { services } = allSucceeding();

            const result = await fetchBibtexAuto(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE (auto)' });
        });

        it('should treat unknown keys like texkeys', async () => {
            const { services, calls } = stubServices({ inspire: { smith2020: INSPIRE_RECORD } });

            const result = await fetchBibtexAuto('smith2020', services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE (auto)' });
            expect(calls).toEqual(['inspire:smith2020']);
        });

        it('should recover a texkey through the INSPIRE cross-reference when INSPIRE BibTeX misses', async () => {
            const { services, calls } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                crossReference: { bibcode: BIBCODE },
            });

            const result = await fetchBibtexAuto(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (fallback, via INSPIRE)' });
            expect(calls).toEqual([`inspire:${TEXKEY}`, `xref:${TEXKEY}`, `ads:${BIBCODE}`]);
        });

        it('should recover a texkey through the arXiv search', async () => {
            const { services } = stubServices({
                ads: { [BIBCODE]: ADS_RECORD },
                arxiv: { [ARXIV_ID]: BIBCODE },
                crossReference: { arxivId: ARXIV_ID },
            });

            const result = await fetchBibtexAuto(TEXKEY, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (fallback, via arXiv)' });
        });
    });

    describe('when every service misses', () => {
        it.each(['ads', 'inspire', 'auto'] as const)('%s strategy should return a miss', async (name) => {
            for (const key of [TEXKEY, LIGO_BIBCODE, 'smith2020']) {
                const { services } = stubServices();
                await expect(STRATEGIES[name](key, services)).resolves.toEqual({ status: 'missed' });
            }
        });

        it('should stop after the arXiv search finds no bibcode', async () => {
            const { services, calls } = stubServices({ crossReference: { arxivId: ARXIV_ID } });

            const result = await fetchBibtexInspirePreferred(TEXKEY, services);

            expect(result).toEqual({ status: 'missed' });
            expect(calls).toEqual([`inspire:${TEXKEY}`, `xref:${TEXKEY}`, `arxiv:${ARXIV_ID}`]);
        });
    });

    describe('fetchBibtex', () => {
        it('should dispatch to the named strategy', async () => {
            const { services } = allSucceeding();

            const result = await fetchBibtex(TEXKEY, 'test-key', 'inspire', services);

            expect(result).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE' });
        });

        it('should default to the ADS-preferred strategy', async () => {
            const { services } = allSucceeding();

            const result = await fetchBibtex(TEXKEY, 'test-key', undefined, services);

            expect(result).toEqual({ status: 'found', bibtex: ADS_RECORD, label: `ADS via INSPIRE (${BIBCODE})` });
        });

        it('should run an unrecognized strategy name exactly like ads', async () => {
            const asAds = stubServices({ inspire: { [TEXKEY]: INSPIRE_RECORD } });
            const asUnknown = stubServices({ inspire: { [TEXKEY]: INSPIRE_RECORD } });

            const adsResult = await fetchBibtex(TEXKEY, 'test-key', 'ads', asAds.services);
            const unknownResult = await fetchBibtex(TEXKEY, 'test-key', 'semantic-scholar', asUnknown.services);

            expect(unknownResult).toEqual(adsResult);
            expect(unknownResult).toEqual({ status: 'found', bibtex: INSPIRE_RECORD, label: 'INSPIRE (fallback)' });
            expect(asUnknown.calls).toEqual(asAds.calls);
        });

        it('should be deterministic for fixed responses', async () => {
            const first = stubServices({ ads: { [BIBCODE]: ADS_RECORD }, crossReference: { bibcode: BIBCODE } });
            const second = stubServices({ ads: { [BIBCODE]: ADS_RECORD }, crossReference: { bibcode: BIBCODE } });

            const a = await fetchBibtex(TEXKEY, 'test-key', 'auto', first.services);
            const b = await fetchBibtex(TEXKEY, 'test-key', 'auto', second.services);

            expect(a).toEqual(b);
            expect(first.calls).toEqual(second.calls);
        });

        it('should resolve the documented round trips', async () => {
            const direct = stubServices({ ads: { [LIGO_BIBCODE]: ADS_RECORD } });
            await expect(fetchBibtex(LIGO_BIBCODE, 'test-key', 'ads', direct.services))
                .resolves.toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (direct)' });

            const viaInspire = stubServices({ ads: { [BIBCODE]: ADS_RECORD }, crossReference: { bibcode: BIBCODE } });
            await expect(fetchBibtex(TEXKEY, 'test-key', 'auto', viaInspire.services))
                .resolves.toEqual({ status: 'found', bibtex: ADS_RECORD, label: 'ADS (fallback, via INSPIRE)' });
        });
    });
});
