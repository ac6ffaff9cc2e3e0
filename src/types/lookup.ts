/**
 * Shape a citation key is recognized as. "unknown" keys are looked up as
 * INSPIRE texkeys.
 */
export type KeyKind = 'ads-bibcode' | 'inspire-key' | 'unknown';

/**
 * Identifiers INSPIRE records for a texkey that point into ADS.
 * Either, both, or neither may be present.
 */
export interface CrossReference {
    /** ADS bibcode (e.g., "1998AdTMP...2..231M") */
    bibcode: string | null;

    /** arXiv eprint identifier (e.g., "hep-th/9711200") */
    arxivId: string | null;
}

/**
 * Outcome of one key resolution. A record always travels with the label of
 * the path that produced it.
 */
export type LookupResult =
    | {
          status: 'found';
          /** Raw BibTeX entry as returned by the service */
          bibtex: string;
          /** Provenance, e.g. "ADS via arXiv (2301.01234)" */
          label: string;
      }
    | { status: 'missed' };

export const MISSED: LookupResult = { status: 'missed' };

export function found(bibtex: string, label: string): LookupResult {
    return { status: 'found', bibtex, label };
}
