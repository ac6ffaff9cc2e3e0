import type { KeyKind } from '../types/index.js';

/**
 * ADS bibcodes are 19 characters: year, journal, volume, section, page and
 * first-author initial (e.g., "2016PhRvL.116f1102A"). Only the ends are fixed
 * enough to test; the length floor rejects short accidental matches.
 */
const ADS_BIBCODE_PATTERN = /^\d{4}[A-Za-z&.]+\..*[A-Z]$/;
const ADS_BIBCODE_MIN_LENGTH = 15;

/**
 * INSPIRE texkeys: surname, colon, year, 2-3 lowercase letters
 * (e.g., "Maldacena:1997re").
 */
const INSPIRE_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9-]+:\d{4}[a-z]{2,3}$/;

export function isAdsBibcode(key: string): boolean {
    return ADS_BIBCODE_PATTERN.test(key) && key.length >= ADS_BIBCODE_MIN_LENGTH;
}

export function isInspireKey(key: string): boolean {
    return INSPIRE_KEY_PATTERN.test(key);
}

/**
 * Classify a citation key. The bibcode test wins when both match.
 */
export function classifyKey(key: string): KeyKind {
    if (isAdsBibcode(key)) return 'ads-bibcode';
    if (isInspireKey(key)) return 'inspire-key';
    return 'unknown';
}
