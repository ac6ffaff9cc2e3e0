import { escapeRegExp } from '../utils/text.js';

/** \def\apj{\ref@jnl{ApJ}} */
const JOURNAL_MACRO_PATTERN = /\\def\\(\w+)\{\\ref@jnl\{([^}]+)\}\}/g;

/** \def\alias{\original} and \let\alias \original */
const ALIAS_PATTERN = /\\(?:def|let)\\(\w+)[{ \\]\\(\w+)[}]?/g;

/**
 * Macro name (without backslash) to journal abbreviation.
 */
export type AasMacros = Record<string, string>;

/**
 * Parse journal macro definitions out of an AAS .sty file.
 * Aliases resolve only to macros defined by \ref@jnl, in file order.
 */
export function parseAasMacros(styContent: string): AasMacros {
    const macros: AasMacros = {};

    for (const [, name, journal] of styContent.matchAll(JOURNAL_MACRO_PATTERN)) {
        if (name && journal) macros[name] = journal;
    }

    for (const [, alias, original] of styContent.matchAll(ALIAS_PATTERN)) {
        if (!alias || !original || Object.hasOwn(macros, alias) || !Object.hasOwn(macros, original)) continue;
        const journal = macros[original];
        if (journal !== undefined) macros[alias] = journal;
    }

    return macros;
}

function macroPattern(name: string, flags = ''): RegExp {
    return new RegExp(`\\\\${escapeRegExp(name)}(?!\\w)`, flags);
}

/**
 * The subset of `macros` that appears in `bibtex` as \name not followed by
 * another word character.
 */
export function findUsedMacros(bibtex: string, macros: AasMacros): AasMacros {
    const used: AasMacros = {};
    for (const [name, journal] of Object.entries(macros)) {
        if (macroPattern(name).test(bibtex)) used[name] = journal;
    }
    return used;
}

/**
 * Replace every macro occurrence with its journal string, so {\apj}
 * becomes {ApJ}.
 */
export function expandAasMacros(bibtex: string, macros: AasMacros): string {
    let expanded = bibtex;
    for (const [name, journal] of Object.entries(macros)) {
        expanded = expanded.replace(macroPattern(name, 'g'), () => journal);
    }
    return expanded;
}
