/**
 * Wsymb2 weather symbol descriptions (1–27).
 */

import symbolTable from './data/symbols.json';

const SYMBOLS: Readonly<Record<string, string>> = symbolTable;

export const MIN_SYMBOL_CODE = 1;
export const MAX_SYMBOL_CODE = 27;

const THUNDER_SYMBOLS = new Set([11, 21]);

/**
 * English description of a symbol code, or undefined for 0 (absent) and
 * codes outside the published range.
 */
export function describeSymbol(code: number): string | undefined {
    if (!Number.isInteger(code) || code < MIN_SYMBOL_CODE || code > MAX_SYMBOL_CODE) {
        return undefined;
    }
    return SYMBOLS[String(code)];
}

export function isThunderSymbol(code: number): boolean {
    return THUNDER_SYMBOLS.has(code);
}
