/**
 * Text Normalizer
 *
 * Whitespace normalization shared by extraction (cleanText) and matching
 * (the three normalization methods), plus MTEXT markup stripping.
 */

import type { NormalizationMethod } from '@/types';

/**
 * Collapse whitespace runs to one space, then trim
 */
export function cleanText(text: string): string {
    if (!text) return '';
    return text.replace(/\s+/g, ' ').trim();
}

export function stripAllWhitespace(text: string): string {
    return text.replace(/\s+/g, '');
}

export function singleSpace(text: string): string {
    return text.trim().replace(/\s+/g, ' ');
}

export function trimOnly(text: string): string {
    return text.trim();
}

// Order matters: the matcher tries them in this order against the whole table
export const NORMALIZATION_METHODS: ReadonlyArray<readonly [NormalizationMethod, (text: string) => string]> = [
    ['strip-all-whitespace', stripAllWhitespace],
    ['single-space', singleSpace],
    ['trim-only', trimOnly],
];

/**
 * Remove MTEXT inline formatting.
 * `\X...;` control sequences and `{...}` groups are deleted wholesale, not interpreted;
 * `\P` paragraph breaks become spaces.
 */
export function stripMTextFormatting(raw: string): string {
    if (!raw) return '';

    return raw
        .replace(/\\[A-Za-z][^;]*;/g, '')   // Font, color, stacking, ... codes
        .replace(/\{[^}]*\}/g, '')          // Grouping markers
        .replace(/\\P/g, ' ')               // Paragraph breaks
        .trim();
}

/**
 * Drop replacement characters left by tolerant decoding
 */
export function fixEncoding(text: string): string {
    if (!text) return '';
    return text.replace(/\ufffd/g, '');
}

export function containsCjk(text: string): boolean {
    return /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/.test(text);
}
