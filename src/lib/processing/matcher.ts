import type { MatchResult, TranslationMap } from '@/types';
import { NORMALIZATION_METHODS } from './text-normalizer';

/**
 * Resolve a source string against the translation map.
 *
 * 1. Exact key lookup. A hit with an empty target stops here ('empty translation').
 * 2. Normalization cascade, method-major: each method is tried against every key
 *    before the next method is considered. First key (in map order) wins.
 * 3. 'no match'.
 */
export function smartMatch(text: string, mapping: TranslationMap): MatchResult {
    if (typeof text !== 'string' || text.trim() === '') {
        return { translation: null, method: 'invalid text' };
    }

    const direct = mapping.get(text);
    if (direct !== undefined) {
        return direct.trim() !== ''
            ? { translation: direct, method: 'direct', matchedKey: text }
            : { translation: null, method: 'empty translation', matchedKey: text };
    }

    for (const [method, normalize] of NORMALIZATION_METHODS) {
        const wanted = normalize(text);
        for (const [key, translation] of mapping) {
            if (normalize(key) === wanted && translation.trim() !== '') {
                return { translation, method, matchedKey: key };
            }
        }
    }

    return { translation: null, method: 'no match' };
}

export function isTranslated(result: MatchResult): result is MatchResult & { translation: string } {
    return result.translation !== null;
}

// Log line for one match
export function describeMatch(text: string, result: MatchResult): string {
    if (!isTranslated(result)) return `"${text}" -> (${result.method})`;
    const via = result.matchedKey !== undefined && result.matchedKey !== text ? ` via "${result.matchedKey}"` : '';
    return `"${text}" -> "${result.translation}" [${result.method}]${via}`;
}
