/**
 * Text Filter
 *
 * Two layers:
 * - Noise classification (isMeaningful): rejects values that look like DXF plumbing
 *   (numbers, coordinates, handles, layer tokens, record keywords). Used by every
 *   extraction source, including the raw-record repair path.
 * - TextFilter: the stricter gate applied by aggregation (length window, exclusion
 *   patterns, excluded layers, optional CJK-only).
 */

import type { FilterConfig } from '@/lib/validation';
import { cleanText, containsCjk } from './text-normalizer';

// ============================================================================
// NOISE RULES
// ============================================================================

export type NoiseRule =
    | 'empty'
    | 'numeric'
    | 'coordinates'
    | 'handle'
    | 'layer-name'
    | 'short-hex'
    | 'keyword'
    | 'too-short';

export const DEFAULT_NOISE_KEYWORDS: readonly string[] = [
    'SECTION', 'ENDSEC', 'HEADER', 'CLASSES', 'TABLES', 'BLOCKS', 'ENTITIES', 'OBJECTS', 'EOF',
    'LINE', 'CIRCLE', 'ARC', 'TEXT', 'MTEXT', 'INSERT', 'POLYLINE', 'LWPOLYLINE', 'POINT',
    'ELLIPSE', 'SPLINE', 'HATCH', 'DIMENSION', 'LEADER', 'VIEWPORT', 'ACDBTEXT', 'ACDBMTEXT'
];

export const DEFAULT_RESERVED_LAYERS: readonly string[] = ['0', 'DEFPOINTS', 'TEXT', 'DIM', 'HATCH'];

export const DEFAULT_LAYER_PREFIXES: readonly string[] = ['LAYER_', 'L_', 'LAY_'];

export interface NoiseFilterOptions {
    keywords?: readonly string[];
    reservedLayers?: readonly string[];
    layerPrefixes?: readonly string[];
    /** Values shorter than this are noise (default 2) */
    minLength?: number;
}

const NUMERIC_LITERAL = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?|nan|inf(?:inity)?)$/i;
const COORDINATE_PART = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;
const HEX = /^[0-9A-Fa-f]+$/;

function isCoordinateList(value: string): boolean {
    if (!value.includes(',')) return false;
    return value.split(',').every(part => COORDINATE_PART.test(part));
}

/**
 * First noise rule the value trips, or null for meaningful text.
 * Rules are checked in a fixed order; the first hit wins.
 */
export function classifyNoise(value: string, options: NoiseFilterOptions = {}): NoiseRule | null {
    const keywords = options.keywords ?? DEFAULT_NOISE_KEYWORDS;
    const reservedLayers = options.reservedLayers ?? DEFAULT_RESERVED_LAYERS;
    const layerPrefixes = options.layerPrefixes ?? DEFAULT_LAYER_PREFIXES;
    const minLength = options.minLength ?? 2;

    const text = (value ?? '').trim();

    if (text.length === 0) return 'empty';
    if (NUMERIC_LITERAL.test(text)) return 'numeric';
    if (isCoordinateList(text)) return 'coordinates';
    if (text.length <= 8 && HEX.test(text)) return 'handle';
    if (reservedLayers.includes(text) || layerPrefixes.some(prefix => text.startsWith(prefix))) return 'layer-name';
    if (text.length <= 4 && HEX.test(text)) return 'short-hex';
    if (keywords.some(keyword => keyword.toUpperCase() === text.toUpperCase())) return 'keyword';
    if (text.length < minLength) return 'too-short';

    return null;
}

export type NoisePredicate = (value: string) => boolean;

export function createNoiseFilter(options: NoiseFilterOptions = {}): NoisePredicate {
    return (value: string) => classifyNoise(value, options) === null;
}

export const isMeaningful: NoisePredicate = createNoiseFilter();

// ============================================================================
// TEXT FILTER
// ============================================================================

export const DEFAULT_EXCLUDE_PATTERNS: readonly RegExp[] = [
    /^\s*$/,                // Blank
    /^\d+$/,                // Digits only
    /^[A-Fa-f0-9]+$/,       // Hex only
    /^[\s\-_.]+$/,          // Separators only
    /^[\d\s\p{P}]+$/u,      // Digits and punctuation
    /^[A-Za-z]$/,           // Single letter
];

export interface TextFilterOptions extends Partial<FilterConfig> {
    /** Replaces the default exclusion patterns */
    excludePatterns?: readonly RegExp[];
    /** Added to the default (or replaced) exclusion patterns */
    extraPatterns?: readonly RegExp[];
}

export class TextFilter {
    readonly minLength: number;
    readonly maxLength: number;
    readonly excludePatterns: readonly RegExp[];
    private readonly excludedLayers: Set<string>;
    private readonly onlyCjk: boolean;

    constructor(options: TextFilterOptions = {}) {
        this.minLength = options.minLength ?? 1;
        this.maxLength = options.maxLength ?? 1000;
        this.excludePatterns = [...(options.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS), ...(options.extraPatterns ?? [])];
        this.excludedLayers = new Set((options.excludeLayers ?? []).map(layer => layer.toUpperCase()));
        this.onlyCjk = options.onlyCjk ?? false;
    }

    /**
     * Length window and exclusion patterns, plus the layer and CJK switches when a layer is known
     */
    isValid(text: string, layer?: string): boolean {
        if (typeof text !== 'string') return false;

        const trimmed = text.trim();
        if (trimmed.length < this.minLength || trimmed.length > this.maxLength) return false;
        if (this.excludePatterns.some(pattern => pattern.test(trimmed))) return false;
        if (layer !== undefined && this.excludedLayers.has(layer.toUpperCase())) return false;
        if (this.onlyCjk && !containsCjk(trimmed)) return false;

        return true;
    }

    /**
     * Valid texts, cleaned and deduplicated, in input order
     */
    filterTexts(texts: Iterable<string>): string[] {
        const seen = new Set<string>();
        const filtered: string[] = [];
        for (const text of texts) {
            if (!this.isValid(text)) continue;
            const cleaned = cleanText(text);
            if (cleaned && !seen.has(cleaned)) {
                seen.add(cleaned);
                filtered.push(cleaned);
            }
        }
        return filtered;
    }
}
