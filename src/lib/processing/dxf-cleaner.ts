/**
 * DXF Cleaner
 *
 * Layer names with characters CAD programs refuse (encoding leftovers such as `?`,
 * control characters, an empty name on SEQEND) keep a drawing from opening.
 * Cleaning rewrites only those values so the drawing can be opened again.
 */

import { splitDxfLines } from './dxf-tags';

export interface LayerNameFix {
    /** 1-based line of the layer value */
    line: number;
    from: string;
    to: string;
}

export interface CleanedContent {
    content: string;
    fixes: LayerNameFix[];
}

export const DEFAULT_LAYER = '0';

const MAX_LAYER_NAME = 255;

// Characters not allowed in symbol table names, plus control and replacement characters
const INVALID_LAYER_CHAR = /[<>/\\":;?*|,=`\u0000-\u001F\uFFFD]/;
const INVALID_LAYER_CHARS = new RegExp(INVALID_LAYER_CHAR.source, 'g');

export function isValidLayerName(value: string): boolean {
    const name = value.trim();
    return name.length > 0 && name.length <= MAX_LAYER_NAME && !INVALID_LAYER_CHAR.test(name);
}

export function cleanLayerName(value: string): string {
    const cleaned = value.replace(INVALID_LAYER_CHARS, '').trim();
    return cleaned ? cleaned.slice(0, MAX_LAYER_NAME) : DEFAULT_LAYER;
}

/**
 * Rewrite invalid layer names (group code 8). Every other line is kept as it is.
 */
export function cleanDrawingContent(content: string): CleanedContent {
    const lines = splitDxfLines(content);
    const fixes: LayerNameFix[] = [];

    for (let i = 0; i + 1 < lines.length; i += 2) {
        if (lines[i].trim() !== '8') continue;
        const value = lines[i + 1];
        if (isValidLayerName(value)) continue;

        const cleaned = cleanLayerName(value);
        lines[i + 1] = cleaned;
        fixes.push({ line: i + 2, from: value, to: cleaned });
    }

    return { content: lines.join('\n') + '\n', fixes };
}
