/**
 * DXF Tag Layer
 *
 * ASCII DXF is a flat list of (group code, value) line pairs.
 * Strict parsing feeds the document model; tolerant scanning feeds the raw-record repair path.
 */

import { ErrorCode, ProcessingError } from '@/lib/errors/types';
import { fixEncoding } from './text-normalizer';

export interface DxfTag {
    code: number;
    value: string;
}

const GROUP_CODE = /^[+-]?\d+$/;

/**
 * Decode file bytes as UTF-8, dropping invalid bytes instead of failing
 */
export function decodeDxfBuffer(buffer: Uint8Array): string {
    const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });
    return fixEncoding(decoder.decode(buffer));
}

/**
 * Split DXF content into lines (BOM removed, line endings normalized)
 */
export function splitDxfLines(content: string): string[] {
    let clean = content;
    if (clean.charCodeAt(0) === 0xFEFF) {
        clean = clean.slice(1);
    }
    clean = clean.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    const lines = clean.split('\n');
    // Trailing newline after EOF
    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Strict parse: every code line must be an integer and every code needs a value.
 * Parsing stops at the 0/EOF pair; trailing lines after it are ignored.
 */
export function parseTags(content: string): DxfTag[] {
    const lines = splitDxfLines(content);
    if (lines.length === 0) {
        throw new ProcessingError(ErrorCode.DXF_EMPTY_FILE, 'DXF content is empty');
    }

    const tags: DxfTag[] = [];
    for (let i = 0; i < lines.length; i += 2) {
        const codeLine = lines[i].trim();
        if (!GROUP_CODE.test(codeLine)) {
            throw new ProcessingError(
                ErrorCode.DXF_INVALID_FORMAT,
                `Invalid group code "${codeLine.slice(0, 20)}" at line ${i + 1}`,
                { line: i + 1 }
            );
        }
        if (i + 1 >= lines.length) {
            throw new ProcessingError(ErrorCode.DXF_INVALID_FORMAT, `DXF has an odd number of lines (${lines.length}); last group code has no value`);
        }
        const tag = { code: parseInt(codeLine, 10), value: lines[i + 1] };
        tags.push(tag);
        if (tag.code === 0 && tag.value.trim() === 'EOF') break;
    }
    return tags;
}

/**
 * Tolerant scan over fixed line pairs. Pairs whose code line is not an integer are skipped;
 * values are trimmed.
 */
export function* scanTagPairs(content: string): Generator<DxfTag> {
    const lines = splitDxfLines(content);
    for (let i = 0; i + 1 < lines.length; i += 2) {
        const codeLine = lines[i].trim();
        if (!GROUP_CODE.test(codeLine)) continue;
        yield { code: parseInt(codeLine, 10), value: lines[i + 1].trim() };
    }
}

export function formatGroupCode(code: number): string {
    return String(code).padStart(3, ' ');
}

export function serializeTags(tags: readonly DxfTag[]): string {
    const lines: string[] = [];
    for (const tag of tags) {
        lines.push(formatGroupCode(tag.code), tag.value);
    }
    return lines.join('\n') + '\n';
}

/**
 * Format a float the way DXF writers usually do (always with a decimal point)
 */
export function formatDxfNumber(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function parseDxfNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
}
