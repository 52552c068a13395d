/**
 * Translation Table Loader
 *
 * Turns rows of a 2- or 3-column table into a source -> target map.
 *   3+ columns: [#, source, target, ...]
 *   2 columns:  [source, target]
 * Placeholder targets are dropped; the last row for a source wins.
 */

import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { TableCell, TableRow, TranslationMap } from '@/types';
import { createSilentLogger, type Logger } from '@/lib/logger';
import { ErrorCode, ProcessingError, createAppError, errorLogContext, toAppError } from '@/lib/errors/types';

export const PLACEHOLDER_TARGETS: ReadonlySet<string> = new Set(['', 'nan', 'none', 'null', 'n/a', 'na']);

const CsvRowsSchema = z.array(z.array(z.string()));

export function cellToString(cell: TableCell): string {
    if (cell === null || cell === undefined) return '';
    if (cell instanceof Date) return cell.toISOString();
    return String(cell);
}

export function isPlaceholderTarget(value: string): boolean {
    return PLACEHOLDER_TARGETS.has(value.trim().toLowerCase());
}

/**
 * Column indexes of source and target for a row, or null if the row is too narrow
 */
export function columnLayout(width: number): { source: number; target: number } | null {
    if (width >= 3) return { source: 1, target: 2 };
    if (width === 2) return { source: 0, target: 1 };
    return null;
}

export function loadTranslationMap(rows: Iterable<TableRow>, logger: Logger = createSilentLogger()): TranslationMap {
    const mapping: TranslationMap = new Map();
    let rowNumber = 0;

    for (const row of rows) {
        rowNumber++;
        const layout = columnLayout(row.length);
        if (!layout) {
            logger.warn(`Row ${rowNumber}: expected at least 2 columns, got ${row.length}`);
            continue;
        }

        const source = cellToString(row[layout.source]).trim();
        const target = cellToString(row[layout.target]).trim();

        if (!source) {
            logger.debug(`Row ${rowNumber}: empty source, skipped`);
            continue;
        }
        if (isPlaceholderTarget(target)) {
            logger.debug(`Row ${rowNumber}: no translation for "${source}"`);
            continue;
        }
        if (mapping.has(source)) {
            logger.debug(`Row ${rowNumber}: "${source}" redefined`);
        }
        mapping.set(source, target);
    }

    logger.info(`Loaded ${mapping.size} translations from ${rowNumber} rows`);
    return mapping;
}

// ============================================================================
// FILE READERS
// ============================================================================

function padRow(cells: string[], width: number): string[] {
    while (cells.length < width) cells.push('');
    return cells;
}

/**
 * Data rows of the first worksheet (header row skipped), padded to the header width
 */
export async function readXlsxRows(filePath: string): Promise<string[][]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    const worksheet = workbook.worksheets[0];
    if (!worksheet) {
        throw new ProcessingError(ErrorCode.TABLE_EMPTY, `Workbook ${filePath} has no worksheet`, { filePath });
    }

    const headerWidth = worksheet.getRow(1).cellCount;
    const rows: string[][] = [];

    worksheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) return;
        const cells: string[] = [];
        for (let col = 1; col <= row.cellCount; col++) {
            cells.push(row.getCell(col).text ?? '');
        }
        rows.push(padRow(cells, headerWidth));
    });

    return rows;
}

/**
 * Data rows of a CSV file (header row skipped), padded to the header width
 */
export async function readCsvRows(filePath: string): Promise<string[][]> {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed = CsvRowsSchema.safeParse(parse(content, {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: true
    }));
    if (!parsed.success) {
        throw new ProcessingError(ErrorCode.TABLE_PARSE_FAILED, `Unexpected CSV structure in ${filePath}`, { filePath });
    }

    const [header, ...rows] = parsed.data;
    const headerWidth = header?.length ?? 0;
    return rows.map(row => padRow([...row], headerWidth));
}

export async function readTableRows(filePath: string): Promise<string[][]> {
    const extension = path.extname(filePath).toLowerCase();
    switch (extension) {
        case '.xlsx':
            return readXlsxRows(filePath);
        case '.csv':
            return readCsvRows(filePath);
        default:
            throw new ProcessingError(ErrorCode.TABLE_UNSUPPORTED_FORMAT, `Unsupported table format "${extension}"`, { filePath });
    }
}

/**
 * Load a translation table file. A missing or unreadable file yields an empty map;
 * callers treat an empty map as fatal.
 */
export async function loadTranslationTableFile(filePath: string, logger: Logger = createSilentLogger()): Promise<TranslationMap> {
    try {
        await fs.access(filePath);
    } catch (e) {
        const appError = createAppError(ErrorCode.TABLE_NOT_FOUND, `Translation table not found: ${filePath}`, { filePath }, e instanceof Error ? e : undefined);
        logger.error(appError.message, errorLogContext(appError));
        return new Map();
    }

    try {
        const rows = await readTableRows(filePath);
        return loadTranslationMap(rows, logger);
    } catch (e) {
        const appError = toAppError(e, ErrorCode.TABLE_PARSE_FAILED, { filePath });
        logger.error(`Cannot read translation table ${filePath}: ${appError.message}`, errorLogContext(appError));
        return new Map();
    }
}
