import ExcelJS from 'exceljs';
import path from 'path';
import type { AcceptedText, ExtractionReport } from '@/types';

export const TEXT_SHEET = 'Texts';
export const PROVENANCE_SHEET = 'Provenance';

// The text sheet doubles as the translation table: # / Source / Translation
const TEXT_COLUMNS: Partial<ExcelJS.Column>[] = [
    { header: '#', key: 'index', width: 8 },
    { header: 'Source', key: 'source', width: 60 },
    { header: 'Translation', key: 'translation', width: 60 }
];

const PROVENANCE_COLUMNS: Partial<ExcelJS.Column>[] = [
    { header: 'Text', key: 'text', width: 40 },
    { header: 'File', key: 'file', width: 30 },
    { header: 'Region', key: 'region', width: 20 },
    { header: 'Region Name', key: 'regionName', width: 20 },
    { header: 'Handle', key: 'handle', width: 10 },
    { header: 'Field', key: 'field', width: 8 },
    { header: 'Kind', key: 'kind', width: 22 },
    { header: 'Layer', key: 'layer', width: 20 },
    { header: 'X', key: 'x', width: 12 },
    { header: 'Y', key: 'y', width: 12 },
    { header: 'Height', key: 'height', width: 10 },
    { header: 'Rotation', key: 'rotation', width: 10 },
    { header: 'Style', key: 'style', width: 20 },
    { header: 'Group Code', key: 'groupCode', width: 10 }
];

export interface ProvenanceEntry extends AcceptedText {
    file?: string;
}

function provenanceRow(entry: ProvenanceEntry): Record<string, string | number | undefined> {
    const { record } = entry;
    const file = entry.file ? path.basename(entry.file) : undefined;

    if (record.sourceRegion === 'raw-record') {
        return { text: entry.text, file, region: record.sourceRegion, groupCode: record.groupCode };
    }
    return {
        text: entry.text,
        file,
        region: record.sourceRegion,
        regionName: record.regionName,
        handle: record.entityHandle,
        field: record.field,
        kind: record.entityKind,
        layer: record.layer,
        x: record.position?.x,
        y: record.position?.y,
        height: record.height,
        rotation: record.rotation,
        style: record.style
    };
}

/**
 * Texts to translate plus where each one was found
 */
export function buildExtractionWorkbook(texts: readonly string[], provenance: readonly ProvenanceEntry[] = []): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();

    const sheet = workbook.addWorksheet(TEXT_SHEET);
    sheet.columns = TEXT_COLUMNS;
    sheet.getRow(1).font = { bold: true };
    texts.forEach((text, i) => sheet.addRow({ index: i + 1, source: text, translation: '' }));

    if (provenance.length > 0) {
        const details = workbook.addWorksheet(PROVENANCE_SHEET);
        details.columns = PROVENANCE_COLUMNS;
        details.getRow(1).font = { bold: true };
        provenance.forEach(entry => details.addRow(provenanceRow(entry)));
    }

    return workbook;
}

/**
 * Merge reports: texts deduplicated across files in first-appearance order
 */
export function mergeReports(reports: readonly ExtractionReport[]): { texts: string[]; provenance: ProvenanceEntry[] } {
    const seen = new Set<string>();
    const texts: string[] = [];
    const provenance: ProvenanceEntry[] = [];

    for (const report of reports) {
        for (const text of report.texts) {
            if (!seen.has(text)) {
                seen.add(text);
                texts.push(text);
            }
        }
        provenance.push(...report.records.map(entry => ({ ...entry, file: report.sourcePath })));
    }

    return { texts, provenance };
}

export async function writeExtractionWorkbook(
    filePath: string,
    texts: readonly string[],
    provenance: readonly ProvenanceEntry[] = []
): Promise<void> {
    await buildExtractionWorkbook(texts, provenance).xlsx.writeFile(filePath);
}
