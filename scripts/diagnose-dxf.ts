/**
 * DXF Diagnostic Script
 * Prints the regions of a drawing and what each extraction strategy finds in it.
 *
 * Run with: npx tsx scripts/diagnose-dxf.ts <file.dxf>
 */

import path from 'path';
import { createLogger } from '@/lib/logger';
import { errorMessage } from '@/lib/errors/types';
import { openCleanDrawing, readDrawingContent } from '@/lib/processing/dxf-document';
import { extractFromContent } from '@/lib/processing/extraction-engine';
import { classifyNoise } from '@/lib/processing/text-filter';
import { scanTagPairs } from '@/lib/processing/dxf-tags';
import { DEFAULT_RAW_RECORD_CODES } from '@/lib/processing/dxf-text-extractor';

async function diagnose(filePath: string) {
    console.log('=== DXF Diagnostic Tool ===\n');
    console.log(`Reading: ${filePath}\n`);

    const content = await readDrawingContent(filePath);

    try {
        const { document, fixes } = openCleanDrawing(content, filePath);
        if (fixes.length > 0) {
            console.log('--- Layer names cleaned ---');
            fixes.forEach(fix => console.log(`line ${String(fix.line).padStart(6)}  "${fix.from}" -> "${fix.to}"`));
            console.log('');
        }
        console.log('--- Regions ---');
        for (const region of document.regions()) {
            const types: Record<string, number> = {};
            for (const entity of region.entities()) {
                types[entity.type] = (types[entity.type] ?? 0) + 1;
            }
            const breakdown = Object.entries(types).map(([type, count]) => `${type}:${count}`).join(' ');
            console.log(`${region.kind.padEnd(20)} ${region.name.padEnd(24)} ${breakdown || '(empty)'}`);
        }
        console.log(`\nStyles: ${document.styles.names().join(', ') || '(none)'}`);
    } catch (e) {
        console.log(`Structured open failed: ${errorMessage(e)}`);
    }

    // Why raw-record candidates were rejected
    const rejected: Record<string, number> = {};
    for (const { code, value } of scanTagPairs(content)) {
        if (!DEFAULT_RAW_RECORD_CODES.includes(code)) continue;
        const rule = classifyNoise(value);
        if (rule) rejected[rule] = (rejected[rule] ?? 0) + 1;
    }
    console.log('\n--- Raw record noise ---');
    Object.entries(rejected)
        .sort((a, b) => b[1] - a[1])
        .forEach(([rule, count]) => console.log(`${rule.padEnd(12)} ${count}`));

    const report = extractFromContent(content, {
        logger: createLogger({ level: 'warn' }),
        includeRawRecords: true
    }, filePath);

    console.log(`\n--- Strategies (${report.mode}) ---`);
    for (const result of report.results) {
        const status = result.success ? `${result.records.length} records` : `FAILED: ${result.errorMessage}`;
        console.log(`${result.strategy.padEnd(20)} ${status}`);
    }

    console.log(`\n--- ${report.texts.length} texts ---`);
    report.texts.slice(0, 50).forEach((text, i) => console.log(`${String(i + 1).padStart(4)}. ${text}`));
    if (report.texts.length > 50) console.log(`  ... ${report.texts.length - 50} more`);
}

const target = process.argv[2];
if (!target) {
    console.error(`Usage: ${path.basename(process.argv[1] ?? 'diagnose-dxf')} <file.dxf>`);
    process.exitCode = 1;
} else {
    diagnose(target).catch(e => {
        console.error(`Failed: ${errorMessage(e)}`);
        process.exitCode = 1;
    });
}
