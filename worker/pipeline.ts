import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { BatchSummary, DocumentJobResult, ExtractionReport, TranslationMap } from '@/types';
import type { Logger } from '@/lib/logger';
import type { PipelineConfig } from '@/lib/validation';
import { ErrorCode, ProcessingError, errorMessage } from '@/lib/errors/types';
import { readDrawing, type DxfDocument } from '@/lib/processing/dxf-document';
import { extractFromFile } from '@/lib/processing/extraction-engine';
import { emptyCounters, sumCounters, translateDocument } from '@/lib/processing/substitution';

export interface JobOptions {
    config: PipelineConfig;
    logger: Logger;
    signal?: AbortSignal;
    /** Translated drawings go here; defaults to each input's directory */
    outputDir?: string;
}

export interface ExtractionBatch {
    runId: string;
    reports: ExtractionReport[];
    cancelled: boolean;
}

// ============================================================================
// FILES
// ============================================================================

/**
 * The input file itself, or every .dxf below a directory (sorted)
 */
export async function findDxfFiles(input: string): Promise<string[]> {
    let stat: Stats;
    try {
        stat = await fs.stat(input);
    } catch (e) {
        throw new ProcessingError(ErrorCode.FILE_NOT_FOUND, `Input not found: ${input}`, { input }, e instanceof Error ? e : undefined);
    }

    if (stat.isFile()) {
        return [input];
    }

    const found: string[] = [];
    const walk = async (dir: string) => {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                await walk(full);
            } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === '.dxf') {
                found.push(full);
            }
        }
    };
    await walk(input);
    return found.sort();
}

export function outputPathFor(file: string, suffix: string, outputDir?: string): string {
    const base = path.basename(file, path.extname(file));
    return path.join(outputDir ?? path.dirname(file), `${base}${suffix}.dxf`);
}

// ============================================================================
// EXTRACTION
// ============================================================================

export async function executeExtractJob(file: string, options: JobOptions): Promise<ExtractionReport> {
    const { config } = options;
    return extractFromFile(file, {
        logger: options.logger.child(path.basename(file)),
        filter: config.filter,
        rawRecordCodes: config.rawRecordCodes,
        includeRawRecords: config.includeRawRecords
    });
}

export async function runExtractionBatch(files: readonly string[], options: JobOptions): Promise<ExtractionBatch> {
    const runId = uuidv4();
    const limit = pLimit(options.config.concurrency);
    options.logger.info(`Extraction run ${runId}: ${files.length} files`);

    const reports = await Promise.all(files.map(file => limit(async (): Promise<ExtractionReport | null> => {
        if (options.signal?.aborted) return null;
        return executeExtractJob(file, options);
    })));

    return {
        runId,
        reports: reports.filter((report): report is ExtractionReport => report !== null),
        cancelled: options.signal?.aborted ?? false
    };
}

// ============================================================================
// TRANSLATION
// ============================================================================

/**
 * Open, translate and save one drawing. Never throws; the status tells what happened.
 */
export async function executeTranslateJob(file: string, mapping: TranslationMap, options: JobOptions): Promise<DocumentJobResult> {
    const { config } = options;
    const logger = options.logger.child(path.basename(file));

    let document: DxfDocument;
    try {
        ({ document } = await readDrawing(file, logger));
    } catch (e) {
        const message = errorMessage(e);
        logger.error(`Cannot open drawing: ${message}`);
        return { file, status: 'open-failed', ...emptyCounters(), errorMessage: message };
    }

    const summary = translateDocument(document, mapping, {
        mode: config.mode,
        fontName: config.fontName,
        fontSizeReduction: config.fontSizeReduction,
        minHeight: config.minHeight,
        widthFactor: config.widthFactor,
        translateAttributes: config.translateAttributes,
        logger,
        signal: options.signal
    });
    const counters = sumCounters([summary]);

    if (summary.cancelled) {
        return { file, status: 'cancelled', ...counters };
    }

    const outputPath = outputPathFor(file, config.outputSuffix, options.outputDir);
    try {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await document.save(outputPath);
    } catch (e) {
        const message = errorMessage(e);
        logger.error(`Cannot save ${outputPath}: ${message}`);
        return { file, status: 'save-failed', ...counters, errorMessage: message };
    }

    logger.info(`Saved ${outputPath}`, { ...counters });
    return { file, status: 'translated', outputPath, ...counters };
}

export function summarizeBatch(runId: string, documents: DocumentJobResult[], cancelled: boolean): BatchSummary {
    return {
        runId,
        files: documents.length,
        succeeded: documents.filter(doc => doc.status === 'translated').length,
        failed: documents.filter(doc => doc.status === 'open-failed' || doc.status === 'save-failed').length,
        cancelled,
        documents,
        ...sumCounters(documents)
    };
}

/**
 * Documents run concurrently up to config.concurrency; each job owns its document.
 * Cancellation is honoured before a document starts and between its regions.
 */
export async function runTranslationBatch(files: readonly string[], mapping: TranslationMap, options: JobOptions): Promise<BatchSummary> {
    const runId = uuidv4();
    const limit = pLimit(options.config.concurrency);
    options.logger.info(`Translation run ${runId}: ${files.length} files, ${mapping.size} translations`);

    const documents = await Promise.all(files.map(file => limit(async (): Promise<DocumentJobResult> => {
        if (options.signal?.aborted) {
            return { file, status: 'cancelled', ...emptyCounters() };
        }
        return executeTranslateJob(file, mapping, options);
    })));

    return summarizeBatch(runId, documents, options.signal?.aborted ?? false);
}
