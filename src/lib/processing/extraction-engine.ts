/**
 * Extraction Engine
 *
 * Runs the text sources for one drawing through an explicit fallback chain and
 * aggregates their results into one handle-unique, filtered text list.
 *
 *   structured open ok  -> model space, layouts, blocks (+ raw records if requested)
 *   structured open ko  -> invalid layer names cleaned, structured sources again
 *   cleaned open ko     -> raw records only (reduced quality, no provenance)
 *   raw records ko      -> no text, mode 'failed'
 */

import type { AcceptedText, ExtractionMode, ExtractionReport, ExtractionResult } from '@/types';
import { createSilentLogger, type Logger } from '@/lib/logger';
import { ErrorCode, createAppError, errorLogContext, errorMessage, toAppError } from '@/lib/errors/types';
import type { FilterConfig } from '@/lib/validation';
import { cleanDrawingContent } from './dxf-cleaner';
import { openDrawing, readDrawingContent } from './dxf-document';
import { createStructuredSources, RawRecordSource, type TextSource } from './dxf-text-extractor';
import { TextFilter, isMeaningful, type NoisePredicate } from './text-filter';
import { cleanText } from './text-normalizer';

// ============================================================================
// TYPES
// ============================================================================

export interface ExtractionOptions {
    logger?: Logger;
    filter?: Partial<FilterConfig>;
    textFilter?: TextFilter;
    noiseFilter?: NoisePredicate;
    rawRecordCodes?: readonly number[];
    /** Run the raw-record source next to the structured ones */
    includeRawRecords?: boolean;
}

export interface AggregateOptions {
    noiseFilter?: NoisePredicate;
    textFilter?: TextFilter;
}

interface ExtractionTier {
    mode: Exclude<ExtractionMode, 'failed'>;
    /** null when the tier does not apply to this content */
    sources(): TextSource[] | null;
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Merge successful results. Structured records are deduplicated by handle and field
 * (first wins); every record is filtered again before it is accepted.
 */
export function aggregateResults(
    results: readonly ExtractionResult[],
    options: AggregateOptions = {}
): { records: AcceptedText[]; texts: string[] } {
    const noiseFilter = options.noiseFilter ?? isMeaningful;
    const textFilter = options.textFilter ?? new TextFilter();

    const seenHandles = new Set<string>();
    const seenTexts = new Set<string>();
    const records: AcceptedText[] = [];
    const texts: string[] = [];

    for (const result of results) {
        if (!result.success) continue;

        for (const record of result.records) {
            const layer = record.sourceRegion === 'raw-record' ? undefined : record.layer;
            if (record.sourceRegion !== 'raw-record') {
                const key = `${record.entityHandle}:${record.field}`;
                if (seenHandles.has(key)) continue;
                seenHandles.add(key);
            }

            if (!noiseFilter(record.rawText) || !textFilter.isValid(record.rawText, layer)) continue;

            const text = cleanText(record.rawText);
            if (!text) continue;

            records.push({ text, record });
            if (!seenTexts.has(text)) {
                seenTexts.add(text);
                texts.push(text);
            }
        }
    }

    return { records, texts };
}

// ============================================================================
// ENGINE
// ============================================================================

export function runSources(sources: readonly TextSource[]): ExtractionResult[] {
    return sources.map(source => source.extract());
}

/**
 * Extract texts from DXF content. Never throws; failures are reported in the result.
 */
export function extractFromContent(content: string, options: ExtractionOptions = {}, sourcePath?: string): ExtractionReport {
    const logger = options.logger ?? createSilentLogger();
    const noiseFilter = options.noiseFilter ?? isMeaningful;
    const textFilter = options.textFilter ?? new TextFilter(options.filter);
    const raw = () => new RawRecordSource(content, logger, { codes: options.rawRecordCodes, noiseFilter });

    const structured = (text: string) => {
        const sources = createStructuredSources(openDrawing(text, sourcePath), logger);
        return options.includeRawRecords ? [...sources, raw()] : sources;
    };

    const tiers: ExtractionTier[] = [
        { mode: 'structured', sources: () => structured(content) },
        {
            mode: 'cleaned',
            sources: () => {
                const cleaned = cleanDrawingContent(content);
                if (cleaned.fixes.length === 0) return null;
                logger.warn(`Cleaned ${cleaned.fixes.length} invalid layer names`, { sourcePath });
                return structured(cleaned.content);
            }
        },
        { mode: 'repaired', sources: () => [raw()] }
    ];

    let lastError: string | undefined;

    for (const tier of tiers) {
        let sources: TextSource[] | null;
        try {
            sources = tier.sources();
        } catch (e) {
            lastError = errorMessage(e);
            logger.warn(`Cannot open drawing as ${tier.mode}: ${lastError}`, { sourcePath });
            continue;
        }
        if (sources === null) continue;

        if (tier.mode === 'repaired') {
            logger.warn('Falling back to raw record scan; texts have no layer, position or style', { sourcePath });
        }

        const results = runSources(sources);
        if (!results.some(result => result.success)) {
            lastError = results.map(result => result.errorMessage).filter(Boolean).join('; ') || lastError;
            continue;
        }

        const { records, texts } = aggregateResults(results, { noiseFilter, textFilter });
        logger.info(`Extracted ${texts.length} texts (${tier.mode})`, {
            sourcePath,
            strategies: results.map(result => `${result.strategy}:${result.success ? result.records.length : 'failed'}`).join(', ')
        });
        return { sourcePath, mode: tier.mode, results, records, texts, errorMessage: tier.mode === 'structured' ? undefined : lastError };
    }

    const appError = createAppError(ErrorCode.EXTRACTION_NO_TEXT, `No text could be extracted: ${lastError ?? 'unknown error'}`, { sourcePath });
    logger.error(appError.message, errorLogContext(appError));
    return { sourcePath, mode: 'failed', results: [], records: [], texts: [], errorMessage: lastError, errorCode: appError.code };
}

export async function extractFromFile(filePath: string, options: ExtractionOptions = {}): Promise<ExtractionReport> {
    let content: string;
    try {
        content = await readDrawingContent(filePath);
    } catch (e) {
        const appError = toAppError(e, ErrorCode.DXF_PARSE_FAILED, { filePath });
        (options.logger ?? createSilentLogger()).error(`Cannot read ${filePath}: ${appError.message}`, errorLogContext(appError));
        return { sourcePath: filePath, mode: 'failed', results: [], records: [], texts: [], errorMessage: appError.message, errorCode: appError.code };
    }
    return extractFromContent(content, options, filePath);
}
