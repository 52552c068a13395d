import dotenv from 'dotenv';
import path from 'path';
import { loadConfig, mergeConfig } from '@/lib/config';
import { createLogger, runLogFileName, type Logger } from '@/lib/logger';
import { ErrorCode, createAppError, errorLogContext, errorMessage } from '@/lib/errors/types';
import type { PipelineConfig } from '@/lib/validation';
import { loadTranslationTableFile } from '@/lib/processing/translation-table';
import { mergeReports, writeExtractionWorkbook } from '@/lib/processing/writer';
import { parseArgs, USAGE, UsageError, type CliCommand, type ExtractCommand, type TranslateCommand } from './args';
import { findDxfFiles, runExtractionBatch, runTranslationBatch } from './pipeline';

dotenv.config({ path: '.env' });

async function extract(args: ExtractCommand, config: PipelineConfig, logger: Logger, signal: AbortSignal): Promise<number> {
    const files = await findDxfFiles(args.input);
    if (files.length === 0) {
        logger.error(`No DXF files found in ${args.input}`);
        return 1;
    }

    const batch = await runExtractionBatch(files, { config, logger, signal });
    const { texts, provenance } = mergeReports(batch.reports);
    const failed = batch.reports.filter(report => report.mode === 'failed');

    if (texts.length === 0) {
        const appError = createAppError(ErrorCode.EXTRACTION_NO_TEXT, 'No texts extracted', { input: args.input });
        logger.error(appError.message, errorLogContext(appError));
        return 1;
    }

    const output = args.output ?? path.join(process.cwd(), 'extracted_texts.xlsx');
    await writeExtractionWorkbook(output, texts, provenance);
    logger.info(`Wrote ${texts.length} texts to ${output}`, { files: files.length, failed: failed.length, cancelled: batch.cancelled });

    return failed.length > 0 || batch.cancelled ? 1 : 0;
}

async function translate(args: TranslateCommand, config: PipelineConfig, logger: Logger, signal: AbortSignal): Promise<number> {
    const mapping = await loadTranslationTableFile(args.table, logger.child('table'));
    if (mapping.size === 0) {
        logger.error(`Translation table ${args.table} has no usable rows; nothing to do`);
        return 1;
    }

    const files = await findDxfFiles(args.input);
    if (files.length === 0) {
        logger.error(`No DXF files found in ${args.input}`);
        return 1;
    }

    const summary = await runTranslationBatch(files, mapping, { config, logger, signal, outputDir: args.output });

    for (const doc of summary.documents) {
        const counts = `${doc.translated}/${doc.processed} translated, ${doc.skipped} skipped, ${doc.errors} errors`;
        if (doc.status === 'translated') {
            logger.info(`${path.basename(doc.file)}: ${counts} -> ${doc.outputPath}`);
        } else {
            logger.warn(`${path.basename(doc.file)}: ${doc.status}${doc.errorMessage ? ` (${doc.errorMessage})` : ''}`);
        }
    }
    logger.info(`Run ${summary.runId}: ${summary.succeeded}/${summary.files} documents`, {
        processed: summary.processed,
        translated: summary.translated,
        skipped: summary.skipped,
        errors: summary.errors,
        failed: summary.failed
    });

    return summary.failed > 0 || summary.errors > 0 || summary.cancelled ? 1 : 0;
}

async function main(): Promise<number> {
    let command: CliCommand;
    try {
        command = parseArgs(process.argv.slice(2));
    } catch (e) {
        if (e instanceof UsageError) {
            console.error(`${e.message}\n\n${USAGE}`);
            return 1;
        }
        throw e;
    }

    if (command.command === 'help') {
        console.log(USAGE);
        return 0;
    }

    const envConfig = loadConfig();
    const config = command.command === 'extract'
        ? mergeConfig(envConfig, {
            includeRawRecords: command.includeRaw || undefined,
            filter: {
                minLength: command.minLength,
                maxLength: command.maxLength,
                excludeLayers: command.excludeLayers,
                onlyCjk: command.onlyCjk || undefined
            }
        })
        : mergeConfig(envConfig, {
            fontName: command.font,
            mode: command.mode,
            fontSizeReduction: command.fontReduction,
            translateAttributes: command.attributes || undefined
        });

    const logger = createLogger({ level: command.verbose ? 'debug' : config.logLevel });
    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted; finishing the current entity and stopping');
        controller.abort();
    });

    try {
        return command.command === 'extract'
            ? await extract(command, config, logger, controller.signal)
            : await translate(command, config, logger, controller.signal);
    } catch (e) {
        logger.error(`Run failed: ${errorMessage(e)}`, e instanceof Error ? e : undefined);
        return 1;
    } finally {
        await saveRunLog(logger, config.logDir);
    }
}

async function saveRunLog(logger: Logger, logDir: string) {
    try {
        const file = await logger.exportLogs(path.join(logDir, runLogFileName()));
        console.log(`Log written to ${file}`);
    } catch (e) {
        console.error(`Cannot write log file: ${errorMessage(e)}`);
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(e => {
        console.error(`Fatal: ${errorMessage(e)}`);
        process.exitCode = 1;
    });
