import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createSilentLogger } from '@/lib/logger';
import { ErrorCode, isProcessingError } from '@/lib/errors/types';
import { PipelineConfigSchema } from '@/lib/validation';
import { openDrawing } from '@/lib/processing/dxf-document';
import {
    executeTranslateJob,
    findDxfFiles,
    outputPathFor,
    runExtractionBatch,
    runTranslationBatch,
    summarizeBatch
} from '../pipeline';

const FIXTURES = path.join(__dirname, '..', '..', 'src', 'lib', 'processing', '__tests__', 'fixtures');
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Pipeline', () => {
    const config = PipelineConfigSchema.parse({});
    const logger = createSilentLogger();
    let dir: string;
    let sample: string;
    let damaged: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
        sample = path.join(dir, 'sample.dxf');
        damaged = path.join(dir, 'damaged.dxf');
        await fs.copyFile(path.join(FIXTURES, 'sample-drawing.dxf'), sample);
        await fs.copyFile(path.join(FIXTURES, 'damaged-drawing.dxf'), damaged);
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('findDxfFiles', () => {
        it('should walk directories for .dxf files in sorted order', async () => {
            await fs.mkdir(path.join(dir, 'nested'));
            await fs.writeFile(path.join(dir, 'nested', 'upper.DXF'), '', 'utf-8');
            await fs.writeFile(path.join(dir, 'notes.txt'), '', 'utf-8');

            expect(await findDxfFiles(dir)).toEqual([
                damaged,
                path.join(dir, 'nested', 'upper.DXF'),
                sample
            ]);
        });

        it('should return a single file as is', async () => {
            expect(await findDxfFiles(sample)).toEqual([sample]);
        });

        it('should reject a missing input', async () => {
            const error: unknown = await findDxfFiles(path.join(dir, 'missing')).catch((e: unknown) => e);

            expect(isProcessingError(error) ? error.code : undefined).toBe(ErrorCode.FILE_NOT_FOUND);
        });
    });

    describe('outputPathFor', () => {
        it('should add the suffix next to the input or in the output directory', () => {
            expect(outputPathFor(path.join('plans', 'level-1.dxf'), '_translated')).toBe(path.join('plans', 'level-1_translated.dxf'));
            expect(outputPathFor(path.join('plans', 'level-1.dxf'), '_fr', 'out')).toBe(path.join('out', 'level-1_fr.dxf'));
        });
    });

    describe('runExtractionBatch', () => {
        it('should extract every file and keep input order', async () => {
            const batch = await runExtractionBatch([sample, damaged], { config, logger });

            expect(batch.runId).toMatch(UUID);
            expect(batch.cancelled).toBe(false);
            expect(batch.reports.map(report => report.mode)).toEqual(['structured', 'repaired']);
            expect(batch.reports[0].texts).toHaveLength(8);
        });

        it('should skip files once cancelled', async () => {
            const controller = new AbortController();
            controller.abort();

            const batch = await runExtractionBatch([sample], { config, logger, signal: controller.signal });

            expect(batch.reports).toEqual([]);
            expect(batch.cancelled).toBe(true);
        });
    });

    describe('executeTranslateJob', () => {
        it('should save the translated drawing next to the input', async () => {
            const result = await executeTranslateJob(sample, new Map([['Hello World', 'Bonjour le monde']]), { config, logger });

            expect(result).toEqual({
                file: sample,
                status: 'translated',
                outputPath: path.join(dir, 'sample_translated.dxf'),
                processed: 6,
                translated: 2,
                skipped: 4,
                errors: 0
            });

            const saved = openDrawing(await fs.readFile(path.join(dir, 'sample_translated.dxf'), 'utf-8'));
            expect(saved.modelSpace.textEntities()[0].text).toBe('Bonjour le monde');
        });

        it('should clean invalid layer names and still translate', async () => {
            const badLayer = path.join(dir, 'bad-layer.dxf');
            await fs.copyFile(path.join(FIXTURES, 'bad-layer-drawing.dxf'), badLayer);

            const result = await executeTranslateJob(badLayer, new Map([['Kitchen', 'Cuisine']]), { config, logger });

            expect(result).toMatchObject({ status: 'translated', processed: 1, translated: 1, skipped: 0, errors: 0 });
            const saved = openDrawing(await fs.readFile(path.join(dir, 'bad-layer_translated.dxf'), 'utf-8'));
            const [translated] = saved.modelSpace.textEntities();
            expect(translated.text).toBe('Cuisine');
            expect(translated.layer).toBe('WALLS');
        });

        it('should report a drawing that cannot be opened', async () => {
            const result = await executeTranslateJob(damaged, new Map([['Damaged Label', 'Etiquette']]), { config, logger });

            expect(result.status).toBe('open-failed');
            expect(result.errorMessage).toBe('Invalid group code "oops" at line 11');
            expect(result.processed).toBe(0);
        });

        it('should report a failed save', async () => {
            const blocker = path.join(dir, 'blocker');
            await fs.writeFile(blocker, '', 'utf-8');

            const result = await executeTranslateJob(sample, new Map([['Hello World', 'Bonjour']]), {
                config,
                logger,
                outputDir: path.join(blocker, 'out')
            });

            expect(result.status).toBe('save-failed');
            expect(result.translated).toBe(2);
            expect(result.outputPath).toBeUndefined();
        });
    });

    describe('runTranslationBatch', () => {
        it('should summarize every document of the run', async () => {
            const outputDir = path.join(dir, 'translated');

            const summary = await runTranslationBatch([sample, damaged], new Map([['Hello World', 'Bonjour']]), { config, logger, outputDir });

            expect(summary.runId).toMatch(UUID);
            expect(summary.documents.map(doc => doc.status)).toEqual(['translated', 'open-failed']);
            expect(summary).toMatchObject({
                files: 2,
                succeeded: 1,
                failed: 1,
                cancelled: false,
                processed: 6,
                translated: 2,
                skipped: 4,
                errors: 0
            });
            expect(await fs.readdir(outputDir)).toEqual(['sample_translated.dxf']);
        });

        it('should mark every document cancelled once aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            const summary = await runTranslationBatch([sample], new Map([['Hello World', 'Bonjour']]), {
                config,
                logger,
                signal: controller.signal
            });

            expect(summary.documents.map(doc => doc.status)).toEqual(['cancelled']);
            expect(summary.cancelled).toBe(true);
            expect(summary.succeeded).toBe(0);
        });
    });

    describe('summarizeBatch', () => {
        it('should count save failures as failed documents', () => {
            const summary = summarizeBatch('run-1', [
                { file: 'a.dxf', status: 'save-failed', processed: 3, translated: 3, skipped: 0, errors: 0 },
                { file: 'b.dxf', status: 'cancelled', processed: 1, translated: 0, skipped: 1, errors: 0 }
            ], true);

            expect(summary).toMatchObject({ files: 2, succeeded: 0, failed: 1, processed: 4, translated: 3, skipped: 1 });
        });
    });
});
