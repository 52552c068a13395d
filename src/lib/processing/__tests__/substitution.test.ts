import fs from 'fs';
import path from 'path';
import { createSilentLogger } from '@/lib/logger';
import { ErrorCode } from '@/lib/errors/types';
import { openDrawing } from '../dxf-document';
import { AttribEntity, TextEntity } from '../dxf-entities';
import {
    ensureTranslationStyle,
    reducedHeight,
    resolveSubstitutionOptions,
    styleNameForFont,
    sumCounters,
    translateDocument
} from '../substitution';
import { drawing, mtext, text } from './helpers/dxf-builder';

const SAMPLE = fs.readFileSync(path.join(__dirname, 'fixtures', 'sample-drawing.dxf'), 'utf-8');

describe('Substitution', () => {
    describe('helpers', () => {
        it('should derive the style name from the font', () => {
            expect(styleNameForFont('Times New Roman')).toBe('TranslatedStyle_Times_New_Roman');
        });

        it('should reduce height down to the floor', () => {
            expect(reducedHeight(10, 4)).toBe(6);
            expect(reducedHeight(3, 4)).toBe(1);
            expect(reducedHeight(3, 4, 0.5)).toBe(0.5);
        });

        it('should fill options from the defaults', () => {
            expect(resolveSubstitutionOptions({ mode: 'replace' })).toEqual({
                mode: 'replace',
                fontName: 'Times New Roman',
                fontSizeReduction: 4,
                minHeight: 1,
                widthFactor: 0.8,
                translateAttributes: false
            });
        });

        it('should add counters', () => {
            expect(sumCounters([
                { processed: 2, translated: 1, skipped: 1, errors: 0 },
                { processed: 1, translated: 0, skipped: 0, errors: 1 }
            ])).toEqual({ processed: 3, translated: 1, skipped: 1, errors: 1 });
        });

        it('should create the translation style only once', () => {
            const document = openDrawing(drawing({ entities: text('Hello') }));

            ensureTranslationStyle(document, { fontName: 'Arial', widthFactor: 0.8 });
            const name = ensureTranslationStyle(document, { fontName: 'Arial', widthFactor: 0.8 });

            expect(name).toBe('TranslatedStyle_Arial');
            expect(document.styles.names()).toEqual(['TranslatedStyle_Arial']);
            expect(document.styles.widthFactor(name)).toBe(0.8);
        });
    });

    describe('replace mode', () => {
        it('should rewrite text, style and height in place', () => {
            const content = drawing({ entities: text('Hello', { height: 10 }) });
            const document = openDrawing(content);

            const summary = translateDocument(document, new Map([['Hello', 'Bonjour']]), { mode: 'replace', fontName: 'Arial' });

            expect(summary).toMatchObject({ processed: 1, translated: 1, skipped: 0, errors: 0, cancelled: false });
            const output = document.serialize();
            expect(output).toContain('  0\nTEXT\n  8\n0\n 10\n0\n 20\n0\n 30\n0\n 40\n6.0\n  1\nBonjour\n  7\nTranslatedStyle_Arial\n');

            const reopened = openDrawing(output);
            expect(reopened.styles.names()).toEqual(['TranslatedStyle_Arial']);
            expect(reopened.styles.font('TranslatedStyle_Arial')).toBe('Arial');
        });

        it('should leave the drawing untouched when nothing matches', () => {
            const content = drawing({ entities: text('Hello', { height: 10 }) });
            const document = openDrawing(content);

            const summary = translateDocument(document, new Map(), { mode: 'replace' });

            expect(summary).toMatchObject({ processed: 1, translated: 0, skipped: 1, errors: 0 });
            expect(document.styles.names()).toEqual([]);
            expect(document.serialize()).toBe(content);
        });

        it('should not shrink text below the minimum height', () => {
            const document = openDrawing(drawing({ entities: text('Tiny', { height: 3 }) }));

            translateDocument(document, new Map([['Tiny', 'Petit']]), { mode: 'replace' });

            const [entity] = document.modelSpace.textEntities();
            expect(entity.height).toBe(1);
            expect(entity.record.get(40)).toBe('1.0');
        });

        it('should keep the stored height when the entity has none', () => {
            const document = openDrawing(drawing({ entities: text('Plain') }));

            translateDocument(document, new Map([['Plain', 'Simple']]), { mode: 'replace' });

            expect(document.modelSpace.textEntities()[0].height).toBeUndefined();
        });

        it('should match multi-line text by its plain content', () => {
            const document = openDrawing(drawing({ entities: mtext('\\A1;Fire\\Pexit', { height: 5 }) }));

            translateDocument(document, new Map([['Fire exit', 'Sortie de secours']]), { mode: 'replace' });

            const [entity] = document.modelSpace.textEntities();
            expect(entity.text).toBe('Sortie de secours');
            expect(entity.height).toBe(1);
        });
    });

    describe('new-entity mode', () => {
        it('should replace each translated entity with a new text in the same place', () => {
            const document = openDrawing(SAMPLE);

            const summary = translateDocument(document, new Map([['Hello World', 'Bonjour le monde']]));

            expect(summary).toMatchObject({ processed: 6, translated: 2, skipped: 4, errors: 0, cancelled: false });
            expect(summary.regions).toEqual([
                { kind: 'model-space', name: 'Model', processed: 4, translated: 2, skipped: 2, errors: 0 },
                { kind: 'paper-space-layout', name: 'Layout1', processed: 1, translated: 0, skipped: 1, errors: 0 },
                { kind: 'block-definition', name: 'TITLE', processed: 1, translated: 0, skipped: 1, errors: 0 }
            ]);

            expect(document.modelSpace.entities().map(entity => entity.handle)).toEqual(['201', '101', '102', '105', '107', '202']);
            expect(document.findByHandle('100')).toBeUndefined();
            expect(document.headerVariable('$HANDSEED')).toBe('203');

            const added = document.findByHandle('201');
            expect(added).toBeInstanceOf(TextEntity);
            if (!(added instanceof TextEntity)) return;
            expect(added.text).toBe('Bonjour le monde');
            expect(added.height).toBe(6);
            expect(added.style).toBe('TranslatedStyle_Times_New_Roman');
            expect(added.insert).toEqual({ x: 10, y: 20, z: 0 });
            expect(added.ownerHandle).toBe('1F');
        });

        it('should write a drawing that opens again', () => {
            const document = openDrawing(SAMPLE);
            translateDocument(document, new Map([['Hello World', 'Bonjour le monde'], ['Sheet Index', 'Index des feuilles']]));

            const reopened = openDrawing(document.serialize());

            expect(reopened.modelSpace.textEntities().map(entity => entity.plainText)).toEqual([
                'Bonjour le monde',
                'Installation Notes See sheet 2',
                '12.50',
                'Bonjour le monde'
            ]);
            expect(reopened.layouts()[0].textEntities().map(entity => entity.text)).toEqual(['Index des feuilles']);
            expect(reopened.layouts()[0].textEntities()[0].inPaperSpace).toBe(true);
            expect(reopened.styles.names()).toEqual(['Standard', 'TranslatedStyle_Times_New_Roman']);
        });

        it('should turn multi-line text into single-line text', () => {
            const document = openDrawing(SAMPLE);

            translateDocument(document, new Map([['Installation Notes See sheet 2', 'Notes']]));

            const converted = document.modelSpace.entities()[1];
            expect(converted).toBeInstanceOf(TextEntity);
            if (!(converted instanceof TextEntity)) return;
            expect(converted.text).toBe('Notes');
            expect(converted.layer).toBe('NOTES');
            expect(converted.insert).toEqual({ x: 0, y: 50, z: 0 });
            expect(converted.height).toBe(1);
        });

        it('should create one style for many translated entities', () => {
            const entities = Array.from({ length: 100 }, (_, i) => text('Hello', { x: i, height: 5 })).flat();
            const document = openDrawing(drawing({ entities }));

            const summary = translateDocument(document, new Map([['Hello', 'Bonjour']]));

            expect(summary.translated).toBe(100);
            expect(document.styles.names()).toEqual(['TranslatedStyle_Times_New_Roman']);
            expect(document.modelSpace.textEntities()).toHaveLength(100);
        });
    });

    describe('attributes', () => {
        it('should leave attributes alone by default', () => {
            const document = openDrawing(SAMPLE);

            translateDocument(document, new Map([['Riverside Plant', 'Usine']]));

            const attrib = document.findByHandle('103');
            expect(attrib instanceof AttribEntity ? attrib.text : undefined).toBe('Riverside Plant');
        });

        it('should edit attribute values in place when enabled', () => {
            const document = openDrawing(SAMPLE);

            const summary = translateDocument(document, new Map([['Riverside Plant', 'Usine']]), { translateAttributes: true });

            const attrib = document.findByHandle('103');
            expect(attrib).toBeInstanceOf(AttribEntity);
            if (!(attrib instanceof AttribEntity)) return;
            expect(attrib.text).toBe('Usine');
            expect(attrib.height).toBe(1);
            expect(attrib.style).toBe('TranslatedStyle_Times_New_Roman');
            expect(summary.regions[0]).toMatchObject({ processed: 5, translated: 1 });
        });
    });

    describe('failures', () => {
        it('should count a failing entity and carry on with the rest', () => {
            const document = openDrawing(drawing({ entities: [...text('Hello'), ...text('Hello')] }));
            jest.spyOn(document.modelSpace, 'addText').mockImplementationOnce(() => {
                throw new Error('write failed');
            });

            const logger = createSilentLogger();

            const summary = translateDocument(document, new Map([['Hello', 'Bonjour']]), { logger });

            expect(summary).toMatchObject({ processed: 2, translated: 1, skipped: 0, errors: 1 });
            expect(logger.getLogsByLevel('error')[0].context).toMatchObject({
                code: ErrorCode.SUBSTITUTION_FAILED,
                region: 'Model'
            });
            expect(document.modelSpace.textEntities().map(entity => entity.text)).toEqual(['Hello', 'Bonjour']);
        });

        it('should stop before the first region when cancelled', () => {
            const document = openDrawing(SAMPLE);
            const controller = new AbortController();
            controller.abort();

            const summary = translateDocument(document, new Map([['Hello World', 'Bonjour']]), { signal: controller.signal });

            expect(summary).toEqual({ processed: 0, translated: 0, skipped: 0, errors: 0, regions: [], cancelled: true });
            expect(document.serialize()).toBe(SAMPLE);
        });
    });
});
