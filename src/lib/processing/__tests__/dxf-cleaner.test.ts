import fs from 'fs';
import path from 'path';
import { cleanDrawingContent, cleanLayerName, isValidLayerName } from '../dxf-cleaner';

const BAD_LAYER = fs.readFileSync(path.join(__dirname, 'fixtures', 'bad-layer-drawing.dxf'), 'utf-8');
const SAMPLE = fs.readFileSync(path.join(__dirname, 'fixtures', 'sample-drawing.dxf'), 'utf-8');

describe('DXF Cleaner', () => {
    describe('isValidLayerName', () => {
        it('should accept ordinary names', () => {
            expect(isValidLayerName('0')).toBe(true);
            expect(isValidLayerName('A-ANNO TEXT')).toBe(true);
            expect(isValidLayerName('标注')).toBe(true);
        });

        it('should reject empty names and forbidden characters', () => {
            expect(isValidLayerName('')).toBe(false);
            expect(isValidLayerName('   ')).toBe(false);
            expect(isValidLayerName('WALLS?')).toBe(false);
            expect(isValidLayerName('A|B')).toBe(false);
            expect(isValidLayerName('bad\u0001name')).toBe(false);
            expect(isValidLayerName('x'.repeat(256))).toBe(false);
        });
    });

    describe('cleanLayerName', () => {
        it('should strip forbidden characters', () => {
            expect(cleanLayerName('WALLS?')).toBe('WALLS');
            expect(cleanLayerName('??标注??')).toBe('标注');
        });

        it('should fall back to layer 0 when nothing is left', () => {
            expect(cleanLayerName('')).toBe('0');
            expect(cleanLayerName('???')).toBe('0');
        });
    });

    describe('cleanDrawingContent', () => {
        it('should rewrite only the invalid layer values', () => {
            const cleaned = cleanDrawingContent(BAD_LAYER);

            expect(cleaned.fixes).toEqual([
                { line: 8, from: 'WALLS?', to: 'WALLS' },
                { line: 54, from: '', to: '0' }
            ]);
            expect(cleaned.content).toBe(BAD_LAYER.replace('WALLS?', 'WALLS').replace('  8\n\n', '  8\n0\n'));
        });

        it('should leave a clean drawing unchanged', () => {
            const cleaned = cleanDrawingContent(SAMPLE);

            expect(cleaned.fixes).toEqual([]);
            expect(cleaned.content).toBe(SAMPLE);
        });
    });
});
