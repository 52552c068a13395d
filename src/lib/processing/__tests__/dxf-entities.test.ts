import { DxfRecord, MTextEntity, TextEntity, createEntity, entityKindOf } from '../dxf-entities';

describe('DXF Entities', () => {
    describe('DxfRecord', () => {
        it('should ignore extension groups and stop at extended data', () => {
            const record = new DxfRecord([
                { code: 0, value: 'TEXT' },
                { code: 102, value: '{ACAD_REACTORS' },
                { code: 330, value: 'AA' },
                { code: 102, value: '}' },
                { code: 330, value: '1F' },
                { code: 1, value: 'Label' },
                { code: 1001, value: 'APPID' },
                { code: 1000, value: 'not mine' }
            ]);

            expect(record.get(330)).toBe('1F');
            expect(record.getAll(330)).toEqual(['1F']);
        });

        it('should add a missing tag after the own tags, before extended data', () => {
            const record = new DxfRecord([
                { code: 0, value: 'TEXT' },
                { code: 1, value: 'Label' },
                { code: 1001, value: 'APPID' }
            ]);

            record.set(7, 'Narrow');

            expect(record.tags.map(tag => tag.code)).toEqual([0, 1, 7, 1001]);
        });
    });

    describe('MTextEntity', () => {
        it('should join chunks when reading and split them when writing', () => {
            const entity = new MTextEntity(new DxfRecord([
                { code: 0, value: 'MTEXT' },
                { code: 3, value: 'First ' },
                { code: 1, value: 'second' },
                { code: 7, value: 'Standard' }
            ]));
            expect(entity.text).toBe('First second');

            entity.setText('x'.repeat(600));

            expect(entity.record.getAll(3).map(chunk => chunk.length)).toEqual([250, 250]);
            expect(entity.record.get(1)).toHaveLength(100);
            expect(entity.record.tags.map(tag => tag.code)).toEqual([0, 3, 3, 1, 7]);
        });
    });

    describe('createEntity', () => {
        it('should pick the view from the record type', () => {
            const text = createEntity(new DxfRecord([{ code: 0, value: 'TEXT' }, { code: 1, value: 'A' }]));
            const line = createEntity(new DxfRecord([{ code: 0, value: 'LINE' }]));

            expect(text).toBeInstanceOf(TextEntity);
            expect(entityKindOf(text)).toBe('plain-text');
            expect(entityKindOf(line)).toBeUndefined();
            expect(line.layer).toBe('0');
        });
    });
});
