import { TextFilter, classifyNoise, createNoiseFilter, isMeaningful } from '../text-filter';

describe('Text Filter', () => {
    describe('classifyNoise', () => {
        it('should flag numbers', () => {
            expect(classifyNoise('12.50')).toBe('numeric');
            expect(classifyNoise('-1e5')).toBe('numeric');
            expect(classifyNoise('NaN')).toBe('numeric');
            expect(classifyNoise('0')).toBe('numeric');
        });

        it('should flag coordinate lists', () => {
            expect(classifyNoise('10.5,20,-3')).toBe('coordinates');
        });

        it('should flag handle-like hex values', () => {
            expect(classifyNoise('ABCD')).toBe('handle');
            expect(classifyNoise('1F3A5B7C')).toBe('handle');
        });

        it('should flag reserved layer names and layer prefixes', () => {
            expect(classifyNoise('DEFPOINTS')).toBe('layer-name');
            expect(classifyNoise('L_WALLS')).toBe('layer-name');
        });

        it('should flag record keywords in any case', () => {
            expect(classifyNoise('mtext')).toBe('keyword');
            expect(classifyNoise('Polyline')).toBe('keyword');
        });

        it('should flag blank and one-character values', () => {
            expect(classifyNoise('   ')).toBe('empty');
            expect(classifyNoise('X')).toBe('too-short');
        });

        it('should accept ordinary labels', () => {
            expect(classifyNoise('  Room 101 ')).toBeNull();
            expect(isMeaningful('Stair core')).toBe(true);
        });

        it('should accept a CJK phrase', () => {
            expect(classifyNoise('图纸目录')).toBeNull();
            expect(isMeaningful('图纸目录')).toBe(true);
        });
    });

    describe('createNoiseFilter', () => {
        it('should honour a custom minimum length and keyword list', () => {
            const filter = createNoiseFilter({ minLength: 5, keywords: ['LOBBY'] });

            expect(filter('Door')).toBe(false);
            expect(filter('lobby')).toBe(false);
            expect(filter('Corridor')).toBe(true);
        });
    });

    describe('TextFilter', () => {
        it('should reject values matching the default exclusion patterns', () => {
            const filter = new TextFilter();

            expect(filter.isValid('123')).toBe(false);
            expect(filter.isValid('BEEF')).toBe(false);
            expect(filter.isValid('--')).toBe(false);
            expect(filter.isValid('1.5 %')).toBe(false);
            expect(filter.isValid('A')).toBe(false);
            expect(filter.isValid('Room 101')).toBe(true);
        });

        it('should apply the length window to trimmed text', () => {
            const filter = new TextFilter({ minLength: 3, maxLength: 5 });

            expect(filter.isValid('  ab  ')).toBe(false);
            expect(filter.isValid('Hall')).toBe(true);
            expect(filter.isValid('Corridor')).toBe(false);
        });

        it('should exclude layers case-insensitively when a layer is given', () => {
            const filter = new TextFilter({ excludeLayers: ['notes'] });

            expect(filter.isValid('Room', 'NOTES')).toBe(false);
            expect(filter.isValid('Room', 'A-ANNO')).toBe(true);
            expect(filter.isValid('Room')).toBe(true);
        });

        it('should keep only CJK text when asked', () => {
            const filter = new TextFilter({ onlyCjk: true });

            expect(filter.isValid('Room')).toBe(false);
            expect(filter.isValid('会议室')).toBe(true);
        });

        it('should add extra patterns to the defaults', () => {
            const filter = new TextFilter({ extraPatterns: [/^TBD$/] });

            expect(filter.isValid('TBD')).toBe(false);
            expect(filter.isValid('123')).toBe(false);
        });

        it('should clean and deduplicate in input order', () => {
            const filter = new TextFilter();

            expect(filter.filterTexts([' Room  A ', 'Room A', '42', 'Lobby'])).toEqual(['Room A', 'Lobby']);
        });
    });
});
