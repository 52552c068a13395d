import { ErrorCode, ProcessingError, createAppError, errorMessage, toAppError } from '../errors/types';

describe('Errors', () => {
    it('should attach recovery information to a code', () => {
        const error = createAppError(ErrorCode.TABLE_NOT_FOUND, 'missing', { filePath: 'table.xlsx' });

        expect(error.code).toBe(ErrorCode.TABLE_NOT_FOUND);
        expect(error.context).toEqual({ filePath: 'table.xlsx' });
        expect(typeof error.recoverable).toBe('boolean');
    });

    it('should keep the code of a ProcessingError and merge context', () => {
        const thrown = new ProcessingError(ErrorCode.DXF_SAVE_FAILED, 'disk full', { filePath: 'out.dxf' });

        const appError = toAppError(thrown, ErrorCode.UNKNOWN_ERROR, { run: 'r1' });

        expect(thrown.code).toBe(ErrorCode.DXF_SAVE_FAILED);
        expect(thrown).toBeInstanceOf(Error);
        expect(appError.code).toBe(ErrorCode.DXF_SAVE_FAILED);
        expect(appError.context).toEqual({ filePath: 'out.dxf', run: 'r1' });
    });

    it('should map ENOENT to FILE_NOT_FOUND', () => {
        const enoent = Object.assign(new Error('no such file'), { code: 'ENOENT' });

        expect(toAppError(enoent, ErrorCode.DXF_PARSE_FAILED).code).toBe(ErrorCode.FILE_NOT_FOUND);
        expect(toAppError(new Error('other'), ErrorCode.DXF_PARSE_FAILED).code).toBe(ErrorCode.DXF_PARSE_FAILED);
    });

    it('should describe non-Error values', () => {
        expect(errorMessage('plain')).toBe('plain');
        expect(toAppError(42).message).toBe('42');
        expect(toAppError(42).code).toBe(ErrorCode.UNKNOWN_ERROR);
    });
});
