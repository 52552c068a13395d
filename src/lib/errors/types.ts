// Structured error handling for the extraction / write-back pipeline

export enum ErrorCode {
    // Drawing errors
    DXF_PARSE_FAILED = 'DXF_001',
    DXF_INVALID_FORMAT = 'DXF_002',
    DXF_EMPTY_FILE = 'DXF_003',
    DXF_ENCODING = 'DXF_004',
    DXF_SAVE_FAILED = 'DXF_005',
    DXF_UNSUPPORTED_ENTITY = 'DXF_006',
    DXF_INVALID_LAYER = 'DXF_007',

    // Translation table errors
    TABLE_NOT_FOUND = 'TABLE_001',
    TABLE_PARSE_FAILED = 'TABLE_002',
    TABLE_UNSUPPORTED_FORMAT = 'TABLE_003',
    TABLE_EMPTY = 'TABLE_004',

    // Processing errors
    EXTRACTION_STRATEGY_FAILED = 'EXTRACT_001',
    EXTRACTION_NO_TEXT = 'EXTRACT_002',
    SUBSTITUTION_FAILED = 'SUBST_001',

    // Configuration
    CONFIG_INVALID = 'CONFIG_001',

    // General errors
    FILE_NOT_FOUND = 'FILE_001',
    UNKNOWN_ERROR = 'UNKNOWN_001',
}

export interface AppError {
    code: ErrorCode;
    message: string;
    context: Record<string, unknown>;
    recoverable: boolean;
    suggestedAction?: string;
    originalError?: Error;
    timestamp: string;
}

/**
 * Create a structured application error with context and recovery information
 * @param code - Error code from ErrorCode enum
 * @param message - Human-readable error message
 * @param context - Additional context data (file path, handle, etc.)
 * @param originalError - Original Error object if available
 * @example
 * ```ts
 * const error = createAppError(
 *   ErrorCode.DXF_PARSE_FAILED,
 *   'Failed to parse DXF file',
 *   { file: 'plan.dxf' }
 * );
 * ```
 */
export function createAppError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    originalError?: Error
): AppError {
    const errorConfig = getErrorConfig(code);

    return {
        code,
        message,
        context,
        recoverable: errorConfig.recoverable,
        suggestedAction: errorConfig.suggestedAction,
        originalError,
        timestamp: new Date().toISOString(),
    };
}

/**
 * Throwable wrapper so pipeline failures keep their code through try/catch
 */
export class ProcessingError extends Error {
    readonly appError: AppError;

    constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}, originalError?: Error) {
        super(message);
        this.name = 'ProcessingError';
        this.appError = createAppError(code, message, context, originalError);
    }

    get code(): ErrorCode {
        return this.appError.code;
    }
}

export function isProcessingError(error: unknown): error is ProcessingError {
    return error instanceof ProcessingError;
}

/**
 * Normalize anything thrown into an AppError
 */
export function toAppError(error: unknown, fallbackCode: ErrorCode = ErrorCode.UNKNOWN_ERROR, context: Record<string, unknown> = {}): AppError {
    if (error instanceof ProcessingError) {
        return { ...error.appError, context: { ...error.appError.context, ...context } };
    }
    if (error instanceof Error) {
        const code = 'code' in error && error.code === 'ENOENT' ? ErrorCode.FILE_NOT_FOUND : fallbackCode;
        return createAppError(code, error.message, context, error);
    }
    return createAppError(fallbackCode, String(error), context);
}

/**
 * Log context for an AppError: its code, suggested action and own context
 */
export function errorLogContext(appError: AppError): Record<string, unknown> {
    return { code: appError.code, suggestedAction: appError.suggestedAction, ...appError.context };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Get error configuration
 */
function getErrorConfig(code: ErrorCode): {
    recoverable: boolean;
    suggestedAction?: string;
} {
    const configs: Record<ErrorCode, { recoverable: boolean; suggestedAction?: string }> = {
        // Drawing - the raw-record scan can still recover text
        [ErrorCode.DXF_PARSE_FAILED]: {
            recoverable: true,
            suggestedAction: 'The drawing could not be parsed; text will be recovered from raw records',
        },
        [ErrorCode.DXF_INVALID_FORMAT]: {
            recoverable: true,
            suggestedAction: 'Check that the file is an ASCII DXF (binary DXF and DWG are not supported)',
        },
        [ErrorCode.DXF_EMPTY_FILE]: {
            recoverable: false,
            suggestedAction: 'The DXF file is empty. Check the file.',
        },
        [ErrorCode.DXF_ENCODING]: {
            recoverable: true,
            suggestedAction: 'The file contains characters in an unexpected encoding',
        },
        [ErrorCode.DXF_SAVE_FAILED]: {
            recoverable: false,
            suggestedAction: 'Check that the output directory exists and is writable',
        },
        [ErrorCode.DXF_UNSUPPORTED_ENTITY]: {
            recoverable: true,
        },
        [ErrorCode.DXF_INVALID_LAYER]: {
            recoverable: true,
            suggestedAction: 'Invalid layer names are cleaned and the drawing is opened again',
        },

        // Translation table
        [ErrorCode.TABLE_NOT_FOUND]: {
            recoverable: false,
            suggestedAction: 'Pass the translated spreadsheet with --table',
        },
        [ErrorCode.TABLE_PARSE_FAILED]: {
            recoverable: false,
            suggestedAction: 'Check that the spreadsheet is a valid .xlsx or .csv file',
        },
        [ErrorCode.TABLE_UNSUPPORTED_FORMAT]: {
            recoverable: false,
            suggestedAction: 'Use an .xlsx or .csv translation table',
        },
        [ErrorCode.TABLE_EMPTY]: {
            recoverable: false,
            suggestedAction: 'Fill in the translation column before running the write-back',
        },

        // Processing
        [ErrorCode.EXTRACTION_STRATEGY_FAILED]: {
            recoverable: true,
        },
        [ErrorCode.EXTRACTION_NO_TEXT]: {
            recoverable: false,
            suggestedAction: 'No translatable text was found in the input drawings',
        },
        [ErrorCode.SUBSTITUTION_FAILED]: {
            recoverable: true,
        },

        [ErrorCode.CONFIG_INVALID]: {
            recoverable: false,
            suggestedAction: 'Fix the invalid settings in .env or on the command line',
        },

        // General
        [ErrorCode.FILE_NOT_FOUND]: {
            recoverable: false,
            suggestedAction: 'Check the input path',
        },
        [ErrorCode.UNKNOWN_ERROR]: {
            recoverable: true,
            suggestedAction: 'Unknown error. Re-run with --verbose and check the logs.',
        },
    };

    return configs[code] || { recoverable: false };
}
