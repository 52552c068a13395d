// Zod schemas for pipeline settings
// Everything read from .env or the command line goes through here

import { z } from 'zod';
import { ErrorCode, ProcessingError } from './errors/types';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const SubstitutionModeSchema = z.enum(['replace', 'new-entity']);

export const FilterConfigSchema = z.object({
    minLength: z.number().int().nonnegative().default(1),
    maxLength: z.number().int().positive().default(1000),
    excludeLayers: z.array(z.string()).default([]),
    onlyCjk: z.boolean().default(false)
}).refine(filter => filter.maxLength >= filter.minLength, {
    message: 'maxLength must be greater than or equal to minLength',
    path: ['maxLength']
});

export const PipelineConfigSchema = z.object({
    fontName: z.string().trim().min(1).default('Times New Roman'),
    mode: SubstitutionModeSchema.default('new-entity'),
    fontSizeReduction: z.number().nonnegative().default(4),
    minHeight: z.number().positive().default(1.0),
    widthFactor: z.number().positive().default(0.8),
    translateAttributes: z.boolean().default(false),
    filter: FilterConfigSchema.default({}),
    rawRecordCodes: z.array(z.number().int().nonnegative()).min(1).default([1, 3, 7, 8]),
    includeRawRecords: z.boolean().default(false),
    concurrency: z.number().int().min(1).max(32).default(2),
    outputSuffix: z.string().default('_translated'),
    logLevel: LogLevelSchema.default('info'),
    /** Directory the run log is written to when the CLI exits */
    logDir: z.string().trim().min(1).default('logs')
});

export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate settings, throwing a CONFIG_INVALID ProcessingError listing every issue
 */
export function parsePipelineConfig(data: unknown): PipelineConfig {
    const result = PipelineConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ProcessingError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}

