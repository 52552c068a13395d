/**
 * Pipeline configuration from environment variables (.env is loaded by the CLI).
 * Command-line flags are merged on top with mergeConfig.
 */

import { parsePipelineConfig, type FilterConfig, type PipelineConfig } from './validation';

export type ConfigOverrides = Partial<Omit<PipelineConfig, 'filter'>> & { filter?: Partial<FilterConfig> };

type Env = Record<string, string | undefined>;

function readNumber(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    // NaN is left for the schema to reject
    return Number(value);
}

function readBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readList(value: string | undefined): string[] | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function readString(value: string | undefined): string | undefined {
    return value === undefined || value === '' ? undefined : value;
}

// Unvalidated settings; parsePipelineConfig fills defaults and rejects bad values
export function configFromEnv(env: Env): Record<string, unknown> {
    return {
        fontName: readString(env.FONT_NAME),
        mode: readString(env.SUBSTITUTION_MODE),
        fontSizeReduction: readNumber(env.FONT_SIZE_REDUCTION),
        minHeight: readNumber(env.MIN_TEXT_HEIGHT),
        widthFactor: readNumber(env.STYLE_WIDTH_FACTOR),
        translateAttributes: readBoolean(env.TRANSLATE_ATTRIBUTES),
        filter: {
            minLength: readNumber(env.FILTER_MIN_LENGTH),
            maxLength: readNumber(env.FILTER_MAX_LENGTH),
            excludeLayers: readList(env.EXCLUDE_LAYERS),
            onlyCjk: readBoolean(env.ONLY_CJK)
        },
        rawRecordCodes: readList(env.RAW_RECORD_CODES)?.map(Number),
        includeRawRecords: readBoolean(env.INCLUDE_RAW_RECORDS),
        concurrency: readNumber(env.WORKER_CONCURRENCY),
        outputSuffix: env.OUTPUT_SUFFIX,
        logLevel: readString(env.LOG_LEVEL),
        logDir: readString(env.LOG_DIR)
    };
}

export function loadConfig(env: Env = process.env): PipelineConfig {
    return parsePipelineConfig(configFromEnv(env));
}

function definedEntries(values: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Apply overrides (typically CLI flags) and re-validate; undefined values keep the base setting
 */
export function mergeConfig(base: PipelineConfig, overrides: ConfigOverrides): PipelineConfig {
    const { filter, ...rest } = overrides;
    return parsePipelineConfig({ ...base, ...definedEntries(rest), filter: { ...base.filter, ...definedEntries(filter ?? {}) } });
}
