/**
 * Substitution Engine
 *
 * Writes translations back into a drawing. Per text entity:
 *   unvisited -> processed-skipped     (blank text, no match, empty translation)
 *   unvisited -> processed-translated  (replace in place, or new TEXT + delete original)
 *   unvisited -> processed-errored     (any failure while editing; siblings continue)
 *
 * Regions are walked model space, layouts, then named blocks; the style table is
 * shared by all of them.
 */

import type {
    DocumentSubstitutionSummary,
    EntityState,
    MatchMethod,
    Point3,
    RegionSummary,
    SubstitutionCounters,
    SubstitutionMode,
    SubstitutionOutcome,
    TranslationMap
} from '@/types';
import { createSilentLogger, type Logger } from '@/lib/logger';
import { ErrorCode, errorLogContext, toAppError } from '@/lib/errors/types';
import type { DrawingDocument, DrawingRegion } from './dxf-document';
import { AttribEntity, type TextBearingEntity } from './dxf-entities';
import { describeMatch, isTranslated, smartMatch } from './matcher';

// ============================================================================
// OPTIONS
// ============================================================================

export interface SubstitutionOptions {
    mode: SubstitutionMode;
    fontName: string;
    fontSizeReduction: number;
    minHeight: number;
    widthFactor: number;
    /** Also translate attribute values of block insertions (always edited in place) */
    translateAttributes: boolean;
}

export const DEFAULT_SUBSTITUTION_OPTIONS: SubstitutionOptions = {
    mode: 'new-entity',
    fontName: 'Times New Roman',
    fontSizeReduction: 4,
    minHeight: 1.0,
    widthFactor: 0.8,
    translateAttributes: false
};

// Attributes of a new TEXT when the original lacks them
export const NEW_TEXT_DEFAULTS = {
    insert: { x: 0, y: 0, z: 0 } satisfies Point3,
    height: 2.5,
    rotation: 0,
    layer: '0'
};

export interface TranslateContext {
    document: DrawingDocument;
    mapping: TranslationMap;
    options: SubstitutionOptions;
    logger: Logger;
}

// ============================================================================
// HELPERS
// ============================================================================

export function resolveSubstitutionOptions(overrides: Partial<SubstitutionOptions>): SubstitutionOptions {
    const defaults = DEFAULT_SUBSTITUTION_OPTIONS;
    return {
        mode: overrides.mode ?? defaults.mode,
        fontName: overrides.fontName ?? defaults.fontName,
        fontSizeReduction: overrides.fontSizeReduction ?? defaults.fontSizeReduction,
        minHeight: overrides.minHeight ?? defaults.minHeight,
        widthFactor: overrides.widthFactor ?? defaults.widthFactor,
        translateAttributes: overrides.translateAttributes ?? defaults.translateAttributes
    };
}

export function styleNameForFont(fontName: string): string {
    return `TranslatedStyle_${fontName.replace(/ /g, '_')}`;
}

/**
 * Make sure the translation style exists; returns its name. Safe to call per entity.
 */
export function ensureTranslationStyle(document: DrawingDocument, options: Pick<SubstitutionOptions, 'fontName' | 'widthFactor'>): string {
    const name = styleNameForFont(options.fontName);
    if (!document.styles.has(name)) {
        document.styles.create(name, { font: options.fontName, widthFactor: options.widthFactor });
    }
    return name;
}

export function reducedHeight(height: number, reduction: number, minHeight = 1.0): number {
    return Math.max(height - reduction, minHeight);
}

export function emptyCounters(): SubstitutionCounters {
    return { processed: 0, translated: 0, skipped: 0, errors: 0 };
}

export function sumCounters(items: Iterable<SubstitutionCounters>): SubstitutionCounters {
    const total = emptyCounters();
    for (const item of items) {
        total.processed += item.processed;
        total.translated += item.translated;
        total.skipped += item.skipped;
        total.errors += item.errors;
    }
    return total;
}

function outcome(state: EntityState, handle?: string, method?: MatchMethod): SubstitutionOutcome {
    return {
        processed: 1,
        translated: state === 'processed-translated' ? 1 : 0,
        skipped: state === 'processed-skipped' ? 1 : 0,
        errors: state === 'processed-errored' ? 1 : 0,
        state,
        handle,
        method
    };
}

// ============================================================================
// ENTITY
// ============================================================================

function applyInPlace(entity: TextBearingEntity | AttribEntity, translation: string, style: string, options: SubstitutionOptions) {
    entity.setText(translation);
    entity.setStyle(style);
    const height = entity.height;
    if (height !== undefined) {
        entity.setHeight(reducedHeight(height, options.fontSizeReduction, options.minHeight));
    }
}

function applyAsNewEntity(region: DrawingRegion, entity: TextBearingEntity, translation: string, style: string, options: SubstitutionOptions) {
    region.addText({
        text: translation,
        insert: entity.insert ?? NEW_TEXT_DEFAULTS.insert,
        height: reducedHeight(entity.height ?? NEW_TEXT_DEFAULTS.height, options.fontSizeReduction, options.minHeight),
        rotation: entity.rotation ?? NEW_TEXT_DEFAULTS.rotation,
        layer: entity.layer || NEW_TEXT_DEFAULTS.layer,
        style
    }, entity);
    region.deleteEntity(entity);
}

/**
 * Translate one TEXT, MTEXT or ATTRIB. Never throws.
 */
export function translateTextEntity(
    region: DrawingRegion,
    entity: TextBearingEntity | AttribEntity,
    context: TranslateContext
): SubstitutionOutcome {
    const { document, mapping, options, logger } = context;
    const handle = entity.handle;

    try {
        const source = entity.plainText;
        if (!source.trim()) {
            return outcome('processed-skipped', handle);
        }

        const match = smartMatch(source, mapping);
        if (!isTranslated(match)) {
            logger.debug(`Skipped ${describeMatch(source, match)}`, { handle });
            return outcome('processed-skipped', handle, match.method);
        }

        const style = ensureTranslationStyle(document, options);
        if (options.mode === 'replace' || entity instanceof AttribEntity) {
            applyInPlace(entity, match.translation, style, options);
        } else {
            applyAsNewEntity(region, entity, match.translation, style, options);
        }

        logger.debug(`Translated ${describeMatch(source, match)}`, { handle });
        return outcome('processed-translated', handle, match.method);
    } catch (e) {
        const appError = toAppError(e, ErrorCode.SUBSTITUTION_FAILED, { handle, region: region.name });
        logger.error(`Failed to translate entity ${handle ?? '(no handle)'} in ${region.name}: ${appError.message}`, errorLogContext(appError));
        return outcome('processed-errored', handle);
    }
}

// ============================================================================
// REGION / DOCUMENT
// ============================================================================

export function translateRegion(region: DrawingRegion, context: TranslateContext): RegionSummary {
    const outcomes: SubstitutionOutcome[] = [];

    for (const entity of region.textEntities()) {
        outcomes.push(translateTextEntity(region, entity, context));
    }

    if (context.options.translateAttributes) {
        for (const insert of region.inserts()) {
            for (const attrib of insert.attribs) {
                outcomes.push(translateTextEntity(region, attrib, context));
            }
        }
    }

    const counters = sumCounters(outcomes);
    if (counters.processed > 0) {
        context.logger.info(`${region.kind} "${region.name}": ${counters.translated}/${counters.processed} translated`, {
            skipped: counters.skipped,
            errors: counters.errors
        });
    }
    return { kind: region.kind, name: region.name, ...counters };
}

export interface TranslateDocumentOptions extends Partial<SubstitutionOptions> {
    logger?: Logger;
    signal?: AbortSignal;
}

/**
 * Translate every region of a document. Cancellation is checked between regions;
 * the document is not saved here.
 */
export function translateDocument(
    document: DrawingDocument,
    mapping: TranslationMap,
    options: TranslateDocumentOptions = {}
): DocumentSubstitutionSummary {
    const { logger = createSilentLogger(), signal } = options;
    const context: TranslateContext = { document, mapping, options: resolveSubstitutionOptions(options), logger };

    const regions: RegionSummary[] = [];
    let cancelled = false;

    for (const region of document.regions()) {
        if (signal?.aborted) {
            logger.warn(`Cancelled before ${region.kind} "${region.name}"`);
            cancelled = true;
            break;
        }
        regions.push(translateRegion(region, context));
    }

    return { ...sumCounters(regions), regions, cancelled };
}

