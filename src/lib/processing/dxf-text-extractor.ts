/**
 * DXF Text Extractor
 *
 * One TextSource per structural region of a drawing, plus the raw-record source that
 * scans the group code / value line pairs directly when the drawing cannot be opened.
 * Sources never throw: a failure becomes an unsuccessful ExtractionResult.
 */

import type {
    EntityKind,
    ExtractionResult,
    RawTextRecord,
    StrategyTag,
    StructuredTextRecord,
    TextField,
    TextRecord
} from '@/types';
import type { Logger } from '@/lib/logger';
import { ErrorCode, errorLogContext, toAppError } from '@/lib/errors/types';
import type { DrawingDocument, DrawingRegion } from './dxf-document';
import {
    AttdefEntity,
    DimensionEntity,
    DxfEntity,
    InsertEntity,
    MTextEntity,
    TextEntity,
    supportsHeight,
    supportsPlacement,
    supportsStyle,
    entityKindOf
} from './dxf-entities';
import { scanTagPairs } from './dxf-tags';
import { isMeaningful, type NoisePredicate } from './text-filter';

// ============================================================================
// TYPES
// ============================================================================

export interface TextSource {
    readonly strategy: StrategyTag;
    extract(): ExtractionResult;
}

/** Measured-value placeholder in dimension text overrides */
const DIMENSION_MEASUREMENT = '<>';

export const DEFAULT_RAW_RECORD_CODES: readonly number[] = [1, 3, 7, 8];

// ============================================================================
// RECORD BUILDING
// ============================================================================

/**
 * Where an entity sits in its region: `3` for the fourth entity, `3.1` for the second
 * attribute of that entity when it is an insert
 */
type RegionSlot = string;

function toRecord(
    region: DrawingRegion,
    entity: DxfEntity,
    slot: RegionSlot,
    kind: EntityKind,
    text: string,
    field: TextField
): StructuredTextRecord {
    const placement = supportsPlacement(entity) ? entity : undefined;
    const position = placement?.insert ?? (entity instanceof DimensionEntity ? entity.insert : undefined);

    return {
        sourceRegion: region.kind,
        regionName: region.name,
        // R12 drawings carry no handles; fall back to the entity's place in its region
        entityHandle: entity.handle ?? `${region.name}#${slot}`,
        field,
        rawText: text,
        layer: entity.layer,
        position,
        height: (supportsHeight(entity) ? entity.height : undefined) ?? 0,
        rotation: placement?.rotation ?? 0,
        style: (supportsStyle(entity) ? entity.style : undefined) ?? '',
        entityKind: kind
    };
}

function push(
    records: StructuredTextRecord[],
    region: DrawingRegion,
    entity: DxfEntity,
    slot: RegionSlot,
    text: string,
    field: TextField = 'text'
) {
    const kind = entityKindOf(entity);
    const trimmed = text.trim();
    if (!kind || !trimmed) return;
    records.push(toRecord(region, entity, slot, kind, trimmed, field));
}

/**
 * TEXT, MTEXT, insert attributes and dimension overrides of a drawing area
 */
export function readLayoutTexts(region: DrawingRegion): StructuredTextRecord[] {
    const records: StructuredTextRecord[] = [];

    region.entities().forEach((entity, index) => {
        const slot = String(index);
        if (entity instanceof TextEntity || entity instanceof MTextEntity) {
            push(records, region, entity, slot, entity.plainText);
        } else if (entity instanceof InsertEntity) {
            entity.attribs.forEach((attrib, attribIndex) => push(records, region, attrib, `${slot}.${attribIndex}`, attrib.text));
        } else if (entity instanceof DimensionEntity) {
            const override = entity.plainText.trim();
            if (override && override !== DIMENSION_MEASUREMENT) push(records, region, entity, slot, override);
        }
    });

    return records;
}

/**
 * TEXT, MTEXT and attribute definitions (default text and tag) of a block definition
 */
export function readBlockTexts(region: DrawingRegion): StructuredTextRecord[] {
    const records: StructuredTextRecord[] = [];

    region.entities().forEach((entity, index) => {
        const slot = String(index);
        if (entity instanceof TextEntity || entity instanceof MTextEntity) {
            push(records, region, entity, slot, entity.plainText);
        } else if (entity instanceof AttdefEntity) {
            push(records, region, entity, slot, entity.text);
            push(records, region, entity, slot, entity.tag, 'tag');
        }
    });

    return records;
}

// ============================================================================
// SOURCES
// ============================================================================

function failedResult(strategy: StrategyTag, error: unknown, logger: Logger): ExtractionResult {
    const appError = toAppError(error, ErrorCode.EXTRACTION_STRATEGY_FAILED, { strategy });
    logger.error(`${strategy} extraction failed: ${appError.message}`, errorLogContext(appError));
    return { strategy, records: [], success: false, errorMessage: appError.message };
}

abstract class RegionTextSource implements TextSource {
    abstract readonly strategy: StrategyTag;

    constructor(protected readonly document: DrawingDocument, protected readonly logger: Logger) {}

    protected abstract regions(): DrawingRegion[];

    protected abstract read(region: DrawingRegion): StructuredTextRecord[];

    extract(): ExtractionResult {
        try {
            const records: TextRecord[] = [];
            for (const region of this.regions()) {
                const found = this.read(region);
                this.logger.debug(`${region.kind} "${region.name}": ${found.length} texts`);
                records.push(...found);
            }
            return { strategy: this.strategy, records, success: true };
        } catch (e) {
            return failedResult(this.strategy, e, this.logger);
        }
    }
}

export class ModelSpaceSource extends RegionTextSource {
    readonly strategy = 'model-space';

    protected regions() {
        return [this.document.modelSpace];
    }

    protected read(region: DrawingRegion) {
        return readLayoutTexts(region);
    }
}

export class PaperSpaceSource extends RegionTextSource {
    readonly strategy = 'paper-space';

    protected regions() {
        return this.document.layouts();
    }

    protected read(region: DrawingRegion) {
        return readLayoutTexts(region);
    }
}

export class BlockDefinitionSource extends RegionTextSource {
    readonly strategy = 'block-definitions';

    protected regions() {
        return this.document.blocks();
    }

    protected read(region: DrawingRegion) {
        return readBlockTexts(region);
    }
}

export interface RawRecordOptions {
    codes?: readonly number[];
    noiseFilter?: NoisePredicate;
}

/**
 * Repair path: scans code/value line pairs, keeping meaningful values of label codes.
 * No entity identity, so values are collapsed by equality.
 */
export class RawRecordSource implements TextSource {
    readonly strategy = 'raw-records';
    private readonly codes: readonly number[];
    private readonly noiseFilter: NoisePredicate;

    constructor(private readonly content: string, private readonly logger: Logger, options: RawRecordOptions = {}) {
        this.codes = options.codes ?? DEFAULT_RAW_RECORD_CODES;
        this.noiseFilter = options.noiseFilter ?? isMeaningful;
    }

    extract(): ExtractionResult {
        try {
            const seen = new Set<string>();
            const records: RawTextRecord[] = [];
            for (const { code, value } of scanTagPairs(this.content)) {
                if (!this.codes.includes(code) || !value) continue;
                if (seen.has(value) || !this.noiseFilter(value)) continue;
                seen.add(value);
                records.push({ sourceRegion: 'raw-record', rawText: value, groupCode: code });
            }
            this.logger.debug(`raw records: ${records.length} texts`);
            return { strategy: this.strategy, records, success: true };
        } catch (e) {
            return failedResult(this.strategy, e, this.logger);
        }
    }
}

/**
 * Structured sources in their fixed order: model space, layouts, blocks
 */
export function createStructuredSources(document: DrawingDocument, logger: Logger): TextSource[] {
    return [
        new ModelSpaceSource(document, logger),
        new PaperSpaceSource(document, logger),
        new BlockDefinitionSource(document, logger)
    ];
}
