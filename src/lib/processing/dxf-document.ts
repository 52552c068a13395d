/**
 * DXF Drawing Document
 *
 * Mutable document model over the DXF tag stream. dxf-parser decides whether a file opens
 * as a structured drawing; the tag model keeps every record so the drawing can be written
 * back with only the edited entities changed.
 */

import fs from 'fs/promises';
import DxfParser from 'dxf-parser';
import type { SourceRegion, Point3 } from '@/types';
import { createSilentLogger, type Logger } from '@/lib/logger';
import { ErrorCode, ProcessingError, errorMessage } from '@/lib/errors/types';
import { cleanDrawingContent, isValidLayerName, type LayerNameFix } from './dxf-cleaner';
import { decodeDxfBuffer, formatDxfNumber, parseTags, serializeTags, type DxfTag } from './dxf-tags';
import {
    CompoundEntity,
    DxfEntity,
    DxfRecord,
    InsertEntity,
    MTextEntity,
    TextEntity,
    createEntity,
    AttribEntity,
    type TextBearingEntity
} from './dxf-entities';

// ============================================================================
// TYPES
// ============================================================================

export type RegionKind = Exclude<SourceRegion, 'raw-record'>;

export const MODEL_LAYOUT_NAME = 'Model';

export interface NewTextAttributes {
    text: string;
    insert: Point3;
    height: number;
    rotation: number;
    layer: string;
    style?: string;
}

export interface DrawingRegion {
    readonly kind: RegionKind;
    readonly name: string;
    entities(): DxfEntity[];
    query(...types: string[]): DxfEntity[];
    textEntities(): TextBearingEntity[];
    inserts(): InsertEntity[];
    /** Add a TEXT entity, placed before `anchor` when given, else at the end of the region */
    addText(attributes: NewTextAttributes, anchor?: DxfEntity): TextEntity;
    deleteEntity(entity: DxfEntity): void;
}

export interface StyleOptions {
    font: string;
    widthFactor: number;
}

export interface StyleTable {
    has(name: string): boolean;
    names(): string[];
    font(name: string): string | undefined;
    widthFactor(name: string): number | undefined;
    create(name: string, options: StyleOptions): void;
}

export interface DrawingDocument {
    readonly sourcePath?: string;
    readonly modelSpace: DrawingRegion;
    /** Paper-space layouts, excluding the model layout, in tab order */
    layouts(): DrawingRegion[];
    /** Named block definitions, excluding anonymous (`*`) blocks */
    blocks(): DrawingRegion[];
    /** Model space, then layouts, then blocks */
    regions(): DrawingRegion[];
    readonly styles: StyleTable;
    findByHandle(handle: string): DxfEntity | undefined;
    serialize(): string;
    save(filePath: string): Promise<void>;
}

interface RegionDefaults {
    ownerHandle?: string;
    paperSpace: boolean;
}

interface LayoutInfo {
    name: string;
    tabOrder: number;
}

// ============================================================================
// REGIONS
// ============================================================================

class DxfRegion implements DrawingRegion {
    private readonly items: DxfEntity[] = [];
    endMarker?: DxfRecord;
    readonly order: number;

    constructor(
        private readonly document: DxfDocument,
        readonly kind: RegionKind,
        readonly name: string,
        readonly defaults: RegionDefaults,
        order = Number.MAX_SAFE_INTEGER
    ) {
        this.order = order;
    }

    push(entity: DxfEntity) {
        this.items.push(entity);
    }

    entities(): DxfEntity[] {
        return [...this.items];
    }

    query(...types: string[]): DxfEntity[] {
        const wanted = new Set(types.map(type => type.toUpperCase()));
        return this.items.filter(entity => wanted.has(entity.type));
    }

    textEntities(): TextBearingEntity[] {
        return this.items.filter((entity): entity is TextBearingEntity =>
            entity instanceof TextEntity || entity instanceof MTextEntity
        );
    }

    inserts(): InsertEntity[] {
        return this.items.filter((entity): entity is InsertEntity => entity instanceof InsertEntity);
    }

    addText(attributes: NewTextAttributes, anchor?: DxfEntity): TextEntity {
        const paperSpace = anchor ? anchor.inPaperSpace : this.defaults.paperSpace;
        const ownerHandle = anchor ? anchor.ownerHandle : this.defaults.ownerHandle;
        const record = this.document.buildTextRecord(attributes, { paperSpace, ownerHandle });
        const entity = new TextEntity(record);

        if (anchor) {
            const position = this.items.indexOf(anchor);
            if (position === -1) {
                throw new ProcessingError(ErrorCode.DXF_UNSUPPORTED_ENTITY, `Anchor entity ${anchor.handle ?? '?'} is not in region ${this.name}`);
            }
            this.document.insertRecordsBefore(anchor.record, [record]);
            this.items.splice(position, 0, entity);
        } else if (this.endMarker) {
            this.document.insertRecordsBefore(this.endMarker, [record]);
            this.items.push(entity);
        } else {
            throw new ProcessingError(ErrorCode.DXF_UNSUPPORTED_ENTITY, `Region ${this.name} has no place to add entities`);
        }
        this.document.registerEntity(entity);
        return entity;
    }

    deleteEntity(entity: DxfEntity) {
        const position = this.items.indexOf(entity);
        if (position === -1) {
            throw new ProcessingError(ErrorCode.DXF_UNSUPPORTED_ENTITY, `Entity ${entity.handle ?? '?'} is not in region ${this.name}`);
        }
        const records = [entity.record];
        if (entity instanceof InsertEntity) {
            records.push(...entity.attribs.map(attrib => attrib.record));
            if (entity.seqend) records.push(entity.seqend);
        } else if (entity instanceof CompoundEntity) {
            records.push(...entity.children);
        }
        this.document.removeRecords(records);
        this.items.splice(position, 1);
        this.document.unregisterEntity(entity);
    }
}

// ============================================================================
// STYLE TABLE
// ============================================================================

class DxfStyleTable implements StyleTable {
    tableRecord?: DxfRecord;
    endTab?: DxfRecord;
    readonly entries: DxfRecord[] = [];

    constructor(private readonly document: DxfDocument) {}

    private find(name: string): DxfRecord | undefined {
        const wanted = name.trim().toUpperCase();
        return this.entries.find(entry => (entry.get(2) ?? '').trim().toUpperCase() === wanted);
    }

    has(name: string): boolean {
        return this.find(name) !== undefined;
    }

    names(): string[] {
        return this.entries.map(entry => (entry.get(2) ?? '').trim());
    }

    font(name: string): string | undefined {
        return this.find(name)?.get(3)?.trim();
    }

    widthFactor(name: string): number | undefined {
        return this.find(name)?.getNumber(41);
    }

    /** Check-then-create: an existing style with the same name is left untouched */
    create(name: string, options: StyleOptions) {
        if (this.has(name)) return;

        const endTab = this.endTab ?? this.document.createStyleTable(this);
        const record = this.document.buildStyleRecord(name, options, this.tableRecord?.get(5)?.trim());
        this.document.insertRecordsBefore(endTab, [record]);
        this.entries.push(record);

        if (this.tableRecord?.has(70)) {
            this.tableRecord.set(70, String(this.entries.length));
        }
    }
}

// ============================================================================
// DOCUMENT
// ============================================================================

export class DxfDocument implements DrawingDocument {
    private records: DxfRecord[];
    readonly styles: DxfStyleTable;
    readonly modelSpace: DxfRegion;
    private paperRegions: DxfRegion[] = [];
    private blockRegions: DxfRegion[] = [];
    private readonly handleIndex = new Map<string, DxfEntity>();
    private readonly sectionStarts = new Map<string, DxfRecord>();
    private readonly sectionEnds = new Map<string, DxfRecord>();
    private headerRecord?: DxfRecord;
    private nextHandle = 1n;
    private readonly usesHandles: boolean;
    private readonly usesSubclassMarkers: boolean;

    private constructor(records: DxfRecord[], readonly sourcePath?: string) {
        this.records = records;
        this.styles = new DxfStyleTable(this);
        this.modelSpace = new DxfRegion(this, 'model-space', MODEL_LAYOUT_NAME, { paperSpace: false });
        this.usesSubclassMarkers = records.some(record => record.tags.some(tag => tag.code === 100));
        this.usesHandles = records.some(record => record.tags.some(tag => tag.code === 5));
        this.index();
    }

    static fromTags(tags: DxfTag[], sourcePath?: string): DxfDocument {
        if (tags.length === 0 || tags[0].code !== 0) {
            throw new ProcessingError(ErrorCode.DXF_INVALID_FORMAT, 'DXF content does not start with a group code 0 record');
        }
        const records: DxfRecord[] = [];
        for (const tag of tags) {
            if (tag.code === 0) {
                records.push(new DxfRecord([{ code: 0, value: tag.value.trim() }]));
            } else {
                records[records.length - 1].tags.push(tag);
            }
        }
        if (!records.some(record => record.type === 'SECTION')) {
            throw new ProcessingError(ErrorCode.DXF_INVALID_FORMAT, 'DXF content has no SECTION');
        }
        return new DxfDocument(records, sourcePath);
    }

    // ------------------------------------------------------------------------
    // Indexing
    // ------------------------------------------------------------------------

    private index() {
        const blockRecordNames = new Map<string, string>();
        const layouts = new Map<string, LayoutInfo>();
        const entitiesSection: DxfEntity[] = [];
        const blocks: Array<{ begin: DxfRecord; entities: DxfEntity[]; end?: DxfRecord }> = [];

        let section: string | undefined;
        let table: string | undefined;
        let parent: InsertEntity | CompoundEntity | undefined;
        let maxHandle = 0n;

        const collect = (record: DxfRecord, target: DxfEntity[]) => {
            const type = record.type;
            if (parent) {
                if (type === 'SEQEND') {
                    if (parent instanceof InsertEntity) parent.seqend = record;
                    else parent.children.push(record);
                    parent = undefined;
                    return;
                }
                if (type === 'ATTRIB' && parent instanceof InsertEntity) {
                    const attrib = new AttribEntity(record);
                    parent.attribs.push(attrib);
                    this.registerEntity(attrib);
                    return;
                }
                if (parent instanceof CompoundEntity && type === 'VERTEX') {
                    parent.children.push(record);
                    return;
                }
                parent = undefined;
            }
            const entity = createEntity(record);
            target.push(entity);
            this.registerEntity(entity);
            if ((entity instanceof InsertEntity && entity.attributesFollow) || entity instanceof CompoundEntity) {
                parent = entity;
            }
        };

        for (const record of this.records) {
            // Header variables ($HANDSEED included) are not handles
            const tags = record.type === 'SECTION' ? [] : record.tags;
            for (const tag of tags) {
                if (tag.code === 5 || tag.code === 105) {
                    const value = parseHandle(tag.value);
                    if (value !== undefined && value > maxHandle) maxHandle = value;
                }
            }

            const type = record.type;
            if (type === 'SECTION') {
                section = record.get(2)?.trim().toUpperCase();
                if (section) this.sectionStarts.set(section, record);
                if (section === 'HEADER') this.headerRecord = record;
                parent = undefined;
                continue;
            }
            if (type === 'ENDSEC') {
                if (section) this.sectionEnds.set(section, record);
                section = undefined;
                parent = undefined;
                continue;
            }
            if (type === 'EOF') continue;

            if (section === 'TABLES') {
                if (type === 'TABLE') {
                    table = record.get(2)?.trim().toUpperCase();
                    if (table === 'STYLE') this.styles.tableRecord = record;
                } else if (type === 'ENDTAB') {
                    if (table === 'STYLE') this.styles.endTab = record;
                    table = undefined;
                } else if (type === 'BLOCK_RECORD') {
                    const handle = record.get(5)?.trim();
                    if (handle) blockRecordNames.set(handle.toUpperCase(), (record.get(2) ?? '').trim());
                } else if (type === 'STYLE' && table === 'STYLE') {
                    this.styles.entries.push(record);
                }
            } else if (section === 'BLOCKS') {
                if (type === 'BLOCK') {
                    blocks.push({ begin: record, entities: [] });
                    parent = undefined;
                } else if (type === 'ENDBLK') {
                    const current = blocks[blocks.length - 1];
                    if (current && !current.end) current.end = record;
                    parent = undefined;
                } else {
                    const current = blocks[blocks.length - 1];
                    if (current && !current.end) collect(record, current.entities);
                }
            } else if (section === 'ENTITIES') {
                collect(record, entitiesSection);
            } else if (section === 'OBJECTS' && type === 'LAYOUT') {
                const layout = readLayout(record);
                if (layout) layouts.set(layout.blockRecord.toUpperCase(), { name: layout.name, tabOrder: layout.tabOrder });
            }
        }

        const seed = this.headerHandleSeed() ?? 0n;
        const next = maxHandle + 1n;
        this.nextHandle = seed > next ? seed : next;
        this.buildRegions(blockRecordNames, layouts, entitiesSection, blocks);
    }

    private buildRegions(
        blockRecordNames: Map<string, string>,
        layouts: Map<string, LayoutInfo>,
        entitiesSection: DxfEntity[],
        blocks: Array<{ begin: DxfRecord; entities: DxfEntity[]; end?: DxfRecord }>
    ) {
        const paperByName = new Map<string, DxfRegion>();

        const blockRecordHandleOf = (name: string): string | undefined => {
            for (const [handle, recordName] of blockRecordNames) {
                if (recordName.toUpperCase() === name.toUpperCase()) return handle;
            }
            return undefined;
        };

        const paperRegion = (name: string, defaults: RegionDefaults, tabOrder?: number): DxfRegion => {
            let region = paperByName.get(name);
            if (!region) {
                region = new DxfRegion(this, 'paper-space-layout', name, defaults, tabOrder);
                paperByName.set(name, region);
            }
            return region;
        };

        const layoutFor = (blockRecordHandle: string | undefined, blockName: string): LayoutInfo => {
            const byHandle = blockRecordHandle ? layouts.get(blockRecordHandle.toUpperCase()) : undefined;
            if (byHandle) return byHandle;
            const byName = blockRecordHandleOf(blockName);
            const resolved = byName ? layouts.get(byName) : undefined;
            if (resolved) return resolved;
            // *Paper_Space -> Layout1, *Paper_Space0 -> Layout2, ...
            const suffix = blockName.replace(/^\*paper_space/i, '');
            const index = suffix === '' ? 1 : parseInt(suffix, 10) + 2;
            return { name: `Layout${Number.isFinite(index) ? index : 1}`, tabOrder: Number.isFinite(index) ? index : 1 };
        };

        // Model space and the active paper layout live in ENTITIES
        const activePaperRecord = blockRecordHandleOf('*Paper_Space');
        const modelRecord = blockRecordHandleOf('*Model_Space');
        this.modelSpace.defaults.ownerHandle = modelRecord;
        this.modelSpace.endMarker = this.sectionEnds.get('ENTITIES');

        for (const entity of entitiesSection) {
            const owner = entity.ownerHandle?.toUpperCase();
            const ownerLayout = owner ? layouts.get(owner) : undefined;
            if (!entity.inPaperSpace && (!ownerLayout || ownerLayout.name === MODEL_LAYOUT_NAME)) {
                this.modelSpace.push(entity);
                continue;
            }
            const info = ownerLayout ?? layoutFor(activePaperRecord, '*Paper_Space');
            const region = paperRegion(info.name, { ownerHandle: owner ?? activePaperRecord, paperSpace: true }, info.tabOrder);
            region.endMarker ??= this.sectionEnds.get('ENTITIES');
            region.push(entity);
        }

        for (const block of blocks) {
            const name = (block.begin.get(2) ?? '').trim();
            const upper = name.toUpperCase();
            const owner = block.begin.get(330)?.trim();

            if (upper === '*MODEL_SPACE') {
                block.entities.forEach(entity => this.modelSpace.push(entity));
                continue;
            }
            if (upper.startsWith('*PAPER_SPACE')) {
                const info = layoutFor(owner, name);
                const region = paperRegion(info.name, { ownerHandle: owner, paperSpace: false }, info.tabOrder);
                region.endMarker ??= block.end;
                block.entities.forEach(entity => region.push(entity));
                continue;
            }
            if (name.startsWith('*')) continue; // anonymous

            const region = new DxfRegion(this, 'block-definition', name, { ownerHandle: owner, paperSpace: false });
            region.endMarker = block.end;
            block.entities.forEach(entity => region.push(entity));
            this.blockRegions.push(region);
        }

        // Layouts without any entity are still layouts
        for (const info of layouts.values()) {
            if (info.name !== MODEL_LAYOUT_NAME) paperRegion(info.name, { paperSpace: true }, info.tabOrder);
        }

        this.paperRegions = [...paperByName.values()]
            .filter(region => region.name !== MODEL_LAYOUT_NAME)
            .sort((a, b) => a.order - b.order);
    }

    // ------------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------------

    layouts(): DrawingRegion[] {
        return [...this.paperRegions];
    }

    blocks(): DrawingRegion[] {
        return [...this.blockRegions];
    }

    regions(): DrawingRegion[] {
        return [this.modelSpace, ...this.paperRegions, ...this.blockRegions];
    }

    findByHandle(handle: string): DxfEntity | undefined {
        return this.handleIndex.get(handle.toUpperCase());
    }

    headerVariable(name: string): string | undefined {
        const index = this.headerVariableIndex(name);
        return index === -1 || !this.headerRecord ? undefined : this.headerRecord.tags[index + 1]?.value.trim();
    }

    private headerVariableIndex(name: string): number {
        if (!this.headerRecord) return -1;
        return this.headerRecord.tags.findIndex(tag => tag.code === 9 && tag.value.trim().toUpperCase() === name.toUpperCase());
    }

    private headerHandleSeed(): bigint | undefined {
        const seed = this.headerVariable('$HANDSEED');
        return seed ? parseHandle(seed) : undefined;
    }

    // ------------------------------------------------------------------------
    // Mutation (used by regions and the style table)
    // ------------------------------------------------------------------------

    registerEntity(entity: DxfEntity) {
        const handle = entity.handle;
        if (handle) this.handleIndex.set(handle.toUpperCase(), entity);
    }

    unregisterEntity(entity: DxfEntity) {
        const handle = entity.handle;
        if (handle && this.handleIndex.get(handle.toUpperCase()) === entity) {
            this.handleIndex.delete(handle.toUpperCase());
        }
    }

    insertRecordsBefore(anchor: DxfRecord, records: DxfRecord[]) {
        const index = this.records.indexOf(anchor);
        if (index === -1) {
            throw new ProcessingError(ErrorCode.DXF_UNSUPPORTED_ENTITY, `Record ${anchor.type} is not part of the document`);
        }
        this.records.splice(index, 0, ...records);
    }

    removeRecords(records: DxfRecord[]) {
        const doomed = new Set(records);
        this.records = this.records.filter(record => !doomed.has(record));
    }

    private allocateHandle(): string | undefined {
        if (!this.usesHandles) return undefined;
        const handle = this.nextHandle.toString(16).toUpperCase();
        this.nextHandle += 1n;

        const seedIndex = this.headerVariableIndex('$HANDSEED');
        if (seedIndex !== -1 && this.headerRecord && this.headerRecord.tags[seedIndex + 1]) {
            this.headerRecord.tags[seedIndex + 1] = { code: 5, value: this.nextHandle.toString(16).toUpperCase() };
        }
        return handle;
    }

    buildTextRecord(attributes: NewTextAttributes, placement: RegionDefaults): DxfRecord {
        const tags: DxfTag[] = [{ code: 0, value: 'TEXT' }];
        const handle = this.allocateHandle();
        if (handle) tags.push({ code: 5, value: handle });
        if (this.usesSubclassMarkers) {
            if (placement.ownerHandle) tags.push({ code: 330, value: placement.ownerHandle });
            tags.push({ code: 100, value: 'AcDbEntity' });
        }
        if (placement.paperSpace) tags.push({ code: 67, value: '1' });
        tags.push({ code: 8, value: attributes.layer });
        if (this.usesSubclassMarkers) tags.push({ code: 100, value: 'AcDbText' });
        tags.push(
            { code: 10, value: formatDxfNumber(attributes.insert.x) },
            { code: 20, value: formatDxfNumber(attributes.insert.y) },
            { code: 30, value: formatDxfNumber(attributes.insert.z) },
            { code: 40, value: formatDxfNumber(attributes.height) },
            { code: 1, value: attributes.text },
            { code: 50, value: formatDxfNumber(attributes.rotation) }
        );
        if (attributes.style) tags.push({ code: 7, value: attributes.style });
        if (this.usesSubclassMarkers) tags.push({ code: 100, value: 'AcDbText' });
        return new DxfRecord(tags);
    }

    buildStyleRecord(name: string, options: StyleOptions, tableHandle?: string): DxfRecord {
        const tags: DxfTag[] = [{ code: 0, value: 'STYLE' }];
        const handle = this.allocateHandle();
        if (handle) tags.push({ code: 5, value: handle });
        if (this.usesSubclassMarkers) {
            if (tableHandle) tags.push({ code: 330, value: tableHandle });
            tags.push({ code: 100, value: 'AcDbSymbolTableRecord' }, { code: 100, value: 'AcDbTextStyleTableRecord' });
        }
        tags.push(
            { code: 2, value: name },
            { code: 70, value: '0' },
            { code: 40, value: '0.0' },
            { code: 41, value: formatDxfNumber(options.widthFactor) },
            { code: 50, value: '0.0' },
            { code: 71, value: '0' },
            { code: 42, value: '2.5' },
            { code: 3, value: options.font },
            { code: 4, value: '' }
        );
        return new DxfRecord(tags);
    }

    /**
     * Add an empty STYLE table (and a TABLES section if the file has none); returns its ENDTAB
     */
    createStyleTable(styles: DxfStyleTable): DxfRecord {
        let tablesEnd = this.sectionEnds.get('TABLES');
        if (!tablesEnd) {
            const sectionStart = new DxfRecord([{ code: 0, value: 'SECTION' }, { code: 2, value: 'TABLES' }]);
            tablesEnd = new DxfRecord([{ code: 0, value: 'ENDSEC' }]);
            const before = ['BLOCKS', 'ENTITIES', 'OBJECTS']
                .map(name => this.sectionStarts.get(name))
                .find((record): record is DxfRecord => record !== undefined)
                ?? this.records.find(record => record.type === 'EOF');
            if (before) this.insertRecordsBefore(before, [sectionStart, tablesEnd]);
            else this.records.push(sectionStart, tablesEnd);
            this.sectionStarts.set('TABLES', sectionStart);
            this.sectionEnds.set('TABLES', tablesEnd);
        }

        const tableTags: DxfTag[] = [{ code: 0, value: 'TABLE' }, { code: 2, value: 'STYLE' }];
        const handle = this.allocateHandle();
        if (handle) tableTags.push({ code: 5, value: handle });
        if (this.usesSubclassMarkers) tableTags.push({ code: 330, value: '0' }, { code: 100, value: 'AcDbSymbolTable' });
        tableTags.push({ code: 70, value: '0' });

        const tableRecord = new DxfRecord(tableTags);
        const endTab = new DxfRecord([{ code: 0, value: 'ENDTAB' }]);
        this.insertRecordsBefore(tablesEnd, [tableRecord, endTab]);
        styles.tableRecord = tableRecord;
        styles.endTab = endTab;
        return endTab;
    }

    // ------------------------------------------------------------------------
    // Output
    // ------------------------------------------------------------------------

    serialize(): string {
        return serializeTags(this.records.flatMap(record => record.tags));
    }

    async save(filePath: string): Promise<void> {
        try {
            await fs.writeFile(filePath, this.serialize(), 'utf-8');
        } catch (error) {
            throw new ProcessingError(ErrorCode.DXF_SAVE_FAILED, `Failed to save ${filePath}: ${errorMessage(error)}`, { filePath });
        }
    }
}

const HEX_HANDLE = /^[0-9A-Fa-f]+$/;

/**
 * Handles are hex strings of up to 64 bits, beyond the safe integer range
 */
export function parseHandle(value: string): bigint | undefined {
    const trimmed = value.trim();
    return HEX_HANDLE.test(trimmed) ? BigInt(`0x${trimmed}`) : undefined;
}

/**
 * LAYOUT objects: the name and block record live in the AcDbLayout subclass
 */
function readLayout(record: DxfRecord): { name: string; blockRecord: string; tabOrder: number } | undefined {
    const marker = record.tags.findIndex(tag => tag.code === 100 && tag.value.trim() === 'AcDbLayout');
    const tags = marker === -1 ? record.tags : record.tags.slice(marker + 1);
    const name = tags.find(tag => tag.code === 1)?.value.trim();
    const blockRecord = [...tags].reverse().find(tag => tag.code === 330)?.value.trim();
    if (!name || !blockRecord) return undefined;
    const tabOrder = parseInt(tags.find(tag => tag.code === 71)?.value.trim() ?? '', 10);
    return { name, blockRecord, tabOrder: Number.isFinite(tabOrder) ? tabOrder : Number.MAX_SAFE_INTEGER };
}

// ============================================================================
// OPENING
// ============================================================================

/**
 * Structural gate: dxf-parser must accept the file before the tag model is built
 */
function parseStructure(content: string, sourcePath?: string): boolean {
    try {
        return new DxfParser().parseSync(content) !== null;
    } catch (e) {
        const message = errorMessage(e);
        if (message.includes('Invalid key') || message.includes('Extended')) {
            throw new ProcessingError(ErrorCode.DXF_ENCODING, `DXF encoding error: ${message}`, { sourcePath });
        } else if (message.includes('Unexpected')) {
            throw new ProcessingError(ErrorCode.DXF_INVALID_FORMAT, `Invalid DXF format: ${message}`, { sourcePath });
        }
        throw new ProcessingError(ErrorCode.DXF_PARSE_FAILED, `Failed to read DXF: ${message}`, { sourcePath });
    }
}

/**
 * Open DXF text as a structured drawing.
 * Throws a ProcessingError when the content is not a structurally valid DXF.
 */
export function openDrawing(content: string, sourcePath?: string): DxfDocument {
    const tags = parseTags(content);

    const badLayer = tags.find(tag => tag.code === 8 && !isValidLayerName(tag.value));
    if (badLayer) {
        throw new ProcessingError(ErrorCode.DXF_INVALID_LAYER, `Invalid layer name "${badLayer.value.trim()}"`, { sourcePath });
    }

    if (!parseStructure(content, sourcePath)) {
        throw new ProcessingError(ErrorCode.DXF_PARSE_FAILED, 'DXF parser returned no drawing', { sourcePath });
    }

    return DxfDocument.fromTags(tags, sourcePath);
}

export interface OpenedDrawing {
    document: DxfDocument;
    /** Layer names rewritten before the drawing would open; empty when it opened as is */
    fixes: LayerNameFix[];
}

/**
 * Open a drawing, cleaning invalid layer names and retrying once when the first open fails.
 * The original error is rethrown when there is nothing to clean.
 */
export function openCleanDrawing(content: string, sourcePath?: string, logger: Logger = createSilentLogger()): OpenedDrawing {
    try {
        return { document: openDrawing(content, sourcePath), fixes: [] };
    } catch (e) {
        const cleaned = cleanDrawingContent(content);
        if (cleaned.fixes.length === 0) throw e;

        logger.warn(`Cleaned ${cleaned.fixes.length} invalid layer names; reopening`, {
            sourcePath,
            layers: cleaned.fixes.map(fix => `${fix.from} -> ${fix.to}`).join(', ')
        });
        return { document: openDrawing(cleaned.content, sourcePath), fixes: cleaned.fixes };
    }
}

export async function readDrawingContent(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    return decodeDxfBuffer(buffer);
}

export async function readDrawing(filePath: string, logger?: Logger): Promise<OpenedDrawing> {
    return openCleanDrawing(await readDrawingContent(filePath), filePath, logger);
}
