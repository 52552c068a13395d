/**
 * Typed entity views over DXF records.
 *
 * A record is the run of tags from one group-code-0 tag up to the next. Views read and
 * write the entity's own tags only: extension dictionary groups (102 "{...}") are skipped
 * and XDATA (1001+) or embedded objects (101) end the search.
 */

import type { EntityKind, Point3 } from '@/types';
import type { DxfTag } from './dxf-tags';
import { formatDxfNumber, parseDxfNumber } from './dxf-tags';
import { stripMTextFormatting } from './text-normalizer';

const MTEXT_CHUNK = 250;

export class DxfRecord {
    constructor(public tags: DxfTag[]) {}

    get type(): string {
        return this.tags[0]?.value.trim() ?? '';
    }

    /** Indexes of the record's own data tags, in order */
    ownIndexes(): number[] {
        const indexes: number[] = [];
        let depth = 0;
        for (let i = 1; i < this.tags.length; i++) {
            const { code, value } = this.tags[i];
            if (code === 1001 || code === 101) break;
            if (code === 102) {
                if (value.startsWith('{')) depth++;
                else if (value.trim() === '}' && depth > 0) depth--;
                continue;
            }
            if (depth > 0) continue;
            indexes.push(i);
        }
        return indexes;
    }

    private tailIndex(): number {
        const own = this.ownIndexes();
        return own.length > 0 ? own[own.length - 1] + 1 : this.tags.length;
    }

    findIndex(code: number): number {
        return this.ownIndexes().find(i => this.tags[i].code === code) ?? -1;
    }

    get(code: number): string | undefined {
        const index = this.findIndex(code);
        return index === -1 ? undefined : this.tags[index].value;
    }

    getAll(code: number): string[] {
        return this.ownIndexes().filter(i => this.tags[i].code === code).map(i => this.tags[i].value);
    }

    getNumber(code: number): number | undefined {
        return parseDxfNumber(this.get(code));
    }

    has(code: number): boolean {
        return this.findIndex(code) !== -1;
    }

    set(code: number, value: string) {
        const index = this.findIndex(code);
        if (index !== -1) {
            this.tags[index] = { code, value };
        } else {
            this.tags.splice(this.tailIndex(), 0, { code, value });
        }
    }

    /** Remove every own tag with one of the codes; returns the first removed position */
    removeAll(codes: readonly number[]): number {
        const indexes = this.ownIndexes().filter(i => codes.includes(this.tags[i].code));
        for (let k = indexes.length - 1; k >= 0; k--) {
            this.tags.splice(indexes[k], 1);
        }
        return indexes.length > 0 ? indexes[0] : this.tailIndex();
    }

    insertAt(index: number, tags: DxfTag[]) {
        this.tags.splice(index, 0, ...tags);
    }
}

// ============================================================================
// CAPABILITIES
// ============================================================================

export interface SupportsText {
    /** Text as stored in the drawing */
    readonly text: string;
    /** Text as a reader sees it (formatting removed) */
    readonly plainText: string;
    setText(value: string): void;
}

export interface SupportsLayer {
    readonly layer: string;
}

export interface SupportsHeight {
    readonly height: number | undefined;
    setHeight(value: number): void;
}

export interface SupportsStyle {
    readonly style: string | undefined;
    setStyle(name: string): void;
}

export interface SupportsPlacement {
    readonly insert: Point3 | undefined;
    readonly rotation: number | undefined;
}

// ============================================================================
// ENTITIES
// ============================================================================

export class DxfEntity implements SupportsLayer {
    constructor(readonly record: DxfRecord) {}

    get type(): string {
        return this.record.type;
    }

    get handle(): string | undefined {
        return this.record.get(5)?.trim();
    }

    get layer(): string {
        return this.record.get(8)?.trim() || '0';
    }

    get ownerHandle(): string | undefined {
        return this.record.get(330)?.trim();
    }

    get inPaperSpace(): boolean {
        return this.record.get(67)?.trim() === '1';
    }
}

/**
 * Single-line text semantics shared by TEXT, ATTRIB and ATTDEF
 */
export class TextLikeEntity extends DxfEntity implements SupportsText, SupportsHeight, SupportsStyle, SupportsPlacement {
    get text(): string {
        return this.record.get(1) ?? '';
    }

    get plainText(): string {
        return this.text;
    }

    setText(value: string) {
        this.record.set(1, value);
    }

    get height(): number | undefined {
        return this.record.getNumber(40);
    }

    setHeight(value: number) {
        this.record.set(40, formatDxfNumber(value));
    }

    get style(): string | undefined {
        return this.record.get(7)?.trim();
    }

    setStyle(name: string) {
        this.record.set(7, name);
    }

    get insert(): Point3 | undefined {
        const x = this.record.getNumber(10);
        const y = this.record.getNumber(20);
        if (x === undefined || y === undefined) return undefined;
        return { x, y, z: this.record.getNumber(30) ?? 0 };
    }

    get rotation(): number | undefined {
        return this.record.getNumber(50);
    }
}

export class TextEntity extends TextLikeEntity {}

export class AttribEntity extends TextLikeEntity {
    get tag(): string {
        return this.record.get(2)?.trim() ?? '';
    }
}

export class AttdefEntity extends TextLikeEntity {
    get tag(): string {
        return this.record.get(2)?.trim() ?? '';
    }
}

export class MTextEntity extends TextLikeEntity {
    /** Code 3 chunks followed by the final code 1 chunk */
    get text(): string {
        return [...this.record.getAll(3), this.record.get(1) ?? ''].join('');
    }

    get plainText(): string {
        return stripMTextFormatting(this.text);
    }

    setText(value: string) {
        const position = this.record.removeAll([1, 3]);
        const chunks: DxfTag[] = [];
        let rest = value;
        while (rest.length > MTEXT_CHUNK) {
            chunks.push({ code: 3, value: rest.slice(0, MTEXT_CHUNK) });
            rest = rest.slice(MTEXT_CHUNK);
        }
        chunks.push({ code: 1, value: rest });
        this.record.insertAt(position, chunks);
    }
}

export class DimensionEntity extends DxfEntity implements SupportsText {
    /** User text override; empty or "<>" means the measured value is shown */
    get text(): string {
        return this.record.get(1) ?? '';
    }

    get plainText(): string {
        return stripMTextFormatting(this.text);
    }

    setText(value: string) {
        this.record.set(1, value);
    }

    get insert(): Point3 | undefined {
        const x = this.record.getNumber(11);
        const y = this.record.getNumber(21);
        if (x === undefined || y === undefined) return undefined;
        return { x, y, z: this.record.getNumber(31) ?? 0 };
    }
}

export class InsertEntity extends DxfEntity {
    readonly attribs: AttribEntity[] = [];
    seqend?: DxfRecord;

    get blockName(): string {
        return this.record.get(2)?.trim() ?? '';
    }

    get attributesFollow(): boolean {
        return this.record.get(66)?.trim() === '1';
    }
}

/**
 * POLYLINE and other entities followed by sub-entities up to SEQEND
 */
export class CompoundEntity extends DxfEntity {
    readonly children: DxfRecord[] = [];
}

export type TextBearingEntity = TextEntity | MTextEntity;

export function createEntity(record: DxfRecord): DxfEntity {
    switch (record.type) {
        case 'TEXT': return new TextEntity(record);
        case 'MTEXT': return new MTextEntity(record);
        case 'ATTRIB': return new AttribEntity(record);
        case 'ATTDEF': return new AttdefEntity(record);
        case 'DIMENSION': return new DimensionEntity(record);
        case 'INSERT': return new InsertEntity(record);
        case 'POLYLINE': return new CompoundEntity(record);
        default: return new DxfEntity(record);
    }
}

export function entityKindOf(entity: DxfEntity): EntityKind | undefined {
    if (entity instanceof TextEntity) return 'plain-text';
    if (entity instanceof MTextEntity) return 'multi-line-text';
    if (entity instanceof AttribEntity) return 'attribute';
    if (entity instanceof AttdefEntity) return 'attribute-definition';
    if (entity instanceof DimensionEntity) return 'dimension-text';
    return undefined;
}

export function supportsStyle(entity: DxfEntity): entity is DxfEntity & SupportsStyle {
    return entity instanceof TextLikeEntity;
}

export function supportsHeight(entity: DxfEntity): entity is DxfEntity & SupportsHeight {
    return entity instanceof TextLikeEntity;
}

export function supportsPlacement(entity: DxfEntity): entity is DxfEntity & SupportsPlacement {
    return entity instanceof TextLikeEntity;
}
