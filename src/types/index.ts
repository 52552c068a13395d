// Shared domain types for extraction, matching and write-back

import type { ErrorCode } from '@/lib/errors/types';

export interface Point3 {
  x: number;
  y: number;
  z: number;
}

// Where a piece of text was found
export type SourceRegion = 'model-space' | 'paper-space-layout' | 'block-definition' | 'raw-record';

export type EntityKind =
  | 'plain-text'
  | 'multi-line-text'
  | 'attribute'
  | 'dimension-text'
  | 'attribute-definition';

// ATTDEF entities carry two translatable strings: the default value and the tag
export type TextField = 'text' | 'tag';

export interface StructuredTextRecord {
  sourceRegion: Exclude<SourceRegion, 'raw-record'>;
  regionName: string;
  entityHandle: string;
  field: TextField;
  rawText: string;
  layer: string;
  position?: Point3;
  height: number;
  rotation: number; // degrees
  style: string;
  entityKind: EntityKind;
}

// Raw-record matches have no entity identity and no provenance
export interface RawTextRecord {
  sourceRegion: 'raw-record';
  rawText: string;
  groupCode: number;
}

export type TextRecord = StructuredTextRecord | RawTextRecord;

export type StrategyTag = 'model-space' | 'paper-space' | 'block-definitions' | 'raw-records';

export interface ExtractionResult {
  strategy: StrategyTag;
  records: TextRecord[];
  success: boolean;
  errorMessage?: string;
}

// How the document was read during extraction
export type ExtractionMode = 'structured' | 'cleaned' | 'repaired' | 'failed';

export interface AcceptedText {
  text: string; // cleaned
  record: TextRecord;
}

export interface ExtractionReport {
  sourcePath?: string;
  mode: ExtractionMode;
  results: ExtractionResult[];
  records: AcceptedText[]; // handle-unique, filtered
  texts: string[]; // value-unique, cleaned, first-appearance order
  errorMessage?: string;
  errorCode?: ErrorCode; // set when mode is 'failed'
}

// Source string -> target string, placeholders already removed
export type TranslationMap = Map<string, string>;

export type TableCell = string | number | boolean | Date | null | undefined;
export type TableRow = readonly TableCell[];

export type NormalizationMethod = 'strip-all-whitespace' | 'single-space' | 'trim-only';

export type MatchMethod = 'direct' | NormalizationMethod | 'empty translation' | 'no match' | 'invalid text';

export interface MatchResult {
  translation: string | null;
  method: MatchMethod;
  matchedKey?: string;
}

export type SubstitutionMode = 'replace' | 'new-entity';

export interface SubstitutionCounters {
  processed: number;
  translated: number;
  skipped: number;
  errors: number;
}

export type EntityState = 'processed-skipped' | 'processed-translated' | 'processed-errored';

export interface SubstitutionOutcome extends SubstitutionCounters {
  state: EntityState;
  handle?: string;
  method?: MatchMethod;
}

export interface RegionSummary extends SubstitutionCounters {
  kind: Exclude<SourceRegion, 'raw-record'>;
  name: string;
}

export interface DocumentSubstitutionSummary extends SubstitutionCounters {
  regions: RegionSummary[];
  cancelled: boolean;
}

export type DocumentStatus = 'translated' | 'open-failed' | 'save-failed' | 'cancelled';

export interface DocumentJobResult extends SubstitutionCounters {
  file: string;
  status: DocumentStatus;
  outputPath?: string;
  errorMessage?: string;
}

export interface BatchSummary extends SubstitutionCounters {
  runId: string;
  files: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  documents: DocumentJobResult[];
}
