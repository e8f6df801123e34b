/**
 * Canonical Knowledge Set
 *
 * Deduplicates entities and relationships extracted from independent text
 * chunks. Each object gets a canonicalization key; per key only the single
 * best representative is kept.
 *
 * "Best" is a total order, so the merge is commutative and associative and
 * the final set is identical whatever order the chunk calls complete in:
 *   1. higher confidence
 *   2. lower source chunk (earliest mention)
 *   3. has evidence
 *   4. lexical order of the remaining fields
 *
 * Objects below the confidence floor never enter the set.
 */

import type {
  ChunkExtraction,
  ExtractedEntity,
  ExtractedRelationship,
  KnowledgeSetSnapshot
} from './types';

export interface ConfidenceFloors {
  entityConfidenceFloor: number;
  relationshipConfidenceFloor: number;
}

const WRAPPING_PAIRS: Array<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['‘', '’'],
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
  ['<', '>']
];

/**
 * Normalize free text for key comparison: NFKC, trim, strip wrapping
 * quotes/brackets and trailing punctuation, collapse whitespace, lower-case.
 */
export function normalizeName(text: string): string {
  let value = text.normalize('NFKC').trim();

  let stripped = true;
  while (stripped && value.length > 0) {
    stripped = false;
    const withoutTrailing = value.replace(/[,;:!?]+$/, '').trim();
    if (withoutTrailing !== value) {
      value = withoutTrailing;
      stripped = true;
    }
    for (const [open, close] of WRAPPING_PAIRS) {
      if (value.length >= 2 && value.startsWith(open) && value.endsWith(close)) {
        value = value.slice(open.length, value.length - close.length).trim();
        stripped = true;
      }
    }
  }

  return value.replace(/\s+/g, ' ').toLowerCase();
}

/**
 * PERSON, person and " Person " are the same type.
 */
export function normalizeType(type: string): string {
  return type.normalize('NFKC').trim().replace(/\s+/g, '_').toUpperCase();
}

export function entityKey(entity: Pick<ExtractedEntity, 'name' | 'type'>): string {
  return JSON.stringify([normalizeName(entity.name), normalizeType(entity.type)]);
}

export function relationshipKey(
  relationship: Pick<ExtractedRelationship, 'subject' | 'predicate' | 'object'>
): string {
  return JSON.stringify([
    normalizeName(relationship.subject),
    normalizeName(relationship.predicate),
    normalizeName(relationship.object)
  ]);
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Negative when `a` should be kept over `b`.
 */
function compareCommon(
  a: { confidence: number; sourceChunk: number; evidence: string | null },
  b: { confidence: number; sourceChunk: number; evidence: string | null }
): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.sourceChunk !== b.sourceChunk) return a.sourceChunk - b.sourceChunk;
  if ((a.evidence === null) !== (b.evidence === null)) return a.evidence === null ? 1 : -1;
  return compareText(a.evidence ?? '', b.evidence ?? '');
}

export function compareEntities(a: ExtractedEntity, b: ExtractedEntity): number {
  return compareCommon(a, b) || compareText(a.name, b.name) || compareText(a.type, b.type);
}

export function compareRelationships(a: ExtractedRelationship, b: ExtractedRelationship): number {
  return (
    compareCommon(a, b) ||
    compareText(a.subject, b.subject) ||
    compareText(a.predicate, b.predicate) ||
    compareText(a.object, b.object)
  );
}

export class CanonicalKnowledgeSet {
  private readonly entities = new Map<string, ExtractedEntity>();
  private readonly relationships = new Map<string, ExtractedRelationship>();

  constructor(private readonly floors: ConfidenceFloors) {}

  /**
   * Insert, or replace the stored entity if this one ranks higher.
   * Returns whether the set changed.
   */
  offerEntity(entity: ExtractedEntity): boolean {
    if (!(entity.confidence >= this.floors.entityConfidenceFloor) || !normalizeName(entity.name)) {
      return false;
    }
    const key = entityKey(entity);
    const current = this.entities.get(key);
    if (current && compareEntities(entity, current) >= 0) {
      return false;
    }
    this.entities.set(key, { ...entity });
    return true;
  }

  offerRelationship(relationship: ExtractedRelationship): boolean {
    if (
      !(relationship.confidence >= this.floors.relationshipConfidenceFloor) ||
      !normalizeName(relationship.subject) ||
      !normalizeName(relationship.object)
    ) {
      return false;
    }
    const key = relationshipKey(relationship);
    const current = this.relationships.get(key);
    if (current && compareRelationships(relationship, current) >= 0) {
      return false;
    }
    this.relationships.set(key, { ...relationship });
    return true;
  }

  mergeExtraction(extraction: ChunkExtraction): void {
    extraction.entities.forEach(entity => this.offerEntity(entity));
    extraction.relationships.forEach(relationship => this.offerRelationship(relationship));
  }

  /**
   * Kept objects ordered by canonicalization key.
   */
  snapshot(): KnowledgeSetSnapshot {
    const byKey = <T>(map: Map<string, T>): T[] =>
      [...map.entries()]
        .sort(([a], [b]) => compareText(a, b))
        .map(([, value]) => ({ ...value }));

    return {
      entities: byKey(this.entities),
      relationships: byKey(this.relationships)
    };
  }
}
