/**
 * Stage 7: FieldOrderingEngine
 *
 * Orders records by the closest known reference ordering when enough keys
 * overlap, otherwise by category. Ties always keep extraction order.
 */

import type { FieldRecord } from '../types';
import type { ReferenceOrdering } from './pipeline-context';
import { DATE_SIGNED_KEY, SIGNATURE_KEY } from './signature-filter';

export const FIELD_CATEGORY = {
  NARRATIVE: 0,
  PRIMARY: 1,
  SIGNATURE: 2,
  DATE_SIGNED: 3,
  SECONDARY: 4,
} as const;

export type FieldCategory = (typeof FIELD_CATEGORY)[keyof typeof FIELD_CATEGORY];

export const SECONDARY_KEYS: ReadonlySet<string> = new Set(['printed_name_if_signed_on_behalf']);

export function categoryOf(record: FieldRecord): FieldCategory {
  if (record.type === 'text') return FIELD_CATEGORY.NARRATIVE;
  if (record.key === SIGNATURE_KEY) return FIELD_CATEGORY.SIGNATURE;
  if (record.key === DATE_SIGNED_KEY) return FIELD_CATEGORY.DATE_SIGNED;
  if (SECONDARY_KEYS.has(record.key)) return FIELD_CATEGORY.SECONDARY;
  return FIELD_CATEGORY.PRIMARY;
}

/** Share of extracted keys that appear in the reference */
export function referenceOverlap(keys: readonly string[], reference: ReferenceOrdering): number {
  if (keys.length === 0) {
    return 0;
  }
  const referenceKeys = new Set(reference.keys);
  return keys.filter((key) => referenceKeys.has(key)).length / keys.length;
}

export function selectReference(
  keys: readonly string[],
  references: readonly ReferenceOrdering[],
  threshold: number
): { reference: ReferenceOrdering; overlap: number } | null {
  let best: { reference: ReferenceOrdering; overlap: number } | null = null;
  for (const reference of references) {
    const overlap = referenceOverlap(keys, reference);
    if (overlap >= threshold && (best === null || overlap > best.overlap)) {
      best = { reference, overlap };
    }
  }
  return best;
}

export function orderByCategory(records: readonly FieldRecord[]): FieldRecord[] {
  return records
    .map((record, position) => ({ record, position, category: categoryOf(record) }))
    .sort((a, b) => a.category - b.category || a.position - b.position)
    .map(({ record }) => record);
}

/**
 * Referenced records in reference order; each remaining record, in
 * extraction order, goes in front of the first record of a later category.
 */
export function orderByReference(records: readonly FieldRecord[], reference: ReferenceOrdering): FieldRecord[] {
  const rank = new Map(reference.keys.map((key, index) => [key, index] as const));
  const ordered = records
    .filter((record) => rank.has(record.key))
    .sort((a, b) => (rank.get(a.key) ?? 0) - (rank.get(b.key) ?? 0));

  for (const record of records) {
    if (rank.has(record.key)) continue;
    const category = categoryOf(record);
    const at = ordered.findIndex((placed) => categoryOf(placed) > category);
    if (at === -1) {
      ordered.push(record);
    } else {
      ordered.splice(at, 0, record);
    }
  }
  return ordered;
}

export interface OrderingResult {
  records: FieldRecord[];
  reference: string | null;
  overlap: number;
}

export function orderFields(
  records: readonly FieldRecord[],
  references: readonly ReferenceOrdering[],
  threshold: number
): OrderingResult {
  const selected = selectReference(
    records.map((record) => record.key),
    references,
    threshold
  );
  if (!selected) {
    return { records: orderByCategory(records), reference: null, overlap: 0 };
  }
  return {
    records: orderByReference(records, selected.reference),
    reference: selected.reference.name,
    overlap: selected.overlap,
  };
}
