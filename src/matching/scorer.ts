/**
 * Compatibility scorer.
 * Weighted similarity over the fields both users answered. Pure: the same
 * catalog and responses always produce the same result, and swapping the
 * two users never changes it.
 */

import type { AnswerValue, QuestionnaireField } from '../types/models.js';
import type { QuestionnaireCatalog } from './catalog.js';

export const SCORE_ROUND_DIGITS = 6;

export type ResponseMap = ReadonlyMap<string, AnswerValue>;

export interface CategoryScore {
  score: number;
  fieldCount: number;
  weight: number;
}

export interface CompatibilityScore {
  /** In [0, 1]. Zero with insufficientData set when no field qualified. */
  overall: number;
  insufficientData: boolean;
  /** Fields answered by both users. */
  fieldCount: number;
  /** fieldCount over catalog size. */
  coverage: number;
  categories: Record<string, CategoryScore>;
  /** Deal-breaker fields on which the two answers are fully incompatible. */
  dealBreakers: string[];
  catalogVersion: string;
}

interface Accumulator {
  weighted: number;
  weight: number;
  fieldCount: number;
}

export function scoreResponses(
  catalog: QuestionnaireCatalog,
  a: ResponseMap,
  b: ResponseMap
): CompatibilityScore {
  const total: Accumulator = { weighted: 0, weight: 0, fieldCount: 0 };
  const byCategory = new Map<string, Accumulator>();
  const dealBreakers: string[] = [];

  for (const field of catalog.fields) {
    const left = a.get(field.id);
    const right = b.get(field.id);
    if (left === undefined || right === undefined) continue;

    const similarity = fieldSimilarity(field, left, right);
    if (similarity === null) continue;

    accumulate(total, field.weight, similarity);

    let category = byCategory.get(field.category);
    if (!category) {
      category = { weighted: 0, weight: 0, fieldCount: 0 };
      byCategory.set(field.category, category);
    }
    accumulate(category, field.weight, similarity);

    if (field.dealBreaker && similarity === 0) {
      dealBreakers.push(field.id);
    }
  }

  const categories: Record<string, CategoryScore> = {};
  for (const name of [...byCategory.keys()].sort()) {
    const acc = byCategory.get(name);
    if (!acc) continue;
    categories[name] = {
      score: ratio(acc),
      fieldCount: acc.fieldCount,
      weight: round(acc.weight),
    };
  }

  return {
    overall: total.fieldCount === 0 ? 0 : ratio(total),
    insufficientData: total.fieldCount === 0,
    fieldCount: total.fieldCount,
    coverage: catalog.size === 0 ? 0 : round(total.fieldCount / catalog.size),
    categories,
    dealBreakers,
    catalogVersion: catalog.version,
  };
}

/**
 * Similarity of two answers to one field, in [0, 1].
 * Null when either value does not fit the field (never scored).
 */
export function fieldSimilarity(
  field: QuestionnaireField,
  left: AnswerValue,
  right: AnswerValue
): number | null {
  if (field.answerKind === 'scale') {
    if (typeof left !== 'number' || typeof right !== 'number' || !field.scale) return null;
    if (field.comparisonRule === 'exact_match') return left === right ? 1 : 0;

    const span = field.scale.max - field.scale.min;
    return round(clamp(1 - Math.abs(left - right) / span));
  }

  if (field.answerKind === 'boolean') {
    if (typeof left !== 'boolean' || typeof right !== 'boolean') return null;
    return left === right ? 1 : 0;
  }

  if (typeof left !== 'string' || typeof right !== 'string') return null;
  if (field.comparisonRule === 'exact_match' || !field.compatibility) {
    return left === right ? 1 : 0;
  }

  const declared = field.compatibility[left]?.[right] ?? field.compatibility[right]?.[left];
  if (declared !== undefined) return clamp(declared);
  return left === right ? 1 : 0;
}

function accumulate(acc: Accumulator, weight: number, similarity: number): void {
  acc.weighted += weight * similarity;
  acc.weight += weight;
  acc.fieldCount += 1;
}

function ratio(acc: Accumulator): number {
  if (acc.weight === 0) return 0;
  return round(clamp(acc.weighted / acc.weight));
}

function clamp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round(value: number): number {
  const multiplier = 10 ** SCORE_ROUND_DIGITS;
  return Math.round(value * multiplier) / multiplier;
}
