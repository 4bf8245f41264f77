/**
 * Questionnaire catalog.
 * An immutable, validated snapshot of the field definitions, with a content
 * version used to key cached scores. Built once per load and shared read-only.
 */

import { createHash } from 'node:crypto';
import type { ChoiceSimilarityMode } from '../config.js';
import type {
  AnswerKind,
  AnswerValue,
  ComparisonRule,
  QuestionnaireField,
} from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';

export const ANSWER_KINDS: readonly AnswerKind[] = ['scale', 'single_choice', 'boolean'];
export const COMPARISON_RULES: readonly ComparisonRule[] = ['similarity', 'exact_match'];

const FIELD_ID_PATTERN = /^[a-z0-9][a-z0-9_.-]{0,63}$/;
const MAX_CATEGORY_LENGTH = 64;
const MAX_LABEL_LENGTH = 300;

export interface CatalogOptions {
  choiceSimilarity: ChoiceSimilarityMode;
}

export class QuestionnaireCatalog {
  /** Sorted by id; scoring walks fields in this order. */
  readonly fields: readonly QuestionnaireField[];
  readonly version: string;
  private readonly byId: ReadonlyMap<string, QuestionnaireField>;

  private constructor(fields: QuestionnaireField[]) {
    this.fields = [...fields].sort((a, b) => compareIds(a.id, b.id));
    this.byId = new Map(this.fields.map((f) => [f.id, f]));
    this.version = computeCatalogVersion(this.fields);
  }

  /** Validate every definition and build the catalog. Throws ValidationError listing all problems. */
  static build(fields: readonly QuestionnaireField[], options: CatalogOptions): QuestionnaireCatalog {
    const problems: string[] = [];
    const seen = new Set<string>();

    for (const field of fields) {
      if (seen.has(field.id)) {
        problems.push(`${field.id}: duplicate field id`);
        continue;
      }
      seen.add(field.id);
      problems.push(...validateFieldDefinition(field, options).map((p) => `${field.id}: ${p}`));
    }

    if (problems.length > 0) {
      throw new ValidationError(`Invalid questionnaire catalog: ${problems.join('; ')}`, {
        problems,
      });
    }

    return new QuestionnaireCatalog([...fields]);
  }

  get size(): number {
    return this.fields.length;
  }

  get(fieldId: string): QuestionnaireField | undefined {
    return this.byId.get(fieldId);
  }

  categories(): string[] {
    return [...new Set(this.fields.map((f) => f.category))].sort(compareIds);
  }

  /** Check a value against its field's answer kind. Returns the value unchanged when valid. */
  validateAnswer(fieldId: string, value: unknown): AnswerValue {
    const field = this.byId.get(fieldId);
    if (!field) {
      throw new NotFoundError(`Questionnaire field "${fieldId}" not found`);
    }

    const problem = answerProblem(field, value);
    if (problem !== null || !isAnswerValue(value)) {
      throw new ValidationError(`Invalid answer for "${fieldId}": ${problem ?? 'unsupported value'}`, {
        fieldId,
      });
    }
    return value;
  }
}

/** Problems with a single field definition; empty when valid. */
export function validateFieldDefinition(
  field: QuestionnaireField,
  options: CatalogOptions
): string[] {
  const problems: string[] = [];

  if (!FIELD_ID_PATTERN.test(field.id)) {
    problems.push('id must be 1-64 lowercase letters, digits, "_", "." or "-"');
  }
  if (!field.category.trim() || field.category.length > MAX_CATEGORY_LENGTH) {
    problems.push(`category must be 1-${MAX_CATEGORY_LENGTH} characters`);
  }
  if (!field.label.trim() || field.label.length > MAX_LABEL_LENGTH) {
    problems.push(`label must be 1-${MAX_LABEL_LENGTH} characters`);
  }
  if (!Number.isFinite(field.weight) || field.weight <= 0) {
    problems.push('weight must be a positive number');
  }
  if (!ANSWER_KINDS.includes(field.answerKind)) {
    problems.push(`answerKind must be one of: ${ANSWER_KINDS.join(', ')}`);
    return problems;
  }
  if (!COMPARISON_RULES.includes(field.comparisonRule)) {
    problems.push(`comparisonRule must be one of: ${COMPARISON_RULES.join(', ')}`);
    return problems;
  }

  switch (field.answerKind) {
    case 'scale':
      if (!field.scale) {
        problems.push('scale fields need a scale range');
      } else if (
        !Number.isFinite(field.scale.min) ||
        !Number.isFinite(field.scale.max) ||
        field.scale.min >= field.scale.max
      ) {
        problems.push('scale.min must be lower than scale.max');
      }
      if (field.options) problems.push('scale fields take no options');
      if (field.compatibility) problems.push('scale fields take no compatibility table');
      break;

    case 'single_choice':
      if (field.scale) problems.push('single_choice fields take no scale range');
      if (!field.options || field.options.length < 2) {
        problems.push('single_choice fields need at least two options');
        break;
      }
      if (new Set(field.options).size !== field.options.length || field.options.some((o) => !o)) {
        problems.push('options must be distinct, non-empty strings');
      }
      if (field.comparisonRule === 'exact_match' && field.compatibility) {
        problems.push('a compatibility table requires the similarity rule');
      }
      if (field.comparisonRule === 'similarity') {
        if (field.compatibility) {
          problems.push(...tableProblems(field.compatibility, field.options));
        } else if (options.choiceSimilarity === 'table') {
          problems.push('similarity rule on a single_choice field needs a compatibility table');
        }
      }
      break;

    case 'boolean':
      if (field.scale || field.options) problems.push('boolean fields take no scale or options');
      if (field.compatibility) problems.push('boolean fields take no compatibility table');
      if (field.comparisonRule !== 'exact_match') {
        problems.push('boolean fields compare by exact_match');
      }
      break;
  }

  return problems;
}

function tableProblems(
  table: Record<string, Record<string, number>>,
  options: readonly string[]
): string[] {
  const problems: string[] = [];
  const known = new Set(options);

  for (const [left, row] of Object.entries(table)) {
    if (!known.has(left)) {
      problems.push(`compatibility references unknown option "${left}"`);
      continue;
    }
    for (const [right, value] of Object.entries(row)) {
      if (!known.has(right)) {
        problems.push(`compatibility references unknown option "${right}"`);
        continue;
      }
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        problems.push(`compatibility ${left}/${right} must be within [0, 1]`);
        continue;
      }
      const mirror = table[right]?.[left];
      if (mirror !== undefined && mirror !== value) {
        problems.push(`compatibility ${left}/${right} is not symmetric`);
      }
    }
  }

  return problems;
}

function answerProblem(field: QuestionnaireField, value: unknown): string | null {
  switch (field.answerKind) {
    case 'scale': {
      if (typeof value !== 'number' || !Number.isFinite(value)) return 'expected a number';
      const range = field.scale;
      if (range && (value < range.min || value > range.max)) {
        return `must be between ${range.min} and ${range.max}`;
      }
      return null;
    }
    case 'single_choice':
      if (typeof value !== 'string') return 'expected a string';
      if (!field.options?.includes(value)) {
        return `must be one of: ${(field.options ?? []).join(', ')}`;
      }
      return null;
    case 'boolean':
      return typeof value === 'boolean' ? null : 'expected a boolean';
  }
}

function isAnswerValue(value: unknown): value is AnswerValue {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

/**
 * Content hash of the definitions. Any change to any field (or the set of
 * fields) changes the version; order of the input does not.
 */
export function computeCatalogVersion(fields: readonly QuestionnaireField[]): string {
  const canonical = [...fields]
    .sort((a, b) => compareIds(a.id, b.id))
    .map((f) => [
      f.id,
      f.category,
      f.weight,
      f.answerKind,
      f.comparisonRule,
      f.scale ? [f.scale.min, f.scale.max] : null,
      f.options,
      f.compatibility ? sortedTable(f.compatibility) : null,
      f.dealBreaker,
    ]);

  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}

function sortedTable(table: Record<string, Record<string, number>>): Array<[string, string, number]> {
  const entries: Array<[string, string, number]> = [];
  for (const left of Object.keys(table).sort(compareIds)) {
    const row = table[left];
    for (const right of Object.keys(row).sort(compareIds)) {
      entries.push([left, right, row[right]]);
    }
  }
  return entries;
}

/** Code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
