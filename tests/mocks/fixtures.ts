import type { Journey, QuestionnaireField } from '../../src/types/models.js';
import { QuestionnaireCatalog } from '../../src/matching/catalog.js';
import { DEFAULT_JOURNEY_POLICY } from '../../src/config.js';
import { applyEvent, type JourneyEvent } from '../../src/journey/transitions.js';

/** A 0–10 similarity scale field in the "values" category, weight 1. */
export function scaleField(id: string, overrides: Partial<QuestionnaireField> = {}): QuestionnaireField {
  return {
    id,
    category: 'values',
    label: `Question ${id}`,
    weight: 1,
    answerKind: 'scale',
    comparisonRule: 'similarity',
    scale: { min: 0, max: 10 },
    options: null,
    compatibility: null,
    dealBreaker: false,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function choiceField(
  id: string,
  options: string[],
  overrides: Partial<QuestionnaireField> = {}
): QuestionnaireField {
  return scaleField(id, {
    answerKind: 'single_choice',
    comparisonRule: 'exact_match',
    scale: null,
    options,
    category: 'lifestyle',
    ...overrides,
  });
}

export function booleanField(id: string, overrides: Partial<QuestionnaireField> = {}): QuestionnaireField {
  return scaleField(id, {
    answerKind: 'boolean',
    comparisonRule: 'exact_match',
    scale: null,
    category: 'lifestyle',
    ...overrides,
  });
}

export function catalogOf(...fields: QuestionnaireField[]): QuestionnaireCatalog {
  return QuestionnaireCatalog.build(fields, { choiceSimilarity: 'table' });
}

/** Apply events in order. Throws unless every one is applied. */
export function replay(journey: Journey, ...events: JourneyEvent[]): Journey {
  return events.reduce((current, event) => {
    const result = applyEvent(current, event, DEFAULT_JOURNEY_POLICY);
    if (result.kind !== 'applied') {
      throw new Error(`${event.type} was ${result.kind}, expected applied`);
    }
    return result.journey;
  }, journey);
}
