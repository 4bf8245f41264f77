/**
 * Questionnaire endpoints.
 * GET /api/v1/questionnaire            — Field catalog and its version
 * PUT /api/v1/questionnaire/responses  — Write answers (auth required, all-or-nothing)
 */

import { pipeline, requireUser } from '../middleware/index.js';
import { validateBody, isRecord } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { MAX_ANSWERS_PER_WRITE } from '../services/QuestionnaireService.js';
import { ValidationError } from '../errors.js';
import { json, readBody } from './http.js';
import { toAnswerResponse, toCatalogResponse } from './serializers.js';

const answersSchema: BodySchema = {
  answers: { type: 'array', required: true, maxLength: MAX_ANSWERS_PER_WRITE },
};

export function createQuestionnaireHandlers(container: Container) {
  const getCatalog: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async () => {
    const catalog = await container.questionnaireService.getCatalog();
    return json(toCatalogResponse(catalog));
  });

  const writeAnswers: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.writeAnswers,
    validateBody(answersSchema)
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    const body = await readBody(req);
    const answers = parseAnswers(body.answers);

    const saved = await container.questionnaireService.answerMany(userId, answers);
    return json({ responses: saved.map(toAnswerResponse) });
  });

  return { getCatalog, writeAnswers };
}

function parseAnswers(raw: unknown): Array<{ fieldId: string; value: unknown }> {
  if (!Array.isArray(raw)) throw new ValidationError('answers must be an array');

  return raw.map((item: unknown, index) => {
    if (!isRecord(item) || typeof item.fieldId !== 'string') {
      throw new ValidationError(`answers[${index}] must be an object with a string fieldId`);
    }
    if (!('value' in item)) {
      throw new ValidationError(`answers[${index}].value is required`);
    }
    return { fieldId: item.fieldId, value: item.value };
  });
}
