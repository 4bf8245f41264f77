/**
 * Questionnaire service.
 * Owns the field catalog (loaded from storage, refreshed on a TTL) and the
 * write path for answers. Answers are validated against the catalog as a
 * batch before anything is written.
 */

import type { IQuestionnaireRepository } from '../repositories/IQuestionnaireRepository.js';
import type { IResponseRepository } from '../repositories/IResponseRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IScoreCache } from '../stores/ScoreCache.js';
import type { ChoiceSimilarityMode } from '../config.js';
import type { AnswerRequest, DefineFieldRequest } from '../types/api.js';
import type { QuestionnaireField, Response } from '../types/models.js';
import { QuestionnaireCatalog, validateFieldDefinition } from '../matching/catalog.js';
import { AppError, ConflictError, ValidationError } from '../errors.js';

/** Most answers accepted in one write. */
export const MAX_ANSWERS_PER_WRITE = 200;

export interface QuestionnaireServiceOptions {
  choiceSimilarity: ChoiceSimilarityMode;
  /** 0 reloads the catalog on every read. */
  catalogRefreshSeconds: number;
}

export class QuestionnaireService {
  private cached: { catalog: QuestionnaireCatalog; loadedAt: number } | null = null;

  constructor(
    private readonly questionnaireRepo: IQuestionnaireRepository,
    private readonly responseRepo: IResponseRepository,
    private readonly scoreCache: IScoreCache,
    private readonly logProvider: ILogProvider,
    private readonly options: QuestionnaireServiceOptions
  ) {}

  async getCatalog(): Promise<QuestionnaireCatalog> {
    const now = Date.now();
    if (this.cached && now - this.cached.loadedAt < this.options.catalogRefreshSeconds * 1000) {
      return this.cached.catalog;
    }

    const fields = await this.questionnaireRepo.listFields();
    let catalog: QuestionnaireCatalog;
    try {
      catalog = QuestionnaireCatalog.build(fields, this.options);
    } catch (err) {
      // A bad stored catalog is a server fault, not the caller's.
      if (err instanceof AppError) {
        throw new Error(`Stored questionnaire catalog is invalid: ${err.message}`, { cause: err });
      }
      throw err;
    }

    if (this.cached && this.cached.catalog.version !== catalog.version) {
      this.logProvider.info('Questionnaire catalog changed', {
        previousVersion: this.cached.catalog.version,
        version: catalog.version,
        fieldCount: catalog.size,
      });
    }

    this.cached = { catalog, loadedAt: now };
    return catalog;
  }

  async defineField(input: DefineFieldRequest): Promise<QuestionnaireField> {
    const field: QuestionnaireField = {
      id: input.id,
      category: input.category,
      label: input.label,
      weight: input.weight,
      answerKind: input.answerKind,
      comparisonRule: input.comparisonRule,
      scale: input.scale ?? null,
      options: input.options ?? null,
      compatibility: input.compatibility ?? null,
      dealBreaker: input.dealBreaker ?? false,
      createdAt: new Date(),
    };

    const problems = validateFieldDefinition(field, this.options);
    if (problems.length > 0) {
      throw new ValidationError(`Invalid field definition: ${problems.join('; ')}`, { problems });
    }

    const catalog = await this.getCatalog();
    if (catalog.get(field.id)) {
      throw new ConflictError(`Questionnaire field "${field.id}" already exists`, { fieldId: field.id });
    }

    const inserted = await this.questionnaireRepo.insertField(field);
    if (!inserted) {
      throw new ConflictError(`Questionnaire field "${field.id}" already exists`, { fieldId: field.id });
    }

    this.cached = null;
    this.logProvider.info('Questionnaire field defined', {
      fieldId: field.id,
      category: field.category,
    });
    return field;
  }

  async answer(userId: string, fieldId: string, value: unknown): Promise<Response> {
    const [saved] = await this.answerMany(userId, [{ fieldId, value }]);
    if (!saved) throw new Error(`Response for "${fieldId}" was not stored`);
    return saved;
  }

  /** Validate every answer, then write them together. Nothing is written if one is invalid. */
  async answerMany(
    userId: string,
    answers: ReadonlyArray<{ fieldId: string; value: unknown }>
  ): Promise<Response[]> {
    if (answers.length === 0) {
      throw new ValidationError('At least one answer is required');
    }
    if (answers.length > MAX_ANSWERS_PER_WRITE) {
      throw new ValidationError(`At most ${MAX_ANSWERS_PER_WRITE} answers can be written at once`);
    }

    const seen = new Set<string>();
    for (const { fieldId } of answers) {
      if (seen.has(fieldId)) {
        throw new ValidationError(`Field "${fieldId}" is answered more than once`, { fieldId });
      }
      seen.add(fieldId);
    }

    const catalog = await this.getCatalog();
    const validated: AnswerRequest[] = answers.map(({ fieldId, value }) => ({
      fieldId,
      value: catalog.validateAnswer(fieldId, value),
    }));

    const saved = await this.responseRepo.upsertMany(userId, validated, new Date());
    this.scoreCache.invalidateUser(userId);
    this.logProvider.debug('Responses saved', { userId, count: saved.length });
    return saved;
  }

  async getResponses(userId: string): Promise<Response[]> {
    return this.responseRepo.findByUser(userId);
  }
}
