import { z } from 'zod';
import type { ParsedAssessment, Result, Taxonomy } from '../types/index.js';
import { fail, ok } from '../types/index.js';
import { categoryIds, isCategory, isSeverity, tagsFor } from '../taxonomy/index.js';
import { extractFields, splitActions, splitTags } from './format.js';

export { extractFields, cleanValue, splitActions, splitTags } from './format.js';

const ModelAnswerSchema = z.object({
  CATEGORY: z.string().min(1),
  SEVERITY: z.string().min(1),
  RATIONALE: z.string().min(1),
  TAGS: z.string().optional(),
  CONFIDENCE: z.string().optional(),
  SUGGESTED_ACTIONS: z.string().optional()
});

/** Fields read from a model answer, before taxonomy validation. */
export interface ModelAnswer {
  category: string;
  severity: string;
  tags: string[];
  rationale: string;
  confidence: number | null;
  suggestedActions: string[];
}

const CONFIDENCE_PATTERN = /^(\d+(?:\.\d+)?|\.\d+)(%?)$/;

function parseConfidence(value: string | undefined): number | null | undefined {
  if (value === undefined || value.length === 0) return null;

  const match = CONFIDENCE_PATTERN.exec(value);
  if (!match) return undefined;

  const confidence = match[2] === '%' ? Number(match[1]) / 100 : Number(match[1]);
  if (confidence < 0 || confidence > 1) return undefined;

  return confidence;
}

export function readModelAnswer(rawOutput: string): Result<ModelAnswer> {
  const parsed = ModelAnswerSchema.safeParse(extractFields(rawOutput));

  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    return fail('MalformedUpstreamResponse', `Model answer is missing required fields: ${missing.join(', ')}`);
  }

  const fields = parsed.data;
  const confidence = parseConfidence(fields.CONFIDENCE);
  if (confidence === undefined) {
    return fail('MalformedUpstreamResponse', `Model confidence "${fields.CONFIDENCE}" is not a number between 0 and 1`);
  }

  return ok({
    category: fields.CATEGORY,
    severity: fields.SEVERITY,
    tags: fields.TAGS ? splitTags(fields.TAGS) : [],
    rationale: fields.RATIONALE,
    confidence,
    suggestedActions: fields.SUGGESTED_ACTIONS ? splitActions(fields.SUGGESTED_ACTIONS) : []
  });
}

// Only case and surrounding whitespace are forgiven; no closest-match guessing
export function validateAnswer(answer: ModelAnswer, taxonomy: Taxonomy): Result<ParsedAssessment> {
  const category = answer.category.trim().toLowerCase();
  const severity = answer.severity.trim().toLowerCase();

  if (!isCategory(taxonomy, category)) {
    return fail(
      'InvalidCategory',
      `Model chose category "${answer.category}", expected one of: ${categoryIds(taxonomy).join(', ')}`
    );
  }

  if (!isSeverity(taxonomy, severity)) {
    return fail(
      'InvalidSeverity',
      `Model chose severity "${answer.severity}", expected one of: ${taxonomy.severities.join(', ')}`
    );
  }

  const allowedTags = tagsFor(taxonomy, category);
  const tags: string[] = [];
  for (const raw of answer.tags) {
    const tag = raw.trim().toLowerCase();
    if (!allowedTags.includes(tag)) {
      return fail(
        'InvalidTag',
        `Model chose tag "${raw}" for category "${category}", expected any of: ${allowedTags.join(', ')}`
      );
    }
    if (!tags.includes(tag)) tags.push(tag);
  }

  return ok({
    category,
    severity,
    tags,
    rationale: answer.rationale,
    confidence: answer.confidence,
    suggested_actions: answer.suggestedActions
  });
}

/**
 * Turns a raw model answer into an assessment constrained to the taxonomy.
 *
 * `MalformedUpstreamResponse` means the answer could not be read at all;
 * `InvalidCategory` / `InvalidSeverity` / `InvalidTag` mean it was read but
 * named a label the taxonomy does not have (tags are checked against the
 * chosen category only).
 */
export function parseModelOutput(rawOutput: string, taxonomy: Taxonomy): Result<ParsedAssessment> {
  const answer = readModelAnswer(rawOutput);
  if (!answer.ok) return answer;

  return validateAnswer(answer.value, taxonomy);
}
