import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { AnalysisResult, Complaint, Result, Stage, Taxonomy } from '../types/index.js';
import { AnalysisError } from '../types/index.js';
import { normalize } from '../normalizer/index.js';
import { buildPrompt, SYSTEM_PROMPT } from '../prompt/index.js';
import type { CompletionGateway, GatewayResponse } from '../gateway/index.js';
import { readModelAnswer, validateAnswer } from '../parser/index.js';
import { routeFor } from '../taxonomy/index.js';
import { deepFreeze } from '../freeze.js';

export interface AnalyzerDeps {
  gateway: CompletionGateway;
  taxonomy: Taxonomy;
  maxInputLength: number;
  logger: Logger;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * Outcome of one analysis. `stages` lists every state the request reached in
 * order; on failure `error.stage` names the stage whose work failed.
 */
export type AnalysisOutcome = Result<AnalysisResult> & {
  requestId: string;
  stages: Stage[];
};

export async function analyzeComplaint(
  complaint: Complaint,
  deps: AnalyzerDeps,
  signal?: AbortSignal
): Promise<AnalysisOutcome> {
  const requestId = deps.generateId ? deps.generateId() : uuidv4();
  const receivedAt = (deps.now ? deps.now() : new Date()).toISOString();
  const log = deps.logger.child({ request_id: requestId });
  const stages: Stage[] = [];

  const enter = (stage: Stage) => {
    stages.push(stage);
    log.debug({ stage }, 'Stage reached');
  };

  const failed = (error: AnalysisError, stage: Stage): AnalysisOutcome => {
    const staged = error.atStage(stage);
    log.warn({ stage, kind: staged.kind, attempts: staged.attempts.length }, staged.message);
    return { ok: false, error: staged, requestId, stages };
  };

  enter('Received');

  const normalized = normalize(complaint.text, deps.maxInputLength);
  if (!normalized.ok) return failed(normalized.error, 'Normalized');
  enter('Normalized');

  const prompt = buildPrompt(normalized.value.text, deps.taxonomy);
  enter('PromptBuilt');

  enter('AwaitingModel');
  let response: GatewayResponse;
  try {
    response = await deps.gateway.invoke(prompt, { systemPrompt: SYSTEM_PROMPT, signal });
  } catch (error) {
    const wrapped = error instanceof AnalysisError
      ? error
      : new AnalysisError('UnknownUpstreamError', error instanceof Error ? error.message : String(error), { cause: error });
    return failed(wrapped, 'AwaitingModel');
  }

  const answer = readModelAnswer(response.output);
  if (!answer.ok) return failed(answer.error, 'Parsed');
  enter('Parsed');

  const assessment = validateAnswer(answer.value, deps.taxonomy);
  if (!assessment.ok) return failed(assessment.error, 'Validated');
  enter('Validated');

  const result: AnalysisResult = deepFreeze<AnalysisResult>({
    request_id: requestId,
    received_at: receivedAt,
    submitted_at: complaint.submitted_at,
    text: normalized.value.text,
    ...assessment.value,
    routing: routeFor(assessment.value.category),
    taxonomy_version: deps.taxonomy.version,
    model: response.model,
    attempts: response.attempts,
    location: complaint.location ? { ...complaint.location } : undefined,
    normalization_flags: normalized.value.flags
  });

  enter('Complete');
  log.info(
    { category: result.category, severity: result.severity, attempts: result.attempts, latency_ms: response.latencyMs },
    'Complaint analyzed'
  );

  return { ok: true, value: result, requestId, stages };
}
