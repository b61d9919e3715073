export type ErrorKind =
  | 'InvalidRequest'
  | 'EmptyInput'
  | 'InputTooLong'
  | 'Timeout'
  | 'RateLimited'
  | 'Unauthorized'
  | 'ServiceUnavailable'
  | 'UpstreamExhausted'
  | 'MalformedUpstreamResponse'
  | 'InvalidCategory'
  | 'InvalidSeverity'
  | 'InvalidTag'
  | 'UnknownUpstreamError'
  | 'Cancelled';

export type Stage =
  | 'Received'
  | 'Normalized'
  | 'PromptBuilt'
  | 'AwaitingModel'
  | 'Parsed'
  | 'Validated'
  | 'Complete';

export interface AttemptFailure {
  attempt: number;
  kind: ErrorKind;
  message: string;
  latencyMs: number;
}

export class AnalysisError extends Error {
  readonly kind: ErrorKind;
  readonly stage?: Stage;
  readonly attempts: AttemptFailure[];

  constructor(kind: ErrorKind, message: string, options: { stage?: Stage; attempts?: AttemptFailure[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AnalysisError';
    this.kind = kind;
    this.stage = options.stage;
    this.attempts = options.attempts ?? [];
  }

  atStage(stage: Stage): AnalysisError {
    return new AnalysisError(this.kind, this.message, { stage, attempts: this.attempts, cause: this.cause });
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnalysisError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: new AnalysisError(kind, message) };
}
