import type { Logger } from 'pino';
import type { AttemptFailure } from '../types/index.js';
import { AnalysisError } from '../types/index.js';
import type { ModelBackend, ModelRequest } from './backends.js';
import { classifyUpstreamError, isRetryable } from './errors.js';
import { backoffDelay, sleep, DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS, type RetryPolicy } from './retry.js';

export interface GatewayOptions {
  timeoutMs?: number;
  retry?: RetryPolicy;
  logger: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface InvokeOptions {
  systemPrompt?: string;
  signal?: AbortSignal;
}

export interface GatewayResponse {
  output: string;
  model: string;
  attempts: number;
  latencyMs: number;
}

/** The seam the orchestrator depends on; tests substitute their own. */
export interface CompletionGateway {
  invoke(prompt: string, options?: InvokeOptions): Promise<GatewayResponse>;
}

export class ModelGateway implements CompletionGateway {
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly backend: ModelBackend, options: GatewayOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = Object.freeze({ ...(options.retry ?? DEFAULT_RETRY_POLICY) });
    this.logger = options.logger.child({ component: 'gateway', backend: backend.type, model: backend.model });
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  get model(): string {
    return this.backend.model;
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<GatewayResponse> {
    const { signal } = options;
    const request: ModelRequest = { prompt, systemPrompt: options.systemPrompt };
    const failures: AttemptFailure[] = [];
    const startTime = Date.now();

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new AnalysisError('Cancelled', 'Request was cancelled by the caller', { attempts: failures });
      }

      const attemptStart = Date.now();

      try {
        const output = await this.attempt(request, signal);
        return {
          output,
          model: this.backend.model,
          attempts: attempt,
          latencyMs: Date.now() - startTime
        };
      } catch (error) {
        const kind = classifyUpstreamError(error);
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ attempt, kind, message, latencyMs: Date.now() - attemptStart });

        if (kind === 'Cancelled' || !isRetryable(kind)) {
          this.logger.error({ attempt, kind, err: error }, 'Model call failed');
          throw new AnalysisError(kind, message, { attempts: failures, cause: error });
        }

        if (attempt === this.retry.maxAttempts) break;

        const delayMs = backoffDelay(attempt, this.retry, this.random);
        this.logger.warn({ attempt, kind, delayMs }, 'Model call failed, retrying');
        await this.sleep(delayMs, signal);
      }
    }

    this.logger.error({ attempts: failures.length, failures }, 'Model call retries exhausted');
    const last = failures[failures.length - 1];
    throw new AnalysisError(
      'UpstreamExhausted',
      `Model call failed after ${failures.length} attempts (last: ${last?.kind ?? 'none'})`,
      { attempts: failures }
    );
  }

  // One backend call bounded by the timeout and the caller's signal
  private async attempt(request: ModelRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          reject(
            timedOut
              ? new AnalysisError('Timeout', `Model call exceeded ${this.timeoutMs} ms`)
              : new AnalysisError('Cancelled', 'Request was cancelled by the caller')
          );
        },
        { once: true }
      );
    });

    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      return await Promise.race([this.backend.complete(request, controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
