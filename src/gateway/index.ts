export {
  ModelGateway,
  type CompletionGateway,
  type GatewayOptions,
  type GatewayResponse,
  type InvokeOptions
} from './gateway.js';
export {
  createBackend,
  AnthropicBackend,
  GeminiBackend,
  OllamaBackend,
  type BackendConfig,
  type BackendType,
  type ModelBackend,
  type ModelRequest
} from './backends.js';
export { classifyUpstreamError, isRetryable, kindForStatus, UpstreamStatusError } from './errors.js';
export { backoffDelay, sleep, DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS, type RetryPolicy } from './retry.js';
