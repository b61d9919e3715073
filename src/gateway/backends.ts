import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { z } from 'zod';
import { AnalysisError } from '../types/index.js';
import { UpstreamStatusError } from './errors.js';

export type BackendType = 'anthropic' | 'gemini' | 'ollama';

export interface BackendConfig {
  type: BackendType;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface ModelRequest {
  prompt: string;
  systemPrompt?: string;
}

/** One upstream model. `complete` makes exactly one network call. */
export interface ModelBackend {
  readonly type: BackendType;
  readonly model: string;
  complete(request: ModelRequest, signal: AbortSignal): Promise<string>;
}

export class AnthropicBackend implements ModelBackend {
  readonly type = 'anthropic';
  readonly model: string;
  private client: Anthropic;

  constructor(private config: BackendConfig) {
    this.model = config.model;
    // Retries belong to the gateway
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxOutputTokens,
        temperature: this.config.temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.prompt }]
      },
      { signal }
    );

    return response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n');
  }
}

export class GeminiBackend implements ModelBackend {
  readonly type = 'gemini';
  readonly model: string;
  private client: GoogleGenerativeAI;

  constructor(private config: BackendConfig) {
    this.model = config.model;
    this.client = new GoogleGenerativeAI(config.apiKey ?? '');
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.config.model,
      systemInstruction: request.systemPrompt,
      generationConfig: {
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxOutputTokens
      }
    });

    const result = await model.generateContent(
      { contents: [{ role: 'user', parts: [{ text: request.prompt }] }] },
      { signal }
    );

    return result.response.text();
  }
}

const OllamaGenerateSchema = z.object({ response: z.string() });

export class OllamaBackend implements ModelBackend {
  readonly type = 'ollama';
  readonly model: string;

  constructor(private config: BackendConfig) {
    this.model = config.model;
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const baseUrl = this.config.baseUrl || 'http://localhost:11434';

    const response = await fetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.config.model,
        prompt: request.prompt,
        system: request.systemPrompt,
        stream: false,
        options: {
          temperature: this.config.temperature,
          num_predict: this.config.maxOutputTokens
        }
      }),
      signal
    });

    if (!response.ok) {
      throw new UpstreamStatusError(response.status, `Ollama error: ${response.status}`);
    }

    const data = OllamaGenerateSchema.safeParse(await response.json());
    if (!data.success) {
      throw new AnalysisError('MalformedUpstreamResponse', 'Ollama response has no "response" text');
    }

    return data.data.response;
  }
}

export function createBackend(config: BackendConfig): ModelBackend {
  switch (config.type) {
    case 'anthropic':
      return new AnthropicBackend(config);
    case 'gemini':
      return new GeminiBackend(config);
    case 'ollama':
      return new OllamaBackend(config);
  }
}
