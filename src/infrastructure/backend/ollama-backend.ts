import { z } from 'zod';
import type { GenerationBackend } from '../../application/backend-strategy.js';
import { BackendUnavailableError } from '../../domain/index.js';

const generateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

export interface OllamaBackendOptions {
  baseUrl: string;
  model: string;
  /** Sampling temperature forwarded to the model. */
  temperature?: number;
}

/**
 * Generation backend speaking Ollama's HTTP API (POST /api/generate,
 * non-streaming). Any transport failure, non-2xx status or malformed
 * body becomes BackendUnavailableError.
 */
export class OllamaBackend implements GenerationBackend {
  readonly name = 'ollama';
  private readonly endpoint: string;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: OllamaBackendOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/api/generate`;
    this.model = options.model;
    this.temperature = options.temperature ?? 0.7;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: { temperature: this.temperature },
        }),
        signal,
      });
    } catch (err: unknown) {
      throw new BackendUnavailableError(`Ollama unreachable at ${this.endpoint}`, { cause: err });
    }

    if (!response.ok) {
      throw new BackendUnavailableError(`Ollama returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new BackendUnavailableError('Ollama returned invalid JSON', { cause: err });
    }

    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendUnavailableError('Ollama response is missing the "response" field');
    }
    return parsed.data.response;
  }
}
