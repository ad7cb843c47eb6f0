import { GenerationError, errorMessage } from '../../remediation/errors';
import type { GenerateOptions, GenerationPort } from '../../remediation/ports';
import { cleanCodeResponse } from '../clean';
import { type GenerationConfig, isOllamaGenerateResponse } from '../types';

/**
 * Ollama provider for local LLM inference
 * Supports models like llama3.2, codellama, mistral
 */
export class OllamaProvider implements GenerationPort {
  private config: GenerationConfig;
  private baseUrl: string;

  constructor(config: GenerationConfig) {
    this.config = config;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          options: {
            temperature: options.temperature,
            top_p: 0.9,
            top_k: 40,
            num_predict: this.config.maxTokens,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new GenerationError(
          'unavailable',
          `Ollama request failed with status ${response.status}: ${error}`
        );
      }

      const data: unknown = await response.json();
      if (!isOllamaGenerateResponse(data)) {
        throw new GenerationError('unavailable', 'Invalid response format from Ollama');
      }

      return cleanCodeResponse(data.response);
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      if (timedOut) {
        throw new GenerationError(
          'timeout',
          `Timeout after ${this.config.timeoutMs}ms while communicating with Ollama service`,
          { cause: error }
        );
      }
      if (options.signal?.aborted) throw error;
      throw new GenerationError(
        'unavailable',
        `Network error while communicating with Ollama: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
