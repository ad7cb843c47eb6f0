/**
 * Code generation backend settings
 *
 * Ollama serves the model locally; the remediation loop only ever asks it
 * for plain code at a low temperature.
 */

export interface GenerationConfig {
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokens: number;
}

export interface OllamaGenerateResponse {
  response: string;
}

export function isOllamaGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}
