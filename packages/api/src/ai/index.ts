import type { GenerationPort } from '../remediation/ports';
import type { GenerationConfig } from './types';
import { OllamaProvider } from './providers/ollama';

export { OllamaProvider } from './providers/ollama';
export type { GenerationConfig } from './types';

/**
 * Create the generation backend for the remediation loop
 */
export function createGenerator(config: GenerationConfig): GenerationPort {
  return new OllamaProvider(config);
}
