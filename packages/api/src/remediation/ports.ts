import type { Finding, SupportedLanguage } from './types';

export interface GenerateOptions {
  temperature: number;
  signal?: AbortSignal;
}

export interface ScanOptions {
  signal?: AbortSignal;
}

/**
 * Code generation backend.
 * Rejects with GenerationError on connection failure or timeout.
 */
export interface GenerationPort {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
  isAvailable(): Promise<boolean>;
}

/**
 * Vulnerability scanner. An empty list is the only "clean" verdict.
 * Rejects with ScanError when no verdict could be obtained.
 */
export interface ScanPort {
  scan(
    code: string,
    language: SupportedLanguage,
    filename: string,
    options?: ScanOptions
  ): Promise<Finding[]>;
  isAvailable(): Promise<boolean>;
}
