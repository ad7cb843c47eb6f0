export type GenerationFailureKind = 'unavailable' | 'timeout' | 'empty_output';

export type ScanFailureKind = 'unavailable' | 'timeout' | 'crashed' | 'invalid_output';

/**
 * The generation backend could not produce code. Infrastructure-class:
 * the loop never retries it.
 */
export class GenerationError extends Error {
  readonly code = 'GENERATION_FAILURE';

  constructor(
    readonly kind: GenerationFailureKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/**
 * The scanner could not give a verdict. Distinct from "findings present".
 */
export class ScanError extends Error {
  readonly code = 'SCAN_FAILURE';

  constructor(
    readonly kind: ScanFailureKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ScanError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
