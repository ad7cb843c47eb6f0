/**
 * Remediation domain types
 *
 * A request describes one vulnerability; the loop turns it into code that
 * the scanner accepts, or explains why it could not.
 */

import type { GenerationError, ScanError } from './errors';

export const SUPPORTED_LANGUAGES = ['python', 'javascript', 'java', 'go', 'csharp'] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export interface RemediationRequest {
  readonly language: string;
  readonly ruleName: string;
  readonly description: string;
  readonly remediationAdvice: string;
}

export interface FindingLocation {
  readonly file?: string;
  readonly line: number;
  readonly snippet?: string;
}

export interface Finding {
  readonly description: string;
  readonly severity: string;
  readonly rule?: string;
  readonly remediationAdvice?: string;
  readonly location?: FindingLocation;
}

// One generation + scan round trip. Only rejected attempts reach the history.
export interface Attempt {
  readonly index: number;
  readonly prompt: string;
  readonly generatedCode?: string;
  readonly findings: readonly Finding[];
}

export type ConversationHistory = readonly Attempt[];

export type RemediationResult =
  | { readonly status: 'success'; readonly code: string; readonly attemptsUsed: number }
  | { readonly status: 'rejected'; readonly lastFindings: readonly Finding[]; readonly attemptsUsed: number }
  | {
      readonly status: 'unsupported_language';
      readonly language: string;
      readonly supportedLanguages: readonly SupportedLanguage[];
    }
  | { readonly status: 'backend_failure'; readonly stage: 'generation'; readonly error: GenerationError }
  | { readonly status: 'backend_failure'; readonly stage: 'scan'; readonly error: ScanError };

export type LoopState =
  | 'INIT'
  | 'GENERATING'
  | 'SCANNING'
  | 'CLEAN'
  | 'VULNERABLE_RETRY'
  | 'VULNERABLE_EXHAUSTED'
  | 'GENERATION_FAILED'
  | 'SCAN_FAILED';
