import type { FastifyBaseLogger } from 'fastify';
import { errorMessage, GenerationError, ScanError } from './errors';
import { resolveLanguage, scanFilename } from './languages';
import type { GenerationPort, ScanPort } from './ports';
import { buildPrompt, summarizeFindings } from './prompt';
import type {
  Attempt,
  ConversationHistory,
  Finding,
  LoopState,
  RemediationRequest,
  RemediationResult,
  SupportedLanguage,
} from './types';

export type LoopLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface RemediationLoopOptions {
  generator: GenerationPort;
  scanner: ScanPort;
  maxRetries: number;
  supportedLanguages: readonly SupportedLanguage[];
  temperature: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  logger?: LoopLogger;
  onTransition?: (state: LoopState, attempt: number) => void;
}

/**
 * Generate → scan → retry state machine.
 *
 * Holds no per-request state: the history lives in `run` and is dropped
 * when it returns, so one instance serves concurrent requests.
 */
export class RemediationLoop {
  private generator: GenerationPort;
  private scanner: ScanPort;
  private maxRetries: number;
  private supportedLanguages: readonly SupportedLanguage[];
  private temperature: number;

  constructor(options: RemediationLoopOptions) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${options.maxRetries}`);
    }
    if (options.supportedLanguages.length === 0) {
      throw new RangeError('supportedLanguages must not be empty');
    }
    this.generator = options.generator;
    this.scanner = options.scanner;
    this.maxRetries = options.maxRetries;
    this.supportedLanguages = options.supportedLanguages;
    this.temperature = options.temperature;
  }

  async run(request: RemediationRequest, options: RunOptions = {}): Promise<RemediationResult> {
    const { signal, logger, onTransition } = options;
    const enter = (state: LoopState, attempt: number) => onTransition?.(state, attempt);

    enter('INIT', 0);
    const language = resolveLanguage(request.language, this.supportedLanguages);
    if (!language) {
      logger?.warn({ language: request.language }, 'Unsupported remediation language');
      return {
        status: 'unsupported_language',
        language: request.language,
        supportedLanguages: this.supportedLanguages,
      };
    }

    const filename = scanFilename(language);
    let history: ConversationHistory = [];

    for (let index = 0; index < this.maxRetries; index++) {
      signal?.throwIfAborted();
      enter('GENERATING', index);
      logger?.debug(`Remediation attempt ${index + 1}/${this.maxRetries}`);

      const prompt = buildPrompt(request, history);
      let code: string;
      try {
        code = await this.generator.generate(prompt, { temperature: this.temperature, signal });
      } catch (error) {
        if (signal?.aborted) throw signal.reason;
        const failure = toGenerationError(error);
        enter('GENERATION_FAILED', index);
        logger?.error({ err: failure, kind: failure.kind }, `Generation failed on attempt ${index + 1}`);
        return { status: 'backend_failure', stage: 'generation', error: failure };
      }

      if (!code.trim()) {
        enter('GENERATION_FAILED', index);
        logger?.error(`Empty response from generation backend on attempt ${index + 1}`);
        return {
          status: 'backend_failure',
          stage: 'generation',
          error: new GenerationError('empty_output', 'Empty response from AI model'),
        };
      }

      signal?.throwIfAborted();
      enter('SCANNING', index);
      let findings: Finding[];
      try {
        findings = await this.scanner.scan(code, language, filename, { signal });
      } catch (error) {
        if (signal?.aborted) throw signal.reason;
        const failure = toScanError(error);
        enter('SCAN_FAILED', index);
        logger?.error({ err: failure, kind: failure.kind }, `Scan failed on attempt ${index + 1}`);
        return { status: 'backend_failure', stage: 'scan', error: failure };
      }

      if (findings.length === 0) {
        enter('CLEAN', index);
        logger?.info(`Successfully generated secure code after ${index + 1} attempts`);
        return { status: 'success', code, attemptsUsed: index + 1 };
      }

      const attempt: Attempt = { index, prompt, generatedCode: code, findings };
      history = [...history, attempt];
      logger?.warn(
        { findings: findings.length },
        `Attempt ${index + 1} had vulnerabilities: ${summarizeFindings(findings)}`
      );

      if (index + 1 >= this.maxRetries) {
        enter('VULNERABLE_EXHAUSTED', index);
        return { status: 'rejected', lastFindings: findings, attemptsUsed: this.maxRetries };
      }
      enter('VULNERABLE_RETRY', index);
    }

    // maxRetries >= 1 is enforced in the constructor, so the loop always returns.
    throw new Error('Remediation loop ended without a result');
  }
}

function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;
  return new GenerationError('unavailable', errorMessage(error), { cause: error });
}

function toScanError(error: unknown): ScanError {
  if (error instanceof ScanError) return error;
  return new ScanError('unavailable', errorMessage(error), { cause: error });
}
