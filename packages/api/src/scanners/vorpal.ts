import { spawn } from 'child_process';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ScanError, errorMessage } from '../remediation/errors';
import type { ScanOptions, ScanPort } from '../remediation/ports';
import type { Finding, SupportedLanguage } from '../remediation/types';
import { parseVorpalResults } from './vorpal-parser';

export interface VorpalConfig {
  binaryPath: string;
  timeoutMs: number;
}

interface ProcessResult {
  code: number | null;
  stderr: string;
}

const RESULT_FILE = 'scan_results.json';

/**
 * Runs the Vorpal CLI against a single generated snippet.
 * Each scan gets its own temporary directory, removed afterwards.
 */
export class VorpalScanner implements ScanPort {
  private config: VorpalConfig;

  constructor(config: VorpalConfig) {
    this.config = config;
  }

  async scan(
    code: string,
    language: SupportedLanguage,
    filename: string,
    options: ScanOptions = {}
  ): Promise<Finding[]> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vorpal-'));
    try {
      const sourceFile = path.join(workDir, path.basename(filename));
      const resultFile = path.join(workDir, RESULT_FILE);
      await fs.writeFile(sourceFile, code, 'utf8');

      const result = await this.runVorpal(['-s', sourceFile, '-r', resultFile], options.signal);
      if (result.code !== 0) {
        throw new ScanError(
          'crashed',
          `Vorpal scan of ${language} code failed with code ${result.code}: ${result.stderr.trim() || 'Unknown error'}`
        );
      }

      return parseVorpalResults(await readReport(resultFile));
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runVorpal(['-v']);
      // The version command exits with 1.
      return result.code === 0 || result.code === 1;
    } catch {
      return false;
    }
  }

  private runVorpal(args: string[], signal?: AbortSignal): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      signal?.throwIfAborted();
      const child = spawn(this.config.binaryPath, args);
      let stderr = '';
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.config.timeoutMs);
      const onAbort = () => child.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.stderr?.on('data', (chunk) => {
        stderr += chunk;
      });

      child.on('error', (err) => {
        cleanup();
        reject(
          new ScanError(
            'unavailable',
            `Vorpal binary at ${this.config.binaryPath} could not be started: ${isErrnoException(err) && err.code ? err.code : errorMessage(err)}`,
            { cause: err }
          )
        );
      });

      child.on('close', (code) => {
        cleanup();
        if (timedOut) {
          reject(new ScanError('timeout', `Vorpal scan timed out after ${this.config.timeoutMs}ms`));
          return;
        }
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }
        resolve({ code, stderr });
      });
    });
  }
}

async function readReport(resultFile: string): Promise<unknown> {
  let content: string;
  try {
    content = (await fs.readFile(resultFile, 'utf8')).trim();
  } catch (err) {
    // No report file means Vorpal found nothing to write.
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw new ScanError('invalid_output', `Failed to read scan results: ${errorMessage(err)}`, { cause: err });
  }

  if (!content) return [];
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ScanError('invalid_output', `Failed to parse scan results: ${errorMessage(err)}`, { cause: err });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
