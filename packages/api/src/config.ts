import type { GenerationConfig } from './ai/types';
import { isSupportedLanguage, normalizeLanguage } from './remediation/languages';
import { SUPPORTED_LANGUAGES, type SupportedLanguage } from './remediation/types';
import type { VorpalConfig } from './scanners/vorpal';

export const SERVICE_NAME = 'Code Remediation Service';
export const SERVICE_VERSION = '1.0.0';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  maxRetries: number;
  supportedLanguages: SupportedLanguage[];
  generation: GenerationConfig;
  scanner: VorpalConfig;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

function readString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min = 1,
  max = Number.MAX_SAFE_INTEGER
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(name, `expected an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigError(name, `expected a number between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readUrl(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = readString(env, name, fallback);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(name, `invalid URL "${raw}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(name, `expected an http(s) URL, got "${raw}"`);
  }
  return raw;
}

function readLanguages(env: NodeJS.ProcessEnv): SupportedLanguage[] {
  const raw = env.SUPPORTED_LANGUAGES;
  if (!raw) return [...SUPPORTED_LANGUAGES];

  const languages = new Set<SupportedLanguage>();
  for (const entry of raw.split(',')) {
    if (!entry.trim()) continue;
    const language = normalizeLanguage(entry);
    if (!isSupportedLanguage(language)) {
      throw new ConfigError('SUPPORTED_LANGUAGES', `unknown language "${entry.trim()}"`);
    }
    languages.add(language);
  }
  if (languages.size === 0) {
    throw new ConfigError('SUPPORTED_LANGUAGES', 'at least one language is required');
  }
  return Array.from(languages);
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = readString(env, 'LOG_LEVEL', 'info').toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigError('LOG_LEVEL', `expected one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host: readString(env, 'HOST', '0.0.0.0'),
    port: readInteger(env, 'PORT', 8000, 1, 65535),
    logLevel: readLogLevel(env),
    maxRetries: readInteger(env, 'MAX_RETRIES', 5),
    supportedLanguages: readLanguages(env),
    generation: {
      baseUrl: readUrl(env, 'OLLAMA_BASE_URL', 'http://127.0.0.1:11434'),
      model: readString(env, 'OLLAMA_MODEL', 'llama3.2'),
      // Low temperature keeps fixes conservative and reproducible.
      temperature: readNumber(env, 'GENERATION_TEMPERATURE', 0.1, 0, 2),
      timeoutMs: readInteger(env, 'OLLAMA_TIMEOUT_MS', 60_000),
      maxTokens: readInteger(env, 'OLLAMA_MAX_TOKENS', 1000),
    },
    scanner: {
      binaryPath: readString(env, 'VORPAL_PATH', '/usr/local/bin/vorpal'),
      timeoutMs: readInteger(env, 'VORPAL_TIMEOUT_MS', 30_000),
    },
  };
}
