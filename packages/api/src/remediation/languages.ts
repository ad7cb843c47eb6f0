import { SUPPORTED_LANGUAGES, type SupportedLanguage } from './types';

const LANGUAGE_ALIASES: Record<string, SupportedLanguage> = {
  'c#': 'csharp',
};

const FILE_EXTENSIONS: Record<SupportedLanguage, string> = {
  python: 'py',
  javascript: 'js',
  java: 'java',
  go: 'go',
  csharp: 'cs',
};

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

// Lower-cased, trimmed and de-aliased; not necessarily a supported language.
export function normalizeLanguage(value: string): string {
  const normalized = value.trim().toLowerCase();
  return LANGUAGE_ALIASES[normalized] ?? normalized;
}

/**
 * Case-insensitive lookup of a request language within the allowed set.
 * Returns null when the language is unknown or not enabled.
 */
export function resolveLanguage(
  value: string,
  allowed: readonly SupportedLanguage[]
): SupportedLanguage | null {
  const language = normalizeLanguage(value);
  if (!isSupportedLanguage(language)) return null;
  return allowed.includes(language) ? language : null;
}

// The scanner picks its rule set from the extension; the name itself means nothing.
export function scanFilename(language: SupportedLanguage): string {
  return `remediation.${FILE_EXTENSIONS[language]}`;
}
