import type { Finding } from '../remediation/types';

type JsonRecord = Record<string, unknown>;

const UNKNOWN_RULE = 'Unknown Rule';

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(entry: JsonRecord, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return undefined;
}

function pickNumber(entry: JsonRecord, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = entry[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  }
  return undefined;
}

function extractEntries(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return [];
  if (Array.isArray(data.results)) return data.results;
  if (Array.isArray(data.vulnerabilities)) return data.vulnerabilities;
  if (Object.keys(data).length === 0) return [];
  return [data];
}

/**
 * Normalize a Vorpal report into findings.
 *
 * Vorpal has emitted several report layouts and key spellings over time
 * (including the misspelled `remediationAdvise`), so every known alias is
 * accepted.
 */
export function parseVorpalResults(data: unknown): Finding[] {
  const findings: Finding[] = [];

  for (const entry of extractEntries(data)) {
    if (!isRecord(entry)) continue;

    // Any object entry is a reported vulnerability, however sparse.
    const rule = pickString(entry, ['rule_name', 'ruleName', 'rule']);
    const description = pickString(entry, ['description', 'desc']) ?? rule ?? UNKNOWN_RULE;

    const file = pickString(entry, ['file', 'fileName', 'filename']);
    const snippet = pickString(entry, ['content', 'problematic_line', 'code']);
    const remediationAdvice = pickString(entry, ['remediationAdvise', 'remediationAdvice', 'advice']);

    findings.push({
      description,
      severity: pickString(entry, ['severity']) ?? 'medium',
      ...(rule ? { rule } : {}),
      ...(remediationAdvice ? { remediationAdvice } : {}),
      location: {
        line: pickNumber(entry, ['line', 'lineNumber', 'line_number']) ?? 1,
        ...(file ? { file } : {}),
        ...(snippet ? { snippet } : {}),
      },
    });
  }

  return findings;
}
