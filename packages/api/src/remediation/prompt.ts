import type { ConversationHistory, Finding, RemediationRequest } from './types';

export const SYSTEM_INSTRUCTION = `You are a security remediation expert. Your task is to provide ONLY secure code snippets that fix the specified vulnerability.

Rules:
1. Respond with ONLY the code snippet - no explanations, no markdown formatting
2. The code must be syntactically correct and secure
3. Use the exact programming language specified in the request
4. Focus specifically on fixing the vulnerability described

The code should demonstrate the secure way to implement the functionality.`;

/**
 * Builds the generation prompt for the next attempt.
 *
 * Every rejected attempt so far is replayed in order, with all of its
 * findings, so the generator sees the whole accumulated feedback rather
 * than only the latest scan.
 */
export function buildPrompt(request: RemediationRequest, history: ConversationHistory): string {
  const sections = [SYSTEM_INSTRUCTION, renderRequest(request)];

  if (history.length > 0) {
    const rejected = history.map((attempt) => {
      const code = attempt.generatedCode ? `\`\`\`\n${attempt.generatedCode}\n\`\`\`\n` : '';
      return `### Rejected version\n${code}Scanner findings:\n${attempt.findings.map(renderFinding).join('\n')}`;
    });

    sections.push(
      `## Previous Security Analysis\nThe security scanner rejected earlier versions of the fix.\n\n${rejected.join('\n\n')}`,
      'Please fix ALL of the security issues listed above and provide a corrected version. Do not reintroduce any of them.'
    );
  } else {
    sections.push('Provide a secure code snippet that fixes this vulnerability.');
  }

  return sections.join('\n\n');
}

function renderRequest(request: RemediationRequest): string {
  return `## Vulnerability Details
- Language: ${request.language}
- Rule: ${request.ruleName}
- Description: ${request.description}
- Remediation Advice: ${request.remediationAdvice}`;
}

export function renderFinding(finding: Finding): string {
  const details = [`severity: ${finding.severity}`];
  if (finding.rule) details.unshift(`rule: ${finding.rule}`);
  if (finding.location) {
    const snippet = finding.location.snippet ? `: ${finding.location.snippet}` : '';
    details.push(`line ${finding.location.line}${snippet}`);
  }
  const advice = finding.remediationAdvice ? ` Advice: ${finding.remediationAdvice}` : '';
  return `- ${finding.description} (${details.join(', ')})${advice}`;
}

export function summarizeFindings(findings: readonly Finding[]): string {
  return findings.map((finding) => finding.description).join('; ');
}
