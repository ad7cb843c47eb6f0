import type { FastifyInstance } from 'fastify';
import { summarizeFindings } from './prompt';
import type { RemediationLoop } from './loop';
import type { Finding, RemediationRequest, RemediationResult } from './types';

export interface RemediationRouteOptions {
  loop: RemediationLoop;
}

const remediationBodySchema = {
  type: 'object',
  required: ['language', 'ruleName', 'description', 'remediationAdvice'],
  properties: {
    language: { type: 'string', minLength: 1 },
    ruleName: { type: 'string', minLength: 1 },
    description: { type: 'string', minLength: 1 },
    remediationAdvice: { type: 'string', minLength: 1 },
  },
} as const;

function serializeFinding(finding: Finding) {
  return {
    description: finding.description,
    severity: finding.severity,
    rule: finding.rule ?? null,
    line: finding.location?.line ?? null,
    content: finding.location?.snippet ?? null,
  };
}

// Remediation routes
export async function remediationRoutes(
  fastify: FastifyInstance,
  options: RemediationRouteOptions
): Promise<void> {
  const { loop } = options;

  fastify.post<{ Body: RemediationRequest }>(
    '/api/remediation',
    { schema: { body: remediationBodySchema } },
    async (request, reply) => {
      const { language, ruleName, description, remediationAdvice } = request.body;
      request.log.info(`Processing remediation request for ${language} - ${ruleName}`);

      // Abort the in-flight backend call if the client goes away before we answer.
      const controller = new AbortController();
      reply.raw.on('close', () => {
        if (!reply.raw.writableFinished) controller.abort();
      });

      let result: RemediationResult;
      try {
        result = await loop.run(
          { language, ruleName, description, remediationAdvice },
          { signal: controller.signal, logger: request.log }
        );
      } catch (error) {
        if (!controller.signal.aborted) throw error;
        request.log.info('Remediation aborted: client disconnected');
        return reply.status(499).send({ detail: 'Client closed request', error_code: 'CLIENT_CLOSED_REQUEST' });
      }

      switch (result.status) {
        case 'success':
          return reply.send({ remediated_code: result.code });
        case 'unsupported_language':
          return reply.status(400).send({
            detail: `Unsupported language: ${result.language}. Supported languages: ${result.supportedLanguages.join(', ')}`,
            error_code: 'UNSUPPORTED_LANGUAGE',
          });
        case 'rejected':
          return reply.status(422).send({
            detail: `Unable to generate secure code after ${result.attemptsUsed} attempts. Last vulnerabilities: ${summarizeFindings(result.lastFindings)}`,
            error_code: 'SECURITY_REJECTED',
            attempts_used: result.attemptsUsed,
            findings: result.lastFindings.map(serializeFinding),
          });
        case 'backend_failure':
          return reply.status(500).send({
            detail: `Failed to generate remediation: ${result.error.message}`,
            error_code: result.error.code,
            cause: result.error.kind,
          });
      }
    }
  );

  // Liveness only; backend health is logged at startup.
  fastify.get('/health', async () => {
    return { status: 'healthy' };
  });
}
