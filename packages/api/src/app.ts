import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createGenerator } from './ai';
import type { AppConfig } from './config';
import { RemediationLoop } from './remediation/loop';
import type { GenerationPort, ScanPort } from './remediation/ports';
import { remediationRoutes } from './remediation/routes';
import { VorpalScanner } from './scanners/vorpal';

export interface BuildAppOptions {
  config: AppConfig;
  generator?: GenerationPort;
  scanner?: ScanPort;
  // false silences logging; an instance replaces the default pino logger.
  logger?: boolean | FastifyBaseLogger;
}

export function buildApp(options: BuildAppOptions): FastifyInstance {
  const { config } = options;
  const fastify = Fastify({
    logger:
      options.logger === undefined || options.logger === true ? { level: config.logLevel } : options.logger,
  });

  const loop = new RemediationLoop({
    generator: options.generator ?? createGenerator(config.generation),
    scanner: options.scanner ?? new VorpalScanner(config.scanner),
    maxRetries: config.maxRetries,
    supportedLanguages: config.supportedLanguages,
    temperature: config.generation.temperature,
  });

  fastify.register(cors, {
    origin: true,
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      reply.status(400).send({ detail: error.message, error_code: 'INVALID_REQUEST' });
      return;
    }
    request.log.error(error);
    reply.status(500).send({ detail: 'Internal server error', error_code: 'INTERNAL_ERROR' });
  });

  fastify.register(remediationRoutes, { loop });

  return fastify;
}
