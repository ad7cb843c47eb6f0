import { buildApp } from './app';
import { createGenerator } from './ai';
import { loadConfig, SERVICE_NAME, SERVICE_VERSION } from './config';
import { VorpalScanner } from './scanners/vorpal';

async function start() {
  const config = loadConfig();
  const generator = createGenerator(config.generation);
  const scanner = new VorpalScanner(config.scanner);
  const fastify = buildApp({ config, generator, scanner });

  try {
    fastify.log.info(`Starting ${SERVICE_NAME} v${SERVICE_VERSION}`);
    fastify.log.info(`Ollama endpoint: ${config.generation.baseUrl} (model ${config.generation.model})`);
    fastify.log.info(`Vorpal path: ${config.scanner.binaryPath}`);
    fastify.log.info(`Max retries: ${config.maxRetries}`);
    fastify.log.info(`Supported languages: ${config.supportedLanguages.join(', ')}`);

    const [generatorUp, scannerUp] = await Promise.all([generator.isAvailable(), scanner.isAvailable()]);
    if (!generatorUp) fastify.log.warn('Ollama service is not available');
    if (!scannerUp) fastify.log.warn('Vorpal scanner is not available');

    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

start().catch((err) => {
  // Configuration errors surface before the logger exists.
  console.error(err);
  process.exit(1);
});
