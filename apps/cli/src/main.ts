import type { GenerativeClient, ProviderId, TextExtractor } from '@docstruct/connector-sdk';
import {
  createConsoleLogger,
  CredentialPool,
  MissingInputError,
  ModelSessionFactory,
  ResponseController,
  type AttemptRecord,
  type Logger,
} from '@docstruct/core';
import { PdfTextExtractor } from '@docstruct/connectors/pdf';
import { createGenerativeClient, type GenerativeClientOptions } from '@docstruct/connectors/llm';
import { loadCliConfig, USAGE } from './lib/config.js';
import { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
import type { SecretSource } from './lib/secrets.js';
import { DocumentPipeline, type PipelineSummary } from './pipeline/driver.js';

/**
 * Collaborators that tests replace.
 */
export interface CliDependencies {
  createClient?: (provider: ProviderId, options: GenerativeClientOptions) => GenerativeClient;
  extractor?: TextExtractor;
  secretSource?: SecretSource;
  logger?: Logger;
  /** Logger handed to the pool, factory, controller and pipeline */
  componentLogger?: (tag: string) => Logger;
  onAttempt?: (record: AttemptRecord) => void;
  onSummary?: (summary: PipelineSummary) => void;
}

/**
 * Run the converter and return the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  const logger = deps.logger ?? createConsoleLogger('CLI');
  const componentLogger = deps.componentLogger ?? createConsoleLogger;

  const configResult = loadCliConfig(argv, deps.secretSource);
  if (!configResult.success) {
    logger.error(`Invalid arguments: ${configResult.error}`);
    logger.info(USAGE);
    return EXIT_CODES.INVALID_ARGUMENTS;
  }

  const config = configResult.config;
  if (config.help) {
    logger.info(USAGE);
    return EXIT_CODES.SUCCESS;
  }

  // Credentials and model
  const credentialLogger = componentLogger('Credentials');
  const poolResult = CredentialPool.load(config.credentials, config.apiKeyFile);
  if (!poolResult.success) {
    credentialLogger.error(poolResult.error);
    return EXIT_CODES.NO_CREDENTIALS;
  }

  const pool = poolResult.pool;
  if (poolResult.fromExplicit > 0) {
    credentialLogger.info(`${poolResult.fromExplicit} credential(s) supplied via --api / DOCSTRUCT_API_KEYS.`);
  }
  if (poolResult.fromFile > 0) {
    credentialLogger.info(`${poolResult.fromFile} credential(s) loaded from '${config.apiKeyFile}'.`);
  }
  credentialLogger.info(`${pool.size} unique credential(s) available.`);

  const createClient = deps.createClient ?? createGenerativeClient;
  const client = createClient(config.provider, { timeoutMs: config.timeoutMs });
  const factory = new ModelSessionFactory(client, componentLogger('Session'));
  const controller = new ResponseController(pool, factory, {
    modelName: config.modelName,
    logger: componentLogger('Controller'),
    ...(deps.onAttempt ? { onAttempt: deps.onAttempt } : {}),
  });

  const bound = controller.initialize();
  if (!bound.success) {
    logger.error('Cannot continue without a working model session.');
    return EXIT_CODES.NO_CREDENTIALS;
  }

  // Documents
  const pipeline = new DocumentPipeline(controller, deps.extractor ?? new PdfTextExtractor(), {
    maxAttempts: config.maxAttempts,
    logger: componentLogger('Pipeline'),
  });

  const result = await pipeline.run({
    inputDir: config.inputDir,
    outputDir: config.outputDir,
    useTemplate: config.useTemplate,
    ...(config.templatePath !== undefined ? { templatePath: config.templatePath } : {}),
  });

  if (!result.success) {
    return result.error instanceof MissingInputError
      ? EXIT_CODES.MISSING_INPUT
      : EXIT_CODES.MISSING_TEMPLATE;
  }

  deps.onSummary?.(result.summary);
  return EXIT_CODES.SUCCESS;
}
