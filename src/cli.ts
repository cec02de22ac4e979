#!/usr/bin/env node
/**
 * docschema CLI
 *
 * Reads the configuration, connects to MongoDB, runs the pipeline once and
 * exits. Credentials come from MONGODB_URI and CLAUDE_API_KEY.
 */

import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig, requireApiKey, requireMongoUri } from './config.js';
import { AnthropicCorrector, NoopCorrector, anthropicCompletion } from './correctors.js';
import type { TextCorrector } from './correctors.js';
import { errorMessage } from './errors.js';
import { DocSchemaLogger } from './logger.js';
import { MongoSource, redactUri } from './adapters/mongo-source.js';
import { SchemaPipeline } from './pipeline.js';
import { attachConsoleReporter } from './reporter.js';
import type { DocSchemaConfig, RunReceipt } from './types.js';

interface CliOptions {
  config: string;
  correct: boolean;
  verbose: boolean;
}

async function generate(options: CliOptions): Promise<RunReceipt> {
  const logger = new DocSchemaLogger({ enabled: true, verbose: options.verbose });
  const detach = attachConsoleReporter(logger.emitter);

  try {
    logger.info(`Loading configuration from ${options.config}`);
    const config = await loadConfig(options.config);
    const uri = requireMongoUri(config);
    const corrector = createCorrector(config, options.correct, logger);

    logger.info(`Connecting to MongoDB at ${redactUri(uri)}...`);
    const source = new MongoSource({ uri, dbName: config.mongodb.database });
    await source.connect();

    try {
      const pipeline = new SchemaPipeline({
        source,
        corrector,
        logger,
        output: config.output,
        schema: config.schema,
      });
      return await pipeline.run();
    } finally {
      await source.close();
    }
  } catch (err) {
    logger.error(`Error generating schemas: ${errorMessage(err)}`);
    throw err;
  } finally {
    detach();
  }
}

function createCorrector(config: DocSchemaConfig, enabled: boolean, logger: DocSchemaLogger): TextCorrector {
  if (!enabled || !config.correction.enabled) {
    logger.info('Diagram correction disabled');
    return new NoopCorrector();
  }

  const apiKey = requireApiKey(config);
  logger.info('Successfully initialized Claude API client');
  return new AnthropicCorrector({
    model: config.correction.model,
    maxTokens: config.correction.maxTokens,
    complete: anthropicCompletion(apiKey, config.correction.timeoutMs),
    logger,
  });
}

const program = new Command();

program
  .name('docschema')
  .description('Generate a Mermaid ER diagram of a MongoDB database by sampling its collections')
  .option('-c, --config <path>', 'path to configuration file', DEFAULT_CONFIG_PATH)
  .option('--no-correct', 'skip the external diagram correction pass')
  .option('-v, --verbose', 'log debug output', false)
  .action(async (options: CliOptions) => {
    try {
      await generate(options);
      console.log('Schema generation completed successfully!');
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
