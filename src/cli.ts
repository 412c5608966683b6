#!/usr/bin/env node

/**
 * Query Handler CLI
 *
 * Interactive multilingual support desk: type a customer message in any
 * language and get an English translation plus a suggested reply.
 */

/* eslint-disable no-console */
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { config as loadEnv } from 'dotenv';
import { loadConfig, requireApiKey } from './config/loader.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { RemoteCompletionClient } from './adapters/completion-client.js';
import { LanguageDetector } from './core/language-detector.js';
import { QueryPipeline } from './core/query-pipeline.js';
import { TranslationService } from './services/translation-service.js';
import { ResponseGenerator } from './services/response-generator.js';
import { MetricsCollector } from './metrics/metrics-collector.js';
import { InteractiveSession } from './cli/session.js';
import { banner } from './cli/render.js';

async function main(): Promise<void> {
  try {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
      showHelp();
      process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
      showVersion();
      process.exit(0);
    }

    loadEnv();
    const config = loadConfig(args);
    const apiKey = requireApiKey(config);
    const logger = createLogger({ level: config.monitoring.logLevel, name: 'query-handler' });

    const client = new RemoteCompletionClient({
      apiKey,
      baseUrl: config.api.baseUrl,
      preferredModel: config.api.preferredModel,
      fallbackModels: config.api.fallbackModels,
      requestTimeout: config.api.requestTimeout,
      probeTimeout: config.api.probeTimeout,
      logger
    });
    await client.selectActiveModel();

    const metrics = new MetricsCollector({ truncateLength: config.metrics.truncateLength });
    const pipeline = new QueryPipeline({
      detector: new LanguageDetector({
        lexicon: config.detection.lexicon,
        cacheSize: config.detection.cacheSize,
        logger
      }),
      translator: new TranslationService(client, {
        maxTokens: config.translation.maxTokens,
        errorSubstrings: config.translation.errorSubstrings,
        logger
      }),
      responder: new ResponseGenerator(client, config.reply.maxTokens),
      metrics,
      logger
    });

    const session = new InteractiveSession({
      pipeline,
      metrics,
      demoQueries: config.demoQueries,
      logger
    });

    // Ctrl+C while a request is in flight
    process.on('SIGINT', () => {
      console.log('\n\nExiting...\n');
      process.exit(0);
    });

    showWelcome(client.model, config.detection.lexicon.version);
    await session.run(process.stdin, process.stdout);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    if (error instanceof ConfigurationError && error.details) {
      for (const detail of error.details) {
        console.error(`  - ${detail}`);
      }
    }
    if (process.env.QUERY_HANDLER_LOG_LEVEL === 'debug' && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

function showWelcome(model: string, lexiconVersion: string): void {
  const lines = [
    '',
    ...banner('REAL-TIME MULTILINGUAL QUERY HANDLER', `Model: ${model}`, `Marker lexicon: ${lexiconVersion}`),
    '',
    'Features:',
    '   - Real-time translation to English',
    '   - AI-powered support responses',
    '   - Performance metrics tracking',
    '   - 16+ language support',
    '',
    'Commands:',
    '   - Type your query in any language',
    "   - 'metrics' - View performance statistics",
    "   - 'test' - Run demo queries",
    "   - 'exit' - Quit program",
    '',
    '─'.repeat(70)
  ];
  console.log(lines.join('\n'));
}

function showHelp(): void {
  console.log(`
Query Handler - multilingual support queries, translated and answered

Usage: query-handler [options]

Options:
  --help, -h              Show this help message
  --version, -v           Show version information
  --config <path>         JSON config file (default: ~/.query-handler/config.json)
  --model <id>            Preferred completion model
  --base-url <url>        OpenAI-compatible API base URL
  --log-level <level>     Log level (debug, info, warn, error, silent)

Environment Variables:
  QUERY_HANDLER_API_KEY   API key for the completion service (GROQ_API_KEY also accepted)
  QUERY_HANDLER_BASE_URL  API base URL
  QUERY_HANDLER_MODEL     Preferred completion model
  QUERY_HANDLER_LOG_LEVEL Log level
  QUERY_HANDLER_CONFIG    Config file path

Examples:
  # Start an interactive session
  QUERY_HANDLER_API_KEY=... query-handler

  # Use another model and show debug logs on stderr
  query-handler --model gemma2-9b-it --log-level debug
`);
}

function showVersion(): void {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // src/ when run from sources, dist/src/ when built
  const packagePath = [path.join(here, '../package.json'), path.join(here, '../../package.json')]
    .find(candidate => fs.existsSync(candidate));

  if (!packagePath) {
    console.log('query-handler (unknown version)');
    return;
  }
  const packageJson: { version?: string } = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
  console.log(`query-handler v${packageJson.version ?? 'unknown'}`);
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run the CLI
if (isEntryPoint()) {
  void main();
}
