import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import { QueryResult } from '../types/index.js';
import { QueryPipeline } from '../core/query-pipeline.js';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import {
  banner,
  renderOriginal,
  renderReply,
  renderSummary,
  renderTranslation
} from './render.js';

export type SessionAction = 'continue' | 'exit';

export const COMMANDS = {
  metrics: 'metrics',
  demo: 'test',
  exit: 'exit'
} as const;

export interface InteractiveSessionOptions {
  pipeline: QueryPipeline;
  metrics: MetricsCollector;
  demoQueries: string[];
  logger: Logger;
  write?: (line: string) => void;
}

/**
 * Line-oriented front end: reserved commands are handled here, everything
 * else goes through the pipeline.
 */
export class InteractiveSession {
  private readonly pipeline: QueryPipeline;
  private readonly metrics: MetricsCollector;
  private readonly demoQueries: string[];
  private readonly logger: Logger;
  private readonly write: (line: string) => void;

  constructor(options: InteractiveSessionOptions) {
    this.pipeline = options.pipeline;
    this.metrics = options.metrics;
    this.demoQueries = options.demoQueries;
    this.logger = options.logger.child({ component: 'session' });
    this.write = options.write ?? ((line: string) => console.log(line));
  }

  async handleLine(input: string): Promise<SessionAction> {
    const text = input.trim();
    if (!text) {
      return 'continue';
    }

    switch (text.toLowerCase()) {
      case COMMANDS.exit:
        this.print(['', 'Goodbye!', '']);
        return 'exit';
      case COMMANDS.metrics:
        this.print(renderSummary(this.metrics.summarize()));
        return 'continue';
      case COMMANDS.demo:
        this.print(['', 'Running demo queries...']);
        for (const query of this.demoQueries) {
          await this.processQuery(query);
        }
        return 'continue';
      default:
        await this.processQuery(text);
        return 'continue';
    }
  }

  /**
   * Read lines until `exit`, Ctrl+C or end of input
   */
  async run(input: Readable, output: Writable): Promise<void> {
    const rl = readline.createInterface({ input, output, prompt: '\nYou: ' });
    let interrupted = false;

    rl.on('SIGINT', () => {
      interrupted = true;
      rl.close();
    });

    rl.prompt();
    for await (const line of rl) {
      if (await this.handleLine(line) === 'exit') {
        break;
      }
      rl.prompt();
    }
    rl.close();

    if (interrupted) {
      this.print(['', '', 'Exiting...', '']);
    }
  }

  /**
   * Runs one query. A thrown fault is logged and printed, and the session
   * keeps reading.
   */
  async processQuery(text: string): Promise<QueryResult | undefined> {
    this.print(['', ...banner('PROCESSING QUERY'), '', ...renderOriginal(text)]);

    try {
      const result = await this.pipeline.process(text, {
        onDetected: (_code, name) => this.print(['', `Detected Language: ${name}`, '', 'Translating to English...']),
        onTranslated: translation => this.print(['', ...renderTranslation(translation), '', 'Generating Support Response...']),
        onReplied: reply => this.print(['', ...renderReply(reply)])
      });

      this.print(['', `Total Response Time: ${result.latency.toFixed(2)}s`, '', '─'.repeat(70), '']);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message }, 'Query failed');
      this.print(['', `Error: ${message}`, '']);
      return undefined;
    }
  }

  private print(lines: string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }
}
