import type { Logger } from 'pino';
import { LanguageCode, QueryResult, Translation } from '../types/index.js';
import { languageName } from '../config/languages.js';
import { LanguageDetector } from './language-detector.js';
import { TranslationService } from '../services/translation-service.js';
import { ResponseGenerator } from '../services/response-generator.js';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import { createLogger } from '../logger.js';

/**
 * Receives each stage's output as soon as it exists
 */
export interface PipelineObserver {
  onDetected?(code: LanguageCode, name: string): void;
  onTranslated?(translation: Translation): void;
  onReplied?(reply: string): void;
}

export interface QueryPipelineDeps {
  detector: LanguageDetector;
  translator: TranslationService;
  responder: ResponseGenerator;
  metrics: MetricsCollector;
  logger?: Logger;
  now?: () => number;
}

/**
 * detect → translate → reply → record, one query at a time.
 * Remote failures arrive as text, so every call yields a QueryResult.
 */
export class QueryPipeline {
  private readonly detector: LanguageDetector;
  private readonly translator: TranslationService;
  private readonly responder: ResponseGenerator;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: QueryPipelineDeps) {
    this.detector = deps.detector;
    this.translator = deps.translator;
    this.responder = deps.responder;
    this.metrics = deps.metrics;
    this.now = deps.now ?? Date.now;
    this.logger = (deps.logger ?? createLogger({ name: 'pipeline' })).child({ component: 'pipeline' });
  }

  async process(rawText: string, observer: PipelineObserver = {}): Promise<QueryResult> {
    const startTime = this.now();

    const languageCode = this.detector.detect(rawText);
    const name = languageName(languageCode);
    observer.onDetected?.(languageCode, name);

    const translation = await this.translator.translate(rawText, languageCode);
    observer.onTranslated?.(translation);

    const reply = await this.responder.generateReply(translation.englishText);
    observer.onReplied?.(reply);

    const latency = (this.now() - startTime) / 1000;
    const record = this.metrics.logQuery(
      name,
      rawText,
      translation.englishText,
      translation.confidence,
      latency
    );

    this.logger.info(
      { queryId: record.id, language: languageCode, confidence: translation.confidence, latency },
      'Query processed'
    );

    return {
      originalText: rawText,
      languageCode,
      languageName: name,
      englishText: translation.englishText,
      confidence: translation.confidence,
      reply,
      latency
    };
  }
}
