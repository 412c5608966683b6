/**
 * Multilingual Query Handler - library entry point
 */

export { RemoteCompletionClient, describeFailure, resultText } from './adapters/completion-client.js';
export type { HttpTransport, CompletionClientOptions } from './adapters/completion-client.js';
export { LanguageDetector } from './core/language-detector.js';
export type { LanguageDetectorOptions, MarkerCounts } from './core/language-detector.js';
export { FrancIdentifier } from './core/statistical-identifier.js';
export type { LanguageIdentifier, IdentificationResult } from './core/statistical-identifier.js';
export { QueryPipeline } from './core/query-pipeline.js';
export type { QueryPipelineDeps, PipelineObserver } from './core/query-pipeline.js';
export { TranslationService, scoreTranslation, buildTranslationPrompt } from './services/translation-service.js';
export type { TranslationServiceOptions } from './services/translation-service.js';
export { ResponseGenerator } from './services/response-generator.js';
export { MetricsCollector } from './metrics/metrics-collector.js';
export type { MetricsCollectorOptions } from './metrics/metrics-collector.js';

export { loadConfig, requireApiKey } from './config/loader.js';
export type { ConfigFile } from './config/loader.js';
export { DEFAULT_CONFIG, defaultConfig } from './config/defaults.js';
export { LANGUAGE_NAMES, languageName } from './config/languages.js';
export { ORTHOGRAPHIC_MARKERS, WORD_MARKERS } from './config/word-markers.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export { ConfigurationError } from './errors.js';

export type * from './types/index.js';
