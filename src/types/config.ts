export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface HandlerConfig {
  api: {
    baseUrl: string;
    apiKey?: string;
    preferredModel: string;
    fallbackModels: string[];
    requestTimeout: number;
    probeTimeout: number;
  };

  translation: {
    maxTokens: number;
    errorSubstrings: string[];
  };

  reply: {
    maxTokens: number;
  };

  detection: {
    cacheSize: number;
    lexicon: MarkerLexicon;
  };

  metrics: {
    truncateLength: number;
  };

  monitoring: {
    logLevel: LogLevel;
  };

  demoQueries: string[];
}

/**
 * Hand-curated marker words used to tell Hindi from Marathi.
 * Bump `version` whenever either list changes.
 */
export interface MarkerLexicon {
  version: string;
  hindi: string[];
  marathi: string[];
}
