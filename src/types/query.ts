export type LanguageCode = string;

export interface QueryRecord {
  id: string;
  sessionId: string;
  timestamp: number;
  language: string;
  original: string;
  translation: string;
  confidence: number;
  responseTime: number;
}

export interface Translation {
  englishText: string;
  confidence: number;
}

export interface QueryResult {
  originalText: string;
  languageCode: LanguageCode;
  languageName: string;
  englishText: string;
  confidence: number;
  reply: string;
  latency: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

export interface MetricsSummary {
  totalQueries: number;
  sessionDurationSeconds: number;
  languageCounts: LanguageCount[];
  averageConfidence: number;
  averageLatencySeconds: number;
}
