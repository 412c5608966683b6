import { v4 as uuidv4 } from 'uuid';
import { LanguageCount, MetricsSummary, QueryRecord } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export interface MetricsCollectorOptions {
  truncateLength?: number;
  now?: () => number;
}

/**
 * Session-lifetime, append-only log of processed queries.
 * Nothing is persisted; records live as long as the collector.
 */
export class MetricsCollector {
  readonly sessionId: string;
  readonly startTime: number;

  private readonly records: QueryRecord[] = [];
  private readonly truncateLength: number;
  private readonly now: () => number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.truncateLength = options.truncateLength ?? DEFAULT_CONFIG.metrics.truncateLength;
    this.now = options.now ?? Date.now;
    this.sessionId = uuidv4();
    this.startTime = this.now();
  }

  logQuery(
    languageName: string,
    originalText: string,
    translatedText: string,
    confidence: number,
    latencySeconds: number
  ): QueryRecord {
    const record: QueryRecord = {
      id: uuidv4(),
      sessionId: this.sessionId,
      timestamp: this.now(),
      language: languageName,
      original: originalText.slice(0, this.truncateLength),
      translation: translatedText.slice(0, this.truncateLength),
      confidence,
      responseTime: latencySeconds
    };

    this.records.push(record);
    return record;
  }

  getRecords(): readonly QueryRecord[] {
    return this.records;
  }

  /**
   * Aggregate view of the session, or null before the first query
   */
  summarize(): MetricsSummary | null {
    if (this.records.length === 0) {
      return null;
    }

    const counts = new Map<string, number>();
    let confidenceTotal = 0;
    let latencyTotal = 0;

    for (const record of this.records) {
      counts.set(record.language, (counts.get(record.language) ?? 0) + 1);
      confidenceTotal += record.confidence;
      latencyTotal += record.responseTime;
    }

    // Array.prototype.sort is stable, so ties keep first-seen order
    const languageCounts: LanguageCount[] = Array.from(counts, ([language, count]) => ({ language, count }))
      .sort((a, b) => b.count - a.count);

    return {
      totalQueries: this.records.length,
      sessionDurationSeconds: Math.floor((this.now() - this.startTime) / 1000),
      languageCounts,
      averageConfidence: confidenceTotal / this.records.length,
      averageLatencySeconds: latencyTotal / this.records.length
    };
  }
}
