import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';
import { LanguageCode, MarkerLexicon } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ORTHOGRAPHIC_MARKERS, WORD_MARKERS } from '../config/word-markers.js';
import { createLogger } from '../logger.js';
import { FrancIdentifier, LanguageIdentifier } from './statistical-identifier.js';

interface ScriptRule {
  pattern: RegExp;
  code: LanguageCode;
}

// Order matters: first match wins
const SCRIPT_RULES: readonly ScriptRule[] = [
  { pattern: /[\u0400-\u04FF]/, code: 'ru' },
  { pattern: /[\u4E00-\u9FFF]/, code: 'zh' },
  { pattern: /[\uAC00-\uD7AF]/, code: 'ko' },
  { pattern: /[\u3040-\u30FF]/, code: 'ja' }
];

const DEVANAGARI = /[\u0900-\u097F]/;

export interface MarkerCounts {
  hindi: number;
  marathi: number;
}

export interface LanguageDetectorOptions {
  identifier?: LanguageIdentifier;
  lexicon?: MarkerLexicon;
  wordMarkers?: Readonly<Record<LanguageCode, readonly string[]>>;
  cacheSize?: number;
  logger?: Logger;
}

/**
 * Classifies free text into a language code.
 *
 * Script ranges are checked before anything statistical, since trigram models
 * routinely confuse CJK and Cyrillic input. Devanagari text is split between
 * Hindi and Marathi by counting marker words, which general detectors tend to
 * collapse into Hindi. Latin-script text is matched against orthographic
 * markers and common words before the statistical identifier runs.
 * Never throws: unclassifiable input resolves to "en".
 */
export class LanguageDetector {
  private readonly identifier: LanguageIdentifier;
  private readonly lexicon: MarkerLexicon;
  private readonly wordMarkers: Readonly<Record<LanguageCode, readonly string[]>>;
  private readonly cache: LRUCache<string, LanguageCode>;

  constructor(options: LanguageDetectorOptions = {}) {
    this.identifier = options.identifier ?? new FrancIdentifier();
    this.lexicon = options.lexicon ?? DEFAULT_CONFIG.detection.lexicon;
    this.wordMarkers = options.wordMarkers ?? WORD_MARKERS;
    this.cache = new LRUCache<string, LanguageCode>({
      max: options.cacheSize ?? DEFAULT_CONFIG.detection.cacheSize
    });

    const logger = (options.logger ?? createLogger({ name: 'detector' })).child({ component: 'detector' });
    logger.info(
      { lexiconVersion: this.lexicon.version, hindi: this.lexicon.hindi.length, marathi: this.lexicon.marathi.length },
      'Marker lexicon loaded'
    );
  }

  detect(text: string): LanguageCode {
    if (!text.trim()) {
      return 'en';
    }

    const cached = this.cache.get(text);
    if (cached) {
      return cached;
    }

    const code = this.classify(text);
    this.cache.set(text, code);
    return code;
  }

  /**
   * Number of distinct Hindi and Marathi markers present in the text
   */
  countMarkers(text: string): MarkerCounts {
    return {
      hindi: this.lexicon.hindi.filter(marker => text.includes(marker)).length,
      marathi: this.lexicon.marathi.filter(marker => text.includes(marker)).length
    };
  }

  get lexiconVersion(): string {
    return this.lexicon.version;
  }

  private classify(text: string): LanguageCode {
    for (const rule of SCRIPT_RULES) {
      if (rule.pattern.test(text)) {
        return rule.code;
      }
    }

    if (DEVANAGARI.test(text)) {
      return this.classifyDevanagari(text);
    }

    const marked = this.classifyByMarkers(text);
    if (marked) {
      return marked;
    }

    const result = this.identifier.identify(text);
    return result.ok ? result.code : 'en';
  }

  /**
   * A language wins only when it is the single one signalled: first by
   * orthography, then by the most distinct marker words.
   */
  private classifyByMarkers(text: string): LanguageCode | undefined {
    const normalized = text.normalize('NFC');
    const orthographic = new Set(
      ORTHOGRAPHIC_MARKERS.filter(marker => marker.pattern.test(normalized)).map(marker => marker.code)
    );
    if (orthographic.size === 1) {
      return [...orthographic][0];
    }

    const words = new Set(normalized.toLowerCase().split(/[^\p{L}]+/u));
    let best: LanguageCode | undefined;
    let bestCount = 0;
    let tied = false;

    for (const [code, markers] of Object.entries(this.wordMarkers)) {
      const count = markers.filter(marker => words.has(marker)).length;
      if (count > bestCount) {
        best = code;
        bestCount = count;
        tied = false;
      } else if (count > 0 && count === bestCount) {
        tied = true;
      }
    }

    return tied ? undefined : best;
  }

  private classifyDevanagari(text: string): LanguageCode {
    const { hindi, marathi } = this.countMarkers(text);

    if (marathi > hindi && marathi > 0) {
      return 'mr';
    }
    if (hindi > 0) {
      return 'hi';
    }

    // Devanagari never falls through to generic detection
    const result = this.identifier.identify(text);
    if (result.ok && (result.code === 'hi' || result.code === 'mr')) {
      return result.code;
    }
    return 'hi';
  }
}
