import type { Logger } from 'pino';
import { ChatMessage, CompletionProvider, LanguageCode, Translation } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { languageName } from '../config/languages.js';
import { resultText } from '../adapters/completion-client.js';
import { createLogger } from '../logger.js';

export const TRANSLATOR_PERSONA =
  'You are a professional translator for customer support. Translate accurately, naturally, and preserve intent, tone, and technical terms.';

export interface TranslationServiceOptions {
  maxTokens?: number;
  errorSubstrings?: string[];
  logger?: Logger;
}

/**
 * Word-count heuristic, not a calibrated probability. A translation that reads
 * like a leaked service error loses 15 points, never dropping below 60.
 */
export function scoreTranslation(
  translation: string,
  errorSubstrings: readonly string[] = DEFAULT_CONFIG.translation.errorSubstrings
): number {
  let confidence = 80.0;
  const words = translation.split(/\s+/).filter(Boolean).length;
  if (words >= 3) {
    confidence = 90.0;
  }
  if (words >= 6) {
    confidence = 95.0;
  }

  const lowered = translation.toLowerCase();
  if (errorSubstrings.some(fragment => lowered.includes(fragment.toLowerCase()))) {
    confidence = Math.max(confidence - 15, 60.0);
  }

  return confidence;
}

export class TranslationService {
  private readonly maxTokens: number;
  private readonly errorSubstrings: readonly string[];
  private readonly logger: Logger;

  constructor(private readonly provider: CompletionProvider, options: TranslationServiceOptions = {}) {
    this.maxTokens = options.maxTokens ?? DEFAULT_CONFIG.translation.maxTokens;
    this.errorSubstrings = options.errorSubstrings ?? DEFAULT_CONFIG.translation.errorSubstrings;
    this.logger = (options.logger ?? createLogger({ name: 'translation' }))
      .child({ component: 'translation' });
  }

  async translate(text: string, languageCode: LanguageCode): Promise<Translation> {
    if (languageCode === 'en') {
      return { englishText: text.trim(), confidence: 100.0 };
    }

    const result = await this.provider.complete(
      buildTranslationPrompt(text, languageName(languageCode)),
      this.maxTokens
    );
    const englishText = resultText(result);
    const confidence = scoreTranslation(englishText, this.errorSubstrings);

    this.logger.debug({ language: languageCode, ok: result.ok, confidence }, 'Translation complete');
    return { englishText, confidence };
  }
}

export function buildTranslationPrompt(text: string, displayName: string): ChatMessage[] {
  return [
    { role: 'system', content: TRANSLATOR_PERSONA },
    {
      role: 'user',
      content: `Translate this ${displayName} customer message to clear, natural English. Output ONLY the translation.\n\nText: ${text}`
    }
  ];
}
