import { franc } from 'franc';
import { iso6393 } from 'iso-639-3';
import { LanguageCode } from '../types/index.js';

export type IdentificationResult =
  | { ok: true; code: LanguageCode }
  | { ok: false; reason: string };

/**
 * Statistical language identification, fallible by nature.
 */
export interface LanguageIdentifier {
  identify(text: string): IdentificationResult;
}

// franc reports macrolanguage members; these have no two-letter code of their own
const MACROLANGUAGE_CODES: Record<string, string> = {
  cmn: 'zh',
  arb: 'ar'
};

const ISO639_3_TO_1: Record<string, string> = {};
for (const language of iso6393) {
  if (language.iso6391) {
    ISO639_3_TO_1[language.iso6393] = language.iso6391;
  }
}

export interface FrancIdentifierOptions {
  minLength?: number;
  /** ISO 639-3 codes to choose from; every language franc knows when omitted */
  only?: readonly string[];
}

/**
 * Trigram-based identification through franc. Languages outside the display
 * table still come back under their own two-letter code.
 */
export class FrancIdentifier implements LanguageIdentifier {
  private readonly minLength: number;
  private readonly only: string[];

  constructor(options: FrancIdentifierOptions = {}) {
    this.minLength = options.minLength ?? 10;
    this.only = [...(options.only ?? [])];
  }

  identify(text: string): IdentificationResult {
    let detected: string;
    try {
      detected = franc(text, { minLength: this.minLength, only: this.only });
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (detected === 'und') {
      return { ok: false, reason: 'undetermined' };
    }

    const code = MACROLANGUAGE_CODES[detected] ?? ISO639_3_TO_1[detected];
    if (!code) {
      return { ok: false, reason: `no two-letter code for ${detected}` };
    }

    return { ok: true, code };
  }
}
