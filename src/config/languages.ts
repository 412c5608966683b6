import { LanguageCode } from '../types/index.js';

export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: 'English',
  es: 'Spanish',
  hi: 'Hindi',
  mr: 'Marathi',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  ru: 'Russian',
  ar: 'Arabic',
  bn: 'Bengali',
  ta: 'Tamil',
  te: 'Telugu'
};

export function languageName(code: LanguageCode): string {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, code)
    ? LANGUAGE_NAMES[code]
    : code.toUpperCase();
}
