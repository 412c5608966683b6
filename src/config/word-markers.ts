import { LanguageCode } from '../types/index.js';

export interface OrthographicMarker {
  pattern: RegExp;
  code: LanguageCode;
}

// Punctuation and letters used by exactly one of the languages below
export const ORTHOGRAPHIC_MARKERS: readonly OrthographicMarker[] = [
  { pattern: /[\u00BF\u00A1\u00F1\u00D1]/, code: 'es' },
  { pattern: /[\u00E3\u00F5\u00C3\u00D5]/, code: 'pt' }
];

/**
 * Common words of Latin-script languages, lowercase. No word appears under
 * two languages.
 */
export const WORD_MARKERS: Readonly<Record<LanguageCode, readonly string[]>> = {
  en: ['the', 'my', 'please', 'where', 'what', 'how', 'you', 'thanks'],
  es: ['hola', 'gracias', 'cómo', 'dónde', 'quiero', 'puedo', 'tengo', 'contraseña'],
  pt: ['olá', 'obrigado', 'obrigada', 'você', 'não', 'quero', 'minha', 'senha'],
  fr: ['bonjour', 'merci', 'je', 'vous', 'est', 'mon', 'votre', 'commande'],
  de: ['hallo', 'danke', 'ich', 'nicht', 'ist', 'mein', 'und', 'bitte'],
  it: ['ciao', 'grazie', 'sono', 'mio', 'voglio', 'ordine', 'perché', 'della']
};
