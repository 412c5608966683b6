import { HandlerConfig } from '../types/index.js';

export const DEFAULT_CONFIG: HandlerConfig = {
  api: {
    baseUrl: 'https://api.groq.com/openai/v1',
    preferredModel: 'llama-3.3-70b-versatile',
    fallbackModels: ['llama3-70b-8192', 'gemma2-9b-it', 'mixtral-8x7b-32768'],
    requestTimeout: 30000,
    probeTimeout: 10000
  },
  translation: {
    maxTokens: 300,
    errorSubstrings: ['error', 'failed', 'http']
  },
  reply: {
    maxTokens: 400
  },
  detection: {
    cacheSize: 1000,
    lexicon: {
      version: '2025-11',
      hindi: ['है', 'हैं', 'का', 'की', 'के', 'में', 'को', 'से', 'ने', 'और', 'या', 'हो', 'हे'],
      marathi: ['आहे', 'आहेत', 'च्या', 'ला', 'ने', 'मध्ये', 'आणि', 'किंवा']
    }
  },
  metrics: {
    truncateLength: 100
  },
  monitoring: {
    logLevel: 'warn'
  },
  demoQueries: [
    '¿Cómo puedo cambiar mi contraseña?',
    'मेरा ऑर्डर कहाँ है?',
    'Le produit est défectueux',
    'Quero alterar minha senha.'
  ]
};

/**
 * Deep copy so callers can mutate the result freely
 */
export function defaultConfig(): HandlerConfig {
  return structuredClone(DEFAULT_CONFIG);
}
