import { describe, it, expect } from 'vitest';
import { FrancIdentifier } from '../../src/core/statistical-identifier.js';

const DUTCH_PROSE =
  'Goedemiddag, ik heb vorige week een pakket besteld maar het is nog steeds niet bezorgd. ' +
  'Kunt u mij vertellen waar mijn bestelling nu is en wanneer ik het kan verwachten?';

describe('FrancIdentifier', () => {
  const identifier = new FrancIdentifier();

  it('should identify English prose', () => {
    const result = identifier.identify(
      'Hello, I need help with my account because I cannot change the password from the mobile application and the recovery email never arrives in my inbox.'
    );

    expect(result).toEqual({ ok: true, code: 'en' });
  });

  it('should identify Spanish prose', () => {
    const result = identifier.identify(
      'Hola, necesito ayuda con mi cuenta porque no puedo cambiar la contraseña desde la aplicación y el correo de recuperación nunca llega a mi bandeja de entrada.'
    );

    expect(result).toEqual({ ok: true, code: 'es' });
  });

  it('should map Mandarin to "zh"', () => {
    const result = identifier.identify('我想更改我的密码，但是系统一直显示错误信息，请帮助我解决这个问题。');

    expect(result).toEqual({ ok: true, code: 'zh' });
  });

  it('should return languages outside the display table under their own code', () => {
    const result = identifier.identify(DUTCH_PROSE);

    expect(result).toEqual({ ok: true, code: 'nl' });
  });

  it('should choose only from an explicit list when given one', () => {
    const restricted = new FrancIdentifier({ only: ['eng', 'spa'] });

    expect(restricted.identify(DUTCH_PROSE)).not.toEqual({ ok: true, code: 'nl' });
  });

  it('should fail on text shorter than the minimum length', () => {
    expect(identifier.identify('ok')).toEqual({ ok: false, reason: 'undetermined' });
  });

  it('should honour a custom minimum length', () => {
    const strict = new FrancIdentifier({ minLength: 500 });

    expect(strict.identify('Bonjour, le produit que j’ai reçu hier est cassé.').ok).toBe(false);
  });
});
