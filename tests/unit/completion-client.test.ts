import { describe, it, expect, beforeEach } from 'vitest';
import {
  RemoteCompletionClient,
  describeFailure,
  resultText
} from '../../src/adapters/completion-client.js';
import { ChatMessage } from '../../src/types/index.js';
import { ConfigurationError } from '../../src/errors.js';
import {
  apiError,
  chatResponse,
  createTransport,
  httpResponse,
  modelListing,
  silentLogger,
  transportError
} from '../fixtures/completions.js';
import { captureLogger } from '../fixtures/logging.js';

const PREFERRED = 'preferred-model';
const FALLBACKS = ['fallback-a', 'fallback-b', 'fallback-c'];

const messages: ChatMessage[] = [
  { role: 'system', content: 'You are a test assistant.' },
  { role: 'user', content: 'Say hello.' }
];

describe('RemoteCompletionClient', () => {
  let http: ReturnType<typeof createTransport>;
  let client: RemoteCompletionClient;

  // The payload object is reused across attempts, so record the model per call
  let sentModels: string[];

  beforeEach(() => {
    http = createTransport();
    sentModels = [];
    client = new RemoteCompletionClient({
      apiKey: 'test-secret',
      preferredModel: PREFERRED,
      fallbackModels: FALLBACKS,
      http,
      logger: silentLogger
    });
  });

  const respondWith = (...outcomes: Array<ReturnType<typeof httpResponse> | Error>) => {
    for (const outcome of outcomes) {
      http.post.mockImplementationOnce(async (_url: string, payload: { model: string }) => {
        sentModels.push(payload.model);
        if (outcome instanceof Error) {
          throw outcome;
        }
        return outcome;
      });
    }
  };

  describe('constructor', () => {
    it('should start on the preferred model', () => {
      expect(client.model).toBe(PREFERRED);
    });

    it('should require at least one fallback model', () => {
      expect(() => new RemoteCompletionClient({
        apiKey: 'test-secret',
        fallbackModels: [],
        http,
        logger: silentLogger
      })).toThrow(ConfigurationError);
    });
  });

  describe('selectActiveModel', () => {
    it('should keep the preferred model when it is listed', async () => {
      http.get.mockResolvedValue(modelListing('fallback-a', PREFERRED));

      await expect(client.selectActiveModel()).resolves.toBe(PREFERRED);
      expect(client.model).toBe(PREFERRED);
      expect(http.get).toHaveBeenCalledWith('/models', expect.objectContaining({ timeout: 10000 }));
    });

    it('should pick the first listed fallback in configured order', async () => {
      http.get.mockResolvedValue(modelListing('fallback-c', 'fallback-b'));

      await expect(client.selectActiveModel()).resolves.toBe('fallback-b');
      expect(client.model).toBe('fallback-b');
    });

    it('should use the first fallback when no candidate is listed', async () => {
      http.get.mockResolvedValue(modelListing('something-else'));

      await expect(client.selectActiveModel()).resolves.toBe('fallback-a');
    });

    it('should use the first fallback when the listing is not 200', async () => {
      http.get.mockResolvedValue(httpResponse(401, { error: { message: 'Invalid API Key' } }));

      await expect(client.selectActiveModel()).resolves.toBe('fallback-a');
    });

    it('should use the first fallback when the probe fails in transport', async () => {
      http.get.mockRejectedValue(transportError('getaddrinfo ENOTFOUND'));

      await expect(client.selectActiveModel()).resolves.toBe('fallback-a');
    });

    it('should treat a malformed listing as empty', async () => {
      http.get.mockResolvedValue(httpResponse(200, { data: 'nope' }));

      await expect(client.selectActiveModel()).resolves.toBe('fallback-a');
    });
  });

  describe('complete', () => {
    it('should send the fixed sampling parameters and return trimmed text', async () => {
      respondWith(chatResponse('  Hello there!  \n'));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: true, text: 'Hello there!' });
      expect(http.post).toHaveBeenCalledTimes(1);
      expect(http.post).toHaveBeenCalledWith(
        '/chat/completions',
        {
          model: PREFERRED,
          messages,
          max_tokens: 300,
          temperature: 0.3,
          top_p: 0.9
        },
        expect.objectContaining({ timeout: 30000 })
      );
    });

    it('should use the model chosen by the startup probe', async () => {
      http.get.mockResolvedValue(modelListing('fallback-b'));
      await client.selectActiveModel();
      respondWith(chatResponse('ok'));

      await client.complete(messages, 50);

      expect(sentModels).toEqual(['fallback-b']);
    });

    it('should return a network error after three transport failures', async () => {
      respondWith(transportError(), transportError(), transportError('socket hang up'));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: false, error: { kind: 'network', cause: 'socket hang up' } });
      expect(http.post).toHaveBeenCalledTimes(3);
    });

    it('should recover when a retry succeeds', async () => {
      respondWith(transportError(), transportError(), chatResponse('Third time lucky'));

      await expect(client.complete(messages, 300)).resolves.toEqual({ ok: true, text: 'Third time lucky' });
      expect(http.post).toHaveBeenCalledTimes(3);
    });

    it('should switch to the first fallback when the model is decommissioned', async () => {
      respondWith(
        apiError(400, `The model \`${PREFERRED}\` has been decommissioned and is no longer supported.`),
        chatResponse('Hello from the fallback')
      );

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: true, text: 'Hello from the fallback' });
      expect(sentModels).toEqual([PREFERRED, 'fallback-a']);
      expect(client.model).toBe('fallback-a');
    });

    it('should treat a "not found" model error the same way', async () => {
      respondWith(
        apiError(400, `The model \`${PREFERRED}\` does not exist or was not found`),
        chatResponse('Hello')
      );

      await client.complete(messages, 300);

      expect(sentModels).toEqual([PREFERRED, 'fallback-a']);
    });

    it('should keep the substituted model for later requests', async () => {
      respondWith(
        apiError(400, 'model decommissioned'),
        chatResponse('first'),
        chatResponse('second')
      );

      await client.complete(messages, 300);
      await client.complete(messages, 300);

      expect(sentModels).toEqual([PREFERRED, 'fallback-a', 'fallback-a']);
    });

    it('should keep retrying the fallback until the attempts run out', async () => {
      respondWith(
        apiError(400, 'model decommissioned'),
        apiError(400, 'model decommissioned'),
        apiError(400, 'model decommissioned')
      );

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: false, error: { kind: 'exhausted' } });
      expect(sentModels).toEqual([PREFERRED, 'fallback-a', 'fallback-a']);
      expect(client.model).toBe('fallback-a');
    });

    it('should retry when the model chosen at startup is the rejected fallback', async () => {
      http.get.mockResolvedValue(modelListing('fallback-a'));
      await client.selectActiveModel();
      respondWith(
        apiError(400, 'model decommissioned'),
        apiError(400, 'model decommissioned'),
        chatResponse('Recovered')
      );

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: true, text: 'Recovered' });
      expect(sentModels).toEqual(['fallback-a', 'fallback-a', 'fallback-a']);
    });

    it('should switch and warn only once per client', async () => {
      const { logger, entries } = captureLogger();
      client = new RemoteCompletionClient({
        apiKey: 'test-secret',
        preferredModel: PREFERRED,
        fallbackModels: FALLBACKS,
        http,
        logger
      });
      respondWith(
        apiError(400, 'model decommissioned'),
        chatResponse('first'),
        apiError(400, 'model decommissioned'),
        chatResponse('second')
      );

      await client.complete(messages, 300);
      await client.complete(messages, 300);

      const warnings = entries.filter(entry => entry.msg === 'Model decommissioned, switching to fallback');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({ model: PREFERRED, fallback: 'fallback-a' });
      expect(sentModels).toEqual([PREFERRED, 'fallback-a', 'fallback-a', 'fallback-a']);
    });

    it('should not retry other 400 responses', async () => {
      respondWith(apiError(400, 'max_tokens is too large'));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'api', status: 400, message: 'max_tokens is too large' }
      });
      expect(http.post).toHaveBeenCalledTimes(1);
      expect(client.model).toBe(PREFERRED);
    });

    it('should not retry server errors', async () => {
      respondWith(httpResponse(503, 'Service Unavailable'));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: false, error: { kind: 'api', status: 503, message: '' } });
      expect(http.post).toHaveBeenCalledTimes(1);
    });

    it('should read the status from transports that throw on non-2xx', async () => {
      const error = transportError('Request failed with status code 429');
      error.response = apiError(429, 'Rate limit reached');
      respondWith(error);

      const result = await client.complete(messages, 300);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'api', status: 429, message: 'Rate limit reached' }
      });
      expect(http.post).toHaveBeenCalledTimes(1);
    });

    it('should report a 200 without message content as an API error', async () => {
      respondWith(httpResponse(200, { choices: [] }));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'api', status: 200, message: 'malformed response' }
      });
    });

    it('should report exhausted retries when a substitution uses the last attempt', async () => {
      respondWith(transportError(), transportError(), apiError(400, 'model decommissioned'));

      const result = await client.complete(messages, 300);

      expect(result).toEqual({ ok: false, error: { kind: 'exhausted' } });
      expect(http.post).toHaveBeenCalledTimes(3);
      expect(client.model).toBe('fallback-a');
    });

    it('should propagate errors that are not transport failures', async () => {
      respondWith(new TypeError('unexpected'));

      await expect(client.complete(messages, 300)).rejects.toThrow('unexpected');
    });
  });
});

describe('describeFailure', () => {
  it('should render API errors with their status', () => {
    expect(describeFailure({ kind: 'api', status: 500 })).toBe('API Error: 500');
  });

  it('should render network errors with their cause', () => {
    expect(describeFailure({ kind: 'network', cause: 'ETIMEDOUT' })).toBe('Network Error: ETIMEDOUT');
  });

  it('should render exhausted retries', () => {
    expect(describeFailure({ kind: 'exhausted' })).toBe('API Error: Failed after retries');
  });
});

describe('resultText', () => {
  it('should pass success text through', () => {
    expect(resultText({ ok: true, text: 'Hi' })).toBe('Hi');
  });

  it('should render failures', () => {
    expect(resultText({ ok: false, error: { kind: 'api', status: 401 } })).toBe('API Error: 401');
  });
});
