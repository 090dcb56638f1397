import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { getEventListeners } from 'events';
import { BridgeClient } from '../../src/client/bridge-client.js';
import { MessageStream } from '../../src/client/message-stream.js';
import type { TransportResponse } from '../../src/client/transport.js';
import { mapRequest } from '../../src/translator/request.js';
import { resetConfig } from '../../src/infrastructure/config/app-config.js';
import {
  APIError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  RateLimitError,
  StreamIncompleteError
} from '../../src/shared/errors/index.js';
import type { MessageCreateParams, StreamingEvent } from '../../src/types/index.js';
import { MockFactories, eventTypes, type FakeTransport, type RecordedCall } from '../utils/mock-factories.js';

const { createChunk, createSSEBody } = MockFactories;

const BASE_URL = 'http://upstream.test/v1';

const streamChunks = [
  createChunk({ role: 'assistant' }),
  createChunk({ content: 'Hi' }),
  createChunk({ content: ' there' }),
  createChunk({}, { finishReason: 'stop', usage: { prompt_tokens: 3, completion_tokens: 2 } })
];

function createClient(fake: FakeTransport, options: { timeoutMs?: number; validateRequests?: boolean } = {}): BridgeClient {
  return new BridgeClient({
    apiKey: 'test-key',
    baseUrl: `${BASE_URL}/`,
    transport: fake.transport,
    logger: MockFactories.createLogger(),
    ...options
  });
}

function sseResponse(body: string): TransportResponse {
  const bytes = new TextEncoder().encode(body);
  return MockFactories.streamResponse([bytes.slice(0, 50), bytes.slice(50)]);
}

function onlyCall(fake: FakeTransport): RecordedCall {
  expect(fake.calls).toHaveLength(1);
  return fake.calls[0];
}

describe('BridgeClient messages.create', () => {
  describe('non-streaming', () => {
    test('posts the mapped request and maps the response', async () => {
      const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(200, MockFactories.createCompletion()));
      const params = MockFactories.createParams({ system: 'Be brief.' });

      const message = await createClient(fake).messages.create(params);

      expect(message).toEqual({
        id: 'chatcmpl-abc123',
        type: 'message',
        role: 'assistant',
        content: [{ type: 'text', text: 'Hello there.' }],
        model: 'gpt-4o-mini',
        stop_reason: 'end_turn',
        stop_sequence: null,
        usage: { input_tokens: 9, output_tokens: 3 }
      });

      const call = onlyCall(fake);
      expect(call.url).toBe('http://upstream.test/v1/chat/completions');
      expect(call.init.method).toBe('POST');
      expect(call.init.headers).toEqual({
        'Authorization': 'Bearer test-key',
        'Content-Type': 'application/json'
      });
      expect(JSON.parse(call.init.body)).toEqual(mapRequest(params, { logger: MockFactories.createLogger() }));
    });

    test('sends default headers alongside the computed ones', async () => {
      const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(200, MockFactories.createCompletion()));
      const client = new BridgeClient({
        apiKey: 'test-key',
        transport: fake.transport,
        logger: MockFactories.createLogger(),
        defaultHeaders: { 'X-Team': 'bridge' }
      });

      await client.messages.create(MockFactories.createParams());

      const call = onlyCall(fake);
      expect(call.url).toBe('https://api.openai.com/v1/chat/completions');
      expect(call.init.headers['X-Team']).toBe('bridge');
    });

    test('wraps an unparseable success body', async () => {
      const fake = MockFactories.createTransport(() => ({
        status: 200,
        ok: true,
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
        body: null
      }));

      await expect(createClient(fake).messages.create(MockFactories.createParams()))
        .rejects.toThrow('Invalid JSON in upstream response: Unexpected token <');
    });
  });

  describe('errors', () => {
    test('maps a rate limit response', async () => {
      const fake = MockFactories.createTransport(() =>
        MockFactories.jsonResponse(429, { error: { message: 'Rate limit reached', type: 'requests' } })
      );

      const error = await createClient(fake).messages.create(MockFactories.createParams()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ statusCode: 429, kind: 'rate_limit', message: 'Rate limit reached' });
    });

    test('maps an unknown status to the generic kind', async () => {
      const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(418, { error: { message: 'teapot' } }));

      const error = await createClient(fake).messages.create(MockFactories.createParams()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({ statusCode: 418, kind: 'generic', message: 'teapot' });
    });

    test('falls back to a generic message when the error body is not JSON', async () => {
      const fake = MockFactories.createTransport(() => ({
        status: 502,
        ok: false,
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
        body: null
      }));

      const error = await createClient(fake).messages.create(MockFactories.createParams()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InternalServerError);
      expect(error).toMatchObject({ statusCode: 502, message: 'Unknown error' });
    });

    test('turns transport failures into internal server errors', async () => {
      const fake = MockFactories.createTransport(() => {
        throw new Error('socket hang up');
      });

      const error = await createClient(fake).messages.create(MockFactories.createParams()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InternalServerError);
      expect(error).toMatchObject({ statusCode: 500, message: 'socket hang up' });
    });

    test('times out while waiting for response headers', async () => {
      const fake = MockFactories.createTransport(({ init }) => new Promise<TransportResponse>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), { once: true });
      }));

      await expect(createClient(fake, { timeoutMs: 20 }).messages.create(MockFactories.createParams()))
        .rejects.toThrow('Request timed out after 20ms');
    });
  });

  describe('validation', () => {
    test('rejects a structurally invalid request before sending it', async () => {
      const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(200, MockFactories.createCompletion()));
      const params: MessageCreateParams = JSON.parse('{"model":"gpt-4o-mini","messages":[{"role":"user","content":"hi"}]}');

      const error = await createClient(fake).messages.create(params).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestError);
      expect(error).toMatchObject({
        statusCode: 400,
        message: "Invalid request: / must have required property 'max_tokens'"
      });
      expect(fake.calls).toHaveLength(0);
    });

    test('can be switched off', async () => {
      const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(200, MockFactories.createCompletion()));
      const params: MessageCreateParams = JSON.parse('{"model":"gpt-4o-mini","messages":[{"role":"user","content":"hi"}]}');

      await createClient(fake, { validateRequests: false }).messages.create(params);

      expect(fake.calls).toHaveLength(1);
    });
  });

  describe('streaming', () => {
    test('yields lifecycle events and asks for an event stream', async () => {
      const fake = MockFactories.createTransport(() => sseResponse(createSSEBody(streamChunks)));

      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());
      const events: StreamingEvent[] = [];
      for await (const event of stream) {
        events.push(event);
      }

      expect(eventTypes(events)).toEqual([
        'message_start',
        'content_block_start',
        'content_block_delta',
        'content_block_delta',
        'content_block_stop',
        'message_delta',
        'message_stop'
      ]);
      expect(stream.completed).toBe(true);

      const call = onlyCall(fake);
      expect(call.init.headers['Accept']).toBe('text/event-stream');
      expect(JSON.parse(call.init.body)).toMatchObject({ stream: true });
    });

    test('finalMessage drains the stream and assembles the message', async () => {
      const fake = MockFactories.createTransport(() => sseResponse(createSSEBody(streamChunks)));

      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      await expect(stream.finalMessage()).resolves.toEqual({
        id: 'chatcmpl-test',
        type: 'message',
        role: 'assistant',
        content: [{ type: 'text', text: 'Hi there' }],
        model: 'gpt-4o-mini',
        stop_reason: 'end_turn',
        stop_sequence: null,
        usage: { input_tokens: 3, output_tokens: 2 }
      });
    });

    test('can only be iterated once', async () => {
      const fake = MockFactories.createTransport(() => sseResponse(createSSEBody(streamChunks)));
      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      await stream.finalMessage();

      await expect(stream[Symbol.asyncIterator]().next()).rejects.toThrow('MessageStream can only be iterated once');
    });

    test('finalMessage reports a truncated stream', async () => {
      const fake = MockFactories.createTransport(() =>
        sseResponse(createSSEBody(streamChunks.slice(0, 2), { done: false }))
      );
      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      await expect(stream.finalMessage()).rejects.toBeInstanceOf(StreamIncompleteError);
      expect(stream.completed).toBe(false);
    });

    test('read errors surface as internal server errors', async () => {
      async function* body() {
        yield createSSEBody(streamChunks.slice(0, 1), { done: false });
        throw new Error('ECONNRESET');
      }
      const fake = MockFactories.createTransport(() => MockFactories.streamResponse(body()));
      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      const events: StreamingEvent[] = [];
      const error = await (async () => {
        for await (const event of stream) events.push(event);
      })().catch((e: unknown) => e);

      expect(eventTypes(events)).toEqual(['message_start']);
      expect(error).toBeInstanceOf(InternalServerError);
      expect(error).toMatchObject({ message: 'ECONNRESET' });
    });

    test('abort ends iteration quietly', async () => {
      let signal: AbortSignal | undefined;
      async function* body() {
        yield createSSEBody(streamChunks.slice(0, 1), { done: false });
        await new Promise<void>(resolve => {
          if (!signal || signal.aborted) resolve();
          else signal.addEventListener('abort', () => resolve(), { once: true });
        });
        throw new Error('The operation was aborted');
      }
      const fake = MockFactories.createTransport(({ init }) => {
        signal = init.signal;
        return MockFactories.streamResponse(body());
      });
      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      const events: StreamingEvent[] = [];
      for await (const event of stream) {
        events.push(event);
        stream.abort();
      }

      expect(eventTypes(events)).toEqual(['message_start']);
      expect(stream.aborted).toBe(true);
      expect(stream.completed).toBe(false);
    });

    test('breaking out of the loop aborts the request', async () => {
      const fake = MockFactories.createTransport(() => sseResponse(createSSEBody(streamChunks)));
      const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams());

      for await (const event of stream) {
        expect(event.type).toBe('message_start');
        break;
      }

      expect(onlyCall(fake).init.signal?.aborted).toBe(true);
      expect(stream).toBeInstanceOf(MessageStream);
    });
  });
});

describe('caller AbortSignal', () => {
  test('listeners are removed once non-streaming requests settle', async () => {
    const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(200, MockFactories.createCompletion()));
    const client = createClient(fake);
    const shared = new AbortController();

    for (let i = 0; i < 20; i++) {
      await client.messages.create(MockFactories.createParams(), { signal: shared.signal });
    }

    expect(getEventListeners(shared.signal, 'abort')).toHaveLength(0);
  });

  test('listener is removed when an error status is returned', async () => {
    const fake = MockFactories.createTransport(() => MockFactories.jsonResponse(500, { error: { message: 'boom' } }));
    const shared = new AbortController();

    await expect(
      createClient(fake).messages.create(MockFactories.createParams(), { signal: shared.signal })
    ).rejects.toBeInstanceOf(InternalServerError);

    expect(getEventListeners(shared.signal, 'abort')).toHaveLength(0);
  });

  test('streaming keeps the listener until the stream is drained', async () => {
    const fake = MockFactories.createTransport(() => sseResponse(createSSEBody(streamChunks)));
    const shared = new AbortController();

    const stream = await createClient(fake).messages.create(MockFactories.createStreamingParams(), { signal: shared.signal });
    expect(getEventListeners(shared.signal, 'abort')).toHaveLength(1);

    await stream.finalMessage();

    expect(getEventListeners(shared.signal, 'abort')).toHaveLength(0);
    expect(shared.signal.aborted).toBe(false);
  });
});

describe('BridgeClient.fromEnv', () => {
  let savedKey: string | undefined;

  beforeEach(() => {
    savedKey = process.env.OPENAI_API_KEY;
    delete process.env.OPENAI_API_KEY;
    resetConfig();
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = savedKey;
    }
    resetConfig();
  });

  test('requires an API key', () => {
    expect(() => BridgeClient.fromEnv()).toThrow(AuthenticationError);
  });

  test('reads the key and base URL from the environment', () => {
    process.env.OPENAI_API_KEY = 'test-key';

    const client = BridgeClient.fromEnv({ baseUrl: 'http://localhost:9999/v1' });

    expect(client.baseUrl).toBe('http://localhost:9999/v1');
    expect(client.validateRequests).toBe(true);
  });
});
