import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import OpenAI from 'openai';
import { loadConfig } from '../../config.js';
import { CompletionFailedError, ConfigError } from '../../errors.js';
import { createLogger } from '../../log.js';
import { OpenAISdkTransport, type SdkChatBody } from '../openai.js';
import { RestTransport, type FetchLike } from '../rest.js';
import { createTransport } from '../transport.js';
import type { CompletionRequest } from '../types.js';
import { ScriptedTransport, captureSink } from '../../__tests__/fakes.js';

const OPTIONS = { apiKey: 'test-secret', baseUrl: 'https://llm.example.test/v1', timeoutMs: 5_000 };

const REQUEST: CompletionRequest = {
  messages: [
    { role: 'system', content: 'You are terse.' },
    { role: 'user', content: 'Say hi' },
  ],
  model: 'test-model',
  temperature: 0.1,
  maxTokens: 10,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// ── REST transport ───────────────────────────────────────────────────

describe('RestTransport', () => {
  it('posts an OpenAI-style request and returns the content', async () => {
    const calls: Array<{ url: string; init: RequestInit }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      calls.push({ url, init });
      return jsonResponse({ choices: [{ message: { role: 'assistant', content: ' hi ' } }] });
    };

    const text = await new RestTransport(OPTIONS, fetchImpl).complete(REQUEST);

    assert.equal(text, ' hi ');
    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'https://llm.example.test/v1/chat/completions');
    assert.equal(calls[0].init.method, 'POST');
    assert.equal(new Headers(calls[0].init.headers).get('Authorization'), 'Bearer test-secret');
    const body = calls[0].init.body;
    assert.equal(typeof body, 'string');
    assert.deepEqual(JSON.parse(String(body)), {
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You are terse.' },
        { role: 'user', content: 'Say hi' },
      ],
      temperature: 0.1,
      max_tokens: 10,
    });
  });

  it('accepts an empty completion', async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({ choices: [{ message: { content: '' } }] });
    assert.equal(await new RestTransport(OPTIONS, fetchImpl).complete(REQUEST), '');
  });

  it('fails on a non-2xx status', async () => {
    const fetchImpl: FetchLike = async () => new Response('rate limited', { status: 429 });
    await assert.rejects(new RestTransport(OPTIONS, fetchImpl).complete(REQUEST), (err: unknown) => {
      assert.ok(err instanceof CompletionFailedError);
      assert.equal(err.status, 429);
      assert.equal(err.message, 'Completion failed (rest): HTTP 429: rate limited');
      return true;
    });
  });

  it('fails on an unexpected response shape', async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({ choices: [] });
    await assert.rejects(new RestTransport(OPTIONS, fetchImpl).complete(REQUEST), /Unexpected response shape/);
  });

  it('fails on a network error', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error('ECONNREFUSED');
    };
    await assert.rejects(new RestTransport(OPTIONS, fetchImpl).complete(REQUEST), (err: unknown) => {
      assert.ok(err instanceof CompletionFailedError);
      assert.equal(err.message, 'Completion failed (rest): ECONNREFUSED');
      return true;
    });
  });
});

// ── SDK transport ────────────────────────────────────────────────────

describe('OpenAISdkTransport', () => {
  it('maps the request onto a chat completion call', async () => {
    const bodies: SdkChatBody[] = [];
    const transport = new OpenAISdkTransport(OPTIONS, async (body) => {
      bodies.push(body);
      return { choices: [{ message: { content: 'hello' } }] };
    });

    assert.equal(await transport.complete(REQUEST), 'hello');
    assert.deepEqual(bodies, [
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'You are terse.' },
          { role: 'user', content: 'Say hi' },
        ],
        temperature: 0.1,
        max_tokens: 10,
      },
    ]);
  });

  it('fails when the response carries no content', async () => {
    const transport = new OpenAISdkTransport(OPTIONS, async () => ({ choices: [{ message: { content: null } }] }));
    await assert.rejects(transport.complete(REQUEST), /no message content/);
  });

  it('keeps the HTTP status of API errors', async () => {
    const transport = new OpenAISdkTransport(OPTIONS, async () => {
      throw new OpenAI.APIError(503, undefined, 'unavailable', undefined);
    });
    await assert.rejects(transport.complete(REQUEST), (err: unknown) => {
      assert.ok(err instanceof CompletionFailedError);
      assert.equal(err.transport, 'sdk');
      assert.equal(err.status, 503);
      return true;
    });
  });

  it('builds a real client without touching the network', () => {
    assert.equal(new OpenAISdkTransport(OPTIONS).kind, 'sdk');
  });
});

// ── Transport selection ──────────────────────────────────────────────

describe('createTransport', () => {
  const env = { GROQ_API_KEY: 'test-secret' };

  it('uses the SDK in auto mode when it can be built', () => {
    const sdk = new ScriptedTransport([]);
    const transport = createTransport(loadConfig(env), { createSdk: () => sdk });
    assert.equal(transport, sdk);
  });

  it('falls back to REST in auto mode and logs a warning', () => {
    const { lines, sink } = captureSink();
    const transport = createTransport(loadConfig(env), {
      logger: createLogger('warn', sink),
      createSdk: () => {
        throw new Error('boom');
      },
    });
    assert.equal(transport.kind, 'rest');
    assert.deepEqual(lines, ['WARN: SDK client unavailable, falling back to REST transport {"reason":"boom"}']);
  });

  it('does not fall back when the SDK is requested explicitly', () => {
    assert.throws(
      () =>
        createTransport(loadConfig({ ...env, ERP_ASSISTANT_TRANSPORT: 'sdk' }), {
          createSdk: () => {
            throw new Error('boom');
          },
        }),
      /boom/,
    );
  });

  it('builds REST when configured', () => {
    const transport = createTransport(loadConfig({ ...env, ERP_ASSISTANT_TRANSPORT: 'rest' }));
    assert.ok(transport instanceof RestTransport);
  });

  it('requires an API key', () => {
    assert.throws(() => createTransport(loadConfig({})), ConfigError);
  });
});
